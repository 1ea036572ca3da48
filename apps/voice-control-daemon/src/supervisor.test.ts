import { setTimeout as delay } from 'node:timers/promises';
import { StatusBus, type PipelineStatusEvent } from '@lightcue/pipeline-events';
import { createPipelineConfig } from './config';
import { FatalPipelineError, RecognitionTimeoutError } from './errors';
import { MockFeedback } from './feedback';
import { logger } from './logger';
import { Pipeline, type PipelineFactory } from './pipeline';
import { Stage, type Clock } from './stage';
import { RECOVERY_ANNOUNCEMENT, Supervisor } from './supervisor';
import { TimerService } from './timerService';

// ─── Fake stages ──────────────────────────────────────────────────────────────

class IdleStage extends Stage {
  constructor(name: string, clock: Clock) {
    super(name, logger, clock);
  }

  protected async step(): Promise<void> {
    await delay(5);
  }
}

class CrashingStage extends Stage {
  constructor(name: string, clock: Clock) {
    super(name, logger, clock);
  }

  protected async step(): Promise<void> {
    throw new Error('microphone unplugged');
  }
}

/** Blocks in step() until stopped */
class StuckStage extends Stage {
  private release: (() => void) | null = null;

  constructor(name: string, clock: Clock) {
    super(name, logger, clock);
  }

  protected step(): Promise<void> {
    return new Promise((resolve) => {
      this.release = resolve;
    });
  }

  protected onStop(): void {
    this.release?.();
  }
}

// ─── Harness ──────────────────────────────────────────────────────────────────

type StageKind = 'idle' | 'crash' | 'stuck';

function setup(plan: Array<StageKind | 'throw'>) {
  let now = 0;
  const clock: Clock = () => now;
  const sleeps: number[] = [];
  const feedback = new MockFeedback();
  const bus = new StatusBus();
  const events: PipelineStatusEvent[] = [];
  bus.subscribe((event) => events.push(event));

  let builds = 0;
  const factory: PipelineFactory = () => {
    const kind = plan[Math.min(builds, plan.length - 1)] ?? 'idle';
    builds += 1;
    if (kind === 'throw') throw new Error('microphone missing');
    const stage =
      kind === 'crash'
        ? new CrashingStage('audio-capture', clock)
        : kind === 'stuck'
          ? new StuckStage('recognizer', clock)
          : new IdleStage('dispatcher', clock);
    return new Pipeline([stage], new TimerService(() => undefined, clock));
  };

  const supervisor = new Supervisor({
    factory,
    config: createPipelineConfig().supervisor,
    feedback,
    bus,
    log: logger,
    clock,
    // backoff is recorded, not waited out; the short yield keeps run() off a microtask spin
    sleep: async (ms) => {
      sleeps.push(ms);
      await delay(1);
    },
  });

  return {
    supervisor,
    feedback,
    events,
    sleeps,
    builds: () => builds,
    setNow: (value: number) => {
      now = value;
    },
  };
}

async function waitForCrash(supervisor: Supervisor): Promise<void> {
  await vi.waitFor(() => {
    expect(supervisor.status().stages[0]?.state).toBe('crashed');
  });
}

// ─── Tests ────────────────────────────────────────────────────────────────────

describe('Supervisor', () => {
  it('restarts once when more than five faults land inside the window', async () => {
    const { supervisor, sleeps, feedback, events, builds, setNow } = setup(['idle']);
    supervisor.start();

    for (const at of [0, 4_000, 8_000, 12_000, 16_000, 20_000]) {
      supervisor.reportFault({ error: new RecognitionTimeoutError(5_000), stage: 'recognizer', at });
    }
    setNow(20_000);

    await expect(supervisor.poll()).resolves.toBe(true);
    await expect(supervisor.poll()).resolves.toBe(false);

    expect(supervisor.restarts).toBe(1);
    expect(sleeps).toEqual([1_000]);
    expect(builds()).toBe(2);
    expect(feedback.spoken).toEqual([RECOVERY_ANNOUNCEMENT]);
    expect(events).toEqual([{ type: 'restart', reason: '6 errors within 30000 ms', restarts: 1, timestamp: 20_000 }]);
    await supervisor.stop();
  });

  it('tolerates exactly the error budget', async () => {
    const { supervisor, setNow } = setup(['idle']);
    supervisor.start();
    for (const at of [0, 1_000, 2_000, 3_000, 4_000]) {
      supervisor.reportFault({ error: new Error('flaky'), stage: 'recognizer', at });
    }
    setNow(5_000);

    await expect(supervisor.poll()).resolves.toBe(false);
    await supervisor.stop();
  });

  it('forgets faults that fall out of the rolling window', async () => {
    const { supervisor, setNow } = setup(['idle']);
    supervisor.start();
    for (const at of [0, 1_000, 2_000, 3_000, 4_000, 31_000]) {
      supervisor.reportFault({ error: new Error('flaky'), stage: 'recognizer', at });
    }
    setNow(31_000);

    await expect(supervisor.poll()).resolves.toBe(false);
    expect(supervisor.restarts).toBe(0);
    await supervisor.stop();
  });

  it('rebuilds the pipeline when a stage crashes', async () => {
    const { supervisor, events, builds } = setup(['crash', 'idle']);
    supervisor.start();
    await waitForCrash(supervisor);

    await expect(supervisor.poll()).resolves.toBe(true);

    expect(builds()).toBe(2);
    expect(events[0]).toMatchObject({ type: 'restart', reason: 'audio-capture crashed: microphone unplugged' });
    expect(supervisor.status().stages.map((s) => [s.name, s.state])).toEqual([['dispatcher', 'running']]);
    await supervisor.stop();
  });

  it('rebuilds the pipeline when a stage stops beating', async () => {
    const { supervisor, events, setNow } = setup(['stuck', 'idle']);
    supervisor.start();

    setNow(30_000);
    await expect(supervisor.poll()).resolves.toBe(false);

    setNow(30_001);
    await expect(supervisor.poll()).resolves.toBe(true);
    expect(events[0]).toMatchObject({ type: 'restart', reason: 'recognizer stalled' });
    await supervisor.stop();
  });

  it('doubles the backoff up to the cap and resets it after a quiet window', async () => {
    const { supervisor, sleeps, setNow } = setup(['crash']);
    supervisor.start();

    for (let i = 0; i < 7; i += 1) {
      await waitForCrash(supervisor);
      await supervisor.poll();
    }
    expect(sleeps).toEqual([1_000, 2_000, 4_000, 8_000, 16_000, 30_000, 30_000]);

    setNow(40_000);
    await waitForCrash(supervisor);
    await supervisor.poll();
    expect(sleeps.at(-1)).toBe(1_000);
    expect(supervisor.restarts).toBe(8);
    await supervisor.stop();
  });

  it('treats a failed rebuild as fatal', async () => {
    const { supervisor } = setup(['crash', 'throw']);
    supervisor.start();
    await waitForCrash(supervisor);

    await expect(supervisor.poll()).rejects.toBeInstanceOf(FatalPipelineError);
  });

  it('fails start() when the first build fails', () => {
    const { supervisor } = setup(['throw']);
    expect(() => supervisor.start()).toThrow('Pipeline could not be started');
    expect(supervisor.running).toBe(false);
  });

  it('run() polls until stopped', async () => {
    const { supervisor, sleeps } = setup(['idle']);
    const done = supervisor.run();

    await vi.waitFor(() => expect(sleeps.length).toBeGreaterThan(2));
    await supervisor.stop();
    await expect(done).resolves.toBeUndefined();
    expect(sleeps.every((ms) => ms === 500)).toBe(true);
    expect(supervisor.status().stages).toEqual([]);
  });

  it('run() rejects when recovery is impossible', async () => {
    const { supervisor } = setup(['crash', 'throw']);
    const done = supervisor.run();

    await expect(done).rejects.toThrow('Pipeline could not be started');
    expect(supervisor.running).toBe(false);
  });
});
