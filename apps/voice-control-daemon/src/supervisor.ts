import { setTimeout as delay } from 'node:timers/promises';
import type { StageHealth, StatusBus } from '@lightcue/pipeline-events';
import { Channel } from './channel';
import type { PipelineConfig } from './config';
import { FatalPipelineError, type Fault, type FaultReporter } from './errors';
import type { IFeedback } from './feedback';
import type { Logger } from './logger';
import type { Pipeline, PipelineFactory } from './pipeline';
import type { Clock } from './stage';
import type { ScheduledTimer } from './timerService';

export const RECOVERY_ANNOUNCEMENT = 'System is having issues. Attempting to recover.';

export interface SupervisorOptions {
  factory: PipelineFactory;
  config: PipelineConfig['supervisor'];
  feedback: IFeedback;
  bus: StatusBus;
  log: Logger;
  clock?: Clock;
  sleep?: (ms: number) => Promise<void>;
}

export interface SupervisorStatus {
  restarts: number;
  stages: StageHealth[];
  timers: ScheduledTimer[];
}

/**
 * Owns the pipeline. Each poll drains the error channel and inspects stage
 * health; a crash, a stall or too many faults in the rolling window rebuild
 * the whole pipeline after a backoff. A rebuild that fails is fatal.
 */
export class Supervisor {
  private pipeline: Pipeline | null = null;
  private readonly faults = new Channel<Fault>(256);
  private faultTimes: number[] = [];
  private restartCount = 0;
  private backoffMs: number;
  private lastRestartAt: number | null = null;
  private isRunning = false;

  private readonly clock: Clock;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(private readonly options: SupervisorOptions) {
    this.clock = options.clock ?? Date.now;
    this.sleep = options.sleep ?? ((ms) => delay(ms));
    this.backoffMs = options.config.backoffInitialMs;
  }

  /** Handed to every pipeline build; stages report service faults through it */
  readonly reportFault: FaultReporter = (fault) => {
    if (!this.faults.trySend(fault)) {
      this.options.log.warn({ stage: fault.stage }, 'error channel full, fault dropped');
    }
  };

  get restarts(): number {
    return this.restartCount;
  }

  get running(): boolean {
    return this.isRunning;
  }

  status(): SupervisorStatus {
    return {
      restarts: this.restartCount,
      stages: this.pipeline?.health() ?? [],
      timers: this.pipeline?.activeTimers() ?? [],
    };
  }

  start(): void {
    if (this.isRunning) return;
    this.pipeline = this.build();
    this.isRunning = true;
    this.options.log.info({ stages: this.pipeline.health().map((h) => h.name) }, 'pipeline started');
  }

  /** Polls until stop(); rejects with FatalPipelineError if a rebuild fails */
  async run(): Promise<void> {
    this.start();
    while (this.isRunning) {
      await this.sleep(this.options.config.pollIntervalMs);
      if (!this.isRunning) break;
      try {
        await this.poll();
      } catch (err) {
        this.isRunning = false;
        throw err;
      }
    }
  }

  /** One supervision pass; true when it restarted the pipeline */
  async poll(): Promise<boolean> {
    const now = this.clock();
    for (const fault of this.faults.drain()) {
      this.faultTimes.push(fault.at);
      this.options.log.debug({ err: fault.error, stage: fault.stage }, 'fault recorded');
    }
    const windowMs = this.options.config.errorWindowMs;
    this.faultTimes = this.faultTimes.filter((at) => now - at <= windowMs);

    const reason = this.restartReason(now);
    if (!reason) return false;
    await this.restart(reason);
    return true;
  }

  async stop(): Promise<void> {
    this.isRunning = false;
    const pipeline = this.pipeline;
    this.pipeline = null;
    await pipeline?.stop();
    this.options.log.info('pipeline stopped');
  }

  private restartReason(now: number): string | null {
    const { stallTimeoutMs, maxErrors, errorWindowMs } = this.options.config;

    for (const health of this.pipeline?.health() ?? []) {
      if (health.state === 'crashed') {
        return health.error ? `${health.name} crashed: ${health.error}` : `${health.name} crashed`;
      }
      if (health.state === 'running' && now - health.lastHeartbeat > stallTimeoutMs) {
        return `${health.name} stalled`;
      }
    }

    if (this.faultTimes.length > maxErrors) {
      return `${this.faultTimes.length} errors within ${errorWindowMs} ms`;
    }
    return null;
  }

  private async restart(reason: string): Promise<void> {
    const { config, feedback, bus, log } = this.options;
    const now = this.clock();

    if (this.lastRestartAt !== null && now - this.lastRestartAt > config.errorWindowMs) {
      this.backoffMs = config.backoffInitialMs;
    }
    this.restartCount += 1;
    log.warn({ reason, restarts: this.restartCount, backoffMs: this.backoffMs }, 'restarting pipeline');
    feedback.say(RECOVERY_ANNOUNCEMENT);
    bus.publish({ type: 'restart', reason, restarts: this.restartCount, timestamp: now });

    const previous = this.pipeline;
    this.pipeline = null;
    await previous?.stop();

    await this.sleep(this.backoffMs);
    this.backoffMs = Math.min(this.backoffMs * 2, config.backoffMaxMs);

    this.faultTimes = [];
    const stale = this.faults.drain();
    if (stale.length > 0) log.debug({ count: stale.length }, 'discarded faults from the stopped pipeline');
    if (!this.isRunning) return;

    this.lastRestartAt = this.clock();
    this.pipeline = this.build();
  }

  private build(): Pipeline {
    let pipeline: Pipeline;
    try {
      pipeline = this.options.factory(this.reportFault);
      pipeline.start();
    } catch (err) {
      throw new FatalPipelineError('Pipeline could not be started', { cause: err });
    }
    return pipeline;
  }
}
