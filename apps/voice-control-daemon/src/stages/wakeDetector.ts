import type { CaptureInboxMessage, StatusBus } from '@lightcue/pipeline-events';
import type { IFrameSource, IWakeWordBackend } from '@lightcue/wake-word';
import type { Channel } from '../channel';
import { StageCrashedError } from '../errors';
import type { IFeedback } from '../feedback';
import type { Logger } from '../logger';
import { Stage, type Clock } from '../stage';

export interface WakeDetectorDeps {
  backend: IWakeWordBackend;
  source: IFrameSource;
  keyword: string;
  outbox: Channel<CaptureInboxMessage>;
  feedback: IFeedback;
  bus: StatusBus;
  log: Logger;
  clock?: Clock;
}

export class WakeDetectorStage extends Stage {
  constructor(private readonly deps: WakeDetectorDeps) {
    super('wake-detector', deps.log, deps.clock);
  }

  protected async step(): Promise<void> {
    const { backend, source, keyword, outbox, feedback, bus } = this.deps;

    const frame = await source.read(backend.frameLength);
    if (!this.running) return;
    if (!frame) throw new StageCrashedError('Audio frame source ended');

    if (backend.process(frame) < 0) return;

    const at = this.clock();
    this.log.info({ keyword }, 'wake word detected');
    feedback.cue('wake');
    bus.publish({ type: 'wake', keyword, timestamp: at });
    if (!outbox.trySend({ kind: 'WakeDetected', keyword, at })) {
      this.log.warn('capture inbox full, wake event dropped');
    }
  }

  protected onStop(): void {
    this.deps.source.close();
  }

  /** Frees the backend once the loop has exited */
  async stop(): Promise<void> {
    await super.stop();
    this.deps.backend.release();
  }
}
