import type { StageHealth, StageState } from '@lightcue/pipeline-events';
import { toError } from './errors';
import type { Logger } from './logger';

export type Clock = () => number;

/**
 * One worker loop on the event loop. Subclasses implement `step()`, which
 * must return within a bounded time (an inbox wait, a bounded capture or
 * recognition call) so the running flag and heartbeat stay current.
 */
export abstract class Stage {
  private state: StageState = 'idle';
  private heartbeatAt: number;
  private failure: Error | null = null;
  private loop: Promise<void> | null = null;

  protected constructor(
    readonly name: string,
    protected readonly log: Logger,
    protected readonly clock: Clock = Date.now,
  ) {
    this.heartbeatAt = clock();
  }

  protected abstract step(): Promise<void>;

  /** Close inputs and release resources so a pending step returns promptly */
  protected onStop(): void {}

  protected get running(): boolean {
    return this.state === 'running';
  }

  protected beat(): void {
    this.heartbeatAt = this.clock();
  }

  start(): void {
    if (this.state === 'running') return;
    this.state = 'running';
    this.failure = null;
    this.beat();
    this.loop = this.runLoop();
    this.log.debug('stage started');
  }

  /** Resolves once the loop has exited */
  async stop(): Promise<void> {
    if (this.state === 'running' || this.state === 'idle') this.state = 'stopped';
    this.onStop();
    await this.loop;
    this.loop = null;
    this.log.debug('stage stopped');
  }

  health(): StageHealth {
    return {
      name: this.name,
      state: this.state,
      lastHeartbeat: this.heartbeatAt,
      ...(this.failure ? { error: this.failure.message } : {}),
    };
  }

  private async runLoop(): Promise<void> {
    try {
      while (this.state === 'running') {
        await this.step();
        this.beat();
      }
    } catch (err) {
      if (this.state !== 'running') return;
      this.state = 'crashed';
      this.failure = toError(err);
      this.log.error({ err: this.failure }, 'stage crashed');
    }
  }
}
