import type { AudioClip } from '@lightcue/pipeline-events';

export interface CaptureLimits {
  /** How long to wait for speech to begin */
  timeoutMs: number;
  /** Longest utterance kept once speech has begun */
  phraseLimitMs: number;
}

export interface IUtteranceRecorder {
  /** Null when no speech began within the timeout, or the recording was aborted */
  record(limits: CaptureLimits): Promise<AudioClip | null>;
  /** Ends a pending record() call */
  abort(): void;
}

/**
 * Scripted recorder. Each call consumes the next queued clip; a queued null
 * or an empty script is a listening timeout.
 */
export class MockUtteranceRecorder implements IUtteranceRecorder {
  private readonly script: Array<AudioClip | null> = [];
  readonly calls: CaptureLimits[] = [];
  aborted = 0;

  enqueue(...outcomes: Array<AudioClip | null>): this {
    this.script.push(...outcomes);
    return this;
  }

  get pending(): number {
    return this.script.length;
  }

  async record(limits: CaptureLimits): Promise<AudioClip | null> {
    this.calls.push(limits);
    const next = this.script.shift();
    if (next) return next;
    await new Promise((resolve) => setTimeout(resolve, 1));
    return null;
  }

  abort(): void {
    this.aborted += 1;
  }
}
