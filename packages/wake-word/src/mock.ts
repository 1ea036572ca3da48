import type { IFrameSource, IWakeWordBackend, WakeWordBackendFactory } from './backend';

/**
 * Reports a detection for frames whose first sample equals the marker value.
 */
export class MockWakeWordBackend implements IWakeWordBackend {
  static readonly DETECTION_MARKER = 4_242;

  readonly frameLength: number;
  readonly sampleRate = 16_000;
  processed = 0;
  released = false;

  constructor(readonly keyword = 'jarvis', frameLength = 512) {
    this.frameLength = frameLength;
  }

  process(frame: Int16Array): number {
    if (this.released) throw new Error('Backend already released');
    this.processed += 1;
    return frame[0] === MockWakeWordBackend.DETECTION_MARKER ? 0 : -1;
  }

  release(): void {
    this.released = true;
  }
}

/** Factory that rejects the listed keywords and records every attempt */
export function mockWakeWordFactory(rejected: readonly string[] = []): WakeWordBackendFactory & {
  attempts: string[];
} {
  const attempts: string[] = [];
  const factory = (keyword: string) => {
    attempts.push(keyword);
    if (rejected.includes(keyword)) throw new Error(`Keyword ${keyword} not supported`);
    return new MockWakeWordBackend(keyword);
  };
  return Object.assign(factory, { attempts });
}

/**
 * Frame source that replays queued frames, then idles (or ends the stream
 * once closed or when `endWhenDrained` is set).
 */
export class MockFrameSource implements IFrameSource {
  private readonly queue: Int16Array[] = [];
  private closed = false;

  constructor(private readonly endWhenDrained = false) {}

  pushSilence(frameLength: number, count = 1): this {
    for (let i = 0; i < count; i += 1) this.queue.push(new Int16Array(frameLength));
    return this;
  }

  pushWake(frameLength: number): this {
    const frame = new Int16Array(frameLength);
    frame[0] = MockWakeWordBackend.DETECTION_MARKER;
    this.queue.push(frame);
    return this;
  }

  async read(frameLength: number): Promise<Int16Array | null> {
    if (this.closed) return null;
    const next = this.queue.shift();
    if (next) return next;
    if (this.endWhenDrained) return null;
    await new Promise((resolve) => setTimeout(resolve, 5));
    return new Int16Array(frameLength);
  }

  close(): void {
    this.closed = true;
  }
}
