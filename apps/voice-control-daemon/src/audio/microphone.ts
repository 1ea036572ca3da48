import { spawn } from 'node:child_process';
import type { Readable } from 'node:stream';
import { record, type Recording } from 'node-record-lpcm16';
import { createAudioClip, type AudioClip } from '@lightcue/pipeline-events';
import type { IFrameSource } from '@lightcue/wake-word';
import { AudioInputError } from '../errors';
import type { Logger } from '../logger';
import type { CaptureLimits, IUtteranceRecorder } from './recorder';
import { EnergyVad } from './vad';

// ─── PCM stream reader ────────────────────────────────────────────────────────

/**
 * Pulls fixed numbers of little-endian 16-bit samples out of a raw PCM stream.
 */
class PcmReader {
  private chunks: Buffer[] = [];
  private buffered = 0;
  private received = 0;
  private ended = false;
  private closed = false;
  private failure: Error | null = null;
  private notify: (() => void) | null = null;

  constructor(stream: Readable) {
    stream.on('data', (chunk: Buffer) => {
      this.chunks.push(chunk);
      this.buffered += chunk.length;
      this.received += chunk.length;
      this.wake();
    });
    stream.on('end', () => this.finish());
    stream.on('close', () => this.finish());
    stream.on('error', (err: Error) => this.fail(err));
  }

  /** Pending and later reads reject with the first failure */
  fail(err: Error): void {
    this.failure ??= err;
    this.wake();
  }

  /** Deliberate stop: pending and later reads resolve null */
  close(): void {
    this.closed = true;
    this.finish();
  }

  private finish(): void {
    this.ended = true;
    this.wake();
  }

  async read(sampleCount: number): Promise<Int16Array | null> {
    const bytes = sampleCount * 2;
    while (this.buffered < bytes) {
      if (this.failure) throw this.failure;
      if (this.closed) return null;
      if (this.ended) {
        if (this.received === 0) throw new AudioInputError('Audio recorder ended before producing audio');
        return null;
      }
      await new Promise<void>((resolve) => {
        this.notify = resolve;
      });
    }

    const joined = Buffer.concat(this.chunks);
    const rest = joined.subarray(bytes);
    this.chunks = rest.length > 0 ? [rest] : [];
    this.buffered = rest.length;

    const samples = new Int16Array(sampleCount);
    for (let i = 0; i < sampleCount; i += 1) samples[i] = joined.readInt16LE(i * 2);
    return samples;
  }

  private wake(): void {
    const notify = this.notify;
    this.notify = null;
    notify?.();
  }
}

export interface MicrophoneOptions {
  sampleRate: number;
  /** Recorder binary; SoX `rec` by default */
  recorder?: 'sox' | 'rec' | 'arecord';
  device?: string;
}

export type RecordingStarter = (options: MicrophoneOptions) => Recording;

export const startRecording: RecordingStarter = (options) => {
  return record({
    sampleRate: options.sampleRate,
    channels: 1,
    audioType: 'raw',
    threshold: 0,
    thresholdStart: null,
    thresholdEnd: null,
    recorder: options.recorder ?? 'rec',
    device: options.device ?? null,
    endOnSilence: false,
  });
};

function openReader(recording: Recording, options: MicrophoneOptions): PcmReader {
  const reader = new PcmReader(recording.stream());
  const binary = options.recorder ?? 'rec';
  recording.process.on('error', (err) => {
    reader.fail(new AudioInputError(`Audio recorder "${binary}" failed to start`, { cause: err }));
  });
  return reader;
}

/** Resolves whether the recorder binary is on PATH */
export function recorderAvailable(binary: string): Promise<boolean> {
  return new Promise((resolve) => {
    const which = spawn('which', [binary]);
    which.on('close', (code) => resolve(code === 0));
    which.on('error', () => resolve(false));
  });
}

// ─── Frame source (wake detector) ─────────────────────────────────────────────

export class MicrophoneFrameSource implements IFrameSource {
  private recording: Recording | null = null;
  private reader: PcmReader | null = null;
  private closed = false;

  constructor(
    private readonly options: MicrophoneOptions,
    private readonly start: RecordingStarter = startRecording,
  ) {}

  async read(frameLength: number): Promise<Int16Array | null> {
    if (this.closed) return null;
    if (!this.reader) {
      this.recording = this.start(this.options);
      this.reader = openReader(this.recording, this.options);
    }
    return this.reader.read(frameLength);
  }

  close(): void {
    this.closed = true;
    this.recording?.stop();
    this.reader?.close();
    this.recording = null;
  }
}

// ─── Utterance recorder (capture stage) ───────────────────────────────────────

const FRAME_MS = 30;

export interface MicrophoneRecorderOptions extends MicrophoneOptions {
  energyThreshold: number;
  endSilenceMs: number;
}

/**
 * Records one utterance per call: waits for speech, keeps it until trailing
 * silence or the phrase limit. Limits are counted in captured audio.
 */
export class MicrophoneUtteranceRecorder implements IUtteranceRecorder {
  private active: { recording: Recording; reader: PcmReader } | null = null;

  constructor(
    private readonly options: MicrophoneRecorderOptions,
    private readonly log: Logger,
    private readonly start: RecordingStarter = startRecording,
  ) {}

  async record(limits: CaptureLimits): Promise<AudioClip | null> {
    const frameSamples = Math.round((this.options.sampleRate * FRAME_MS) / 1000);
    const vad = new EnergyVad({
      energyThreshold: this.options.energyThreshold,
      startFrames: 3,
      endFrames: Math.max(1, Math.ceil(this.options.endSilenceMs / FRAME_MS)),
    });
    const startupFrames = Math.ceil(limits.timeoutMs / FRAME_MS);
    const phraseFrames = Math.ceil(limits.phraseLimitMs / FRAME_MS);

    const recording = this.start(this.options);
    const reader = openReader(recording, this.options);
    this.active = { recording, reader };

    const preRoll: Int16Array[] = [];
    const kept: Int16Array[] = [];
    try {
      for (let waited = 0; !vad.speaking; waited += 1) {
        if (waited >= startupFrames) return null;
        const frame = await reader.read(frameSamples);
        if (!frame) return null;
        preRoll.push(frame);
        if (preRoll.length > 3) preRoll.shift();
        if (vad.process(frame) === 'speech-start') kept.push(...preRoll);
      }

      while (kept.length < phraseFrames) {
        const frame = await reader.read(frameSamples);
        if (!frame) break;
        kept.push(frame);
        if (vad.process(frame) === 'speech-end') break;
      }
    } finally {
      recording.stop();
      this.active = null;
    }

    const samples = new Int16Array(kept.length * frameSamples);
    kept.forEach((frame, i) => samples.set(frame, i * frameSamples));
    this.log.debug({ frames: kept.length }, 'utterance captured');
    return createAudioClip(samples, this.options.sampleRate);
  }

  abort(): void {
    if (!this.active) return;
    this.active.recording.stop();
    this.active.reader.close();
  }
}
