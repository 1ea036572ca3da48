// ─── Energy VAD ───────────────────────────────────────────────────────────────

export interface EnergyVadOptions {
  /** Normalized RMS (0–1) above which a frame is speech */
  energyThreshold: number;
  /** Consecutive speech frames that open an utterance */
  startFrames: number;
  /** Consecutive silent frames that close it */
  endFrames: number;
}

export type VadEvent = 'silence' | 'speech-start' | 'speech' | 'speech-end';

/** Root-mean-square of 16-bit samples, normalized to 0–1 */
export function rms(samples: Int16Array): number {
  if (samples.length === 0) return 0;
  let sum = 0;
  for (const sample of samples) {
    const normalized = sample / 32_768;
    sum += normalized * normalized;
  }
  return Math.sqrt(sum / samples.length);
}

export class EnergyVad {
  private inSpeech = false;
  private run = 0;

  constructor(private readonly options: EnergyVadOptions) {}

  get speaking(): boolean {
    return this.inSpeech;
  }

  process(frame: Int16Array): VadEvent {
    const isSpeech = rms(frame) > this.options.energyThreshold;

    if (!this.inSpeech) {
      this.run = isSpeech ? this.run + 1 : 0;
      if (this.run >= this.options.startFrames) {
        this.inSpeech = true;
        this.run = 0;
        return 'speech-start';
      }
      return 'silence';
    }

    this.run = isSpeech ? 0 : this.run + 1;
    if (this.run >= this.options.endFrames) {
      this.inSpeech = false;
      this.run = 0;
      return 'speech-end';
    }
    return 'speech';
  }

  reset(): void {
    this.inSpeech = false;
    this.run = 0;
  }
}
