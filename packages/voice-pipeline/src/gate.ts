// ─── Confidence Gate ──────────────────────────────────────────────────────────

export interface ConfidenceGateOptions {
  /** Transcripts must score strictly above this */
  threshold?: number;
  /** How many recently accepted texts suppress duplicates */
  windowSize?: number;
}

export type GateDecision =
  | { accepted: true }
  | { accepted: false; reason: 'low-confidence' | 'duplicate' };

/**
 * Accepts a transcript iff its confidence is above the threshold and its text
 * is not among the last `windowSize` accepted texts. Only accepted texts enter
 * the window; the oldest is evicted first.
 */
export class ConfidenceGate {
  private readonly threshold: number;
  private readonly windowSize: number;
  private readonly recentTexts: string[] = [];

  constructor(options: ConfidenceGateOptions = {}) {
    this.threshold = options.threshold ?? 0.7;
    this.windowSize = Math.max(0, options.windowSize ?? 5);
  }

  evaluate(text: string, confidence: number): GateDecision {
    if (!(confidence > this.threshold)) {
      return { accepted: false, reason: 'low-confidence' };
    }
    if (this.recentTexts.includes(text)) {
      return { accepted: false, reason: 'duplicate' };
    }
    if (this.windowSize > 0) {
      this.recentTexts.push(text);
      if (this.recentTexts.length > this.windowSize) this.recentTexts.shift();
    }
    return { accepted: true };
  }

  recent(): readonly string[] {
    return [...this.recentTexts];
  }
}
