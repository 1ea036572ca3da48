import { z } from 'zod';
import type { AudioClip } from '@lightcue/pipeline-events';

// ─── Recognition Result ───────────────────────────────────────────────────────

export const RecognitionAlternativeSchema = z.object({
  text: z.string(),
  /** Services omit confidence for some results; treated as 1.0 */
  confidence: z.number().min(0).max(1).optional(),
});
export type RecognitionAlternative = z.infer<typeof RecognitionAlternativeSchema>;

export const RecognitionResponseSchema = z.object({
  transcripts: z.array(RecognitionAlternativeSchema),
});
export type RecognitionResponse = z.infer<typeof RecognitionResponseSchema>;

// ─── Recognition Service Interface ────────────────────────────────────────────

export interface IRecognitionService {
  /** Rejects with RecognitionServiceError or UnintelligibleAudioError */
  recognize(clip: AudioClip): Promise<RecognitionResponse>;
}

// ─── Errors ───────────────────────────────────────────────────────────────────

/** Service unreachable, failing, or answering with something unparseable */
export class RecognitionServiceError extends Error {
  readonly kind = 'service' as const;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RecognitionServiceError';
  }
}

/** The service answered but heard nothing it could transcribe */
export class UnintelligibleAudioError extends Error {
  readonly kind = 'perception' as const;

  constructor(message = 'Could not understand audio') {
    super(message);
    this.name = 'UnintelligibleAudioError';
  }
}

/** Validates a service answer; anything off-schema is a service failure */
export function parseRecognitionResponse(payload: unknown): RecognitionResponse {
  const parsed = RecognitionResponseSchema.safeParse(payload);
  if (!parsed.success) {
    throw new RecognitionServiceError('Malformed recognition response', { cause: parsed.error });
  }
  return parsed.data;
}

/**
 * Picks the first non-empty alternative. Throws UnintelligibleAudioError when
 * the service returned nothing usable.
 */
export function bestAlternative(response: RecognitionResponse): { text: string; confidence: number } {
  for (const alternative of response.transcripts) {
    const text = alternative.text.trim().toLowerCase();
    if (text.length > 0) {
      return { text, confidence: alternative.confidence ?? 1 };
    }
  }
  throw new UnintelligibleAudioError();
}
