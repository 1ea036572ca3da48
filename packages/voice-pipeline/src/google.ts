import fetch, { type Response } from 'node-fetch';
import { z } from 'zod';
import type { AudioClip } from '@lightcue/pipeline-events';
import {
  RecognitionServiceError,
  UnintelligibleAudioError,
  type IRecognitionService,
  type RecognitionResponse,
} from './recognition';

// ─── Google Speech-to-Text Config ─────────────────────────────────────────────

export const GoogleSpeechConfigSchema = z.object({
  /** REST endpoint for synchronous recognition */
  endpoint: z.string().url().default('https://speech.googleapis.com/v1/speech:recognize'),
  /** API key with Speech-to-Text enabled */
  apiKey: z.string().min(1),
  /** BCP-47 language of the speaker */
  languageCode: z.string().default('en-US'),
  /** HTTP timeout; the recognizer stage applies its own bounded wait on top */
  timeoutMs: z.number().int().positive().default(10_000),
});
export type GoogleSpeechConfig = z.infer<typeof GoogleSpeechConfigSchema>;

const GoogleRecognizeResponseSchema = z.object({
  results: z
    .array(
      z.object({
        alternatives: z
          .array(
            z.object({
              transcript: z.string().optional(),
              confidence: z.number().optional(),
            }),
          )
          .default([]),
      }),
    )
    .optional(),
});

// ─── Request / response mapping ───────────────────────────────────────────────

/**
 * Builds the synchronous recognize body for a LINEAR16 clip.
 */
export function buildRecognizeRequest(clip: AudioClip, config: GoogleSpeechConfig) {
  const pcm = Buffer.from(clip.samples.buffer, clip.samples.byteOffset, clip.samples.byteLength);
  return {
    config: {
      encoding: 'LINEAR16',
      sampleRateHertz: clip.sampleRate,
      languageCode: config.languageCode,
      maxAlternatives: 3,
    },
    audio: { content: pcm.toString('base64') },
  };
}

/**
 * Maps the service payload onto transcripts. An empty result set means the
 * audio was not understood.
 */
export function parseRecognizeResponse(payload: unknown): RecognitionResponse {
  const parsed = GoogleRecognizeResponseSchema.safeParse(payload);
  if (!parsed.success) {
    throw new RecognitionServiceError('Malformed recognition response', { cause: parsed.error });
  }

  const [first] = parsed.data.results ?? [];
  const transcripts = (first?.alternatives ?? []).flatMap((alternative) =>
    alternative.transcript === undefined
      ? []
      : [
          {
            text: alternative.transcript,
            confidence:
              alternative.confidence === undefined
                ? undefined
                : Math.min(1, Math.max(0, alternative.confidence)),
          },
        ],
  );

  if (transcripts.length === 0) throw new UnintelligibleAudioError();
  return { transcripts };
}

// ─── Google Speech Client ─────────────────────────────────────────────────────

export class GoogleSpeechClient implements IRecognitionService {
  private readonly config: GoogleSpeechConfig;

  constructor(config: z.input<typeof GoogleSpeechConfigSchema>) {
    this.config = GoogleSpeechConfigSchema.parse(config);
  }

  async recognize(clip: AudioClip): Promise<RecognitionResponse> {
    const url = new URL(this.config.endpoint);
    url.searchParams.set('key', this.config.apiKey);

    let response: Response;
    try {
      response = await fetch(url.toString(), {
        method: 'POST',
        headers: { 'content-type': 'application/json' },
        body: JSON.stringify(buildRecognizeRequest(clip, this.config)),
        timeout: this.config.timeoutMs,
      });
    } catch (err) {
      throw new RecognitionServiceError('Speech recognition service unreachable', { cause: err });
    }

    if (!response.ok) {
      throw new RecognitionServiceError(`Speech recognition service responded ${response.status}`);
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (err) {
      throw new RecognitionServiceError('Speech recognition service returned malformed JSON', {
        cause: err,
      });
    }
    return parseRecognizeResponse(payload);
  }
}
