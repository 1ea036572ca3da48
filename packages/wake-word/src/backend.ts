import { existsSync } from 'node:fs';
import { basename, extname } from 'node:path';

// ─── Wake-word Backend ────────────────────────────────────────────────────────

export interface IWakeWordBackend {
  /** Samples per frame expected by process() */
  readonly frameLength: number;
  readonly sampleRate: number;
  /** Index of the detected keyword, or -1 */
  process(frame: Int16Array): number;
  release(): void;
}

/** Microphone (or scripted) source of fixed-size PCM frames; null means end of stream */
export interface IFrameSource {
  read(frameLength: number): Promise<Int16Array | null>;
  close(): void;
}

/** Builds a backend for one keyword (built-in name or keyword file path) */
export type WakeWordBackendFactory = (keyword: string, sensitivity: number) => IWakeWordBackend;

export class WakeWordUnavailableError extends Error {
  readonly kind = 'fatal' as const;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'WakeWordUnavailableError';
  }
}

// ─── Keyword Resolution ───────────────────────────────────────────────────────

export const KEYWORD_PREFERENCE = ['jarvis', 'computer', 'porcupine', 'hey siri', 'alexa'] as const;

/** Keyword tried once more when the backend rejects the resolved one */
export const LAST_RESORT_KEYWORD = 'porcupine';

export interface KeywordRequest {
  /** Custom keyword file; used when it exists */
  keywordPath?: string;
  /** Built-in keyword asked for by name */
  keyword?: string;
  /** Built-in keywords the backend ships */
  available: readonly string[];
  pathExists?: (path: string) => boolean;
}

export interface ResolvedKeyword {
  /** What the backend factory receives */
  keyword: string;
  /** Human-readable name for logs and status */
  label: string;
  source: 'file' | 'requested' | 'preferred' | 'first-available';
  /** True when the caller asked for something else */
  substituted: boolean;
}

export function resolveKeyword(request: KeywordRequest): ResolvedKeyword {
  const pathExists = request.pathExists ?? existsSync;
  const requested = request.keyword?.trim().toLowerCase();

  if (request.keywordPath && pathExists(request.keywordPath)) {
    return {
      keyword: request.keywordPath,
      label: basename(request.keywordPath, extname(request.keywordPath)),
      source: 'file',
      substituted: false,
    };
  }

  const askedFor = Boolean(request.keywordPath) || Boolean(requested);

  if (requested && request.available.includes(requested)) {
    return { keyword: requested, label: requested, source: 'requested', substituted: false };
  }

  const preferred = KEYWORD_PREFERENCE.find((k) => request.available.includes(k));
  if (preferred) {
    return { keyword: preferred, label: preferred, source: 'preferred', substituted: askedFor };
  }

  const [first] = request.available;
  if (first) {
    return { keyword: first, label: first, source: 'first-available', substituted: askedFor };
  }

  throw new WakeWordUnavailableError('No wake-word keyword is available');
}

// ─── Backend Construction ─────────────────────────────────────────────────────

export interface WakeWordSetup {
  backend: IWakeWordBackend;
  keyword: ResolvedKeyword;
  /** Set when the resolved keyword was rejected and the last resort was used */
  rejected?: { keyword: string; error: unknown };
}

/**
 * Resolves a keyword and builds the backend, retrying once with the last
 * resort keyword if the factory rejects the resolved one.
 */
export function createWakeWordBackend(
  factory: WakeWordBackendFactory,
  request: KeywordRequest & { sensitivity: number },
): WakeWordSetup {
  const keyword = resolveKeyword(request);
  try {
    return { backend: factory(keyword.keyword, request.sensitivity), keyword };
  } catch (err) {
    if (keyword.keyword === LAST_RESORT_KEYWORD) {
      throw new WakeWordUnavailableError(`Wake-word backend rejected "${keyword.label}"`, {
        cause: err,
      });
    }
    try {
      return {
        backend: factory(LAST_RESORT_KEYWORD, request.sensitivity),
        keyword: {
          keyword: LAST_RESORT_KEYWORD,
          label: LAST_RESORT_KEYWORD,
          source: 'preferred',
          substituted: true,
        },
        rejected: { keyword: keyword.label, error: err },
      };
    } catch (retryErr) {
      throw new WakeWordUnavailableError('Wake-word backend could not be constructed', {
        cause: retryErr,
      });
    }
  }
}
