import { readFile, writeFile } from 'node:fs/promises';
import { z } from 'zod';
import { ConfigError } from './errors';

// ─── Environment ──────────────────────────────────────────────────────────────

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value === '' ? undefined : value));

const optionalMs = z.coerce.number().int().positive().optional();

export const EnvSchema = z.object({
  HUE_BRIDGE_IP: optionalString,
  HUE_AUTH_TOKEN: optionalString,
  BRIDGE_CONFIG_FILE: z.string().default('bridge_config.json'),
  WAKE_WORD: optionalString,
  WAKE_WORD_KEYWORD_PATH: optionalString,
  WAKE_WORD_SENSITIVITY: z.coerce.number().min(0).max(1).default(0.5),
  PICOVOICE_ACCESS_KEY: optionalString,
  GOOGLE_SPEECH_API_KEY: optionalString,
  SPEECH_LANGUAGE: z.string().default('en-US'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  STATUS_PORT: z.coerce.number().int().min(0).max(65_535).default(4040),

  ACTIVATION_WINDOW_MS: optionalMs,
  LISTEN_TIMEOUT_MS: optionalMs,
  PHRASE_LIMIT_MS: optionalMs,
  COOLDOWN_MS: optionalMs,
  RECOGNITION_TIMEOUT_MS: optionalMs,
  CACHE_TTL_MS: optionalMs,
  STALL_TIMEOUT_MS: optionalMs,
  ERROR_WINDOW_MS: optionalMs,
  MAX_ERRORS: z.coerce.number().int().positive().optional(),
});
export type Env = z.infer<typeof EnvSchema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigError(`Invalid environment: ${issues}`, { cause: parsed.error });
  }
  return parsed.data;
}

// ─── Pipeline Config ──────────────────────────────────────────────────────────

export const PipelineConfigSchema = z.object({
  mode: z.enum(['gated', 'continuous']).default('gated'),
  wakeWord: z
    .object({
      keyword: z.string().optional(),
      keywordPath: z.string().optional(),
      sensitivity: z.number().min(0).max(1).default(0.5),
    })
    .default({}),
  capture: z
    .object({
      sampleRate: z.number().int().positive().default(16_000),
      activationWindowMs: z.number().int().positive().default(10_000),
      listenTimeoutMs: z.number().int().positive().default(5_000),
      phraseLimitMs: z.number().int().positive().default(5_000),
      cooldownMs: z.number().int().nonnegative().default(5_000),
      /** Trailing silence that ends an utterance */
      endSilenceMs: z.number().int().positive().default(800),
      /** RMS energy (0–1) above which a frame counts as speech */
      energyThreshold: z.number().min(0).max(1).default(0.02),
    })
    .default({}),
  recognition: z
    .object({
      timeoutMs: z.number().int().positive().default(5_000),
      confidenceThreshold: z.number().min(0).max(1).default(0.7),
      debounceWindow: z.number().int().nonnegative().default(5),
      languageCode: z.string().default('en-US'),
    })
    .default({}),
  dispatch: z
    .object({
      fuzzyThreshold: z.number().min(0).max(100).default(70),
      cacheTtlMs: z.number().int().positive().default(60_000),
      undoDepth: z.number().int().positive().default(5),
    })
    .default({}),
  supervisor: z
    .object({
      pollIntervalMs: z.number().int().positive().default(500),
      stallTimeoutMs: z.number().int().positive().default(30_000),
      maxErrors: z.number().int().positive().default(5),
      errorWindowMs: z.number().int().positive().default(30_000),
      backoffInitialMs: z.number().int().nonnegative().default(1_000),
      backoffMaxMs: z.number().int().nonnegative().default(30_000),
    })
    .default({}),
  channels: z
    .object({
      capacity: z.number().int().positive().default(16),
      /** Longest a stage waits on an empty inbox before re-checking its running flag */
      idleBackoffMs: z.number().int().positive().default(100),
    })
    .default({}),
});
export type PipelineConfigInput = z.input<typeof PipelineConfigSchema>;

export type DeepReadonly<T> = {
  readonly [K in keyof T]: T[K] extends object ? DeepReadonly<T[K]> : T[K];
};

export type PipelineConfig = DeepReadonly<z.infer<typeof PipelineConfigSchema>>;

function deepFreeze(value: object): void {
  for (const child of Object.values(value)) {
    if (child !== null && typeof child === 'object') deepFreeze(child);
  }
  Object.freeze(value);
}

/** Validates, fills defaults and deep-freezes. Built once at startup. */
export function createPipelineConfig(input: PipelineConfigInput = {}): PipelineConfig {
  const parsed = PipelineConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError('Invalid pipeline configuration', { cause: parsed.error });
  }
  deepFreeze(parsed.data);
  return parsed.data;
}

/** Maps environment tuning variables onto config input; unset values keep their defaults */
export function configInputFromEnv(env: Env, mode: 'gated' | 'continuous'): PipelineConfigInput {
  return {
    mode,
    wakeWord: {
      keyword: env.WAKE_WORD,
      keywordPath: env.WAKE_WORD_KEYWORD_PATH,
      sensitivity: env.WAKE_WORD_SENSITIVITY,
    },
    capture: {
      activationWindowMs: env.ACTIVATION_WINDOW_MS,
      listenTimeoutMs: env.LISTEN_TIMEOUT_MS,
      phraseLimitMs: env.PHRASE_LIMIT_MS,
      cooldownMs: env.COOLDOWN_MS,
    },
    recognition: {
      timeoutMs: env.RECOGNITION_TIMEOUT_MS,
      languageCode: env.SPEECH_LANGUAGE,
    },
    dispatch: { cacheTtlMs: env.CACHE_TTL_MS },
    supervisor: {
      stallTimeoutMs: env.STALL_TIMEOUT_MS,
      errorWindowMs: env.ERROR_WINDOW_MS,
      maxErrors: env.MAX_ERRORS,
    },
  };
}

// ─── CLI ──────────────────────────────────────────────────────────────────────

export interface CliOptions {
  /** Skip the wake-word stage and capture continuously */
  fallback: boolean;
  debug: boolean;
  help: boolean;
  unknown: string[];
}

export function parseCliArgs(argv: readonly string[]): CliOptions {
  const options: CliOptions = { fallback: false, debug: false, help: false, unknown: [] };
  for (const arg of argv) {
    switch (arg) {
      case '--fallback':
        options.fallback = true;
        break;
      case '--debug':
        options.debug = true;
        break;
      case '--help':
      case '-h':
        options.help = true;
        break;
      default:
        options.unknown.push(arg);
    }
  }
  return options;
}

export const USAGE = `Usage: voice-control-daemon [options]

Options:
  --fallback  Run without a wake word; listen continuously
  --debug     Enable debug logging
  --help      Show this message`;

// ─── Bridge Credentials ───────────────────────────────────────────────────────

export const BridgeCredentialsSchema = z.object({
  bridgeAddress: z.string().min(1),
  authToken: z.string().min(1),
});
export type BridgeCredentials = z.infer<typeof BridgeCredentialsSchema>;

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/** Returns null when the file does not exist yet */
export async function loadBridgeCredentials(path: string): Promise<BridgeCredentials | null> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf8');
  } catch (err) {
    if (isMissingFile(err)) return null;
    throw new ConfigError(`Could not read ${path}`, { cause: err });
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(`${path} is not valid JSON`, { cause: err });
  }

  const parsed = BridgeCredentialsSchema.safeParse(json);
  if (!parsed.success) {
    throw new ConfigError(`${path} does not contain bridge credentials`, { cause: parsed.error });
  }
  return parsed.data;
}

export async function saveBridgeCredentials(path: string, credentials: BridgeCredentials): Promise<void> {
  const data = BridgeCredentialsSchema.parse(credentials);
  await writeFile(path, `${JSON.stringify(data, null, 2)}\n`, 'utf8');
}

/** Environment wins over the persisted file */
export function resolveBridgeCredentials(
  env: Env,
  persisted: BridgeCredentials | null,
): Partial<BridgeCredentials> {
  return {
    bridgeAddress: env.HUE_BRIDGE_IP ?? persisted?.bridgeAddress,
    authToken: env.HUE_AUTH_TOKEN ?? persisted?.authToken,
  };
}
