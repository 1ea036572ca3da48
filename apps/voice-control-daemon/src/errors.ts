// ─── Fault Taxonomy ───────────────────────────────────────────────────────────

export const FAULT_KINDS = ['perception', 'service', 'device', 'stage', 'fatal'] as const;
export type FaultKind = (typeof FAULT_KINDS)[number];

export type FaultAction = 'ignore' | 'invalidate-cache' | 'escalate' | 'terminate';

export class PipelineError extends Error {
  constructor(
    readonly kind: FaultKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'PipelineError';
  }
}

/** A stage loop died or stopped making progress */
export class StageCrashedError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('stage', message, options);
    this.name = 'StageCrashedError';
  }
}

/** The recognition service did not answer within the bounded wait */
export class RecognitionTimeoutError extends PipelineError {
  constructor(readonly timeoutMs: number) {
    super('service', `Recognition did not complete within ${timeoutMs} ms`);
    this.name = 'RecognitionTimeoutError';
  }
}

/** The audio recorder process could not start or stopped producing audio */
export class AudioInputError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('stage', message, options);
    this.name = 'AudioInputError';
  }
}

/** Unrecoverable: the process exits with status 1 */
export class FatalPipelineError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('fatal', message, options);
    this.name = 'FatalPipelineError';
  }
}

export class ConfigError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('fatal', message, options);
    this.name = 'ConfigError';
  }
}

// ─── Fault Policy ─────────────────────────────────────────────────────────────

export function faultPolicy(kind: FaultKind): FaultAction {
  switch (kind) {
    case 'perception':
      return 'ignore';
    case 'device':
      return 'invalidate-cache';
    case 'service':
    case 'stage':
      return 'escalate';
    case 'fatal':
      return 'terminate';
  }
}

function isFaultKind(value: unknown): value is FaultKind {
  return FAULT_KINDS.some((kind) => kind === value);
}

/**
 * Reads the `kind` carried by package and pipeline errors. Anything
 * unclassified is treated as a stage failure.
 */
export function faultKindOf(error: unknown): FaultKind {
  if (error instanceof Error && 'kind' in error && isFaultKind(error.kind)) {
    return error.kind;
  }
  return 'stage';
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

// ─── Fault Reports ────────────────────────────────────────────────────────────

/** What travels on the supervisor's error channel */
export interface Fault {
  error: Error;
  stage: string;
  at: number;
}

export type FaultReporter = (fault: Fault) => void;
