import { percentToBrightness } from '@lightcue/light-bridge';
import {
  UNDO_PHRASES,
  containsPhrase,
  type ActionMatch,
  type ActionRegistry,
  type Magnitude,
} from './actionRegistry';

export const TIME_UNITS = ['second', 'minute', 'hour'] as const;
export type TimeUnit = (typeof TIME_UNITS)[number];

export type Classification =
  | { type: 'delay'; amount: number; unit: TimeUnit; actionText: string }
  | { type: 'undo' }
  | { type: 'percent'; percent: number; brightness: number }
  | { type: 'action'; match: ActionMatch; how: 'exact' | 'fuzzy'; magnitude: Magnitude }
  | { type: 'unknown'; bestScore: number };

/** Splits a command on standalone `and` / `then` into ordered, non-empty parts */
export function splitChain(text: string): string[] {
  return text
    .split(/\s+(?:and\s+then|and|then)\s+/i)
    .map((part) => part.trim())
    .filter((part) => part.length > 0 && !/^(?:and|then)$/i.test(part));
}

const DELAY_PATTERN = /(?:^|\s)(?:in|after)\s+(\d+)\s+(second|minute|hour)s?\s+(.*\S)\s*$/i;
const PERCENT_PATTERN = /(-?\d+(?:\.\d+)?)\s*(?:percent|per cent|%)/i;

const SMALL_WORDS = ['little', 'bit', 'slightly'];
const LARGE_WORDS = ['lot', 'much', 'significantly'];

export function magnitudeOf(text: string): Magnitude {
  if (SMALL_WORDS.some((word) => containsPhrase(text, word))) return 'small';
  if (LARGE_WORDS.some((word) => containsPhrase(text, word))) return 'large';
  return 'default';
}

export function parseDelay(text: string): { amount: number; unit: TimeUnit; actionText: string } | null {
  const match = DELAY_PATTERN.exec(text);
  if (!match) return null;
  const [, amount, unit, actionText] = match;
  if (amount === undefined || unit === undefined || actionText === undefined) return null;
  const normalizedUnit = TIME_UNITS.find((u) => u === unit.toLowerCase());
  if (!normalizedUnit) return null;
  return { amount: Number(amount), unit: normalizedUnit, actionText: actionText.trim() };
}

export function parsePercent(text: string): number | null {
  const match = PERCENT_PATTERN.exec(text);
  if (!match || match[1] === undefined) return null;
  return Number(match[1]);
}

export function isUndo(text: string): boolean {
  return UNDO_PHRASES.some((phrase) => containsPhrase(text, phrase));
}

/**
 * Classifies one SubCommand: delay, undo, percentage, exact phrase, then
 * fuzzy match above `fuzzyThreshold`.
 */
export function classify(text: string, registry: ActionRegistry, fuzzyThreshold: number): Classification {
  const normalized = text.trim().toLowerCase();

  const delay = parseDelay(normalized);
  if (delay) return { type: 'delay', ...delay };

  if (isUndo(normalized)) return { type: 'undo' };

  const percent = parsePercent(normalized);
  if (percent !== null) {
    return { type: 'percent', percent, brightness: percentToBrightness(percent) };
  }

  const magnitude = magnitudeOf(normalized);

  const exact = registry.matchExact(normalized);
  if (exact) return { type: 'action', match: exact, how: 'exact', magnitude };

  const fuzzy = registry.bestFuzzy(normalized);
  if (fuzzy && fuzzy.score > fuzzyThreshold) {
    return { type: 'action', match: fuzzy, how: 'fuzzy', magnitude };
  }
  return { type: 'unknown', bestScore: fuzzy?.score ?? 0 };
}
