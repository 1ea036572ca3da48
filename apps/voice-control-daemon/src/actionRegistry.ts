import {
  MAX_BRIGHTNESS,
  MIN_BRIGHTNESS,
  clampBrightness,
  type LightCapabilities,
  type LightSnapshot,
  type LightStatePatch,
} from '@lightcue/light-bridge';
import { similarity } from './fuzzy';

// ─── Actions ──────────────────────────────────────────────────────────────────

export const CANONICAL_ACTIONS = ['turn on', 'turn off', 'dim', 'brighten', 'maximum', 'minimum'] as const;
export type CanonicalAction = (typeof CANONICAL_ACTIONS)[number];

export type Magnitude = 'small' | 'default' | 'large';

export const BRIGHTNESS_DELTAS: Readonly<Record<Magnitude, number>> = {
  small: 25,
  default: 64,
  large: 100,
};

/**
 * Computes the patch for one device from its pre-mutation state. Null means
 * the device is left alone.
 */
export type ActionHandler = (
  state: LightSnapshot,
  capabilities: LightCapabilities,
  magnitude: Magnitude,
) => LightStatePatch | null;

export interface ActionDefinition {
  readonly action: CanonicalAction;
  readonly aliases: readonly string[];
  readonly handler: ActionHandler;
  /** Spoken once the action has been applied */
  readonly acknowledgment: string;
}

const turnOn: ActionHandler = () => ({ on: true });

const turnOff: ActionHandler = () => ({ on: false });

const dim: ActionHandler = (state, capabilities, magnitude) => {
  if (!state.on || !capabilities.supportsBrightness) return null;
  const current = state.brightness ?? MAX_BRIGHTNESS;
  return { brightness: Math.max(MIN_BRIGHTNESS, current - BRIGHTNESS_DELTAS[magnitude]) };
};

const brighten: ActionHandler = (state, capabilities, magnitude) => {
  if (!state.on) {
    return capabilities.supportsBrightness
      ? { on: true, brightness: clampBrightness(BRIGHTNESS_DELTAS.small) }
      : { on: true };
  }
  if (!capabilities.supportsBrightness) return null;
  const current = state.brightness ?? MIN_BRIGHTNESS;
  return { brightness: Math.min(MAX_BRIGHTNESS, current + BRIGHTNESS_DELTAS[magnitude]) };
};

function absolute(brightness: number): ActionHandler {
  return (_state, capabilities) =>
    capabilities.supportsBrightness ? { on: true, brightness } : { on: true };
}

/** Absolute brightness from a spoken percentage */
export function brightnessHandler(brightness: number): ActionHandler {
  return absolute(clampBrightness(brightness));
}

export const UNDO_PHRASES = ['undo', 'revert', 'go back', 'previous', 'cancel'] as const;

// ─── Registry ─────────────────────────────────────────────────────────────────

export interface ActionMatch {
  definition: ActionDefinition;
  /** The alias or canonical phrase that matched */
  phrase: string;
  score: number;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Phrase occurs in text on word boundaries */
export function containsPhrase(text: string, phrase: string): boolean {
  return new RegExp(`(^|[^a-z0-9])${escapeRegExp(phrase)}($|[^a-z0-9])`).test(text);
}

/**
 * Immutable table of canonical actions, their alias phrases and handlers.
 * Lookups walk the table in declaration order.
 */
export class ActionRegistry {
  private readonly definitions: readonly ActionDefinition[];

  constructor(definitions: readonly ActionDefinition[]) {
    this.definitions = Object.freeze(
      definitions.map((def) => Object.freeze({ ...def, aliases: Object.freeze([...def.aliases]) })),
    );
  }

  get actions(): readonly ActionDefinition[] {
    return this.definitions;
  }

  get(action: CanonicalAction): ActionDefinition | undefined {
    return this.definitions.find((def) => def.action === action);
  }

  /** First action (table order) whose canonical name or an alias occurs in the text */
  matchExact(text: string): ActionMatch | null {
    for (const definition of this.definitions) {
      for (const phrase of [definition.action, ...definition.aliases]) {
        if (containsPhrase(text, phrase)) return { definition, phrase, score: 100 };
      }
    }
    return null;
  }

  /** Highest-scoring phrase across the table; ties keep the earlier entry */
  bestFuzzy(text: string): ActionMatch | null {
    let best: ActionMatch | null = null;
    for (const definition of this.definitions) {
      for (const phrase of [definition.action, ...definition.aliases]) {
        const score = similarity(text, phrase);
        if (!best || score > best.score) best = { definition, phrase, score };
      }
    }
    return best;
  }
}

export function createDefaultRegistry(): ActionRegistry {
  return new ActionRegistry([
    {
      action: 'turn on',
      aliases: ['lights on', 'switch on', 'power on', 'on', 'activate lights'],
      handler: turnOn,
      acknowledgment: 'Turning the lights on',
    },
    {
      action: 'turn off',
      aliases: ['lights off', 'switch off', 'power off', 'off', 'deactivate lights'],
      handler: turnOff,
      acknowledgment: 'Turning the lights off',
    },
    {
      action: 'dim',
      aliases: ['lower', 'darker', 'reduce brightness', 'less bright', 'dimmer'],
      handler: dim,
      acknowledgment: 'Dimming the lights',
    },
    {
      action: 'brighten',
      aliases: ['brighter', 'increase', 'more light', 'lighter', 'more brightness'],
      handler: brighten,
      acknowledgment: 'Brightening the lights',
    },
    {
      action: 'maximum',
      aliases: ['brightest', 'full', 'hundred percent', 'max brightness'],
      handler: absolute(MAX_BRIGHTNESS),
      acknowledgment: 'Setting lights to maximum brightness',
    },
    {
      action: 'minimum',
      aliases: ['dimmest', 'low', 'lowest', 'min brightness'],
      handler: absolute(MIN_BRIGHTNESS),
      acknowledgment: 'Setting lights to minimum brightness',
    },
  ]);
}
