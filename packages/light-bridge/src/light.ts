import { z } from 'zod';

// ─── Light State ──────────────────────────────────────────────────────────────

export const MIN_BRIGHTNESS = 1;
export const MAX_BRIGHTNESS = 254;

/** CIE xy color point, both coordinates in [0, 1] */
export const ColorPointSchema = z.tuple([z.number().min(0).max(1), z.number().min(0).max(1)]);
export type ColorPoint = z.infer<typeof ColorPointSchema>;

export const LightStateSchema = z.object({
  on: z.boolean(),
  brightness: z.number().int().min(MIN_BRIGHTNESS).max(MAX_BRIGHTNESS).optional(),
  colorPoint: ColorPointSchema.optional(),
});
export type LightState = z.infer<typeof LightStateSchema>;

export type LightStatePatch = Partial<LightState>;

/**
 * Pre-mutation capture of one device. Fields the device does not support, or
 * does not currently report, are absent rather than defaulted.
 */
export const LightSnapshotSchema = LightStateSchema;
export type LightSnapshot = z.infer<typeof LightSnapshotSchema>;

// ─── Capabilities ─────────────────────────────────────────────────────────────

export const LightCapabilitiesSchema = z.object({
  supportsBrightness: z.boolean(),
  supportsColor: z.boolean(),
});
export type LightCapabilities = z.infer<typeof LightCapabilitiesSchema>;

// ─── Bridge Interface ─────────────────────────────────────────────────────────

export interface LightHandle {
  readonly id: string;
  readonly name: string;
  readonly capabilities: LightCapabilities;
  readState(): Promise<LightState>;
  applyState(patch: LightStatePatch): Promise<void>;
}

export interface ILightBridge {
  listLights(): Promise<LightHandle[]>;
  getLight(id: string): Promise<LightHandle>;
}

export class LightBridgeError extends Error {
  readonly kind = 'device' as const;

  constructor(
    message: string,
    public readonly lightId?: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'LightBridgeError';
  }
}

// ─── Brightness helpers ───────────────────────────────────────────────────────

export function clampBrightness(value: number): number {
  if (!Number.isFinite(value)) return MIN_BRIGHTNESS;
  return Math.min(MAX_BRIGHTNESS, Math.max(MIN_BRIGHTNESS, Math.round(value)));
}

/**
 * Maps a spoken percentage onto the bridge scale: round(p / 100 × 254),
 * clamped to [1, 254] so 0 % and anything past 100 % stay valid.
 */
export function percentToBrightness(percent: number): number {
  return clampBrightness(Math.round((percent / 100) * MAX_BRIGHTNESS));
}

/** Drops fields the device cannot take. */
export function restrictPatch(capabilities: LightCapabilities, patch: LightStatePatch): LightStatePatch {
  const restricted: LightStatePatch = {};
  if (patch.on !== undefined) restricted.on = patch.on;
  if (patch.brightness !== undefined && capabilities.supportsBrightness) {
    restricted.brightness = clampBrightness(patch.brightness);
  }
  if (patch.colorPoint !== undefined && capabilities.supportsColor) {
    restricted.colorPoint = patch.colorPoint;
  }
  return restricted;
}

export async function takeSnapshot(light: LightHandle): Promise<LightSnapshot> {
  const state = await light.readState();
  const snapshot: LightSnapshot = { on: state.on };
  if (light.capabilities.supportsBrightness && state.brightness !== undefined) {
    snapshot.brightness = state.brightness;
  }
  if (light.capabilities.supportsColor && state.colorPoint !== undefined) {
    snapshot.colorPoint = state.colorPoint;
  }
  return snapshot;
}
