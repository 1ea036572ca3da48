import fetch, { type Response } from 'node-fetch';
import { z } from 'zod';
import {
  LightBridgeError,
  MAX_BRIGHTNESS,
  MIN_BRIGHTNESS,
  restrictPatch,
  type ILightBridge,
  type LightCapabilities,
  type LightHandle,
  type LightState,
  type LightStatePatch,
} from './light';

// ─── Hue v1 REST payloads ─────────────────────────────────────────────────────

const HueLightStateSchema = z.object({
  on: z.boolean(),
  bri: z.number().int().optional(),
  xy: z.tuple([z.number(), z.number()]).optional(),
  reachable: z.boolean().optional(),
});

const HueLightSchema = z.object({
  name: z.string(),
  type: z.string(),
  state: HueLightStateSchema,
});
type HueLight = z.infer<typeof HueLightSchema>;

const HueLightMapSchema = z.record(HueLightSchema);

const HueResultSchema = z.array(
  z.union([
    z.object({ success: z.record(z.unknown()) }),
    z.object({
      error: z.object({
        type: z.number().int(),
        address: z.string().optional(),
        description: z.string(),
      }),
    }),
  ]),
);

/** Bridge error code returned while the link button has not been pressed */
const LINK_BUTTON_NOT_PRESSED = 101;

export class LinkButtonNotPressedError extends LightBridgeError {
  constructor() {
    super('Press the link button on the bridge, then start again');
    this.name = 'LinkButtonNotPressedError';
  }
}

/**
 * Capability descriptor derived from the bridge's declared light type.
 * "Extended color light" and "Color light" take xy; anything reporting `bri`
 * or declared dimmable takes brightness.
 */
export function capabilitiesForType(type: string, state: { bri?: number }): LightCapabilities {
  const normalized = type.toLowerCase();
  return {
    supportsColor: normalized.includes('color'),
    supportsBrightness:
      state.bri !== undefined ||
      normalized.includes('dimmable') ||
      normalized.includes('color') ||
      normalized.includes('temperature'),
  };
}

function toLightState(light: HueLight): LightState {
  const state: LightState = { on: light.state.on };
  if (light.state.bri !== undefined) {
    state.brightness = Math.min(MAX_BRIGHTNESS, Math.max(MIN_BRIGHTNESS, light.state.bri));
  }
  if (light.state.xy !== undefined) {
    state.colorPoint = light.state.xy;
  }
  return state;
}

function toHueBody(patch: LightStatePatch): Record<string, unknown> {
  const body: Record<string, unknown> = {};
  if (patch.on !== undefined) body['on'] = patch.on;
  if (patch.brightness !== undefined) body['bri'] = patch.brightness;
  if (patch.colorPoint !== undefined) body['xy'] = patch.colorPoint;
  return body;
}

function firstError(payload: unknown): { type: number; description: string } | undefined {
  const parsed = HueResultSchema.safeParse(payload);
  if (!parsed.success) return undefined;
  for (const entry of parsed.data) {
    if ('error' in entry) return entry.error;
  }
  return undefined;
}

// ─── Transport ────────────────────────────────────────────────────────────────

async function requestJson(
  url: string,
  method: 'GET' | 'PUT' | 'POST',
  body: unknown,
  timeoutMs: number,
  lightId?: string,
): Promise<unknown> {
  let response: Response;
  try {
    response = await fetch(url, {
      method,
      headers: body === undefined ? undefined : { 'content-type': 'application/json' },
      body: body === undefined ? undefined : JSON.stringify(body),
      timeout: timeoutMs,
    });
  } catch (err) {
    throw new LightBridgeError(`Bridge request ${method} ${url} failed`, lightId, { cause: err });
  }

  if (!response.ok) {
    throw new LightBridgeError(`Bridge responded ${response.status} to ${method} ${url}`, lightId);
  }

  try {
    const payload: unknown = await response.json();
    return payload;
  } catch (err) {
    throw new LightBridgeError(`Bridge returned malformed JSON for ${method} ${url}`, lightId, {
      cause: err,
    });
  }
}

/**
 * Registers a new application user on the bridge and returns its auth token.
 * Throws LinkButtonNotPressedError until the physical button is pressed.
 */
export async function pairWithBridge(
  address: string,
  deviceType = 'lightcue#daemon',
  timeoutMs = 5_000,
): Promise<string> {
  const payload = await requestJson(`http://${address}/api`, 'POST', { devicetype: deviceType }, timeoutMs);
  const error = firstError(payload);
  if (error?.type === LINK_BUTTON_NOT_PRESSED) throw new LinkButtonNotPressedError();
  if (error) throw new LightBridgeError(`Pairing failed: ${error.description}`);

  const parsed = z
    .array(z.object({ success: z.object({ username: z.string().min(1) }) }))
    .nonempty()
    .safeParse(payload);
  if (!parsed.success) throw new LightBridgeError('Pairing response did not contain a username');
  return parsed.data[0].success.username;
}

// ─── Hue Bridge Client ────────────────────────────────────────────────────────

export interface HueBridgeOptions {
  /** Host (and optional port) of the bridge, e.g. 192.168.1.20 */
  address: string;
  /** Application username issued by the bridge at pairing */
  authToken: string;
  timeoutMs?: number;
}

export class HueBridgeClient implements ILightBridge {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(options: HueBridgeOptions) {
    this.baseUrl = `http://${options.address}/api/${encodeURIComponent(options.authToken)}`;
    this.timeoutMs = options.timeoutMs ?? 5_000;
  }

  async listLights(): Promise<LightHandle[]> {
    const payload = await requestJson(`${this.baseUrl}/lights`, 'GET', undefined, this.timeoutMs);
    const error = firstError(payload);
    if (error) throw new LightBridgeError(`Listing lights failed: ${error.description}`);

    const parsed = HueLightMapSchema.safeParse(payload);
    if (!parsed.success) throw new LightBridgeError('Bridge returned an unexpected light list');

    return Object.entries(parsed.data).map(([id, light]) => this.handleFor(id, light));
  }

  async getLight(id: string): Promise<LightHandle> {
    return this.handleFor(id, await this.fetchLight(id));
  }

  private async fetchLight(id: string): Promise<HueLight> {
    const payload = await requestJson(
      `${this.baseUrl}/lights/${encodeURIComponent(id)}`,
      'GET',
      undefined,
      this.timeoutMs,
      id,
    );
    const error = firstError(payload);
    if (error) throw new LightBridgeError(`Reading light ${id} failed: ${error.description}`, id);

    const parsed = HueLightSchema.safeParse(payload);
    if (!parsed.success) throw new LightBridgeError(`Bridge returned an unexpected light ${id}`, id);
    return parsed.data;
  }

  private async setState(id: string, patch: LightStatePatch): Promise<void> {
    const body = toHueBody(patch);
    if (Object.keys(body).length === 0) return;

    const payload = await requestJson(
      `${this.baseUrl}/lights/${encodeURIComponent(id)}/state`,
      'PUT',
      body,
      this.timeoutMs,
      id,
    );
    const error = firstError(payload);
    if (error) throw new LightBridgeError(`Updating light ${id} failed: ${error.description}`, id);
  }

  private handleFor(id: string, light: HueLight): LightHandle {
    const capabilities = capabilitiesForType(light.type, light.state);
    return {
      id,
      name: light.name,
      capabilities,
      readState: async () => toLightState(await this.fetchLight(id)),
      applyState: (patch) => this.setState(id, restrictPatch(capabilities, patch)),
    };
  }
}
