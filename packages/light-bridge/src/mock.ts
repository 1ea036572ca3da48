import {
  LightBridgeError,
  LightStateSchema,
  restrictPatch,
  type ILightBridge,
  type LightCapabilities,
  type LightHandle,
  type LightState,
  type LightStatePatch,
} from './light';

// ─── Mock LightBridge ─────────────────────────────────────────────────────────

export interface MockLightDefinition {
  id: string;
  name: string;
  capabilities?: Partial<LightCapabilities>;
  state: LightState;
}

interface MockLightRecord {
  id: string;
  name: string;
  capabilities: LightCapabilities;
  state: LightState;
}

/**
 * In-memory bridge for development and testing. Records every applied patch
 * and lets tests inject listing and mutation failures.
 */
export class MockLightBridge implements ILightBridge {
  private readonly lights = new Map<string, MockLightRecord>();
  private readonly failingLights = new Set<string>();
  private pendingListFailure: Error | null = null;

  listCalls = 0;
  readonly appliedPatches: Array<{ id: string; patch: LightStatePatch }> = [];

  constructor(definitions: MockLightDefinition[] = []) {
    for (const def of definitions) {
      this.lights.set(def.id, {
        id: def.id,
        name: def.name,
        capabilities: {
          supportsBrightness: def.capabilities?.supportsBrightness ?? true,
          supportsColor: def.capabilities?.supportsColor ?? false,
        },
        state: LightStateSchema.parse(def.state),
      });
    }
  }

  async listLights(): Promise<LightHandle[]> {
    this.listCalls += 1;
    if (this.pendingListFailure) {
      const error = this.pendingListFailure;
      this.pendingListFailure = null;
      throw error;
    }
    return [...this.lights.values()].map((record) => this.handleFor(record));
  }

  async getLight(id: string): Promise<LightHandle> {
    const record = this.lights.get(id);
    if (!record) throw new LightBridgeError(`Unknown light ${id}`, id);
    return this.handleFor(record);
  }

  /** Test helper: the current state of a light */
  stateOf(id: string): LightState {
    const record = this.lights.get(id);
    if (!record) throw new LightBridgeError(`Unknown light ${id}`, id);
    return { ...record.state };
  }

  /** Test helper: make the next listLights() call reject */
  failNextList(error: Error = new LightBridgeError('Bridge unreachable')): void {
    this.pendingListFailure = error;
  }

  /** Test helper: make every mutation of a light reject */
  failMutationsFor(id: string): void {
    this.failingLights.add(id);
  }

  private handleFor(record: MockLightRecord): LightHandle {
    return {
      id: record.id,
      name: record.name,
      capabilities: { ...record.capabilities },
      readState: async () => ({ ...record.state }),
      applyState: async (patch) => {
        if (this.failingLights.has(record.id)) {
          throw new LightBridgeError(`Light ${record.name} rejected the update`, record.id);
        }
        const restricted = restrictPatch(record.capabilities, patch);
        this.appliedPatches.push({ id: record.id, patch: restricted });
        record.state = { ...record.state, ...restricted };
      },
    };
  }
}
