import type { ILightBridge, LightHandle } from '@lightcue/light-bridge';
import type { Clock } from './stage';

interface CacheEntry {
  handles: Map<string, LightHandle>;
  fetchedAt: number;
}

/**
 * Time-boxed cache of device handles. A stale or empty entry is refetched on
 * the next read; any fetch or mutation error should call `invalidate()`.
 */
export class LightStateCache {
  private entry: CacheEntry | null = null;

  constructor(
    private readonly bridge: ILightBridge,
    private readonly ttlMs: number,
    private readonly clock: Clock = Date.now,
  ) {}

  async getAll(): Promise<LightHandle[]> {
    return [...(await this.current()).values()];
  }

  async get(id: string): Promise<LightHandle | undefined> {
    return (await this.current()).get(id);
  }

  invalidate(): void {
    this.entry = null;
  }

  get fetchedAt(): number | null {
    return this.entry?.fetchedAt ?? null;
  }

  private async current(): Promise<Map<string, LightHandle>> {
    const now = this.clock();
    if (this.entry && this.entry.handles.size > 0 && now - this.entry.fetchedAt <= this.ttlMs) {
      return this.entry.handles;
    }

    try {
      const handles = await this.bridge.listLights();
      this.entry = { handles: new Map(handles.map((h) => [h.id, h])), fetchedAt: now };
      return this.entry.handles;
    } catch (err) {
      this.invalidate();
      throw err;
    }
  }
}
