import { createHash } from "node:crypto";

/** Anything with a change key: meshes, layers through their mesh, images. */
export interface Keyed {
  readonly key: number;
}

/**
 * Derived data (quads, GPU buffers, thumbnails) indexed by the source key and
 * the effect settings it was built with. Least recently used entries are
 * evicted past `capacity`.
 */
export class KeyedCache<S extends Keyed, T> {
  public hits = 0;
  public misses = 0;
  private readonly capacity: number;
  private readonly onEvict?: (value: T) => void;
  private readonly entries = new Map<string, T>();

  public constructor(capacity = 64, onEvict?: (value: T) => void) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`Cache capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
    this.onEvict = onEvict;
  }

  public get size(): number {
    return this.entries.size;
  }

  public get(source: S, effects: number | string, build: (source: S) => T): T {
    const id = `${source.key}|${effects}`;
    if (this.entries.has(id)) {
      const value = this.entries.get(id);
      if (value !== undefined) {
        this.hits++;
        this.entries.delete(id);
        this.entries.set(id, value);
        return value;
      }
    }
    this.misses++;
    const value = build(source);
    this.entries.set(id, value);
    this.evict();
    return value;
  }

  public clear(): void {
    for (const value of this.entries.values()) {
      this.onEvict?.(value);
    }
    this.entries.clear();
  }

  private evict(): void {
    for (const [id, value] of this.entries) {
      if (this.entries.size <= this.capacity) return;
      this.entries.delete(id);
      this.onEvict?.(value);
    }
  }
}

export const RENDERER_VERSION = "1";

export function meshCacheKey(meshKey: number | string, rendererVersion: string, effects: number | string): string {
  return createHash("sha256")
    .update(`mesh|${meshKey}|${rendererVersion}|${effects}`)
    .digest("hex");
}

export function thumbCacheKey(meshKey: string, thumbConfig: string, rendererVersion: string): string {
  return createHash("sha256")
    .update(`thumb|${meshKey}|${thumbConfig}|${rendererVersion}`)
    .digest("hex");
}
