import type { Channel } from '../curves/types';
import type { LutSize, MaterializedLUT } from './types';

/**
 * One materialized table per (channel, size). Tables are built on first read
 * after an invalidation, so a burst of edits costs a single rebuild.
 */
export class LutCache {
  private readonly entries = new Map<Channel, Map<LutSize, MaterializedLUT>>();

  get(channel: Channel, size: LutSize): MaterializedLUT | null {
    return this.entries.get(channel)?.get(size) ?? null;
  }

  getOrBuild(channel: Channel, size: LutSize, build: () => MaterializedLUT): MaterializedLUT {
    const cached = this.get(channel, size);
    if (cached) {
      return cached;
    }

    const built = build();
    const bySize = this.entries.get(channel) ?? new Map<LutSize, MaterializedLUT>();
    bySize.set(size, built);
    this.entries.set(channel, bySize);
    return built;
  }

  invalidate(channel: Channel): void {
    this.entries.delete(channel);
  }

  clear(): void {
    this.entries.clear();
  }

  size(): number {
    let count = 0;
    for (const bySize of this.entries.values()) {
      count += bySize.size;
    }
    return count;
  }
}
