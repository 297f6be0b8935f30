// In-memory volume catalogue backing the mock provider.

const GIB = 1024n ** 3n;

// uint64 sizes travel as decimal strings, the form the codecs decode them to
export const DEFAULT_VOLUME_BYTES = String(100n * GIB);
export const TOTAL_CAPACITY_BYTES = String(100n * GIB * 1024n);

export interface VolumeRecord {
  capacityBytes: string;
  id: { values: Record<string, string> };
  metadata: { values: Record<string, string> };
}

export class VolumeCatalogue {
  private readonly volumes: VolumeRecord[] = [];
  private lastId = 0;

  constructor(seedNames: readonly string[] = []) {
    for (const name of seedNames) {
      this.create(name, DEFAULT_VOLUME_BYTES);
    }
  }

  get size(): number {
    return this.volumes.length;
  }

  create(name: string, capacityBytes: string): VolumeRecord {
    this.lastId += 1;
    const volume: VolumeRecord = {
      capacityBytes,
      id: { values: { id: String(this.lastId), name } },
      metadata: { values: {} },
    };
    this.volumes.push(volume);
    return volume;
  }

  /** Case-insensitive match on one id field ("id" or "name"). */
  find(field: 'id' | 'name', value: string): VolumeRecord | undefined {
    const wanted = value.toLowerCase();
    return this.volumes.find((volume) => volume.id.values[field]?.toLowerCase() === wanted);
  }

  remove(volume: VolumeRecord): void {
    const index = this.volumes.indexOf(volume);
    if (index !== -1) this.volumes.splice(index, 1);
  }

  slice(start: number, end?: number): VolumeRecord[] {
    return this.volumes.slice(start, end);
  }
}

/** Detached copy for replies, so later mutations never leak into them. */
export function snapshot(volume: VolumeRecord): VolumeRecord {
  return {
    capacityBytes: volume.capacityBytes,
    id: { values: { ...volume.id.values } },
    metadata: { values: { ...volume.metadata.values } },
  };
}
