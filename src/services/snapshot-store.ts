// Snapshot Store
// Keeps the last market snapshot per region in a JSON file so a scan can be replayed offline

import * as fs from 'fs';
import * as path from 'path';
import type { MarketEntry, MarketSnapshot, Region } from '../types';

interface SnapshotFile {
  region: Region;
  fetchedAt: number; // epoch ms
  entries: Array<{ id: number; price: number; stock: number }>;
}

export interface StoredSnapshot {
  snapshot: MarketSnapshot;
  fetchedAt: Date | null;
}

export interface LoadOptions {
  maxAgeMinutes?: number;
  now?: number;
}

export function defaultSnapshotDir(): string {
  return path.resolve(process.cwd(), process.env.SNAPSHOT_DIR || path.join('data', 'snapshots'));
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

function isSnapshotEntry(value: unknown): value is SnapshotFile['entries'][number] {
  return (
    typeof value === 'object' &&
    value !== null &&
    'id' in value &&
    'price' in value &&
    'stock' in value &&
    isFiniteNumber(value.id) &&
    isFiniteNumber(value.price) &&
    isFiniteNumber(value.stock)
  );
}

function isSnapshotFile(value: unknown): value is SnapshotFile {
  return (
    typeof value === 'object' &&
    value !== null &&
    'fetchedAt' in value &&
    'entries' in value &&
    isFiniteNumber(value.fetchedAt) &&
    Array.isArray(value.entries) &&
    value.entries.every(isSnapshotEntry)
  );
}

function emptySnapshot(): StoredSnapshot {
  return { snapshot: new Map(), fetchedAt: null };
}

export class SnapshotStore {
  private dir: string;

  constructor(dir: string = defaultSnapshotDir()) {
    this.dir = dir;
  }

  private filePath(region: Region): string {
    return path.join(this.dir, `${region.toLowerCase()}.json`);
  }

  /**
   * Replace the stored snapshot for a region. Returns the number of entries written.
   */
  save(region: Region, snapshot: MarketSnapshot, fetchedAt: number = Date.now()): number {
    const data: SnapshotFile = {
      region,
      fetchedAt,
      entries: [...snapshot.entries()].map(([id, entry]) => ({ id, price: entry.price, stock: entry.stock })),
    };

    if (!fs.existsSync(this.dir)) {
      fs.mkdirSync(this.dir, { recursive: true });
    }

    // written beside the target, then renamed over it
    const target = this.filePath(region);
    const temp = `${target}.tmp`;
    fs.writeFileSync(temp, JSON.stringify(data));
    fs.renameSync(temp, target);

    return data.entries.length;
  }

  private read(region: Region): SnapshotFile | null {
    const file = this.filePath(region);
    if (!fs.existsSync(file)) return null;

    try {
      const data: unknown = JSON.parse(fs.readFileSync(file, 'utf8'));
      if (isSnapshotFile(data)) return data;
      console.warn(`⚠️  Ignoring malformed snapshot file ${file}`);
    } catch (e) {
      console.warn(`⚠️  Could not read snapshot file ${file}:`, e instanceof Error ? e.message : e);
    }
    return null;
  }

  /**
   * Stored snapshot for a region. With maxAgeMinutes, a snapshot older than that loads as empty.
   */
  load(region: Region, options: LoadOptions = {}): StoredSnapshot {
    const data = this.read(region);
    if (!data) return emptySnapshot();

    const now = options.now ?? Date.now();
    if (options.maxAgeMinutes !== undefined && now - data.fetchedAt > options.maxAgeMinutes * 60000) {
      return emptySnapshot();
    }

    const snapshot = new Map<number, MarketEntry>();
    for (const entry of data.entries) {
      snapshot.set(entry.id, Object.freeze({ price: entry.price, stock: entry.stock }));
    }
    return { snapshot, fetchedAt: new Date(data.fetchedAt) };
  }

  /**
   * Minutes since the region was last saved, or null if nothing is stored
   */
  getAge(region: Region, now: number = Date.now()): number | null {
    const data = this.read(region);
    if (!data) return null;
    return Math.floor((now - data.fetchedAt) / 60000);
  }

  /**
   * Total bytes of all stored snapshot files
   */
  getSize(): number {
    if (!fs.existsSync(this.dir)) return 0;

    let totalSize = 0;
    for (const file of fs.readdirSync(this.dir)) {
      if (file.endsWith('.json')) {
        totalSize += fs.statSync(path.join(this.dir, file)).size;
      }
    }
    return totalSize;
  }
}
