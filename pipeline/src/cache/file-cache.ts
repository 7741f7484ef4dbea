/**
 * Read-through file cache for API responses
 *
 * One JSON file per entry at <dir>/<kind>/<sha1(key)>.json holding
 * { key, storedAt, value }. Entries expire by age only; nothing is evicted.
 */

import { createHash } from 'crypto';
import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';

export const CACHE_KINDS = [
  'schedule',
  'roster',
  'person',
  'player-stats',
  'statcast',
  'weather',
  'boxscore',
] as const;

export type CacheKind = (typeof CACHE_KINDS)[number];

const MINUTE = 60 * 1000;
const HOUR = 60 * MINUTE;
const DAY = 24 * HOUR;

export const DEFAULT_MAX_AGE_MS: Readonly<Record<CacheKind, number>> = Object.freeze({
  schedule: 2 * HOUR,
  roster: 12 * HOUR,
  person: 30 * DAY,
  'player-stats': 12 * HOUR,
  statcast: 24 * HOUR,
  weather: 1 * HOUR,
  boxscore: 30 * DAY,
});

export type CacheLookup =
  | { hit: true; value: unknown; storedAt: number }
  | { hit: false; reason: 'missing' | 'stale' | 'corrupt' };

export interface FileCacheOptions {
  dir: string;
  maxAgeMs?: Partial<Record<CacheKind, number>>;
  /** Clock in epoch milliseconds */
  now?: () => number;
}

const entrySchema = z.object({
  key: z.string(),
  storedAt: z.number(),
  value: z.unknown(),
});

export class FileCache {
  private readonly dir: string;
  private readonly maxAgeMs: Record<CacheKind, number>;
  private readonly now: () => number;

  constructor(options: FileCacheOptions) {
    this.dir = options.dir;
    this.maxAgeMs = { ...DEFAULT_MAX_AGE_MS, ...options.maxAgeMs };
    this.now = options.now ?? Date.now;
  }

  pathFor(kind: CacheKind, key: string): string {
    const digest = createHash('sha1').update(key).digest('hex');
    return path.join(this.dir, kind, `${digest}.json`);
  }

  maxAgeFor(kind: CacheKind): number {
    return this.maxAgeMs[kind];
  }

  get(kind: CacheKind, key: string): CacheLookup {
    const file = this.pathFor(kind, key);
    if (!fs.existsSync(file)) {
      return { hit: false, reason: 'missing' };
    }

    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(file, 'utf-8'));
    } catch {
      return { hit: false, reason: 'corrupt' };
    }

    const entry = entrySchema.safeParse(raw);
    // A digest collision or a hand-edited file both show up as a key mismatch
    if (!entry.success || entry.data.key !== key) {
      return { hit: false, reason: 'corrupt' };
    }

    if (this.now() - entry.data.storedAt >= this.maxAgeMs[kind]) {
      return { hit: false, reason: 'stale' };
    }

    return { hit: true, value: entry.data.value, storedAt: entry.data.storedAt };
  }

  set(kind: CacheKind, key: string, value: unknown): void {
    const file = this.pathFor(kind, key);
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, JSON.stringify({ key, storedAt: this.now(), value }));
  }
}
