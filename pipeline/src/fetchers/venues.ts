/**
 * Ballpark table: park factor, location and orientation by MLB venue name
 */

import * as fs from 'fs';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import type { ParkFactor } from '@hrcast/model';
import { ConfigurationError } from '../errors.js';

export const DEFAULT_BALLPARKS_PATH = fileURLToPath(new URL('../../data/ballparks.json', import.meta.url));

const ballparkSchema = z.object({
  team: z.string(),
  parkFactor: z.number().positive(),
  lat: z.number(),
  lon: z.number(),
  elevationFt: z.number(),
  centerFieldBearingDeg: z.number().min(0).max(360),
  /** Retractable roofs count as closed: the feeds do not say whether they are open */
  roof: z.enum(['open', 'retractable', 'dome']),
  aliases: z.array(z.string()).optional(),
});

const ballparkTableSchema = z.record(ballparkSchema);

export type Ballpark = z.infer<typeof ballparkSchema> & { name: string };

export interface VenueLookup {
  park: ParkFactor;
  location: { lat: number; lon: number; elevationFt: number } | null;
}

export class BallparkTable {
  private readonly byName = new Map<string, Ballpark>();

  constructor(parks: Ballpark[]) {
    for (const park of parks) {
      this.byName.set(normalizeVenueName(park.name), park);
      for (const alias of park.aliases ?? []) {
        this.byName.set(normalizeVenueName(alias), park);
      }
    }
  }

  static load(file: string = DEFAULT_BALLPARKS_PATH): BallparkTable {
    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(file, 'utf-8'));
    } catch (error) {
      throw new ConfigurationError(`Cannot read ballpark table ${file}: ${String(error)}`);
    }
    const parsed = ballparkTableSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigurationError(`Invalid ballpark table ${file}: ${parsed.error.issues[0]?.message}`);
    }
    return new BallparkTable(Object.entries(parsed.data).map(([name, park]) => ({ ...park, name })));
  }

  get size(): number {
    return this.byName.size;
  }

  find(venueName: string): Ballpark | undefined {
    return this.byName.get(normalizeVenueName(venueName));
  }

  /**
   * Park factor for a venue. Unmapped venues get a null factor, which the
   * scorer imputes as neutral.
   */
  lookup(venueName: string): VenueLookup {
    const park = this.find(venueName);
    if (!park) {
      console.warn(`  ⚠️ [Venues] No ballpark entry for "${venueName}"`);
      return {
        park: { venueName, factor: null, centerFieldBearingDeg: null, dome: false },
        location: null,
      };
    }
    return {
      park: {
        venueName: park.name,
        factor: park.parkFactor,
        centerFieldBearingDeg: park.centerFieldBearingDeg,
        dome: park.roof !== 'open',
      },
      location: { lat: park.lat, lon: park.lon, elevationFt: park.elevationFt },
    };
  }
}

export function normalizeVenueName(name: string): string {
  return name.trim().toLowerCase().replace(/\s+/g, ' ');
}
