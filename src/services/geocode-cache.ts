/**
 * Geocode Cache
 * 地理編碼快取 - 正規化站名 → 座標；null 座標代表查詢失敗（負快取）
 *
 * Entries never expire and are never pruned here; `clearNegative` exists so
 * an operator can retry names that failed before.
 */

import fs from 'node:fs';
import path from 'node:path';
import { isFiniteNumber, isRecord } from '../utils/guards.js';
import type { GeocodeCacheEntry, LatLon } from '../types/stop.js';

export const GEOCODE_CACHE_FILE = 'geocode_cache.json';

export type CacheLookup =
  | { state: 'miss' }
  | { state: 'negative' }
  | { state: 'hit'; coordinate: LatLon };

export interface GeocodeCacheStatus {
  cachePath: string;
  entries: number;
  positive: number;
  negative: number;
}

function toEntry(value: unknown): GeocodeCacheEntry | null {
  if (!isRecord(value)) return null;
  if (isFiniteNumber(value.lat) && isFiniteNumber(value.lon)) {
    return { lat: value.lat, lon: value.lon };
  }
  if (value.lat === null || value.lon === null) {
    return { lat: null, lon: null };
  }
  return null;
}

export class GeocodeCache {
  private entries: Map<string, GeocodeCacheEntry>;

  constructor(entries: Record<string, GeocodeCacheEntry> = {}) {
    this.entries = new Map(Object.entries(entries));
  }

  lookup(key: string): CacheLookup {
    const entry = this.entries.get(key);
    if (!entry) {
      return { state: 'miss' };
    }
    if (entry.lat === null || entry.lon === null) {
      return { state: 'negative' };
    }
    return { state: 'hit', coordinate: { lat: entry.lat, lon: entry.lon } };
  }

  set(key: string, coordinate: LatLon): void {
    this.entries.set(key, { lat: coordinate.lat, lon: coordinate.lon });
  }

  setNegative(key: string): void {
    this.entries.set(key, { lat: null, lon: null });
  }

  /**
   * Drop failed lookups; returns how many were removed
   */
  clearNegative(): number {
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (entry.lat === null || entry.lon === null) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  get size(): number {
    return this.entries.size;
  }

  countNegative(): number {
    let count = 0;
    for (const entry of this.entries.values()) {
      if (entry.lat === null || entry.lon === null) count++;
    }
    return count;
  }

  toJSON(): Record<string, GeocodeCacheEntry> {
    return Object.fromEntries(this.entries);
  }
}

/**
 * geocode_cache.json reader/writer
 */
export class GeocodeCacheStore {
  private cachePath: string;

  constructor(dataDir: string) {
    this.cachePath = path.join(dataDir, GEOCODE_CACHE_FILE);
  }

  /**
   * 載入快取；檔案不存在或損毀時回傳空快取
   */
  load(): GeocodeCache {
    try {
      if (!fs.existsSync(this.cachePath)) {
        return new GeocodeCache();
      }
      const parsed: unknown = JSON.parse(fs.readFileSync(this.cachePath, 'utf-8'));
      if (!isRecord(parsed)) {
        return new GeocodeCache();
      }

      const entries: Record<string, GeocodeCacheEntry> = {};
      for (const [key, value] of Object.entries(parsed)) {
        const entry = toEntry(value);
        if (entry) entries[key] = entry;
      }
      return new GeocodeCache(entries);
    } catch {
      return new GeocodeCache();
    }
  }

  save(cache: GeocodeCache): void {
    fs.mkdirSync(path.dirname(this.cachePath), { recursive: true });
    fs.writeFileSync(this.cachePath, JSON.stringify(cache.toJSON(), null, 2), 'utf-8');
  }

  getStatus(cache: GeocodeCache): GeocodeCacheStatus {
    const negative = cache.countNegative();
    return {
      cachePath: this.cachePath,
      entries: cache.size,
      positive: cache.size - negative,
      negative,
    };
  }
}
