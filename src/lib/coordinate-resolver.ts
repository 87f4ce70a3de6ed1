/**
 * Coordinate Resolver
 * 座標解析 - inline → 前次快照 → 地理編碼（含快取）
 */

import { normalizeStopName } from './stop-name.js';
import { loggers } from './logger.js';
import { recordGeocodeRequest, recordStopResolution } from './metrics.js';
import { isFiniteNumber } from '../utils/guards.js';
import type { GeocodeCache } from '../services/geocode-cache.js';
import type { Geocoder } from '../services/geocoder.js';
import type { Pacer } from '../services/pacer.js';
import type { LatLon, PriorStopIndex, ResolvedStop } from '../types/stop.js';

export type ResolutionTier = 'inline' | 'prior' | 'cache' | 'geocode';

export interface ResolvedCoordinate extends LatLon {
  tier: ResolutionTier;
}

export interface ResolverContext {
  priorIndex: PriorStopIndex;
  geocodeCache: GeocodeCache;
  geocoder: Geocoder;
  /** Mandatory pause after each live geocoder call */
  geocodePacer: Pacer;
  geocodeEnabled: boolean;
}

/**
 * Index the previous snapshot by normalized stop name.
 * Rows without a name or without coordinates are skipped.
 */
export function buildPriorStopIndex(previous: readonly Partial<ResolvedStop>[] | null): PriorStopIndex {
  const index: PriorStopIndex = new Map();
  if (!previous) {
    return index;
  }

  for (const stop of previous) {
    const name = normalizeStopName(stop.stop_name ?? '');
    if (!name) continue;
    if (!isFiniteNumber(stop.lat) || !isFiniteNumber(stop.lon)) continue;

    const entries = index.get(name) ?? [];
    entries.push({ lat: stop.lat, lon: stop.lon, fc: stop.fc ?? '' });
    index.set(name, entries);
  }

  return index;
}

export class CoordinateResolver {
  private context: ResolverContext;

  constructor(context: ResolverContext) {
    this.context = context;
  }

  /**
   * Coordinates for a stop, or null when no tier can place it.
   * @param fcLabel carrier whose prior entries are preferred; null for none
   */
  async resolve(
    stopName: string,
    fcLabel: string | null,
    inline: LatLon | null
  ): Promise<ResolvedCoordinate | null> {
    const resolved = await this.resolveTiers(stopName, fcLabel, inline);
    recordStopResolution(resolved ? resolved.tier : null);
    return resolved;
  }

  private async resolveTiers(
    stopName: string,
    fcLabel: string | null,
    inline: LatLon | null
  ): Promise<ResolvedCoordinate | null> {
    if (inline) {
      return { lat: inline.lat, lon: inline.lon, tier: 'inline' };
    }

    const key = normalizeStopName(stopName);
    const prior = this.fromPriorIndex(key, fcLabel);
    if (prior) {
      return { ...prior, tier: 'prior' };
    }

    return this.geocode(stopName, key);
  }

  private fromPriorIndex(key: string, fcLabel: string | null): LatLon | null {
    const candidates = this.context.priorIndex.get(key);
    if (!candidates || candidates.length === 0) {
      return null;
    }

    if (fcLabel) {
      const sameCarrier = candidates.find((entry) => entry.fc === fcLabel);
      if (sameCarrier) {
        return { lat: sameCarrier.lat, lon: sameCarrier.lon };
      }
    }

    return { lat: candidates[0].lat, lon: candidates[0].lon };
  }

  /**
   * Cache first, then one live call. Every outcome is cached before returning.
   */
  private async geocode(stopName: string, key: string): Promise<ResolvedCoordinate | null> {
    const { geocodeCache, geocoder, geocodePacer, geocodeEnabled } = this.context;

    if (!geocodeEnabled) {
      return null;
    }

    const cached = geocodeCache.lookup(key);
    if (cached.state === 'hit') {
      return { ...cached.coordinate, tier: 'cache' };
    }
    if (cached.state === 'negative') {
      return null;
    }

    let coordinate: LatLon | null = null;
    try {
      coordinate = await geocoder.geocode(stopName);
    } catch (error) {
      loggers.geocode.warn('Geocoder request failed', {
        stop: stopName,
        reason: error instanceof Error ? error.message : String(error),
      });
      recordGeocodeRequest('failed');
      geocodeCache.setNegative(key);
      await geocodePacer.pause();
      return null;
    }

    if (coordinate) {
      geocodeCache.set(key, coordinate);
      recordGeocodeRequest('hit');
    } else {
      geocodeCache.setNegative(key);
      recordGeocodeRequest('empty');
      loggers.geocode.debug('No geocoder match', { stop: stopName });
    }

    await geocodePacer.pause();

    return coordinate ? { ...coordinate, tier: 'geocode' } : null;
  }
}
