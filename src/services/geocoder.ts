/**
 * Geocoder
 * Nominatim 地理編碼 - 一個站名最多一個最佳結果
 */

import { ofetch } from 'ofetch';
import { retry, defaultShouldRetry } from './retry.js';
import type { LatLon } from '../types/stop.js';

const NOMINATIM_SEARCH = 'https://nominatim.openstreetmap.org/search';
const REQUEST_TIMEOUT_MS = 25000;

/**
 * Country-restricted free-text lookup. Resolves to null when nothing
 * matched; rejects on network or format errors.
 */
export interface Geocoder {
  geocode(query: string): Promise<LatLon | null>;
}

interface NominatimPlace {
  lat: string;
  lon: string;
  display_name?: string;
}

export interface NominatimOptions {
  userAgent: string;
  /** ISO code passed as countrycodes, default "pl" */
  countryCode?: string;
  /** Appended to every query, default "Poland" */
  countryName?: string;
  endpoint?: string;
}

function toCoordinate(place: NominatimPlace): LatLon {
  const lat = Number(place.lat);
  const lon = Number(place.lon);
  if (!Number.isFinite(lat) || !Number.isFinite(lon)) {
    throw new Error(`Unexpected coordinates in geocoder response: ${place.lat}, ${place.lon}`);
  }
  return { lat, lon };
}

export class NominatimGeocoder implements Geocoder {
  private userAgent: string;
  private countryCode: string;
  private countryName: string;
  private endpoint: string;

  constructor(options: NominatimOptions) {
    this.userAgent = options.userAgent;
    this.countryCode = options.countryCode ?? 'pl';
    this.countryName = options.countryName ?? 'Poland';
    this.endpoint = options.endpoint ?? NOMINATIM_SEARCH;
  }

  async geocode(query: string): Promise<LatLon | null> {
    const places = await retry(
      () =>
        ofetch<NominatimPlace[]>(this.endpoint, {
          method: 'GET',
          query: {
            format: 'json',
            limit: 1,
            q: `${query}, ${this.countryName}`,
            addressdetails: 0,
            countrycodes: this.countryCode,
          },
          headers: { 'User-Agent': this.userAgent },
          timeout: REQUEST_TIMEOUT_MS,
          retry: 0,
        }),
      { shouldRetry: defaultShouldRetry }
    );

    if (!Array.isArray(places)) {
      throw new Error('Unexpected geocoder response');
    }
    if (places.length === 0) {
      return null;
    }

    return toCoordinate(places[0]);
  }
}
