/**
 * Coordinate Extractor
 * 座標擷取 - 從地圖連結或文字中取出經緯度
 */

import type { LatLon } from '../types/stop.js';

/** `#map=<zoom>/<lat>/<lon>` as written by openstreetmap.org */
const MAP_FRAGMENT = /(?:^|&)map=\d+\/([+-]?[0-9.]+)\/([+-]?[0-9.]+)(?:&|$)/;

/**
 * Decimal lat (1-2 integer digits) and lon (1-3 integer digits), each with at
 * least four fractional digits, comma or dot decimals, joined by , ; / or space.
 */
const LATLON_INLINE = /([+-]?\d{1,2}[.,]\d{4,})\s*[,;/\s]\s*([+-]?\d{1,3}[.,]\d{4,})/;

export interface TextCoordinateMatch extends LatLon {
  /** Offset of the matched substring */
  index: number;
  /** The matched substring itself */
  text: string;
}

/** Plain decimal notation; hex, octal and binary literals are not coordinates */
const DECIMAL = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

/** Hrefs starting with a scheme, e.g. `https:` */
const HAS_SCHEME = /^[a-z][a-z\d+\-.]*:\/\//i;

const MAP_BASE_URL = 'https://www.openstreetmap.org/';

function toNumber(raw: string): number | null {
  const value = raw.trim().replace(',', '.');
  if (!DECIMAL.test(value)) return null;
  const n = Number(value);
  return Number.isFinite(n) ? n : null;
}

/**
 * Parse an OpenStreetMap link: `mlat`/`mlon` query first, then the
 * `map=` fragment. Anything malformed yields null.
 */
export function extractFromLink(href: string): LatLon | null {
  const compact = href.replace(/\s+/g, '');

  // protocol-relative and root-relative hrefs resolve against the map host;
  // a bare host such as `www.openstreetmap.org/?mlat=...` gets a scheme
  const absolute = HAS_SCHEME.test(compact) || compact.startsWith('/') ? compact : `https://${compact}`;

  let url: URL;
  try {
    url = new URL(absolute, MAP_BASE_URL);
  } catch {
    return null;
  }

  const mlat = url.searchParams.get('mlat');
  const mlon = url.searchParams.get('mlon');
  if (mlat && mlon) {
    const lat = toNumber(mlat);
    const lon = toNumber(mlon);
    if (lat !== null && lon !== null) {
      return { lat, lon };
    }
  }

  const fragment = url.hash.replace(/^#/, '');
  if (fragment) {
    const match = MAP_FRAGMENT.exec(fragment);
    if (match) {
      const lat = toNumber(match[1]);
      const lon = toNumber(match[2]);
      if (lat !== null && lon !== null) {
        return { lat, lon };
      }
    }
  }

  return null;
}

/**
 * First coordinate pair in free text, with where it was found
 */
export function matchInText(text: string): TextCoordinateMatch | null {
  const match = LATLON_INLINE.exec(text);
  if (!match) {
    return null;
  }

  const lat = toNumber(match[1]);
  const lon = toNumber(match[2]);
  if (lat === null || lon === null) {
    return null;
  }

  return { lat, lon, index: match.index, text: match[0] };
}

export function extractFromText(text: string): LatLon | null {
  const match = matchInText(text);
  return match ? { lat: match.lat, lon: match.lon } : null;
}
