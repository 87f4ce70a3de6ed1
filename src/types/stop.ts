/**
 * 站點資料結構
 * Stop, route and snapshot shapes shared across the pipeline
 */

/**
 * 座標
 */
export interface LatLon {
  lat: number;
  lon: number;
}

/**
 * Raw stop as extracted from a route page or a PDF line.
 * Coordinates may be absent; the resolver fills them in.
 */
export interface StopCandidate {
  stopName: string;
  lat?: number;
  lon?: number;
  /** "HH:MM" tokens seen next to the stop, unique and sorted */
  contextTimes: string[];
  /** Map link for HTML stops, document URL for PDF stops */
  sourceUrl: string;
}

/**
 * One published route: a route page or a PDF timetable
 */
export interface Route {
  /** Carrier label, e.g. "WRO", "LCJ2", "UNKNOWN" */
  fc: string;
  route: string;
  routeSlug: string;
  source: string;
  stops: StopCandidate[];
}

/**
 * A stop with final coordinates, as persisted in stops.json.
 * Field names match the on-disk format.
 */
export interface ResolvedStop {
  fc: string;
  route: string;
  route_slug: string;
  source: string;
  stop_name: string;
  lat: number;
  lon: number;
  url: string;
  context_times: string[];
}

/**
 * geocode_cache.json entry; null coordinates mark a failed lookup
 */
export type GeocodeCacheEntry = LatLon | { lat: null; lon: null };

export interface PriorStopEntry extends LatLon {
  fc: string;
}

/**
 * 前次快照索引：正規化站名 → 已知座標
 */
export type PriorStopIndex = Map<string, PriorStopEntry[]>;

export interface RouteKeyRecord {
  fc: string;
  route_slug: string;
}

/**
 * Stop as described in the diff report
 */
export interface StopChangeRecord {
  fc: string;
  route: string;
  route_slug: string;
  stop_name: string;
  lat: number;
  lon: number;
  source: string;
  url: string;
}

/**
 * changes.json
 */
export interface DiffReport {
  generated: number;
  routes_total_new: number;
  stops_total_new: number;
  new_routes: RouteKeyRecord[];
  removed_routes: RouteKeyRecord[];
  new_stops: StopChangeRecord[];
  removed_stops: StopChangeRecord[];
}
