/**
 * 設定檔結構
 */
export interface AppConfig {
  /** Pause after each route page fetch (seconds) */
  requestDelaySec?: number;
  /** Pause after each live geocoder call (seconds) */
  geocodeDelaySec?: number;
  /** Set false to skip the geocoder tier entirely */
  geocodeEnabled?: boolean;
  /** Outbound User-Agent */
  userAgent?: string;
  /** Directory holding stops.json, changes.json and geocode_cache.json */
  dataDir?: string;
  /** Clone shared-listing stops once per member carrier */
  fanOutSharedRoutes?: boolean;
  collectionMode?: CollectionMode;
  logLevel?: 'debug' | 'info' | 'warn' | 'error';
}

/**
 * pdf-first: PDF routes replace HTML collection when any are found.
 * combined: both always run.
 */
export type CollectionMode = 'pdf-first' | 'combined';

/**
 * Fully resolved settings handed to a harvest run
 */
export type HarvestSettings = Required<AppConfig>;
