/**
 * Snapshot Differ / Deduper
 * 快照差異比對 - 去重、展開共用路線、排序、與前次快照比較
 */

import { routeSlug } from './stop-name.js';
import type {
  DiffReport,
  ResolvedStop,
  Route,
  RouteKeyRecord,
  StopChangeRecord,
} from '../types/stop.js';

/** (fc, route_slug, stop_name, lat, lon) with coordinates rounded to 6 places */
export type StopKey = [string, string, string, number, number];

/** (fc, route_slug) */
export type RouteKey = [string, string];

/** Stop fields the differ reads; rows from a previous snapshot may carry more */
export type DiffableStop = Omit<ResolvedStop, 'context_times'> & { context_times?: string[] };

export function round6(value: number): number {
  return Math.round(value * 1e6) / 1e6;
}

export function stopKey(stop: DiffableStop): StopKey {
  return [stop.fc, stop.route_slug, stop.stop_name, round6(stop.lat), round6(stop.lon)];
}

export function routeKey(stop: Pick<ResolvedStop, 'fc' | 'route_slug'>): RouteKey {
  return [stop.fc, stop.route_slug];
}

function serializeKey(key: StopKey | RouteKey): string {
  return JSON.stringify(key);
}

function compareValues(a: string | number, b: string | number): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Lexicographic tuple comparison
 */
export function compareKeys(a: readonly (string | number)[], b: readonly (string | number)[]): number {
  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; i++) {
    const order = compareValues(a[i], b[i]);
    if (order !== 0) return order;
  }
  return a.length - b.length;
}

/**
 * Flatten routes into persisted rows. Stops without coordinates are not rows.
 */
export function flattenRoutes(routes: readonly Route[]): ResolvedStop[] {
  const rows: ResolvedStop[] = [];
  for (const route of routes) {
    for (const stop of route.stops) {
      if (stop.lat === undefined || stop.lon === undefined) continue;
      rows.push({
        fc: route.fc,
        route: route.route,
        route_slug: route.routeSlug,
        source: route.source,
        stop_name: stop.stopName,
        lat: stop.lat,
        lon: stop.lon,
        url: stop.sourceUrl,
        context_times: stop.contextTimes,
      });
    }
  }
  return rows;
}

/**
 * 去重 - first occurrence of each stop key wins, order preserved
 */
export function dedupeStops<T extends DiffableStop>(stops: readonly T[]): T[] {
  const seen = new Set<string>();
  const unique: T[] = [];
  for (const stop of stops) {
    const key = serializeKey(stopKey(stop));
    if (seen.has(key)) continue;
    seen.add(key);
    unique.push(stop);
  }
  return unique;
}

export interface FanOutOptions {
  enabled: boolean;
  /** Label carried by stops of the shared listing, e.g. "WRO" */
  sharedLabel: string;
  /** Member carrier codes, e.g. ["wro1", "wro2"] */
  members: readonly string[];
}

/**
 * Clone every shared-label stop once per member carrier, recomputing the slug
 * from the member code and the route title
 */
export function fanOutSharedStops(stops: readonly ResolvedStop[], options: FanOutOptions): ResolvedStop[] {
  if (!options.enabled) {
    return [...stops];
  }

  const result: ResolvedStop[] = [];
  for (const stop of stops) {
    if (stop.fc !== options.sharedLabel) {
      result.push(stop);
      continue;
    }
    for (const member of options.members) {
      result.push({
        ...stop,
        fc: member.toUpperCase(),
        route_slug: routeSlug(member, stop.route),
      });
    }
  }
  return result;
}

export function sortStops<T extends DiffableStop>(stops: readonly T[]): T[] {
  return [...stops].sort((a, b) => compareKeys(stopKey(a), stopKey(b)));
}

function countRoutes(stops: readonly DiffableStop[]): number {
  return new Set(stops.map((stop) => serializeKey(routeKey(stop)))).size;
}

function describeStop(stop: DiffableStop): StopChangeRecord {
  return {
    fc: stop.fc,
    route: stop.route,
    route_slug: stop.route_slug,
    stop_name: stop.stop_name,
    lat: stop.lat,
    lon: stop.lon,
    source: stop.source,
    url: stop.url,
  };
}

function indexByStopKey(stops: readonly DiffableStop[]): Map<string, { key: StopKey; stop: DiffableStop }> {
  const index = new Map<string, { key: StopKey; stop: DiffableStop }>();
  for (const stop of stops) {
    const key = stopKey(stop);
    const serialized = serializeKey(key);
    if (!index.has(serialized)) {
      index.set(serialized, { key, stop });
    }
  }
  return index;
}

function indexByRouteKey(stops: readonly DiffableStop[]): Map<string, RouteKey> {
  const index = new Map<string, RouteKey>();
  for (const stop of stops) {
    const key = routeKey(stop);
    index.set(serializeKey(key), key);
  }
  return index;
}

function difference<V>(from: Map<string, V>, minus: Map<string, V>): V[] {
  const values: V[] = [];
  for (const [serialized, value] of from) {
    if (!minus.has(serialized)) values.push(value);
  }
  return values;
}

function toRouteRecord([fc, slug]: RouteKey): RouteKeyRecord {
  return { fc, route_slug: slug };
}

/**
 * Diff the new stop set against the previous one.
 * Without a previous snapshot only the totals are filled in.
 */
export function diffSnapshots(
  previous: readonly DiffableStop[] | null,
  next: readonly DiffableStop[],
  generated: number
): DiffReport {
  const report: DiffReport = {
    generated,
    routes_total_new: countRoutes(next),
    stops_total_new: next.length,
    new_routes: [],
    removed_routes: [],
    new_stops: [],
    removed_stops: [],
  };

  if (previous === null) {
    return report;
  }

  const previousStops = indexByStopKey(previous);
  const nextStops = indexByStopKey(next);
  const byStopKey = (a: { key: StopKey }, b: { key: StopKey }) => compareKeys(a.key, b.key);

  report.new_stops = difference(nextStops, previousStops)
    .sort(byStopKey)
    .map((entry) => describeStop(entry.stop));
  report.removed_stops = difference(previousStops, nextStops)
    .sort(byStopKey)
    .map((entry) => describeStop(entry.stop));

  const previousRoutes = indexByRouteKey(previous);
  const nextRoutes = indexByRouteKey(next);
  report.new_routes = difference(nextRoutes, previousRoutes).sort(compareKeys).map(toRouteRecord);
  report.removed_routes = difference(previousRoutes, nextRoutes).sort(compareKeys).map(toRouteRecord);

  return report;
}

/**
 * Report for a run that collected nothing: totals describe the untouched
 * previous snapshot and every change list is empty
 */
export function noChangeReport(previous: readonly DiffableStop[] | null, generated: number): DiffReport {
  const stops = previous ?? [];
  return {
    generated,
    routes_total_new: countRoutes(stops),
    stops_total_new: stops.length,
    new_routes: [],
    removed_routes: [],
    new_stops: [],
    removed_stops: [],
  };
}
