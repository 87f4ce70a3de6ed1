/**
 * Prometheus 指標收集
 * Counters for one harvest run: pages, routes, stop resolution and geocoding.
 * `harvest --metrics` prints them in exposition format at the end of a run.
 */

import { register, Counter, Histogram } from 'prom-client';

/**
 * 抓取指標
 */
export const fetchRequestsTotal = new Counter({
  name: 'fc_fetch_requests_total',
  help: 'HTTP fetches by outcome',
  labelNames: ['kind', 'outcome'] // kind: 'page' | 'pdf'; outcome: 'ok' | 'failed'
});

export const fetchDurationSeconds = new Histogram({
  name: 'fc_fetch_duration_seconds',
  help: 'HTTP fetch latency including retries (seconds)',
  labelNames: ['kind'],
  buckets: [0.1, 0.5, 1.0, 2.0, 5.0, 10.0, 30.0]
});

/**
 * 探索與解析指標
 */
export const pagesCrawledTotal = new Counter({
  name: 'fc_pages_crawled_total',
  help: 'Pages visited by the bounded crawler',
  labelNames: ['site']
});

export const routesCollectedTotal = new Counter({
  name: 'fc_routes_collected_total',
  help: 'Routes produced by the parsers',
  labelNames: ['format'] // 'html' | 'pdf'
});

export const parseMissesTotal = new Counter({
  name: 'fc_parse_misses_total',
  help: 'Pages or PDFs that yielded no stops',
  labelNames: ['format']
});

/**
 * 座標解析指標
 */
export const stopsResolvedTotal = new Counter({
  name: 'fc_stops_resolved_total',
  help: 'Stops given coordinates, by the tier that answered',
  labelNames: ['tier'] // 'inline' | 'prior' | 'cache' | 'geocode'
});

export const stopsDroppedTotal = new Counter({
  name: 'fc_stops_dropped_total',
  help: 'Stops dropped because no tier could place them'
});

export const geocodeRequestsTotal = new Counter({
  name: 'fc_geocode_requests_total',
  help: 'Live geocoder calls by outcome',
  labelNames: ['outcome'] // 'hit' | 'empty' | 'failed'
});

export async function getMetricsSnapshot(): Promise<string> {
  return register.metrics();
}

/**
 * 重置所有指標（用於測試）
 */
export function resetMetrics(): void {
  register.resetMetrics();
}

export function recordFetch(kind: 'page' | 'pdf', ok: boolean, durationMs: number): void {
  fetchRequestsTotal.inc({ kind, outcome: ok ? 'ok' : 'failed' });
  fetchDurationSeconds.observe({ kind }, durationMs / 1000);
}

export function recordCrawledPage(site: string): void {
  pagesCrawledTotal.inc({ site });
}

export function recordRoute(format: 'html' | 'pdf'): void {
  routesCollectedTotal.inc({ format });
}

export function recordParseMiss(format: 'html' | 'pdf'): void {
  parseMissesTotal.inc({ format });
}

export function recordStopResolution(tier: 'inline' | 'prior' | 'cache' | 'geocode' | null): void {
  if (tier === null) {
    stopsDroppedTotal.inc();
    return;
  }
  stopsResolvedTotal.inc({ tier });
}

export function recordGeocodeRequest(outcome: 'hit' | 'empty' | 'failed'): void {
  geocodeRequestsTotal.inc({ outcome });
}
