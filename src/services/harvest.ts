/**
 * Harvest Run
 * 完整收集流程 - 讀取前次快照 → 收集 → 去重排序 → 寫入快照與差異報告
 *
 * The previous snapshot is only ever replaced by a run that collected at
 * least one stop.
 */

import { CoordinateResolver, buildPriorStopIndex } from '../lib/coordinate-resolver.js';
import { collectRoutes, type CollectedRoutes } from '../lib/collector.js';
import { loggers, formatDuration } from '../lib/logger.js';
import {
  dedupeStops,
  diffSnapshots,
  fanOutSharedStops,
  flattenRoutes,
  noChangeReport,
  sortStops,
} from '../lib/snapshot-diff.js';
import { CARRIER_CODES, EMPLOYEE_TRANSPORT_URL, SHARED_WRO_SITE, SITES } from '../data/sites.js';
import { HttpFetcher, type PageFetcher } from './fetcher.js';
import { GeocodeCacheStore } from './geocode-cache.js';
import { NominatimGeocoder, type Geocoder } from './geocoder.js';
import { createPacers, realSleep, type SleepFn } from './pacer.js';
import { UnpdfTextExtractor, type PdfTextExtractor } from './pdf-text.js';
import { SnapshotStore } from './snapshot-store.js';
import type { HarvestSettings } from '../types/config.js';
import type { SiteStrategy } from '../types/site.js';
import type { DiffReport } from '../types/stop.js';

export interface HarvestDependencies {
  fetcher: PageFetcher;
  pdfExtractor: PdfTextExtractor;
  geocoder: Geocoder;
  sleep?: SleepFn;
  sites?: readonly SiteStrategy[];
  /** Epoch seconds for `generated` */
  now?: () => number;
}

export interface HarvestOptions {
  /** Collect and diff without touching any file */
  dryRun?: boolean;
}

export interface HarvestOutcome {
  status: 'written' | 'kept-previous';
  /** Stops in the new snapshot (0 when the previous one was kept) */
  stops: number;
  routes: number;
  report: DiffReport;
  dryRun: boolean;
}

export function epochSeconds(): number {
  return Math.floor(Date.now() / 1000);
}

/**
 * Live HTTP collaborators for a harvest run
 */
export function createHarvestDependencies(settings: HarvestSettings): HarvestDependencies {
  return {
    fetcher: new HttpFetcher({ userAgent: settings.userAgent }),
    pdfExtractor: new UnpdfTextExtractor(),
    geocoder: new NominatimGeocoder({ userAgent: settings.userAgent }),
  };
}

/**
 * 執行一次完整收集
 */
export async function runHarvest(
  settings: HarvestSettings,
  deps: HarvestDependencies,
  options: HarvestOptions = {}
): Promise<HarvestOutcome> {
  const dryRun = options.dryRun ?? false;
  const now = deps.now ?? epochSeconds;
  const startTime = Date.now();
  const runId = loggers.harvest.pushRunId();

  try {
    const snapshotStore = new SnapshotStore(settings.dataDir);
    const cacheStore = new GeocodeCacheStore(settings.dataDir);

    const previous = snapshotStore.loadPrevious();
    const previousStops = previous ? previous.stops : null;
    const geocodeCache = cacheStore.load();

    loggers.harvest.info('Harvest started', {
      runId,
      previousStops: previousStops ? previousStops.length : 0,
      cachedNames: geocodeCache.size,
      mode: settings.collectionMode,
    });

    const pacers = createPacers(settings.requestDelaySec, settings.geocodeDelaySec, deps.sleep ?? realSleep);
    const resolver = new CoordinateResolver({
      priorIndex: buildPriorStopIndex(previousStops),
      geocodeCache,
      geocoder: deps.geocoder,
      geocodePacer: pacers.geocode,
      geocodeEnabled: settings.geocodeEnabled,
    });

    let collected: CollectedRoutes;
    try {
      collected = await collectRoutes({
        fetcher: deps.fetcher,
        pdfExtractor: deps.pdfExtractor,
        resolver,
        pacers,
        sites: deps.sites ?? SITES,
        carrierCodes: CARRIER_CODES,
        employeeTransportUrl: EMPLOYEE_TRANSPORT_URL,
        collectionMode: settings.collectionMode,
      });
    } catch (error) {
      loggers.harvest.error(
        'Collection failed, continuing with no routes',
        error instanceof Error ? error : new Error(String(error))
      );
      collected = { routes: [], pdfRoutes: 0, htmlRoutes: 0 };
    }

    const shared = SHARED_WRO_SITE.shared;
    const stops = sortStops(
      fanOutSharedStops(dedupeStops(flattenRoutes(collected.routes)), {
        enabled: settings.fanOutSharedRoutes,
        sharedLabel: shared ? shared.label : '',
        members: shared ? shared.members : [],
      })
    );

    const generated = now();

    if (stops.length === 0) {
      loggers.harvest.warn('No stops collected, keeping previous snapshot', {
        snapshot: snapshotStore.getSnapshotPath(),
      });
      const report = noChangeReport(previousStops, generated);
      if (!dryRun) {
        snapshotStore.writeChanges(report);
        cacheStore.save(geocodeCache);
      }
      return { status: 'kept-previous', stops: 0, routes: 0, report, dryRun };
    }

    const report = diffSnapshots(previousStops, stops, generated);
    if (!dryRun) {
      snapshotStore.writeSnapshot(generated, stops);
      cacheStore.save(geocodeCache);
      snapshotStore.writeChanges(report);
      loggers.snapshot.info('Snapshot saved', {
        path: snapshotStore.getSnapshotPath(),
        stops: stops.length,
      });
    }

    loggers.harvest.info('Harvest finished', {
      routes: report.routes_total_new,
      stops: stops.length,
      newStops: report.new_stops.length,
      removedStops: report.removed_stops.length,
      elapsed: formatDuration(Date.now() - startTime),
    });

    return {
      status: 'written',
      stops: stops.length,
      routes: report.routes_total_new,
      report,
      dryRun,
    };
  } finally {
    loggers.harvest.popRunId();
  }
}
