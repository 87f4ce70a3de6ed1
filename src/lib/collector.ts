/**
 * Route Collector
 * 路線收集 - PDF 時刻表與路線頁，解析後補齊座標
 */

import { collectPdfLinks } from './links.js';
import { loggers } from './logger.js';
import { recordParseMiss, recordRoute } from './metrics.js';
import {
  UNKNOWN_CARRIER,
  inferPdfCarrier,
  inferPdfRouteTitle,
  parsePdfStopLines,
} from './pdf-route-parser.js';
import { parseRoutePage } from './route-page-parser.js';
import { discoverRoutePages } from './site-discovery.js';
import { routeSlug } from './stop-name.js';
import type { CoordinateResolver } from './coordinate-resolver.js';
import type { PageFetcher } from '../services/fetcher.js';
import type { Pacers } from '../services/pacer.js';
import type { PdfTextExtractor } from '../services/pdf-text.js';
import type { CollectionMode } from '../types/config.js';
import type { RoutePageTarget, SiteStrategy } from '../types/site.js';
import type { LatLon, Route, StopCandidate } from '../types/stop.js';

export interface CollectorContext {
  fetcher: PageFetcher;
  pdfExtractor: PdfTextExtractor;
  resolver: CoordinateResolver;
  pacers: Pacers;
  sites: readonly SiteStrategy[];
  /** Codes searched for in PDF titles and URLs, in priority order */
  carrierCodes: readonly string[];
  employeeTransportUrl: string;
  collectionMode: CollectionMode;
}

export type CollectedRoutes = {
  routes: Route[];
  pdfRoutes: number;
  htmlRoutes: number;
};

function inlineOf(stop: StopCandidate): LatLon | null {
  return stop.lat !== undefined && stop.lon !== undefined ? { lat: stop.lat, lon: stop.lon } : null;
}

/**
 * Give every stop final coordinates; unplaceable stops are dropped
 */
async function resolveStops(
  stops: StopCandidate[],
  fcLabel: string | null,
  resolver: CoordinateResolver,
  source: string
): Promise<StopCandidate[]> {
  const resolved: StopCandidate[] = [];
  for (const stop of stops) {
    const coordinate = await resolver.resolve(stop.stopName, fcLabel, inlineOf(stop));
    if (!coordinate) {
      loggers.resolve.info('Stop dropped without coordinates', { stop: stop.stopName, url: source });
      continue;
    }
    resolved.push({ ...stop, lat: coordinate.lat, lon: coordinate.lon });
  }
  return resolved;
}

/**
 * One route per employee-transport PDF that yields at least one placed stop
 */
export async function collectPdfRoutes(ctx: CollectorContext): Promise<Route[]> {
  const page = await ctx.fetcher.fetchText(ctx.employeeTransportUrl);
  if (!page.success) {
    loggers.parse.warn('Employee transport page unavailable', {
      url: ctx.employeeTransportUrl,
      statusCode: page.error.status,
      reason: page.error.message,
    });
    return [];
  }

  const pdfLinks = collectPdfLinks(page.value, ctx.employeeTransportUrl);
  if (pdfLinks.length === 0) {
    loggers.parse.info('No PDF links found', { url: ctx.employeeTransportUrl });
    return [];
  }

  const routes: Route[] = [];
  for (const link of pdfLinks) {
    const route = await collectPdfRoute(link.url, ctx);
    if (route) {
      routes.push(route);
      recordRoute('pdf');
    }
  }
  return routes;
}

async function collectPdfRoute(url: string, ctx: CollectorContext): Promise<Route | null> {
  const download = await ctx.fetcher.fetchBytes(url);
  if (!download.success) {
    loggers.parse.warn('PDF download failed', {
      url,
      statusCode: download.error.status,
      reason: download.error.message,
    });
    return null;
  }

  const extracted = await ctx.pdfExtractor.extract(download.value, url);
  if (!extracted.success) {
    loggers.parse.warn('PDF text extraction failed', { url, reason: extracted.error.message });
    recordParseMiss('pdf');
    return null;
  }

  const text = extracted.value;
  if (!text.trim()) {
    loggers.parse.info('Empty PDF', { url });
    recordParseMiss('pdf');
    return null;
  }

  const title = inferPdfRouteTitle(url, text);
  const fc = inferPdfCarrier(title, url, ctx.carrierCodes);

  const lines = parsePdfStopLines(text);
  if (lines.length === 0) {
    loggers.parse.info('No stops parsed from PDF', { url });
    recordParseMiss('pdf');
    return null;
  }

  const candidates: StopCandidate[] = lines.map((line) => ({
    stopName: line.stopName,
    ...(line.inlineLatLon ? { lat: line.inlineLatLon.lat, lon: line.inlineLatLon.lon } : {}),
    contextTimes: line.contextTimes,
    sourceUrl: url,
  }));

  const stops = await resolveStops(candidates, fc === UNKNOWN_CARRIER ? null : fc, ctx.resolver, url);
  if (stops.length === 0) {
    loggers.parse.info('No placeable stops in PDF', { url });
    recordParseMiss('pdf');
    return null;
  }

  loggers.parse.info('PDF route collected', { fc, route: title, stops: stops.length });

  return {
    fc,
    route: title,
    routeSlug: routeSlug(fc, title),
    source: url,
    stops,
  };
}

async function collectRoutePage(target: RoutePageTarget, ctx: CollectorContext): Promise<Route | null> {
  const page = await ctx.fetcher.fetchText(target.url);
  if (!page.success) {
    loggers.parse.warn('Route page unavailable', {
      fc: target.code,
      url: target.url,
      statusCode: page.error.status,
      reason: page.error.message,
    });
    return null;
  }

  const route = parseRoutePage(page.value, target.url, {
    code: target.code,
    ...(target.shared ? { shared: target.shared } : {}),
  });
  if (!route) {
    loggers.parse.info('No map stops on page', { fc: target.code, url: target.url });
    recordParseMiss('html');
    return null;
  }

  const stops = await resolveStops(route.stops, route.fc, ctx.resolver, target.url);
  if (stops.length === 0) {
    recordParseMiss('html');
    return null;
  }

  loggers.parse.info('Route page collected', { fc: route.fc, route: route.route, stops: stops.length });
  return { ...route, stops };
}

/**
 * Discover and parse route pages site by site, one page at a time
 */
export async function collectHtmlRoutes(ctx: CollectorContext): Promise<Route[]> {
  const routes: Route[] = [];

  for (const site of ctx.sites) {
    const targets = await discoverRoutePages(site, {
      fetcher: ctx.fetcher,
      crawlPacer: ctx.pacers.crawl,
      probePacer: ctx.pacers.probe,
    });

    for (const target of targets) {
      const route = await collectRoutePage(target, ctx);
      if (route) {
        routes.push(route);
        recordRoute('html');
      }
      await ctx.pacers.request.pause();
    }
  }

  return routes;
}

/**
 * 收集全部路線
 * In pdf-first mode any PDF route pre-empts the route page scan.
 */
export async function collectRoutes(ctx: CollectorContext): Promise<CollectedRoutes> {
  const pdfRoutes = await collectPdfRoutes(ctx);

  if (ctx.collectionMode === 'pdf-first' && pdfRoutes.length > 0) {
    loggers.harvest.info('PDF routes found, skipping route pages', { routes: pdfRoutes.length });
    return { routes: pdfRoutes, pdfRoutes: pdfRoutes.length, htmlRoutes: 0 };
  }

  const htmlRoutes = await collectHtmlRoutes(ctx);
  return {
    routes: [...pdfRoutes, ...htmlRoutes],
    pdfRoutes: pdfRoutes.length,
    htmlRoutes: htmlRoutes.length,
  };
}
