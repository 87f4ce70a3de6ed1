/**
 * Site Discovery
 * 路線頁探索 - 依站台策略找出候選路線頁
 */

import { BoundedCrawler, isExcludedUrl, stripTrailingSlash } from './crawler.js';
import { collectLinks, hostOf, pageHasMarker } from './links.js';
import { loggers } from './logger.js';
import type { PageFetcher } from '../services/fetcher.js';
import type { Pacer } from '../services/pacer.js';
import type {
  ListingPageSite,
  PageLink,
  RootProbeSite,
  RoutePageTarget,
  SeededCrawlSite,
  SiteStrategy,
} from '../types/site.js';

export interface DiscoveryContext {
  fetcher: PageFetcher;
  /** Between crawler fetches */
  crawlPacer: Pacer;
  /** Between root-probe fetches */
  probePacer: Pacer;
}

function toTargets(links: PageLink[], site: SiteStrategy): RoutePageTarget[] {
  const shared =
    site.kind === 'listing-page' && site.shared
      ? { label: site.shared.label, slugPrefix: site.shared.slugPrefix }
      : undefined;

  return links.map((link) => ({
    title: link.title,
    url: link.url,
    code: site.code,
    ...(shared ? { shared } : {}),
  }));
}

async function discoverFromListing(site: ListingPageSite, ctx: DiscoveryContext): Promise<PageLink[]> {
  const page = await ctx.fetcher.fetchText(site.listingUrl);
  if (!page.success) {
    loggers.crawl.warn('Listing page unavailable', {
      fc: site.code,
      url: site.listingUrl,
      statusCode: page.error.status,
      reason: page.error.message,
    });
    return [];
  }

  const listing = stripTrailingSlash(site.listingUrl);
  return collectLinks(page.value, site.listingUrl, hostOf(site.listingUrl), true).filter((link) => {
    const url = stripTrailingSlash(link.url);
    if (site.skipListingSelf && url === listing) return false;
    return !isExcludedUrl(url);
  });
}

async function discoverBySeededCrawl(site: SeededCrawlSite, ctx: DiscoveryContext): Promise<PageLink[]> {
  const crawler = new BoundedCrawler(ctx.fetcher, ctx.crawlPacer, { site: site.code });
  const { candidates } = await crawler.crawl(site.seeds);
  return candidates;
}

async function discoverByRootProbe(site: RootProbeSite, ctx: DiscoveryContext): Promise<PageLink[]> {
  const root = await ctx.fetcher.fetchText(site.rootUrl);
  if (!root.success) {
    loggers.crawl.warn('Site root unavailable', {
      fc: site.code,
      url: site.rootUrl,
      statusCode: root.error.status,
      reason: root.error.message,
    });
    return [];
  }

  const kept: PageLink[] = [];
  for (const link of collectLinks(root.value, site.rootUrl, hostOf(site.rootUrl), false)) {
    const probe = await ctx.fetcher.fetchText(link.url);
    if (probe.success && pageHasMarker(probe.value)) {
      kept.push(link);
    } else if (!probe.success) {
      loggers.crawl.debug('Probe fetch failed', { fc: site.code, url: link.url });
    }
    await ctx.probePacer.pause();
  }
  return kept;
}

function linksFor(site: SiteStrategy, ctx: DiscoveryContext): Promise<PageLink[]> {
  switch (site.kind) {
    case 'listing-page':
      return discoverFromListing(site, ctx);
    case 'seeded-crawl':
      return discoverBySeededCrawl(site, ctx);
    case 'root-probe':
      return discoverByRootProbe(site, ctx);
  }
}

/**
 * Candidate route pages of one site, labelled for the route page parser
 */
export async function discoverRoutePages(
  site: SiteStrategy,
  ctx: DiscoveryContext
): Promise<RoutePageTarget[]> {
  const links = await linksFor(site, ctx);

  loggers.crawl.info('Route pages discovered', {
    fc: site.code,
    strategy: site.kind,
    pages: links.length,
  });

  return toTargets(links, site);
}
