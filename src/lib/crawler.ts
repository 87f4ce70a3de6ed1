/**
 * Bounded Site Crawler
 * 有界廣度優先爬蟲 - 找出內嵌地圖的頁面
 *
 * State per crawl: FIFO frontier of (url, depth) and a visited set keyed by
 * URL without trailing slash. Stops when the frontier drains or the visited
 * count reaches the page cap.
 */

import { collectLinks, hostOf, pageHasMarker } from './links.js';
import { loggers } from './logger.js';
import { recordCrawledPage } from './metrics.js';
import type { PageFetcher } from '../services/fetcher.js';
import type { Pacer } from '../services/pacer.js';
import type { PageLink } from '../types/site.js';

export const MAX_DEPTH = 2;
export const MAX_PAGES_PER_HOST = 300;

/** Category, tag and pagination listings never hold a route */
export const EXCLUDED_SEGMENTS = ['/category/', '/kategoria/', '/tag/', '/page/'];

export interface CrawlOptions {
  maxDepth?: number;
  maxPages?: number;
  excludedSegments?: string[];
  /** Label for logs and metrics */
  site?: string;
}

export interface CrawlResult {
  /** Pages carrying the map marker, unique by URL */
  candidates: PageLink[];
  /** Visited URLs in visit order */
  visited: string[];
  /** Deepest depth ever put on the frontier */
  deepestEnqueued: number;
}

interface FrontierItem {
  url: string;
  depth: number;
}

export function stripTrailingSlash(url: string): string {
  return url.replace(/\/+$/, '');
}

export function isExcludedUrl(url: string, segments: string[] = EXCLUDED_SEGMENTS): boolean {
  return segments.some((segment) => url.includes(segment));
}

export class BoundedCrawler {
  private fetcher: PageFetcher;
  private pacer: Pacer;
  private maxDepth: number;
  private maxPages: number;
  private excludedSegments: string[];
  private site: string;

  constructor(fetcher: PageFetcher, pacer: Pacer, options: CrawlOptions = {}) {
    this.fetcher = fetcher;
    this.pacer = pacer;
    this.maxDepth = options.maxDepth ?? MAX_DEPTH;
    this.maxPages = options.maxPages ?? MAX_PAGES_PER_HOST;
    this.excludedSegments = options.excludedSegments ?? EXCLUDED_SEGMENTS;
    this.site = options.site ?? '';
  }

  /**
   * Crawl from the seeds; links are followed on the first seed's host only
   */
  async crawl(seeds: string[]): Promise<CrawlResult> {
    if (seeds.length === 0) {
      return { candidates: [], visited: [], deepestEnqueued: 0 };
    }

    const host = hostOf(seeds[0]);
    const frontier: FrontierItem[] = seeds.map((url) => ({ url, depth: 0 }));
    const visited = new Set<string>();
    const candidates: PageLink[] = [];
    const kept = new Set<string>();
    let deepestEnqueued = 0;

    while (frontier.length > 0 && visited.size < this.maxPages) {
      const item = frontier.shift();
      if (!item) break;

      const url = stripTrailingSlash(item.url);
      if (visited.has(url)) continue;
      visited.add(url);
      recordCrawledPage(this.site);

      const page = await this.fetcher.fetchText(url);
      await this.pacer.pause();

      if (!page.success) {
        loggers.crawl.warn('Crawl fetch failed', {
          fc: this.site,
          url,
          statusCode: page.error.status,
          reason: page.error.message,
        });
        continue;
      }

      const html = page.value;

      if (pageHasMarker(html) && !kept.has(url)) {
        kept.add(url);
        candidates.push({ title: '', url });
      }

      if (item.depth < this.maxDepth) {
        for (const link of collectLinks(html, url, host, false)) {
          const next = stripTrailingSlash(link.url);
          if (visited.has(next)) continue;
          if (isExcludedUrl(next, this.excludedSegments)) continue;

          frontier.push({ url: next, depth: item.depth + 1 });
          deepestEnqueued = Math.max(deepestEnqueued, item.depth + 1);
        }
      }
    }

    loggers.crawl.info('Crawl finished', {
      fc: this.site,
      visited: visited.size,
      candidates: candidates.length,
    });

    return { candidates, visited: [...visited], deepestEnqueued };
  }
}
