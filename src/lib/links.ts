/**
 * HTML Link Collector
 * 連結擷取 - 同站連結、PDF 連結與地圖標記偵測
 */

import * as cheerio from 'cheerio';
import type { Element } from 'domhandler';
import type { PageLink } from '../types/site.js';

/** Pages embedding stop maps link to this host */
export const MAP_MARKER = 'openstreetmap.org';

/** Region holding the article body on the carrier sites */
const CONTENT_SELECTOR = '.entry-content';

function resolveHref(href: string, baseUrl: string): URL | null {
  try {
    return new URL(href, baseUrl);
  } catch {
    return null;
  }
}

function isSameHost(hostname: string, host: string): boolean {
  const target = hostname.toLowerCase();
  const expected = host.toLowerCase();
  return target === expected || target.endsWith(`.${expected}`);
}

/**
 * Keep the first link per URL, in discovery order
 */
function dedupeByUrl(links: PageLink[]): PageLink[] {
  const seen = new Set<string>();
  const out: PageLink[] = [];
  for (const link of links) {
    if (seen.has(link.url)) continue;
    seen.add(link.url);
    out.push(link);
  }
  return out;
}

function anchorText($: cheerio.CheerioAPI, el: Element): string {
  return $(el).text().replace(/\s+/g, ' ').trim();
}

/**
 * Same-host http(s) links on a page.
 * `host` matches itself and its subdomains. With `contentOnly` the scan is
 * limited to the article body when the page has one.
 */
export function collectLinks(
  html: string,
  baseUrl: string,
  host: string,
  contentOnly = false
): PageLink[] {
  const $ = cheerio.load(html);
  const content = contentOnly ? $(CONTENT_SELECTOR).first() : null;
  const anchors = content && content.length > 0 ? content.find('a[href]') : $('a[href]');

  const links: PageLink[] = [];
  anchors.each((_, el) => {
    const href = $(el).attr('href');
    if (!href) return;

    const url = resolveHref(href, baseUrl);
    if (!url) return;
    if (url.protocol !== 'http:' && url.protocol !== 'https:') return;
    if (!isSameHost(url.hostname, host)) return;

    links.push({ title: anchorText($, el), url: url.href });
  });

  return dedupeByUrl(links);
}

/**
 * Links whose path ends in .pdf, on any host
 */
export function collectPdfLinks(html: string, baseUrl: string): PageLink[] {
  const $ = cheerio.load(html);

  const links: PageLink[] = [];
  $('a[href]').each((_, el) => {
    const href = $(el).attr('href');
    if (!href) return;

    const url = resolveHref(href, baseUrl);
    if (!url) return;
    if (!url.pathname.toLowerCase().endsWith('.pdf')) return;

    links.push({ title: anchorText($, el), url: url.href });
  });

  return dedupeByUrl(links);
}

export function pageHasMarker(html: string): boolean {
  return html.includes(MAP_MARKER);
}

/**
 * Host part used to scope link collection for a site URL
 */
export function hostOf(url: string): string {
  return new URL(url).hostname;
}
