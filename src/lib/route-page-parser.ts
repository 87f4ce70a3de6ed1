/**
 * Route Page Parser
 * 路線頁解析 - 地圖連結即站點，鄰近區塊的時間即班次時間
 */

import * as cheerio from 'cheerio';
import { isText, type AnyNode } from 'domhandler';
import { extractFromLink } from './coordinates.js';
import { MAP_MARKER } from './links.js';
import { routeSlug } from './stop-name.js';
import type { Route, StopCandidate } from '../types/stop.js';

const BLOCK_ANCESTORS = 'tr, li, p, div';
const CLOCK_TIME = /\b\d{1,2}:\d{2}\b/g;

export interface RoutePageLabel {
  /** Carrier code of the site the page was found on, e.g. "wro5" */
  code: string;
  /** Set for pages of a listing shared by several carriers */
  shared?: {
    label: string;
    slugPrefix: string;
  };
}

/**
 * Text of a subtree with a space between text nodes, so that adjacent cells
 * like <td>08:15</td><td>09:30</td> stay separate tokens
 */
function spacedText<T extends AnyNode>(node: cheerio.Cheerio<T>): string {
  const parts: string[] = [];
  node.find('*').addBack().contents().each((_, child) => {
    if (isText(child)) {
      parts.push(child.data);
    }
  });
  return parts.join(' ');
}

export function clockTimes(text: string): string[] {
  const found = text.match(CLOCK_TIME) ?? [];
  return [...new Set(found)].sort();
}

/**
 * Turn one route page into a route, or null when it has no placeable stops
 */
export function parseRoutePage(html: string, url: string, label: RoutePageLabel): Route | null {
  const $ = cheerio.load(html);
  const stops: StopCandidate[] = [];

  $('a[href]').each((_, el) => {
    const anchor = $(el);
    const href = anchor.attr('href');
    if (!href || !href.includes(MAP_MARKER)) return;

    const coords = extractFromLink(href);
    if (!coords) return;

    const block = anchor.closest(BLOCK_ANCESTORS);
    const scopeText = block.length > 0 ? spacedText(block) : spacedText($.root());

    stops.push({
      stopName: anchor.text().replace(/\s+/g, ' ').trim(),
      lat: coords.lat,
      lon: coords.lon,
      contextTimes: clockTimes(scopeText),
      sourceUrl: href,
    });
  });

  if (stops.length === 0) {
    return null;
  }

  const heading = $('h1, h2').first();
  const headingText = heading.length > 0 ? heading.text().replace(/\s+/g, ' ').trim() : '';
  const title = headingText || url;

  const fc = label.shared ? label.shared.label : label.code.toUpperCase();
  const prefix = label.shared ? label.shared.slugPrefix : label.code;

  return {
    fc,
    route: title,
    routeSlug: routeSlug(prefix, title),
    source: url,
    stops,
  };
}
