/**
 * Page Command
 * 路線頁解析指令
 */

import { Command } from 'commander';
import { SHARED_WRO_SITE } from '../data/sites.js';
import { parseRoutePage, type RoutePageLabel } from '../lib/route-page-parser.js';
import { HttpFetcher } from '../services/fetcher.js';
import { configFor, fail, globalOptions } from '../utils/command.js';
import { output, type ColumnDef } from '../utils/output.js';
import type { StopCandidate } from '../types/stop.js';

interface PageCommandOptions {
  code?: string;
  shared?: boolean;
}

export const STOP_COLUMNS: ColumnDef<StopCandidate>[] = [
  { key: 'stopName', label: 'Stop' },
  { key: 'lat', label: 'Lat', align: 'right' },
  { key: 'lon', label: 'Lon', align: 'right' },
  { key: 'contextTimes', label: 'Times' },
];

/**
 * Carrier code from a sub-site URL: first label of the host name
 */
export function codeFromUrl(url: string): string {
  try {
    return new URL(url).hostname.split('.')[0] ?? '';
  } catch {
    return '';
  }
}

export function pageLabel(url: string, options: PageCommandOptions): RoutePageLabel {
  const code = options.code ?? codeFromUrl(url);
  const shared = SHARED_WRO_SITE.shared;
  if (options.shared && shared) {
    return { code, shared: { label: shared.label, slugPrefix: shared.slugPrefix } };
  }
  return { code };
}

export const pageCommand = new Command('page')
  .description('Fetch one route page and print its stops')
  .argument('<url>', 'route page URL')
  .option('--code <code>', 'carrier code (default: first label of the host name)')
  .option('--shared', 'label the page as part of the shared WRO listing')
  .action(async (url: string, options: PageCommandOptions, cmd: Command) => {
    const { format } = globalOptions(cmd);
    const settings = configFor(cmd).getSettings();
    const fetcher = new HttpFetcher({ userAgent: settings.userAgent });

    const page = await fetcher.fetchText(url);
    if (!page.success) {
      fail(`Could not fetch ${url}: ${page.error.message}`);
    }

    const route = parseRoutePage(page.value, url, pageLabel(url, options));
    if (!route) {
      fail(`No map stops found on ${url}`);
    }

    if (format === 'json') {
      console.log(JSON.stringify(route, null, 2));
      return;
    }

    if (format === 'table') {
      console.log(`${route.fc}: ${route.route} (${route.routeSlug})\n`);
    }
    console.log(output(route.stops, STOP_COLUMNS, format));
  });
