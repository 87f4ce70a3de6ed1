/**
 * Crawl Command
 * 單一站台探索指令 - 列出候選路線頁
 */

import { Command } from 'commander';
import { findSite } from '../data/sites.js';
import { discoverRoutePages } from '../lib/site-discovery.js';
import { HttpFetcher } from '../services/fetcher.js';
import { createPacers } from '../services/pacer.js';
import { configFor, fail, globalOptions } from '../utils/command.js';
import { output, type ColumnDef } from '../utils/output.js';
import type { RoutePageTarget } from '../types/site.js';

const COLUMNS: ColumnDef<RoutePageTarget>[] = [
  { key: 'code', label: 'Code' },
  { key: 'title', label: 'Title' },
  { key: 'url', label: 'URL' },
];

export const crawlCommand = new Command('crawl')
  .description('Run route page discovery for one carrier site')
  .argument('<code>', 'carrier code, e.g. ktw1 or wro2')
  .action(async (code: string, _options: unknown, cmd: Command) => {
    const { format } = globalOptions(cmd);
    const site = findSite(code);
    if (!site) {
      fail(`Unknown carrier code: ${code}`);
    }

    const settings = configFor(cmd).getSettings();
    const pacers = createPacers(settings.requestDelaySec, settings.geocodeDelaySec);
    const targets = await discoverRoutePages(site, {
      fetcher: new HttpFetcher({ userAgent: settings.userAgent }),
      crawlPacer: pacers.crawl,
      probePacer: pacers.probe,
    });

    if (format !== 'json' && targets.length === 0) {
      console.log(`No route pages found for ${code}`);
      return;
    }
    console.log(output(targets, COLUMNS, format));
  });
