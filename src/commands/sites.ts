/**
 * Sites Command
 * 站台清單指令
 */

import { Command } from 'commander';
import { SITES } from '../data/sites.js';
import { globalOptions } from '../utils/command.js';
import { output, type ColumnDef } from '../utils/output.js';
import type { SiteStrategy } from '../types/site.js';

interface SiteRow {
  code: string;
  strategy: string;
  label: string;
  entry: string[];
}

const COLUMNS: ColumnDef<SiteRow>[] = [
  { key: 'code', label: 'Code' },
  { key: 'strategy', label: 'Strategy' },
  { key: 'label', label: 'Label' },
  { key: 'entry', label: 'Entry URLs', format: (_, row) => row.entry.join('\n') },
];

function entryUrls(site: SiteStrategy): string[] {
  switch (site.kind) {
    case 'listing-page':
      return [site.listingUrl];
    case 'seeded-crawl':
      return site.seeds;
    case 'root-probe':
      return [site.rootUrl];
  }
}

export function siteRows(sites: readonly SiteStrategy[]): SiteRow[] {
  return sites.map((site) => ({
    code: site.code,
    strategy: site.kind,
    label: site.kind === 'listing-page' && site.shared ? site.shared.label : site.code.toUpperCase(),
    entry: entryUrls(site),
  }));
}

export const sitesCommand = new Command('sites')
  .description('List carrier sites and how route pages are found on each')
  .action((_options: unknown, cmd: Command) => {
    const { format } = globalOptions(cmd);
    console.log(output(siteRows(SITES), COLUMNS, format));
  });
