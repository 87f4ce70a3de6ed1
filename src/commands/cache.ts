/**
 * Cache Command
 * 地理編碼快取管理指令
 */

import { Command } from 'commander';
import { GeocodeCacheStore } from '../services/geocode-cache.js';
import { configFor, globalOptions } from '../utils/command.js';
import { output, type ColumnDef } from '../utils/output.js';

interface StatusRow {
  item: string;
  value: string;
}

const STATUS_COLUMNS: ColumnDef<StatusRow>[] = [
  { key: 'item', label: 'Item' },
  { key: 'value', label: 'Value' },
];

export const cacheCommand = new Command('cache')
  .description('Geocode cache maintenance');

/**
 * fc-stops cache status
 */
cacheCommand
  .command('status')
  .description('Show geocode cache statistics')
  .action((_options: unknown, cmd: Command) => {
    const { format } = globalOptions(cmd);
    const store = new GeocodeCacheStore(configFor(cmd).getDataDir());
    const status = store.getStatus(store.load());

    if (format === 'json') {
      console.log(JSON.stringify(status, null, 2));
      return;
    }

    const rows: StatusRow[] = [
      { item: 'path', value: status.cachePath },
      { item: 'entries', value: String(status.entries) },
      { item: 'resolved', value: String(status.positive) },
      { item: 'not found', value: String(status.negative) },
    ];
    console.log(output(rows, STATUS_COLUMNS, format));
  });

/**
 * fc-stops cache clear-negative
 */
cacheCommand
  .command('clear-negative')
  .description('Forget failed lookups so the next harvest retries them')
  .action((_options: unknown, cmd: Command) => {
    const { format } = globalOptions(cmd);
    const store = new GeocodeCacheStore(configFor(cmd).getDataDir());
    const cache = store.load();
    const removed = cache.clearNegative();
    store.save(cache);

    if (format === 'json') {
      console.log(JSON.stringify({ removed, remaining: cache.size }, null, 2));
    } else {
      console.log(`✅ Removed ${removed} negative entries (${cache.size} remaining)`);
    }
  });
