/**
 * Harvest Command
 * 收集指令 - 完整執行一次收集並輸出差異摘要
 */

import { Command } from 'commander';
import { createHarvestDependencies, runHarvest, type HarvestOutcome } from '../services/harvest.js';
import { getMetricsSnapshot } from '../lib/metrics.js';
import { configFor, errorMessage, globalOptions } from '../utils/command.js';
import { output, type ColumnDef } from '../utils/output.js';

interface HarvestCommandOptions {
  dryRun?: boolean;
  metrics?: boolean;
}

interface SummaryRow {
  item: string;
  count: number;
}

const SUMMARY_COLUMNS: ColumnDef<SummaryRow>[] = [
  { key: 'item', label: 'Item' },
  { key: 'count', label: 'Count', align: 'right' },
];

export function summarize(outcome: HarvestOutcome): SummaryRow[] {
  const { report } = outcome;
  return [
    { item: 'routes', count: report.routes_total_new },
    { item: 'stops', count: report.stops_total_new },
    { item: 'new routes', count: report.new_routes.length },
    { item: 'removed routes', count: report.removed_routes.length },
    { item: 'new stops', count: report.new_stops.length },
    { item: 'removed stops', count: report.removed_stops.length },
  ];
}

export const harvestCommand = new Command('harvest')
  .description('Collect every route, resolve stop coordinates, write the snapshot and diff')
  .option('--dry-run', 'collect and diff without writing any file')
  .option('--metrics', 'print Prometheus metrics after the run')
  .action(async (options: HarvestCommandOptions, cmd: Command) => {
    const { format } = globalOptions(cmd);
    const settings = configFor(cmd).getSettings();

    let outcome: HarvestOutcome;
    try {
      outcome = await runHarvest(settings, createHarvestDependencies(settings), {
        dryRun: options.dryRun ?? false,
      });
    } catch (error) {
      console.error(`❌ Harvest failed: ${errorMessage(error)}`);
      process.exit(1);
    }

    if (format === 'json') {
      console.log(
        JSON.stringify(
          {
            status: outcome.status,
            dryRun: outcome.dryRun,
            routes: outcome.report.routes_total_new,
            stops: outcome.report.stops_total_new,
            newRoutes: outcome.report.new_routes.length,
            removedRoutes: outcome.report.removed_routes.length,
            newStops: outcome.report.new_stops.length,
            removedStops: outcome.report.removed_stops.length,
          },
          null,
          2
        )
      );
    } else {
      console.log(output(summarize(outcome), SUMMARY_COLUMNS, format));
      if (outcome.status === 'kept-previous') {
        console.log('\nNo stops collected; previous snapshot kept.');
      }
    }

    if (options.metrics) {
      console.log('');
      console.log(await getMetricsSnapshot());
    }
  });
