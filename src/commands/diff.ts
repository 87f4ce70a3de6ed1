/**
 * Diff Command
 * 快照比較指令 - 不執行收集，直接比較兩個 stops.json
 */

import fs from 'node:fs';
import { Command } from 'commander';
import { diffSnapshots } from '../lib/snapshot-diff.js';
import { epochSeconds } from '../services/harvest.js';
import { SnapshotStore } from '../services/snapshot-store.js';
import { fail, globalOptions } from '../utils/command.js';
import { output, type ColumnDef } from '../utils/output.js';
import type { StopChangeRecord } from '../types/stop.js';

interface ChangeRow {
  change: '+' | '-';
  fc: string;
  route_slug: string;
  stop_name: string;
  lat: number;
  lon: number;
}

const COLUMNS: ColumnDef<ChangeRow>[] = [
  { key: 'change', label: '' },
  { key: 'fc', label: 'FC' },
  { key: 'route_slug', label: 'Route' },
  { key: 'stop_name', label: 'Stop' },
  { key: 'lat', label: 'Lat', align: 'right' },
  { key: 'lon', label: 'Lon', align: 'right' },
];

function toRows(change: ChangeRow['change'], stops: StopChangeRecord[]): ChangeRow[] {
  return stops.map((stop) => ({
    change,
    fc: stop.fc,
    route_slug: stop.route_slug,
    stop_name: stop.stop_name,
    lat: stop.lat,
    lon: stop.lon,
  }));
}

export const diffCommand = new Command('diff')
  .description('Diff two snapshot files without running a harvest')
  .argument('<previous>', 'older stops.json (a missing file counts as no previous snapshot)')
  .argument('<current>', 'newer stops.json')
  .action((previousPath: string, currentPath: string, _options: unknown, cmd: Command) => {
    const { format } = globalOptions(cmd);

    const current = SnapshotStore.readFile(currentPath);
    if (!current) {
      fail(`Not a readable snapshot: ${currentPath}`);
    }

    const previous = SnapshotStore.readFile(previousPath);
    if (!previous && fs.existsSync(previousPath)) {
      fail(`Not a readable snapshot: ${previousPath}`);
    }

    const report = diffSnapshots(previous ? previous.stops : null, current.stops, epochSeconds());

    if (format === 'json') {
      console.log(JSON.stringify(report, null, 2));
      return;
    }

    const rows = [...toRows('+', report.new_stops), ...toRows('-', report.removed_stops)];
    if (format === 'table') {
      console.log(`+ new routes: ${report.new_routes.length}`);
      console.log(`- removed routes: ${report.removed_routes.length}`);
      console.log(`+ new stops: ${report.new_stops.length}`);
      console.log(`- removed stops: ${report.removed_stops.length}\n`);
    }
    if (rows.length > 0) {
      console.log(output(rows, COLUMNS, format));
    }
  });
