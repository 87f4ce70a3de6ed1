/**
 * Snapshot Store
 * 快照檔案存取 - stops.json 與 changes.json
 */

import fs from 'node:fs';
import path from 'node:path';
import { isFiniteNumber, isRecord } from '../utils/guards.js';
import type { DiffableStop } from '../lib/snapshot-diff.js';
import type { DiffReport, ResolvedStop } from '../types/stop.js';

export const SNAPSHOT_FILE = 'stops.json';
export const CHANGES_FILE = 'changes.json';

export interface StoredSnapshot {
  generated: number | null;
  stops: DiffableStop[];
}

function stringField(record: Record<string, unknown>, key: string): string | null {
  const value = record[key];
  return typeof value === 'string' ? value : null;
}

/**
 * One persisted row, or null when a field the differ needs is missing
 */
export function toStoredStop(value: unknown): DiffableStop | null {
  if (!isRecord(value)) return null;

  const fc = stringField(value, 'fc');
  const slug = stringField(value, 'route_slug');
  const name = stringField(value, 'stop_name');
  if (fc === null || slug === null || name === null) return null;
  if (!isFiniteNumber(value.lat) || !isFiniteNumber(value.lon)) return null;

  const stop: DiffableStop = {
    fc,
    route: stringField(value, 'route') ?? '',
    route_slug: slug,
    source: stringField(value, 'source') ?? '',
    stop_name: name,
    lat: value.lat,
    lon: value.lon,
    url: stringField(value, 'url') ?? '',
  };

  const times = value.context_times;
  if (Array.isArray(times)) {
    stop.context_times = times.filter((time): time is string => typeof time === 'string');
  }
  return stop;
}

/**
 * Parse a snapshot document; null when it is not `{stops: [...]}`
 */
export function parseSnapshot(raw: string): StoredSnapshot | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }
  if (!isRecord(parsed) || !Array.isArray(parsed.stops)) {
    return null;
  }

  const stops: DiffableStop[] = [];
  for (const row of parsed.stops) {
    const stop = toStoredStop(row);
    if (stop) stops.push(stop);
  }

  return {
    generated: isFiniteNumber(parsed.generated) ? parsed.generated : null,
    stops,
  };
}

function writeJson(filePath: string, value: unknown): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, JSON.stringify(value, null, 2), 'utf-8');
}

export class SnapshotStore {
  private snapshotPath: string;
  private changesPath: string;

  constructor(dataDir: string) {
    this.snapshotPath = path.join(dataDir, SNAPSHOT_FILE);
    this.changesPath = path.join(dataDir, CHANGES_FILE);
  }

  /**
   * 讀取前次快照；檔案不存在或損毀時回傳 null
   */
  loadPrevious(): StoredSnapshot | null {
    return SnapshotStore.readFile(this.snapshotPath);
  }

  static readFile(filePath: string): StoredSnapshot | null {
    if (!fs.existsSync(filePath)) {
      return null;
    }
    try {
      return parseSnapshot(fs.readFileSync(filePath, 'utf-8'));
    } catch {
      return null;
    }
  }

  writeSnapshot(generated: number, stops: readonly ResolvedStop[]): void {
    writeJson(this.snapshotPath, { generated, stops });
  }

  writeChanges(report: DiffReport): void {
    writeJson(this.changesPath, report);
  }

  getSnapshotPath(): string {
    return this.snapshotPath;
  }

  getChangesPath(): string {
    return this.changesPath;
  }
}
