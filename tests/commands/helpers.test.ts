import { describe, it, expect, afterEach, vi } from 'vitest';
import { Command } from 'commander';
import { summarize } from '../../src/commands/harvest.js';
import { siteRows } from '../../src/commands/sites.js';
import { codeFromUrl, pageLabel } from '../../src/commands/page.js';
import { SITES } from '../../src/data/sites.js';
import { errorMessage, fail, globalOptions, type GlobalOptions } from '../../src/utils/command.js';
import type { HarvestOutcome } from '../../src/services/harvest.js';

describe('summarize', () => {
  it('should count totals and every change list', () => {
    const outcome: HarvestOutcome = {
      status: 'written',
      stops: 3,
      routes: 2,
      dryRun: false,
      report: {
        generated: 1700000000,
        routes_total_new: 2,
        stops_total_new: 3,
        new_routes: [{ fc: 'KTW1', route_slug: 'ktw1-linia-a' }],
        removed_routes: [],
        new_stops: [],
        removed_stops: [],
      },
    };

    expect(summarize(outcome)).toEqual([
      { item: 'routes', count: 2 },
      { item: 'stops', count: 3 },
      { item: 'new routes', count: 1 },
      { item: 'removed routes', count: 0 },
      { item: 'new stops', count: 0 },
      { item: 'removed stops', count: 0 },
    ]);
  });
});

describe('siteRows', () => {
  it('should describe each strategy by its entry URLs', () => {
    const rows = siteRows(SITES);

    expect(rows[0]).toEqual({
      code: 'szz1',
      strategy: 'root-probe',
      label: 'SZZ1',
      entry: ['https://szz1.transport-fc.eu/'],
    });
    expect(rows.find((row) => row.code === 'wro')).toEqual({
      code: 'wro',
      strategy: 'listing-page',
      label: 'WRO',
      entry: ['https://wro.transport-fc.eu/rozklady-jazdy/'],
    });
    expect(rows.find((row) => row.code === 'lcj3')?.entry).toEqual([
      'https://lcj3.transport-fc.eu/',
      'https://lcj3.transport-fc.eu/trasy/',
      'https://lcj3.transport-fc.eu/rozklady-jazdy/',
    ]);
  });
});

describe('page command helpers', () => {
  it('should take the carrier code from the first host label', () => {
    expect(codeFromUrl('https://wro5.transport-fc.eu/linia-1/')).toBe('wro5');
    expect(codeFromUrl('not a url')).toBe('');
  });

  it('should prefer an explicit code', () => {
    expect(pageLabel('https://wro5.transport-fc.eu/linia-1/', { code: 'lcj2' })).toEqual({ code: 'lcj2' });
  });

  it('should label shared pages with the shared listing', () => {
    expect(pageLabel('https://wro.transport-fc.eu/linia-1/', { shared: true })).toEqual({
      code: 'wro',
      shared: { label: 'WRO', slugPrefix: 'wro' },
    });
  });
});

describe('globalOptions', () => {
  function parse(args: string[]): GlobalOptions | undefined {
    let seen: GlobalOptions | undefined;
    const program = new Command()
      .option('-f, --format <format>', 'output format', 'json')
      .option('-c, --config <path>', 'config file');
    program.command('sites').action((_options: unknown, cmd: Command) => {
      seen = globalOptions(cmd);
    });
    program.parse(args, { from: 'user' });
    return seen;
  }

  it('should read options declared on the parent program', () => {
    expect(parse(['-f', 'csv', 'sites'])).toEqual({ format: 'csv' });
    expect(parse(['--config', '/tmp/fc.json', '-f', 'table', 'sites'])).toEqual({
      format: 'table',
      config: '/tmp/fc.json',
    });
  });

  it('should fall back to json for an unknown format', () => {
    expect(parse(['-f', 'xml', 'sites'])).toEqual({ format: 'json' });
  });
});

describe('fail / errorMessage', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should print the message and exit with code 1', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const exitSpy = vi.spyOn(process, 'exit').mockImplementation(() => {
      throw new Error('exit');
    });

    expect(() => fail('Unknown site: gdn1')).toThrow('exit');
    expect(errorSpy).toHaveBeenCalledWith('❌ Unknown site: gdn1');
    expect(exitSpy).toHaveBeenCalledWith(1);
  });

  it('should describe thrown values', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage('plain')).toBe('plain');
  });
});
