import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import { runHarvest, type HarvestDependencies } from '../../src/services/harvest.js';
import { DEFAULT_SETTINGS } from '../../src/services/config.js';
import { EMPLOYEE_TRANSPORT_URL, SITES } from '../../src/data/sites.js';
import type { PageFetcher } from '../../src/services/fetcher.js';
import type { HarvestSettings } from '../../src/types/config.js';
import type { FetchFailedError, Result } from '../../src/types/result.js';
import type { ResolvedStop } from '../../src/types/stop.js';
import { FakeFetcher, FakeGeocoder, FakePdfExtractor, noSleep, pdfBytes } from '../helpers/fakes.js';

const NOW = 1700000000;
const PDF_URL = 'https://transport-fc.pl/pdf/ktw1-trasa.pdf';
const WRO5_LISTING = 'https://wro5.transport-fc.eu/rozklady-jazdy/';
const WRO5_ROUTE = 'https://wro5.transport-fc.eu/linia-1/';

const PREVIOUS_STOP: ResolvedStop = {
  fc: 'WRO',
  route: 'Linia 1',
  route_slug: 'wro-linia-1',
  source: 'https://wro.transport-fc.eu/linia-1/',
  stop_name: 'Rynek',
  lat: 51.1,
  lon: 17.03,
  url: 'https://www.openstreetmap.org/?mlat=51.1&mlon=17.03',
  context_times: [],
};

const EMPLOYEE_PAGE = `<a href="/pdf/ktw1-trasa.pdf">Trasa poranna</a>`;

const PDF_TEXT = [
  'Trasa KTW1 Poranna',
  'Rozkład jazdy',
  '06:00 Zajezdnia 50.2649,19.0238',
  '06:10 Rynek',
  '06:20 Nieznany Przystanek',
].join('\n');

const LISTING_PAGE = `
  <div class="entry-content">
    <a href="/linia-1/">Linia 1</a>
    <a href="/category/aktualnosci/">Aktualności</a>
  </div>
`;

const ROUTE_PAGE = `
  <h1>Linia 1</h1>
  <p><a href="https://www.openstreetmap.org/?mlat=51.0990&amp;mlon=17.0360">Galeria</a> 07:45</p>
`;

const WRO5_SITES = SITES.filter((site) => site.code === 'wro5');

class ThrowingFetcher implements PageFetcher {
  async fetchText(): Promise<Result<string, FetchFailedError>> {
    throw new Error('unexpected parser state');
  }

  async fetchBytes(): Promise<Result<Uint8Array, FetchFailedError>> {
    throw new Error('unexpected parser state');
  }
}

describe('runHarvest', () => {
  let dataDir: string;
  let settings: HarvestSettings;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    dataDir = fs.mkdtempSync(path.join(os.tmpdir(), 'fc-stops-harvest-'));
    settings = { ...DEFAULT_SETTINGS, dataDir };
  });

  afterEach(() => {
    fs.rmSync(dataDir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  function writePrevious(): string {
    const raw = JSON.stringify({ generated: 1600000000, stops: [PREVIOUS_STOP] }, null, 2);
    fs.writeFileSync(path.join(dataDir, 'stops.json'), raw, 'utf-8');
    return raw;
  }

  function readJson(file: string): unknown {
    return JSON.parse(fs.readFileSync(path.join(dataDir, file), 'utf-8'));
  }

  function deps(overrides: Partial<HarvestDependencies> = {}): HarvestDependencies {
    return {
      fetcher: new FakeFetcher(),
      pdfExtractor: new FakePdfExtractor(),
      geocoder: new FakeGeocoder(),
      sleep: noSleep,
      now: () => NOW,
      ...overrides,
    };
  }

  describe('zero-stops guard', () => {
    it('should leave the previous snapshot byte-identical', async () => {
      const before = writePrevious();

      const outcome = await runHarvest(settings, deps());

      expect(outcome.status).toBe('kept-previous');
      expect(fs.readFileSync(path.join(dataDir, 'stops.json'), 'utf-8')).toBe(before);
    });

    it('should write a no-change report against the previous snapshot', async () => {
      writePrevious();

      await runHarvest(settings, deps());

      expect(readJson('changes.json')).toEqual({
        generated: NOW,
        routes_total_new: 1,
        stops_total_new: 1,
        new_routes: [],
        removed_routes: [],
        new_stops: [],
        removed_stops: [],
      });
    });

    it('should survive an exception escaping collection', async () => {
      const before = writePrevious();

      const outcome = await runHarvest(settings, deps({ fetcher: new ThrowingFetcher() }));

      expect(outcome.status).toBe('kept-previous');
      expect(outcome.stops).toBe(0);
      expect(fs.readFileSync(path.join(dataDir, 'stops.json'), 'utf-8')).toBe(before);
    });

    it('should not create a snapshot when there was none', async () => {
      await runHarvest(settings, deps());

      expect(fs.existsSync(path.join(dataDir, 'stops.json'))).toBe(false);
      expect(readJson('changes.json')).toMatchObject({ routes_total_new: 0, stops_total_new: 0 });
    });
  });

  describe('PDF routes', () => {
    function pdfWorld(): { fetcher: FakeFetcher; geocoder: FakeGeocoder } {
      return {
        fetcher: new FakeFetcher(
          { [EMPLOYEE_TRANSPORT_URL]: EMPLOYEE_PAGE, [WRO5_LISTING]: LISTING_PAGE, [WRO5_ROUTE]: ROUTE_PAGE },
          { [PDF_URL]: pdfBytes(PDF_TEXT) }
        ),
        geocoder: new FakeGeocoder({ 'Nieznany Przystanek': { lat: 50.3, lon: 19.1 } }),
      };
    }

    it('should resolve stops through inline, prior and geocoder tiers', async () => {
      writePrevious();
      const world = pdfWorld();

      const outcome = await runHarvest(settings, deps({ ...world, sites: WRO5_SITES }));

      expect(outcome.status).toBe('written');
      expect(outcome.stops).toBe(3);

      const snapshot = readJson('stops.json');
      expect(snapshot).toEqual({
        generated: NOW,
        stops: [
          {
            fc: 'KTW1',
            route: 'Trasa KTW1 Poranna',
            route_slug: 'ktw1-trasa-ktw1-poranna',
            source: PDF_URL,
            stop_name: 'Nieznany Przystanek',
            lat: 50.3,
            lon: 19.1,
            url: PDF_URL,
            context_times: ['06:20'],
          },
          {
            fc: 'KTW1',
            route: 'Trasa KTW1 Poranna',
            route_slug: 'ktw1-trasa-ktw1-poranna',
            source: PDF_URL,
            stop_name: 'Rynek',
            lat: 51.1,
            lon: 17.03,
            url: PDF_URL,
            context_times: ['06:10'],
          },
          {
            fc: 'KTW1',
            route: 'Trasa KTW1 Poranna',
            route_slug: 'ktw1-trasa-ktw1-poranna',
            source: PDF_URL,
            stop_name: 'Zajezdnia',
            lat: 50.2649,
            lon: 19.0238,
            url: PDF_URL,
            context_times: ['06:00'],
          },
        ],
      });
      expect(world.geocoder.queries).toEqual(['Trasa KTW1 Poranna', 'Nieznany Przystanek']);
    });

    it('should skip route pages in pdf-first mode when PDFs yield routes', async () => {
      const world = pdfWorld();

      await runHarvest(settings, deps({ ...world, sites: WRO5_SITES }));

      expect(world.fetcher.requested).toEqual([EMPLOYEE_TRANSPORT_URL, PDF_URL]);
    });

    it('should collect both sources in combined mode', async () => {
      const world = pdfWorld();

      const outcome = await runHarvest(
        { ...settings, collectionMode: 'combined' },
        deps({ ...world, sites: WRO5_SITES })
      );

      // Rynek has no prior entry and no geocoder answer, so the PDF keeps two stops
      expect(outcome.routes).toBe(2);
      expect(outcome.stops).toBe(3);
      expect(world.fetcher.requested).toContain(WRO5_ROUTE);
    });

    it('should diff against the previous snapshot', async () => {
      writePrevious();

      const outcome = await runHarvest(settings, deps({ ...pdfWorld(), sites: WRO5_SITES }));

      expect(outcome.report.new_routes).toEqual([{ fc: 'KTW1', route_slug: 'ktw1-trasa-ktw1-poranna' }]);
      expect(outcome.report.removed_routes).toEqual([{ fc: 'WRO', route_slug: 'wro-linia-1' }]);
      expect(outcome.report.new_stops.map((s) => s.stop_name)).toEqual([
        'Nieznany Przystanek',
        'Rynek',
        'Zajezdnia',
      ]);
      expect(outcome.report.removed_stops.map((s) => s.stop_name)).toEqual(['Rynek']);
      expect(readJson('changes.json')).toEqual(outcome.report);
    });

    it('should persist geocoder outcomes, including failures', async () => {
      writePrevious();

      await runHarvest(settings, deps({ ...pdfWorld(), sites: WRO5_SITES }));

      expect(readJson('geocode_cache.json')).toEqual({
        'trasa ktw1 poranna': { lat: null, lon: null },
        'nieznany przystanek': { lat: 50.3, lon: 19.1 },
      });
    });

    it('should drop unresolved stops when geocoding is disabled', async () => {
      const outcome = await runHarvest(
        { ...settings, geocodeEnabled: false },
        deps({ ...pdfWorld(), sites: WRO5_SITES })
      );

      // only the stop with inline coordinates survives without a previous snapshot
      expect(outcome.stops).toBe(1);
    });
  });

  describe('route pages', () => {
    it('should fall back to route pages when no PDF yields a route', async () => {
      const fetcher = new FakeFetcher({ [WRO5_LISTING]: LISTING_PAGE, [WRO5_ROUTE]: ROUTE_PAGE });

      const outcome = await runHarvest(settings, deps({ fetcher, sites: WRO5_SITES }));

      expect(outcome.status).toBe('written');
      expect(readJson('stops.json')).toEqual({
        generated: NOW,
        stops: [
          {
            fc: 'WRO5',
            route: 'Linia 1',
            route_slug: 'wro5-linia-1',
            source: WRO5_ROUTE,
            stop_name: 'Galeria',
            lat: 51.099,
            lon: 17.036,
            url: 'https://www.openstreetmap.org/?mlat=51.0990&mlon=17.0360',
            context_times: ['07:45'],
          },
        ],
      });
      expect(fetcher.requested).not.toContain('https://wro5.transport-fc.eu/category/aktualnosci/');
    });

    it('should tag log lines of every component with the run id', async () => {
      const fetcher = new FakeFetcher({ [WRO5_LISTING]: LISTING_PAGE, [WRO5_ROUTE]: ROUTE_PAGE });

      await runHarvest(settings, deps({ fetcher, sites: WRO5_SITES }));

      const entries = vi
        .mocked(console.log)
        .mock.calls.map((call) => JSON.parse(String(call[0])));
      const started = entries.find((entry) => entry.message === 'Harvest started');
      const discovered = entries.find((entry) => entry.message === 'Route pages discovered');

      expect(started.context.runId).toEqual(expect.any(String));
      expect(discovered).toMatchObject({ component: 'Crawl', context: { runId: started.context.runId } });
    });

    it('should write nothing in a dry run', async () => {
      const fetcher = new FakeFetcher({ [WRO5_LISTING]: LISTING_PAGE, [WRO5_ROUTE]: ROUTE_PAGE });

      const outcome = await runHarvest(settings, deps({ fetcher, sites: WRO5_SITES }), { dryRun: true });

      expect(outcome).toMatchObject({ status: 'written', stops: 1, dryRun: true });
      expect(fs.readdirSync(dataDir)).toEqual([]);
    });

    it('should clone shared listing stops when fan-out is enabled', async () => {
      const sharedListing = 'https://wro.transport-fc.eu/rozklady-jazdy/';
      const sharedRoute = 'https://wro.transport-fc.eu/linia-1/';
      const fetcher = new FakeFetcher({
        [sharedListing]: LISTING_PAGE,
        [sharedRoute]: ROUTE_PAGE,
      });
      const sites = SITES.filter((site) => site.code === 'wro');

      await runHarvest({ ...settings, fanOutSharedRoutes: true }, deps({ fetcher, sites }));

      const snapshot = readJson('stops.json');
      expect(snapshot).toMatchObject({
        stops: [
          { fc: 'WRO1', route_slug: 'wro1-linia-1' },
          { fc: 'WRO2', route_slug: 'wro2-linia-1' },
          { fc: 'WRO3', route_slug: 'wro3-linia-1' },
          { fc: 'WRO4', route_slug: 'wro4-linia-1' },
        ],
      });
    });
  });
});
