/**
 * Geocode Command
 * 單一站名地理編碼指令 - 經由快取與 Nominatim
 */

import { Command } from 'commander';
import { CoordinateResolver } from '../lib/coordinate-resolver.js';
import { GeocodeCacheStore } from '../services/geocode-cache.js';
import { NominatimGeocoder } from '../services/geocoder.js';
import { Pacer } from '../services/pacer.js';
import { configFor, globalOptions } from '../utils/command.js';

export const geocodeCommand = new Command('geocode')
  .description('Resolve one stop name through the geocode cache and the geocoder')
  .argument('<name>', 'stop name')
  .action(async (name: string, _options: unknown, cmd: Command) => {
    const { format } = globalOptions(cmd);
    const settings = configFor(cmd).getSettings();

    const cacheStore = new GeocodeCacheStore(settings.dataDir);
    const geocodeCache = cacheStore.load();
    const resolver = new CoordinateResolver({
      priorIndex: new Map(),
      geocodeCache,
      geocoder: new NominatimGeocoder({ userAgent: settings.userAgent }),
      // single lookup, nothing follows it
      geocodePacer: new Pacer(0),
      geocodeEnabled: settings.geocodeEnabled,
    });

    const resolved = await resolver.resolve(name, null, null);
    cacheStore.save(geocodeCache);

    if (format === 'json') {
      console.log(JSON.stringify({ name, found: resolved !== null, ...resolved }, null, 2));
      return;
    }

    if (!resolved) {
      console.log(`No coordinates for "${name}"`);
      return;
    }
    console.log(`${name}: ${resolved.lat}, ${resolved.lon} (${resolved.tier})`);
  });
