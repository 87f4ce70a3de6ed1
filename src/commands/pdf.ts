/**
 * PDF Command
 * PDF 時刻表解析指令（不解析座標）
 */

import { Command } from 'commander';
import { CARRIER_CODES } from '../data/sites.js';
import { inferPdfCarrier, inferPdfRouteTitle, parsePdfStopLines, type PdfStopLine } from '../lib/pdf-route-parser.js';
import { HttpFetcher } from '../services/fetcher.js';
import { UnpdfTextExtractor } from '../services/pdf-text.js';
import { configFor, fail, globalOptions } from '../utils/command.js';
import { output, type ColumnDef } from '../utils/output.js';

const COLUMNS: ColumnDef<PdfStopLine>[] = [
  { key: 'stopName', label: 'Stop' },
  { key: 'contextTimes', label: 'Times' },
  {
    key: 'inlineLatLon',
    label: 'Inline coordinates',
    format: (_, row) => (row.inlineLatLon ? `${row.inlineLatLon.lat}, ${row.inlineLatLon.lon}` : ''),
  },
];

export const pdfCommand = new Command('pdf')
  .description('Download one PDF timetable and print the stop lines found in it')
  .argument('<url>', 'PDF URL')
  .action(async (url: string, _options: unknown, cmd: Command) => {
    const { format } = globalOptions(cmd);
    const settings = configFor(cmd).getSettings();

    const download = await new HttpFetcher({ userAgent: settings.userAgent }).fetchBytes(url);
    if (!download.success) {
      fail(`Could not download ${url}: ${download.error.message}`);
    }

    const extracted = await new UnpdfTextExtractor().extract(download.value, url);
    if (!extracted.success) {
      fail(`Could not read ${url}: ${extracted.error.message}`);
    }

    const text = extracted.value;
    const route = inferPdfRouteTitle(url, text);
    const fc = inferPdfCarrier(route, url, CARRIER_CODES);
    const stops = parsePdfStopLines(text);

    if (format === 'json') {
      console.log(JSON.stringify({ fc, route, source: url, stops }, null, 2));
      return;
    }

    if (format === 'table') {
      console.log(`${fc}: ${route}\n`);
    }
    if (stops.length === 0) {
      console.log('No stop lines found');
      return;
    }
    console.log(output(stops, COLUMNS, format));
  });
