/**
 * PDF Route Parser
 * PDF 時刻表解析 - 以行為單位的啟發式規則
 *
 * Each surviving line is one stop: time tokens become context times, an
 * inline coordinate pair (if any) is kept, and what remains is the name.
 */

import { matchInText } from './coordinates.js';
import type { LatLon } from '../types/stop.js';

/** Lines containing any of these are table headers or legends */
export const DEFAULT_HEADING_KEYWORDS = ['rozklad', 'rozkład', 'godz', 'legenda'];

export const UNKNOWN_CARRIER = 'UNKNOWN';

const TIME_TOKEN = /\b\d{1,2}[:.]\d{2}\b/g;
const EDGE_PUNCTUATION = /^[\s\-–—:;|,.]+|[\s\-–—:;|,.]+$/g;
const MIN_NAME_LENGTH = 3;

export interface PdfStopLine {
  stopName: string;
  contextTimes: string[];
  inlineLatLon: LatLon | null;
}

export interface PdfParseOptions {
  headingKeywords?: string[];
}

function collapse(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Parse one line; null when it is not a stop
 */
export function parsePdfLine(
  rawLine: string,
  headingKeywords: string[] = DEFAULT_HEADING_KEYWORDS
): PdfStopLine | null {
  const line = collapse(rawLine);
  if (line.length < MIN_NAME_LENGTH) {
    return null;
  }

  const lowered = line.toLowerCase();
  if (headingKeywords.some((keyword) => lowered.includes(keyword.toLowerCase()))) {
    return null;
  }

  const times = (line.match(TIME_TOKEN) ?? []).map((token) => token.replace('.', ':'));
  const contextTimes = [...new Set(times)].sort();

  const coordinate = matchInText(line);
  let namePart = line;
  if (coordinate) {
    namePart =
      namePart.slice(0, coordinate.index) +
      ' ' +
      namePart.slice(coordinate.index + coordinate.text.length);
  }
  namePart = namePart.replace(TIME_TOKEN, ' ');

  const stopName = collapse(namePart).replace(EDGE_PUNCTUATION, '');
  if (stopName.length < MIN_NAME_LENGTH) {
    return null;
  }

  return {
    stopName,
    contextTimes,
    inlineLatLon: coordinate ? { lat: coordinate.lat, lon: coordinate.lon } : null,
  };
}

/**
 * All stop lines of a PDF's extracted text, in document order
 */
export function parsePdfStopLines(text: string, options: PdfParseOptions = {}): PdfStopLine[] {
  const stops: PdfStopLine[] = [];
  for (const rawLine of text.split(/\r?\n/)) {
    const stop = parsePdfLine(rawLine, options.headingKeywords);
    if (stop) {
      stops.push(stop);
    }
  }
  return stops;
}

function fileTitle(url: string): string {
  let pathname = url;
  try {
    pathname = new URL(url).pathname;
  } catch {
    // not absolute; use as-is
  }

  const filename = pathname.split('/').pop() ?? '';
  let decoded = filename;
  try {
    decoded = decodeURIComponent(filename);
  } catch {
    // malformed escape; keep the raw name
  }

  return decoded.replace(/\.pdf$/i, '').replace(/[_-]/g, ' ').trim();
}

/**
 * Title from the first five non-blank lines (first one that has a letter and
 * at least four characters), else from the file name, else the URL
 */
export function inferPdfRouteTitle(url: string, text: string): string {
  const firstLines = text
    .split(/\r?\n/)
    .filter((line) => line.trim().length > 0)
    .slice(0, 5);

  for (const line of firstLines) {
    const trimmed = line.trim();
    if (trimmed.length >= 4 && /\p{L}/u.test(trimmed)) {
      return trimmed;
    }
  }

  return fileTitle(url) || url;
}

/**
 * First known carrier code contained in the text, uppercased
 */
export function detectCarrier(text: string, carrierCodes: readonly string[]): string | null {
  const lowered = text.toLowerCase();
  for (const code of carrierCodes) {
    if (lowered.includes(code.toLowerCase())) {
      return code.toUpperCase();
    }
  }
  return null;
}

/**
 * Carrier label for a PDF: title first, then URL, else UNKNOWN
 */
export function inferPdfCarrier(title: string, url: string, carrierCodes: readonly string[]): string {
  return detectCarrier(title, carrierCodes) ?? detectCarrier(url, carrierCodes) ?? UNKNOWN_CARRIER;
}
