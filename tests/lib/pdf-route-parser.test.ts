import { describe, it, expect } from 'vitest';
import {
  detectCarrier,
  inferPdfCarrier,
  inferPdfRouteTitle,
  parsePdfLine,
  parsePdfStopLines,
} from '../../src/lib/pdf-route-parser.js';
import { CARRIER_CODES } from '../../src/data/sites.js';

describe('parsePdfLine', () => {
  it('should split a line into times, inline coordinates and the stop name', () => {
    expect(parsePdfLine('08:15 Rynek Główny 51.1100,17.0300')).toEqual({
      stopName: 'Rynek Główny',
      contextTimes: ['08:15'],
      inlineLatLon: { lat: 51.11, lon: 17.03 },
    });
  });

  it('should normalize dotted times and sort them', () => {
    expect(parsePdfLine('Plac Wolności 14.30 6:05 14:30')).toEqual({
      stopName: 'Plac Wolności',
      contextTimes: ['14:30', '6:05'],
      inlineLatLon: null,
    });
  });

  it('should strip punctuation and dashes at the edges', () => {
    expect(parsePdfLine('– Dworzec PKP -')?.stopName).toBe('Dworzec PKP');
    expect(parsePdfLine('Centrum: 07:10 |')?.stopName).toBe('Centrum');
  });

  it.each([
    ['Rozkład jazdy linii 5'],
    ['ROZKLAD JAZDY'],
    ['Godz. odjazdu'],
    ['Legenda: kursuje w dni robocze'],
  ])('should skip heading line "%s"', (line) => {
    expect(parsePdfLine(line)).toBeNull();
  });

  it('should skip lines that are too short or only times', () => {
    expect(parsePdfLine('ab')).toBeNull();
    expect(parsePdfLine('12:00 13:00')).toBeNull();
    expect(parsePdfLine('Xy 10:00')).toBeNull();
  });
});

describe('parsePdfStopLines', () => {
  it('should keep stop lines in document order', () => {
    const text = [
      'Rozkład jazdy',
      '06:00 Zajezdnia',
      '',
      '06:12 Rynek 51.1100,17.0300',
      '06:20 Dworzec',
    ].join('\n');

    expect(parsePdfStopLines(text).map((line) => line.stopName)).toEqual([
      'Zajezdnia',
      'Rynek',
      'Dworzec',
    ]);
  });

  it('should accept custom heading keywords', () => {
    const text = 'Trasa A\nPrzystanek Centrum';

    expect(parsePdfStopLines(text, { headingKeywords: ['trasa'] })).toEqual([
      { stopName: 'Przystanek Centrum', contextTimes: [], inlineLatLon: null },
    ]);
  });
});

describe('inferPdfRouteTitle', () => {
  it('should use the first meaningful line of text', () => {
    const text = '\n  \n12:00\nTrasa Gliwice - Katowice\nZajezdnia';
    expect(inferPdfRouteTitle('https://transport-fc.pl/a.pdf', text)).toBe('Trasa Gliwice - Katowice');
  });

  it('should fall back to the file name', () => {
    const text = '12:00\n123\nAB';
    expect(inferPdfRouteTitle('https://transport-fc.pl/files/Linia_KTW1-nocna.pdf', text)).toBe(
      'Linia KTW1 nocna'
    );
  });

  it('should percent-decode the file name', () => {
    expect(inferPdfRouteTitle('https://transport-fc.pl/Trasa%20%C5%81%C3%B3d%C5%BA.pdf', '')).toBe(
      'Trasa Łódź'
    );
  });

  it('should fall back to the URL when there is no file name', () => {
    expect(inferPdfRouteTitle('https://transport-fc.pl/pdf/', '')).toBe('https://transport-fc.pl/pdf/');
  });

  it('should only look at the first five non-blank lines', () => {
    const text = '1\n2\n3\n4\n5\nTrasa za daleko';
    expect(inferPdfRouteTitle('https://transport-fc.pl/trasa_c.pdf', text)).toBe('trasa c');
  });
});

describe('carrier detection', () => {
  it('should find a carrier code case-insensitively', () => {
    expect(detectCarrier('Linia KTW1 nocna', CARRIER_CODES)).toBe('KTW1');
    expect(detectCarrier('Trasa A', CARRIER_CODES)).toBeNull();
  });

  it('should follow the carrier table order', () => {
    expect(detectCarrier('poz1 i poz2', CARRIER_CODES)).toBe('POZ2');
  });

  it('should check the title before the URL', () => {
    expect(inferPdfCarrier('Trasa LCJ3', 'https://transport-fc.pl/wro5.pdf', CARRIER_CODES)).toBe('LCJ3');
    expect(inferPdfCarrier('Trasa A', 'https://transport-fc.pl/pdf/wro5-trasa.pdf', CARRIER_CODES)).toBe(
      'WRO5'
    );
  });

  it('should label unmatched PDFs as UNKNOWN', () => {
    expect(inferPdfCarrier('Trasa A', 'https://transport-fc.pl/a.pdf', CARRIER_CODES)).toBe('UNKNOWN');
  });
});
