/**
 * 站台清單
 * Carrier sub-sites in discovery order, and how route pages are found on each
 */

import type { ListingPageSite, SiteStrategy } from '../types/site.js';

export const SITE_DOMAIN = 'transport-fc.eu';

/** Public page linking the employee-transport PDF timetables */
export const EMPLOYEE_TRANSPORT_URL = 'https://transport-fc.pl/employee-transport.html';

/** Carrier codes in lookup order, used to label PDF timetables */
export const CARRIER_CODES = [
  'szz1', 'poz2', 'poz1', 'ktw1', 'ktw3', 'ktw5',
  'wro1', 'wro2', 'wro3', 'wro4', 'wro5',
  'lcj2', 'lcj3', 'lcj4',
] as const;

function siteRoot(code: string): string {
  return `https://${code}.${SITE_DOMAIN}/`;
}

function rootProbe(code: string): SiteStrategy {
  return { kind: 'root-probe', code, rootUrl: siteRoot(code) };
}

function seededCrawl(code: string): SiteStrategy {
  const root = siteRoot(code);
  return { kind: 'seeded-crawl', code, seeds: [root, `${root}trasy/`, `${root}rozklady-jazdy/`] };
}

/**
 * WRO1 to WRO4 publish one common timetable listing
 */
export const SHARED_WRO_SITE: ListingPageSite = {
  kind: 'listing-page',
  code: 'wro',
  listingUrl: `${siteRoot('wro')}rozklady-jazdy/`,
  skipListingSelf: true,
  shared: {
    label: 'WRO',
    slugPrefix: 'wro',
    members: ['wro1', 'wro2', 'wro3', 'wro4'],
  },
};

export const SITES: readonly SiteStrategy[] = [
  rootProbe('szz1'),
  rootProbe('poz2'),
  rootProbe('poz1'),
  rootProbe('ktw1'),
  rootProbe('ktw3'),
  rootProbe('ktw5'),
  SHARED_WRO_SITE,
  {
    kind: 'listing-page',
    code: 'wro5',
    listingUrl: `${siteRoot('wro5')}rozklady-jazdy/`,
    skipListingSelf: false,
  },
  seededCrawl('lcj2'),
  seededCrawl('lcj3'),
  seededCrawl('lcj4'),
];

/**
 * 依代碼查詢站台；shared listing members resolve to the shared entry
 */
export function findSite(code: string): SiteStrategy | undefined {
  const wanted = code.toLowerCase();
  return SITES.find(
    (site) =>
      site.code === wanted ||
      (site.kind === 'listing-page' && site.shared?.members.includes(wanted) === true)
  );
}
