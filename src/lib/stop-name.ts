/**
 * Stop name normalization and route slugs
 */

import slugify from '@sindresorhus/slugify';

/**
 * Lookup key for the prior-snapshot index and the geocode cache:
 * whitespace collapsed, lowercased, punctuation other than hyphens removed.
 */
export function normalizeStopName(name: string): string {
  const cleaned = name.replace(/\s+/g, ' ').trim().toLowerCase();
  return cleaned.replace(/[^\p{L}\p{N}_\s-]/gu, '');
}

/**
 * Deterministic URL/filesystem-safe slug for `<prefix>-<title>`
 */
export function routeSlug(prefix: string, title: string): string {
  return slugify(`${prefix.toLowerCase()}-${title}`, { decamelize: false });
}
