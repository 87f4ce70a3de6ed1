/**
 * 站台探索策略
 * One variant per way of finding route pages on a carrier sub-site
 */

interface SiteBase {
  /** Carrier code, lowercase, e.g. "ktw1" */
  code: string;
}

/**
 * A known listing page links directly to every route page
 */
export interface ListingPageSite extends SiteBase {
  kind: 'listing-page';
  listingUrl: string;
  /** Drop links pointing back at the listing itself */
  skipListingSelf: boolean;
  /**
   * Set when one listing is shared by several carriers. Routes get this
   * label instead of the code, and fan-out clones them per member.
   */
  shared?: {
    label: string;
    slugPrefix: string;
    members: string[];
  };
}

/**
 * Unknown link topology: breadth-first crawl from the seeds
 */
export interface SeededCrawlSite extends SiteBase {
  kind: 'seeded-crawl';
  seeds: string[];
}

/**
 * Fetch the site root and probe every linked page for a map marker
 */
export interface RootProbeSite extends SiteBase {
  kind: 'root-probe';
  rootUrl: string;
}

export type SiteStrategy = ListingPageSite | SeededCrawlSite | RootProbeSite;

/**
 * A page that may hold a route
 */
export interface PageLink {
  title: string;
  url: string;
}

/**
 * Candidate route page together with how it should be labelled
 */
export interface RoutePageTarget extends PageLink {
  code: string;
  shared?: {
    label: string;
    slugPrefix: string;
  };
}
