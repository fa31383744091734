/** One `key:domain` row of the domain table. Keys are lower-case. */
export interface DomainMapping {
  key: string;
  domain: string;
}

export const DEFAULT_DOMAIN = 'www.indeed.com';

/**
 * Picks the site domain for a location: the first mapping whose key occurs
 * in the lower-cased location wins, in table order.
 */
export function resolveDomain(
  location: string,
  mappings: readonly DomainMapping[],
  defaultDomain: string = DEFAULT_DOMAIN,
): string {
  const lowered = location.toLowerCase();
  for (const { key, domain } of mappings) {
    if (lowered.includes(key)) return domain;
  }
  return defaultDomain;
}

export interface SearchQueryOptions {
  /** Indeed `sort` parameter */
  sort: string;
  /** Indeed `fromage` parameter: maximum listing age in days */
  maxDaysOld: number;
}

/**
 * Builds a results-page URL, e.g.
 * `https://uk.indeed.com/jobs?q=Data+Analyst&l=London%2C+UK&sort=date&fromage=7`
 */
export function buildSearchUrl(
  domain: string,
  jobTitle: string,
  location: string,
  options: SearchQueryOptions,
): string {
  const params = new URLSearchParams({
    q: jobTitle,
    l: location,
    sort: options.sort,
    fromage: String(options.maxDaysOld),
  });
  return `https://${domain}/jobs?${params.toString()}`;
}

/**
 * Public URL of one listing.
 */
export function buildListingUrl(domain: string, jobKey: string): string {
  return `https://${domain}/viewjob?jk=${encodeURIComponent(jobKey)}`;
}
