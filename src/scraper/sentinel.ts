export interface BlockSignatures {
  /** Case-insensitive fragments of a captcha or block page's host and path */
  url: readonly string[];
  /** Case-insensitive fragments of a captcha or block page title */
  title: readonly string[];
}

export const DEFAULT_BLOCK_SIGNATURES: BlockSignatures = {
  url: ['showcaptcha', 'blocked'],
  title: ['captcha', 'unusual traffic', 'access denied', 'security check'],
};

export type DetectionResult =
  | { blocked: false }
  | { blocked: true; reason: string; signature: string };

/** The search that produced the page; its terms are echoed back in titles. */
export interface SearchTerms {
  jobTitle: string;
  location: string;
}

/**
 * Host and path of the URL, lower-cased. The query string carries the
 * user's search terms and is never matched.
 */
function urlWithoutQuery(currentUrl: string): string {
  try {
    const { hostname, pathname } = new URL(currentUrl);
    return `${hostname}${pathname}`.toLowerCase();
  } catch {
    return currentUrl.split(/[?#]/)[0].toLowerCase();
  }
}

/**
 * Lower-cased title with the searched job title and location removed.
 */
function titleWithoutTerms(pageTitle: string, terms: SearchTerms | undefined): string {
  let title = pageTitle.toLowerCase();
  if (!terms) return title;
  for (const term of [terms.jobTitle, terms.location]) {
    const needle = term.trim().toLowerCase();
    if (needle) title = title.split(needle).join(' ');
  }
  return title;
}

/**
 * Checks the landing page for signs that the site flagged the session.
 * URL signatures are checked before the page title.
 */
export function checkForBlock(
  currentUrl: string,
  pageTitle: string,
  signatures: BlockSignatures = DEFAULT_BLOCK_SIGNATURES,
  terms?: SearchTerms,
): DetectionResult {
  const url = urlWithoutQuery(currentUrl);
  const urlHit = signatures.url.find((fragment) => url.includes(fragment.toLowerCase()));
  if (urlHit) {
    return {
      blocked: true,
      reason: 'Bot detection triggered - captcha or block page',
      signature: urlHit,
    };
  }

  const title = titleWithoutTerms(pageTitle, terms);
  const titleHit = signatures.title.find((fragment) => title.includes(fragment.toLowerCase()));
  if (titleHit) {
    return {
      blocked: true,
      reason: 'Bot detection triggered - block page title',
      signature: titleHit,
    };
  }

  return { blocked: false };
}
