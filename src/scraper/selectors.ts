import { classChain, cssChain } from './selector-chain';

/**
 * Indeed DOM selectors for the search form and results page.
 * Each list is ordered newest markup first.
 * NOTE: Indeed reworks its markup often; these need periodic maintenance.
 */
export const SELECTORS = {
  /** Homepage search form (interactive navigation) */
  form: {
    what: cssChain(
      '#text-input-what',
      'input[name="q"]',
      'input[id*="what"]',
      'input[aria-label*="Job title"]',
    ),
    where: cssChain(
      '#text-input-where',
      'input[name="l"]',
      'input[id*="where"]',
      'input[aria-label*="location"]',
    ),
    submit: cssChain(
      'button[type="submit"]',
      '.yosegi-InlineWhatWhere-primaryButton',
      'button.icl-WhatWhere-button',
    ),
  },

  /** Results page */
  search: {
    /** Card containers by class name, tried before the CSS list */
    cardClasses: classChain(
      'css-ehf62e.eu4oa1w0',
      'job_seen_beacon',
      'cardOutline',
      'slider_item',
      'resultContent',
    ),
    /** Card containers by attribute / CSS */
    cardCss: cssChain(
      'li[data-jk]',
      'div.job_seen_beacon',
      'div[data-jk]',
      '.cardOutline',
      'td.resultContent',
    ),
    /** Indeed's explicit "no jobs found" banner */
    noResults: '.jobsearch-NoResult-messageHeader',
  },

  /** Fields inside a single card */
  card: {
    title: cssChain(
      'h2.jobTitle span[title]',
      'h2.jobTitle a span',
      'h2.jobTitle',
      'a.jcs-JobTitle span',
      '.jobTitle span',
      'h2 span[title]',
    ),
    company: cssChain(
      "[data-testid='company-name']",
      'span.companyName',
      '.companyName',
      "span[data-testid='company-name']",
    ),
    location: cssChain(
      "[data-testid='text-location']",
      'div.companyLocation',
      '.companyLocation',
      "div[data-testid='text-location']",
    ),
    salary: cssChain(
      "[data-testid='attribute_snippet_testid']",
      '.salary-snippet-container',
      '.salary-snippet',
      'div.salary-snippet',
      '.metadata.salary-snippet-container',
    ),
    /** Anchor carrying the listing id when the card root does not */
    titleLink: 'h2.jobTitle a, a.jcs-JobTitle',
    /** Listing id attribute */
    jobKey: 'data-jk',
  },
} as const;
