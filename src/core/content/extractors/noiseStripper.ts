import type { CheerioAPI } from 'cheerio';
import type { SiteProfile, StripLevel } from '../types/extraction';
import {
  ALWAYS_STRIPPED_TAGS,
  MINIMAL_STRIPPED_TAGS,
  ENCYCLOPEDIA_CHROME_SELECTORS,
  ENCYCLOPEDIA_NOISE_SELECTORS,
  TECHNICAL_BLOG_NOISE_SELECTORS,
  GENERIC_LAYOUT_TAGS,
  GENERIC_NOISE_SELECTORS,
  GENERIC_NOISE_CLASS_TOKENS,
} from './selectors';

function removeAll($: CheerioAPI, selectors: readonly string[]): number {
  let removed = 0;
  for (const selector of selectors) {
    const matches = $(selector);
    removed += matches.length;
    matches.remove();
  }
  return removed;
}

function profileSelectors(profile: SiteProfile): readonly string[] {
  switch (profile) {
    case 'encyclopedia':
      return [...ENCYCLOPEDIA_CHROME_SELECTORS, ...ENCYCLOPEDIA_NOISE_SELECTORS];
    case 'technicalBlog':
      return TECHNICAL_BLOG_NOISE_SELECTORS;
    case 'generic':
      return [
        ...GENERIC_LAYOUT_TAGS,
        ...GENERIC_NOISE_SELECTORS,
        ...GENERIC_NOISE_CLASS_TOKENS.map(token => `[class*="${token}"]`),
      ];
  }
}

/**
 * Removes non-content markup from the loaded document in place and returns the
 * number of matched elements. Nodes are only ever removed, so a second pass over
 * the same tree finds nothing new.
 */
export function stripNoise($: CheerioAPI, profile: SiteProfile, level: StripLevel): number {
  if (level === 'minimal') {
    return removeAll($, MINIMAL_STRIPPED_TAGS);
  }

  return removeAll($, ALWAYS_STRIPPED_TAGS) + removeAll($, profileSelectors(profile));
}
