import type { Cheerio, CheerioAPI } from 'cheerio';
import { hasChildren, isText, type AnyNode } from 'domhandler';
import type { SiteProfile } from '../types/extraction';
import { QUALITY_THRESHOLDS } from '../../../config/constants';
import {
  ENCYCLOPEDIA_CONTENT_SELECTOR,
  GENERIC_CONTENT_SELECTORS,
  LAB_ARTICLE_CONTENT_SELECTORS,
  LAB_ARTICLE_DOMAINS,
} from './selectors';
import { codePointLength } from '../../../utils/textLength';

export interface ContentCandidate {
  element: Cheerio<AnyNode>;
  selector: string;
  textLength: number;
}

export interface ContentSelection extends ContentCandidate {
  meetsMinimum: boolean;
}

/**
 * Length of the node's text with every text node trimmed before joining,
 * so indentation and blank lines between tags do not count.
 */
export function visibleTextLength(node: AnyNode): number {
  if (isText(node)) {
    return codePointLength(node.data.trim());
  }
  if (hasChildren(node)) {
    let total = 0;
    for (const child of node.children) {
      total += visibleTextLength(child);
    }
    return total;
  }
  return 0;
}

export function candidateSelectorsFor(profile: SiteProfile, url: string): readonly string[] {
  switch (profile) {
    case 'encyclopedia':
      return [ENCYCLOPEDIA_CONTENT_SELECTOR];
    case 'technicalBlog':
      return LAB_ARTICLE_DOMAINS.some(domain => url.includes(domain))
        ? LAB_ARTICLE_CONTENT_SELECTORS
        : GENERIC_CONTENT_SELECTORS;
    case 'generic':
      return GENERIC_CONTENT_SELECTORS;
  }
}

export function collectCandidates($: CheerioAPI, selectors: readonly string[]): ContentCandidate[] {
  const candidates: ContentCandidate[] = [];
  for (const selector of selectors) {
    $(selector).each((_, element) => {
      candidates.push({
        element: $(element),
        selector,
        textLength: visibleTextLength(element),
      });
    });
  }
  return candidates;
}

// Strictly-greater comparison keeps the first candidate among equals
export function pickLongest(candidates: readonly ContentCandidate[]): ContentCandidate | null {
  let best: ContentCandidate | null = null;
  for (const candidate of candidates) {
    if (best === null || candidate.textLength > best.textLength) {
      best = candidate;
    }
  }
  return best;
}

function toSelection(candidate: ContentCandidate | null): ContentSelection | null {
  if (!candidate) return null;
  return {
    ...candidate,
    meetsMinimum: candidate.textLength > QUALITY_THRESHOLDS.CANDIDATE_MIN_TEXT,
  };
}

/**
 * Finds the main content container for the page's profile. The encyclopedia
 * container is taken as-is when present; every other profile scores its pool of
 * candidates by visible text length.
 */
export function selectContent(
  $: CheerioAPI,
  profile: SiteProfile,
  url: string
): ContentSelection | null {
  if (profile === 'encyclopedia') {
    return selectEncyclopediaContainer($);
  }

  return toSelection(pickLongest(collectCandidates($, candidateSelectorsFor(profile, url))));
}

export function selectEncyclopediaContainer($: CheerioAPI): ContentSelection | null {
  const container = $(ENCYCLOPEDIA_CONTENT_SELECTOR).first();
  const node = container.get(0);
  if (!node) return null;

  return toSelection({
    element: container,
    selector: ENCYCLOPEDIA_CONTENT_SELECTOR,
    textLength: visibleTextLength(node),
  });
}
