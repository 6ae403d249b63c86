export const SITE_PROFILES = ['encyclopedia', 'technicalBlog', 'generic'] as const;

/**
 * Layout family of a target page; decides which cleanup and selection rules run.
 */
export type SiteProfile = (typeof SITE_PROFILES)[number];

export type StripLevel = 'full' | 'minimal';

export const EXTRACTION_STAGES = ['stripped', 'reparsed', 'lastResort'] as const;

export type ExtractionStage = (typeof EXTRACTION_STAGES)[number];

export interface MarkdownRenderOptions {
  includeImages: boolean;
  includeTables: boolean;
}

export interface ExtractionResult {
  title: string;
  markdownContent: string;
  profile: SiteProfile;
  stage: ExtractionStage;
  // Selector that supplied the rendered subtree, or 'body' / 'document' for fallbacks
  contentSource: string;
}

export interface ExtractorOptions {
  url: string;
  correlationId?: string;
  renderOptions?: MarkdownRenderOptions;
}
