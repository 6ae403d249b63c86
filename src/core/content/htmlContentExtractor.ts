import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import type {
  ExtractionResult,
  ExtractionStage,
  ExtractorOptions,
  SiteProfile,
} from './types/extraction';
import { classifySite } from './siteClassifier';
import { stripNoise } from './extractors/noiseStripper';
import { selectContent, selectEncyclopediaContainer } from './extractors/contentSelector';
import { DEFAULT_RENDER_OPTIONS, MarkdownConverter } from './extractors/markdownConverter';
import { QUALITY_THRESHOLDS } from '../../config/constants';
import { ParseError } from '../../mcp/errors';
import { createChildLogger, generateCorrelationId, withTiming } from '../../utils/logger';
import { codePointLength } from '../../utils/textLength';

export const NO_TITLE = 'No title';

/**
 * Raw page as fetched. Every stage parses it afresh, so stripping done by one
 * stage never leaks into the next.
 */
export interface SourceDocument {
  html: string;
  url: string;
}

export interface StageOutcome {
  markdown: string;
  contentSource: string;
}

type StageRunner = (
  document: SourceDocument,
  profile: SiteProfile,
  converter: MarkdownConverter
) => StageOutcome;

function parse(html: string): CheerioAPI {
  try {
    return cheerio.load(html);
  } catch (error) {
    throw new ParseError(error instanceof Error ? error.message : 'Unreadable HTML');
  }
}

export function readTitle($: CheerioAPI): string {
  return $('title').first().text().trim() || NO_TITLE;
}

function renderBodyOrDocument($: CheerioAPI, converter: MarkdownConverter): StageOutcome {
  const body = $('body').first();
  if (body.length > 0) {
    return { markdown: converter.convertToMarkdown($.html(body)), contentSource: 'body' };
  }
  return { markdown: converter.convertToMarkdown($.html()), contentSource: 'document' };
}

function renderEncyclopediaOrBody($: CheerioAPI, converter: MarkdownConverter): StageOutcome {
  const container = selectEncyclopediaContainer($);
  if (container) {
    return {
      markdown: converter.convertToMarkdown($.html(container.element)),
      contentSource: container.selector,
    };
  }
  return renderBodyOrDocument($, converter);
}

function renderBestCandidateOrBody(
  $: CheerioAPI,
  profile: SiteProfile,
  url: string,
  converter: MarkdownConverter
): StageOutcome {
  const selection = selectContent($, profile, url);
  if (selection?.meetsMinimum) {
    return {
      markdown: converter.convertToMarkdown($.html(selection.element)),
      contentSource: selection.selector,
    };
  }
  return renderBodyOrDocument($, converter);
}

export const runStrippedStage: StageRunner = (document, profile, converter) => {
  const $ = parse(document.html);
  stripNoise($, profile, 'full');
  return renderBestCandidateOrBody($, profile, document.url, converter);
};

export const runReparsedStage: StageRunner = (document, profile, converter) => {
  const $ = parse(document.html);
  stripNoise($, profile, 'minimal');
  if (profile === 'encyclopedia') {
    return renderEncyclopediaOrBody($, converter);
  }
  return renderBestCandidateOrBody($, profile, document.url, converter);
};

export const runLastResortStage: StageRunner = (document, profile, converter) => {
  const $ = parse(document.html);
  stripNoise($, profile, 'minimal');
  if (profile === 'encyclopedia') {
    return renderEncyclopediaOrBody($, converter);
  }
  return renderBodyOrDocument($, converter);
};

export const STAGE_RUNNERS: Record<ExtractionStage, StageRunner> = {
  stripped: runStrippedStage,
  reparsed: runReparsedStage,
  lastResort: runLastResortStage,
};

export const STAGE_GATES: Record<ExtractionStage, (markdown: string) => boolean> = {
  stripped: markdown => codePointLength(markdown) >= QUALITY_THRESHOLDS.STRIPPED_MIN_MARKDOWN,
  reparsed: markdown => codePointLength(markdown.trim()) >= QUALITY_THRESHOLDS.REPARSED_MIN_MARKDOWN,
  lastResort: () => true,
};

export const NEXT_STAGE: Record<ExtractionStage, ExtractionStage | null> = {
  stripped: 'reparsed',
  reparsed: 'lastResort',
  lastResort: null,
};

/**
 * Extracts the main content of a page as markdown.
 *
 * Starts with profile-specific aggressive cleanup and steps down to gentler
 * passes over a fresh parse whenever the output is implausibly short. The last
 * stage is always accepted, however little text it yields.
 */
export async function extractContent(
  html: string,
  url: string,
  options?: Omit<ExtractorOptions, 'url'>
): Promise<ExtractionResult> {
  const correlationId = options?.correlationId || generateCorrelationId();
  const logger = createChildLogger(correlationId);
  const converter = new MarkdownConverter(options?.renderOptions ?? DEFAULT_RENDER_OPTIONS);
  const document: SourceDocument = { html, url };
  const profile = classifySite(url);

  logger.info(
    { event: 'extraction_start', url, profile, htmlLength: html.length },
    'Starting content extraction pipeline'
  );

  return withTiming(logger, 'content_extraction', async () => {
    const title = readTitle(parse(html));

    let stage: ExtractionStage | null = 'stripped';
    let result: ExtractionResult | null = null;

    while (stage !== null) {
      const outcome = STAGE_RUNNERS[stage](document, profile, converter);
      result = {
        title,
        markdownContent: outcome.markdown,
        profile,
        stage,
        contentSource: outcome.contentSource,
      };

      logger.debug(
        {
          event: 'extraction_stage',
          stage,
          contentSource: outcome.contentSource,
          markdownLength: outcome.markdown.length,
        },
        'Extraction stage rendered'
      );

      if (STAGE_GATES[stage](outcome.markdown)) {
        break;
      }

      const next: ExtractionStage | null = NEXT_STAGE[stage];
      logger.warn(
        { event: 'extraction_over_filtered', stage, next, markdownLength: outcome.markdown.length },
        'Extracted content too short, retrying with less filtering'
      );
      stage = next;
    }

    if (!result) {
      // Unreachable: the loop always runs the first stage
      throw new ParseError(`No extraction stage ran for ${url}`);
    }

    const trimmedLength = codePointLength(result.markdownContent.trim());
    if (result.stage === 'lastResort' && trimmedLength < QUALITY_THRESHOLDS.REPARSED_MIN_MARKDOWN) {
      logger.warn(
        { event: 'extraction_minimal', markdownLength: trimmedLength },
        'Last-resort extraction still produced very little text'
      );
    }

    logger.info(
      {
        event: 'extraction_success',
        stage: result.stage,
        contentSource: result.contentSource,
        contentLength: result.markdownContent.length,
        hasTitle: result.title !== NO_TITLE,
      },
      'Content extracted'
    );

    return result;
  });
}
