import type pino from 'pino';
import { getEnvironment } from '../../config/environment';
import { QUALITY_THRESHOLDS } from '../../config/constants';
import { toErrorPayload, type ErrorPayload } from '../../mcp/errors';
import { normalizeTargetUrl } from '../../utils/urlValidator';
import { createChildLogger, generateCorrelationId } from '../../utils/logger';
import { formatLongTimestamp } from '../../utils/timestamp';
import { createSummarizer } from '../llm/summarizer';
import { formatAiSummary } from '../search/resultFormatter';
import { fetchPage } from './httpContentFetcher';
import { extractContent } from './htmlContentExtractor';
import { DEFAULT_RENDER_OPTIONS } from './extractors/markdownConverter';
import type { ExtractionStage, MarkdownRenderOptions } from './types/extraction';
import { codePointLength } from '../../utils/textLength';

export const MINIMAL_CONTENT_NOTE = 'Content extraction yielded minimal results.';
export const SUMMARY_UNAVAILABLE_NOTE =
  'Content summarization was requested, but no OpenAI/OpenRouter API token is configured. Please set OPENAI_API_TOKEN in your environment to enable summarization.';

export interface ScrapeOptions {
  summarize?: boolean;
  renderOptions?: MarkdownRenderOptions;
  correlationId?: string;
}

export interface ScrapedPage {
  ok: true;
  url: string;
  title: string;
  content: string;
  summarized: boolean;
  notes: string[];
  stage: ExtractionStage;
}

export interface ScrapeFailure {
  ok: false;
  url: string;
  error: ErrorPayload;
}

export type ScrapeOutcome = ScrapedPage | ScrapeFailure;

/**
 * Fetches one page and extracts its main content. Failures come back as a
 * value; nothing here throws.
 */
export async function scrapeWebpage(url: string, options: ScrapeOptions = {}): Promise<ScrapeOutcome> {
  const log: pino.Logger = createChildLogger(options.correlationId ?? generateCorrelationId());

  let targetUrl: string;
  try {
    targetUrl = normalizeTargetUrl(url);
  } catch (error) {
    return { ok: false, url, error: toErrorPayload(error) };
  }

  log.info({ url: targetUrl, summarize: Boolean(options.summarize) }, 'Scraping webpage');

  try {
    const page = await fetchPage(targetUrl, {
      timeoutMs: getEnvironment().SCRAPE_TIMEOUT_MS,
      correlationId: options.correlationId,
    });
    const extraction = await extractContent(page.bodyText, page.url, {
      correlationId: options.correlationId,
      renderOptions: options.renderOptions ?? DEFAULT_RENDER_OPTIONS,
    });

    const notes: string[] = [];
    const base = {
      ok: true as const,
      url: page.url,
      title: extraction.title,
      stage: extraction.stage,
    };

    if (options.summarize) {
      const summarizer = createSummarizer(log);
      if (summarizer) {
        const summary = await summarizer.summarize(
          extraction.markdownContent,
          extraction.title,
          page.url
        );
        return { ...base, content: summary, summarized: true, notes };
      }
      notes.push(SUMMARY_UNAVAILABLE_NOTE);
    }

    const contentLength = codePointLength(extraction.markdownContent.trim());
    if (contentLength < QUALITY_THRESHOLDS.REPARSED_MIN_MARKDOWN) {
      log.warn(
        { url: page.url, length: contentLength },
        'Content extraction produced too little text'
      );
      notes.unshift(MINIMAL_CONTENT_NOTE);
    }

    return { ...base, content: extraction.markdownContent, summarized: false, notes };
  } catch (error) {
    const payload = toErrorPayload(error);
    log.error({ url: targetUrl, error: payload }, 'Scraping failed');
    return { ok: false, url: targetUrl, error: payload };
  }
}

export function formatScrapedPage(page: ScrapedPage, scrapedAt: Date = new Date()): string {
  if (page.summarized) {
    return formatAiSummary(page.title, page.url, page.content, scrapedAt);
  }

  let text = `# ${page.title}\n\n`;
  text += `**Source URL:** ${page.url}\n\n`;
  text += `**Scraped on:** ${formatLongTimestamp(scrapedAt)}\n\n`;
  text += '---\n\n';
  for (const note of page.notes) {
    text += `**Note: ${note}**\n\n`;
  }
  text += page.content;
  return text;
}
