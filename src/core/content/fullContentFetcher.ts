import type pino from 'pino';
import { getEnvironment } from '../../config/environment';
import { toErrorPayload } from '../../mcp/errors';
import { createChildLogger, generateCorrelationId } from '../../utils/logger';
import { createSummarizer, type Summarizer } from '../llm/summarizer';
import type { SearxngResult } from '../search/searxngClient';
import type { FullContentEntry } from '../search/resultFormatter';
import { fetchPage } from './httpContentFetcher';
import { extractContent } from './htmlContentExtractor';
import { DEFAULT_RENDER_OPTIONS } from './extractors/markdownConverter';

export interface FullContentOptions {
  summarize?: boolean;
  correlationId?: string;
  onProgress?: (completed: number, total: number, url?: string) => Promise<void>;
}

async function loadEntry(
  result: SearxngResult,
  index: number,
  summarizer: Summarizer | null,
  options: FullContentOptions,
  log: pino.Logger
): Promise<FullContentEntry> {
  const title = result.title ?? 'No title';
  const entry: FullContentEntry = {
    index,
    title,
    url: result.url || undefined,
    content: '',
    summarized: false,
    summaryUnavailable: false,
  };

  if (!entry.url) {
    return entry;
  }

  log.info({ url: entry.url, index }, 'Retrieving full content');

  try {
    const page = await fetchPage(entry.url, {
      timeoutMs: getEnvironment().PAGE_FETCH_TIMEOUT_MS,
      correlationId: options.correlationId,
    });
    const extraction = await extractContent(page.bodyText, page.url, {
      correlationId: options.correlationId,
      renderOptions: DEFAULT_RENDER_OPTIONS,
    });
    entry.content = extraction.markdownContent;
  } catch (error) {
    entry.error = toErrorPayload(error);
    log.error({ url: entry.url, index, error: entry.error }, 'Error retrieving full content');
    return entry;
  }

  if (!options.summarize) {
    return entry;
  }

  if (!summarizer) {
    entry.summaryUnavailable = true;
    return entry;
  }

  try {
    entry.content = await summarizer.summarize(entry.content, title, entry.url);
    entry.summarized = true;
  } catch (error) {
    const payload = toErrorPayload(error);
    entry.error = {
      kind: payload.kind,
      message: `Failed to summarize content: ${payload.message}`,
    };
    log.error({ url: entry.url, index, error: payload }, 'Summarization failed');
  }

  return entry;
}

/**
 * Fetches the pages behind the first `maxResults` search hits, one after
 * another. A page that fails is recorded on its own entry and the rest still run.
 */
export async function fetchFullContent(
  results: SearxngResult[],
  maxResults: number,
  options: FullContentOptions = {}
): Promise<FullContentEntry[]> {
  const log = createChildLogger(options.correlationId ?? generateCorrelationId());
  const selected = results.slice(0, maxResults);
  const summarizer = options.summarize ? createSummarizer(log) : null;

  if (options.summarize && !summarizer) {
    log.warn('AI summaries requested but OPENAI_API_TOKEN is not configured');
  }

  const entries: FullContentEntry[] = [];
  for (const [i, result] of selected.entries()) {
    entries.push(await loadEntry(result, i + 1, summarizer, options, log));
    await options.onProgress?.(i + 1, selected.length, result.url);
  }

  log.info(
    {
      total: entries.length,
      failed: entries.filter(entry => entry.error).length,
      summarized: entries.filter(entry => entry.summarized).length,
    },
    'Full content retrieval finished'
  );

  return entries;
}
