import type pino from 'pino';
import { getEnvironment } from '../../config/environment';
import { ValidationError } from '../../mcp/errors';
import type { SearchInputType } from '../../mcp/schemas';
import { fetchFullContent, type FullContentOptions } from '../content/fullContentFetcher';
import { SearxngClient, validateInstance } from './searxngClient';
import {
  NO_RESULTS_MESSAGE,
  formatAiSummaryResults,
  formatFullContent,
  formatSummary,
} from './resultFormatter';

export interface SearchRunOptions {
  correlationId?: string;
  onProgress?: FullContentOptions['onProgress'];
}

/**
 * Runs one search and renders it in the requested format. Page fetching for
 * the full formats happens sequentially after the search returns.
 */
export async function performSearch(
  input: SearchInputType,
  logger: pino.Logger,
  options: SearchRunOptions = {}
): Promise<string> {
  let baseUrl: string | undefined;
  if (input.searxngUrl) {
    const validation = await validateInstance(input.searxngUrl, logger);
    if (!validation.valid) {
      throw new ValidationError(validation.reason);
    }
    baseUrl = validation.url;
  }

  const engine = input.engine ?? getEnvironment().DEFAULT_ENGINE;
  logger.info({ query: input.query, engine, format: input.format }, 'Performing search');

  const client = new SearxngClient(baseUrl, logger);
  const response = await client.search({
    query: input.query,
    engine,
    language: input.language,
    safesearch: input.safesearch,
    timeRange: input.timeRange,
  });

  if (response.results.length === 0) {
    logger.info('Search returned no results');
    return NO_RESULTS_MESSAGE;
  }

  switch (input.format) {
    case 'summary':
      return formatSummary(response.results, input.maxResults);
    case 'full': {
      const entries = await fetchFullContent(response.results, input.maxResults, {
        correlationId: options.correlationId,
        onProgress: options.onProgress,
      });
      return formatFullContent(entries);
    }
    case 'full_with_ai_summary': {
      const entries = await fetchFullContent(response.results, input.maxResults, {
        summarize: true,
        correlationId: options.correlationId,
        onProgress: options.onProgress,
      });
      return formatAiSummaryResults(entries);
    }
  }
}
