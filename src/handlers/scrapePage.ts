import type pino from 'pino';
import { ScrapeInput } from '../mcp/schemas';
import { formatScrapedPage, scrapeWebpage } from '../core/content/pageScraper';
import {
  DEFAULT_RENDER_OPTIONS,
  DETAILED_RENDER_OPTIONS,
} from '../core/content/extractors/markdownConverter';
import { generateCorrelationId } from '../utils/logger';
import type { HandlerContext } from '../mcp/mcpServer';
import { errorResult, payloadResult, textResult, type ToolResult } from './toolResult';

export async function handleScrapePage(
  args: unknown,
  logger: pino.Logger,
  context?: HandlerContext
): Promise<ToolResult> {
  const correlationId = generateCorrelationId();
  const childLogger = logger.child({ correlationId });

  try {
    const input = ScrapeInput.parse(args);
    childLogger.info({ url: input.url, summarize: input.summarize }, 'Processing scrape request');

    await context?.sendProgress(0, 100, 'Fetching page...');
    const outcome = await scrapeWebpage(input.url, {
      summarize: input.summarize,
      renderOptions: input.includeImages ? DETAILED_RENDER_OPTIONS : DEFAULT_RENDER_OPTIONS,
      correlationId,
    });
    await context?.sendProgress(100, 100, 'Page processed');

    if (!outcome.ok) {
      childLogger.warn({ url: outcome.url, error: outcome.error }, 'Scrape returned an error');
      return payloadResult(outcome.error);
    }

    return textResult(formatScrapedPage(outcome));
  } catch (error) {
    return errorResult(error, childLogger, 'Scrape');
  }
}
