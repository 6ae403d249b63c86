import type pino from 'pino';
import { SearchInput } from '../mcp/schemas';
import { performSearch } from '../core/search/searchService';
import { generateCorrelationId } from '../utils/logger';
import { hostnameOf } from '../utils/urlValidator';
import type { HandlerContext } from '../mcp/mcpServer';
import { errorResult, textResult, type ToolResult } from './toolResult';

export async function handleWebSearch(
  args: unknown,
  logger: pino.Logger,
  context?: HandlerContext
): Promise<ToolResult> {
  const correlationId = generateCorrelationId();
  const childLogger = logger.child({ correlationId });

  try {
    const input = SearchInput.parse(args);
    childLogger.info({ input }, 'Processing web search request');

    await context?.sendProgress(0, 100, 'Querying SearXNG...');

    const text = await performSearch(input, childLogger, {
      correlationId,
      onProgress: async (completed, total, url) => {
        const where = url ? `: ${hostnameOf(url)}` : '';
        await context?.sendProgress(
          Math.round((completed / total) * 100),
          100,
          `[${completed}/${total}] Retrieved page${where}`
        );
      },
    });

    await context?.sendProgress(100, 100, 'Search completed');
    childLogger.info({ format: input.format, length: text.length }, 'Web search completed');

    return textResult(text);
  } catch (error) {
    return errorResult(error, childLogger, 'Web search');
  }
}
