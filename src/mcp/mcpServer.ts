import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { ListToolsRequestSchema, CallToolRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import type { ZodTypeAny } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import type pino from 'pino';

import { APP_NAME, APP_VERSION, MCP_TOOL_DESCRIPTIONS } from '../config/constants';
import { generateCorrelationId, createChildLogger, withTiming } from '../utils/logger';
import { handleMcpError, ValidationError } from './errors';
import { SearchInput, ScrapeInput, DiagnosticsInput } from './schemas';
import { handleWebSearch, handleScrapePage, handleDiagnostics } from '../handlers/index';
import type { ToolResult } from '../handlers/toolResult';

export const TOOL_NAMES = {
  WEB_SEARCH: 'web.search',
  WEB_SCRAPE: 'web.scrape',
  DIAGNOSTICS: 'searxng.diagnostics',
} as const;

type ToolName = (typeof TOOL_NAMES)[keyof typeof TOOL_NAMES];

/**
 * Context passed to handlers for progress notifications
 */
export interface HandlerContext {
  progressToken?: string | number;
  sendProgress: (progress: number, total?: number, message?: string) => Promise<void>;
}

interface ToolDefinition {
  description: string;
  inputSchema: ZodTypeAny;
  handle: (args: unknown, logger: pino.Logger, context: HandlerContext) => Promise<ToolResult>;
}

export const TOOLS: Record<ToolName, ToolDefinition> = {
  [TOOL_NAMES.WEB_SEARCH]: {
    description: MCP_TOOL_DESCRIPTIONS.WEB_SEARCH,
    inputSchema: SearchInput,
    handle: handleWebSearch,
  },
  [TOOL_NAMES.WEB_SCRAPE]: {
    description: MCP_TOOL_DESCRIPTIONS.WEB_SCRAPE,
    inputSchema: ScrapeInput,
    handle: handleScrapePage,
  },
  [TOOL_NAMES.DIAGNOSTICS]: {
    description: MCP_TOOL_DESCRIPTIONS.DIAGNOSTICS,
    inputSchema: DiagnosticsInput,
    handle: (args, logger) => handleDiagnostics(args, logger),
  },
};

function isToolName(name: string): name is ToolName {
  return Object.prototype.hasOwnProperty.call(TOOLS, name);
}

export function listTools() {
  return Object.entries(TOOLS).map(([name, tool]) => ({
    name,
    description: tool.description,
    inputSchema: zodToJsonSchema(tool.inputSchema),
  }));
}

export const mcpServer = new Server(
  {
    name: APP_NAME,
    version: APP_VERSION,
  },
  {
    capabilities: {
      tools: {},
    },
  }
);

mcpServer.setRequestHandler(ListToolsRequestSchema, async () => {
  createChildLogger(generateCorrelationId()).debug('Listing available tools');
  return { tools: listTools() };
});

// Handlers turn domain failures into isError results; only an unknown tool throws
mcpServer.setRequestHandler(CallToolRequestSchema, async request => {
  const { name, arguments: args, _meta } = request.params;
  const childLogger = createChildLogger(generateCorrelationId());

  try {
    childLogger.info({ tool: name }, 'Tool call received');

    if (!isToolName(name)) {
      throw new ValidationError(`Unknown tool: ${name}`);
    }

    const progressToken = _meta?.progressToken;
    const context: HandlerContext = {
      progressToken,
      sendProgress: async (progress: number, total?: number, message?: string) => {
        if (progressToken === undefined) return;
        await mcpServer.notification({
          method: 'notifications/progress',
          params: {
            progressToken,
            progress,
            ...(total !== undefined && { total }),
            ...(message && { message }),
          },
        });
      },
    };

    return await withTiming(childLogger, `tool:${name}`, async () =>
      TOOLS[name].handle(args, childLogger, context)
    );
  } catch (error) {
    childLogger.error({ error, tool: name }, 'Tool call failed');
    throw handleMcpError(error, `Tool call: ${name}`);
  }
});
