import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import { logger } from '../utils/logger';
import { mcpServer } from '../mcp/mcpServer';

export class TransportManager {
  async connect(transport?: Transport): Promise<void> {
    try {
      const serverTransport = transport ?? new StdioServerTransport();
      logger.info('Connecting MCP server to transport');
      await mcpServer.connect(serverTransport);
      logger.info('MCP server connected successfully and ready to accept connections');
    } catch (error) {
      logger.error({ error }, 'Failed to connect MCP server to transport');
      throw error;
    }
  }

  async close(): Promise<void> {
    await mcpServer.close();
    logger.info('MCP server closed');
  }
}
