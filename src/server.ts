import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import { logger } from './utils/logger';
import { InitializationService } from './services/initialization';
import { TransportManager } from './transport/manager';

/**
 * Validates configuration, then serves the MCP tools over a transport
 * (STDIO unless one is given).
 */
export class SearxngScraperServer {
  private initService: InitializationService;
  private transportManager: TransportManager;

  constructor() {
    this.initService = new InitializationService();
    this.transportManager = new TransportManager();
  }

  async initialize(): Promise<void> {
    await this.initService.initialize();
  }

  async connect(transport?: Transport): Promise<void> {
    await this.transportManager.connect(transport);
  }

  async start(): Promise<void> {
    try {
      await this.initialize();
      await this.connect();
    } catch (error) {
      logger.error({ error }, 'Failed to start MCP server');
      process.exit(1);
    }
  }

  async stop(): Promise<void> {
    await this.transportManager.close();
  }
}

export { mcpServer } from './mcp/mcpServer';
