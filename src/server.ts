import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { logger } from './utils/logger';
import { closeChartClient } from './core/chartClient';
import { InitializationService } from './services/initialization';
import { TransportManager } from './transport/manager';

/**
 * Validates configuration, then serves the chart tools over a transport.
 */
export class ChartCrawlerServer {
  private initService: InitializationService;
  private transportManager: TransportManager;

  constructor() {
    this.initService = new InitializationService();
    this.transportManager = new TransportManager();
  }

  async initialize(): Promise<void> {
    await this.initService.initialize();
  }

  async connect(transport?: StdioServerTransport): Promise<void> {
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
    await closeChartClient();
  }
}

export { mcpServer } from './mcp/mcpServer';
