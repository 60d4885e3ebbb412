import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { logger } from '../utils/logger';
import { mcpServer } from '../mcp/mcpServer';

export class TransportManager {
  private connected = false;

  get isConnected(): boolean {
    return this.connected;
  }

  /** Connects over STDIO unless another transport is supplied. */
  async connect(transport?: StdioServerTransport): Promise<void> {
    try {
      const serverTransport = transport ?? new StdioServerTransport();
      logger.info('Connecting MCP server to transport');
      await mcpServer.connect(serverTransport);
      this.connected = true;
      logger.info('MCP server connected and ready to accept requests');
    } catch (error) {
      logger.error({ error }, 'Failed to connect MCP server to transport');
      throw error;
    }
  }

  async close(): Promise<void> {
    if (!this.connected) return;
    await mcpServer.close();
    this.connected = false;
    logger.info('MCP transport closed');
  }
}
