import { McpServer as BaseMcpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { GenerationService } from '../application/services/GenerationService.js';
import { Logger, silentLogger } from '../utils/logger.js';
import { registerGenerationTools } from './tools/GenerationTools.js';

export interface McpServerInfo {
  name: string;
  version: string;
}

/**
 * MCP front end over stdio. Shares the generation service (and therefore
 * the cache, the job table and the rate limiter) with the HTTP API.
 */
export class McpServer {
  private server: BaseMcpServer;
  private connected = false;

  constructor(
    info: McpServerInfo,
    service: GenerationService,
    private logger: Logger = silentLogger
  ) {
    this.server = new BaseMcpServer({
      name: info.name,
      version: info.version,
    });
    registerGenerationTools(this.server, service);
  }

  async start(): Promise<void> {
    const transport = new StdioServerTransport();

    process.stdin.on('error', (error) => {
      this.logger.warn(`stdin error (non-fatal): ${error.message}`);
    });
    process.stdin.on('end', () => {
      this.logger.warn('stdin ended - client may have disconnected');
    });

    await this.server.connect(transport);
    this.connected = true;
    this.logger.info('MCP server running on stdio');
  }

  async shutdown(): Promise<void> {
    if (!this.connected) return;
    this.connected = false;
    await this.server.close();
  }
}
