import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  ListResourcesRequestSchema,
  ReadResourceRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';

import { registerTools, handleToolCall } from './tools/index.js';
import { SERVER_VERSION } from './tools/health.js';
import { registerResources, handleResourceRead } from './resources/index.js';
import { getContainer, type ServiceContainer } from './services/index.js';
import { logger } from './utils/logger.js';

/**
 * Strategos MCP Server
 *
 * Turns project descriptions into phases, task graphs and resourced mission plans.
 */
export class StrategosServer {
  private server: Server;
  private container: ServiceContainer;

  constructor(container: ServiceContainer = getContainer()) {
    this.server = new Server(
      {
        name: 'strategos',
        version: SERVER_VERSION,
      },
      {
        capabilities: {
          tools: {},
          resources: {},
        },
      }
    );

    this.container = container;
    this.setupHandlers();
  }

  private setupHandlers(): void {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => {
      return {
        tools: registerTools(),
      };
    });

    this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
      const { name, arguments: args } = request.params;
      return handleToolCall(name, args ?? {}, this.container);
    });

    this.server.setRequestHandler(ListResourcesRequestSchema, async () => {
      return {
        resources: registerResources(await this.container.getRegistries()),
      };
    });

    this.server.setRequestHandler(ReadResourceRequestSchema, async (request) => {
      const { uri } = request.params;
      return handleResourceRead(uri, await this.container.getRegistries());
    });
  }

  async start(): Promise<void> {
    // Fail at startup, not on the first tool call, when the config is broken
    await this.container.getRegistries();

    const transport = new StdioServerTransport();
    await this.server.connect(transport);

    logger.info('Strategos MCP server started', { version: SERVER_VERSION });
  }

  async stop(): Promise<void> {
    await this.server.close();
  }
}
