import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  ListResourcesRequestSchema,
  ReadResourceRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';

import { registerTools, handleToolCall } from './tools/index.js';
import { registerResources, handleResourceRead } from './resources/index.js';
import { getContainer, type ServiceContainer } from './services/index.js';
import { logger } from './utils/logger.js';
import { SERVER_NAME, VERSION } from './version.js';

/**
 * MCP server for drafting an Estudo Técnico Preliminar through conversation.
 */
export class EtpAssistantServer {
  private server: Server;
  private container: ServiceContainer;

  constructor(container: ServiceContainer = getContainer()) {
    this.server = new Server(
      {
        name: SERVER_NAME,
        version: VERSION,
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
      const services = await this.container.getAll();
      return handleToolCall(name, args ?? {}, services);
    });

    this.server.setRequestHandler(ListResourcesRequestSchema, async () => {
      return {
        resources: registerResources(await this.container.getStorage()),
      };
    });

    this.server.setRequestHandler(ReadResourceRequestSchema, async (request) => {
      const { uri } = request.params;
      return handleResourceRead(uri, await this.container.getStorage());
    });
  }

  async start(): Promise<void> {
    // Open storage and resolve the generator before accepting requests
    const { config, generator } = await this.container.getAll();

    const transport = new StdioServerTransport();
    await this.server.connect(transport);

    logger.info('ETP assistant MCP server started', {
      version: VERSION,
      dbPath: config.dbPath,
      generator: generator.name,
    });
  }

  async stop(): Promise<void> {
    await this.server.close();
    this.container.clear();
  }
}
