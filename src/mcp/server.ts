/**
 * MCP Server - stdio transport for MCP clients
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import { tools, getTool, zodToJsonSchema } from './tools/index.js';
import { getMetricsRecorder, getPipeline } from '../core/pipeline/index.js';
import { sanitizeError } from '../utils/security.js';
import { createLogger } from '../utils/logger.js';

const SERVER_NAME = 'self-correcting-rag';
const SERVER_VERSION = '1.0.0';

// Logs go to stderr; stdout carries the MCP protocol
const log = createLogger('mcp');

/**
 * Create and configure the MCP server
 */
export function createServer(): Server {
  const server = new Server(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return {
      tools: tools.map(tool => ({
        name: tool.name,
        description: tool.description,
        inputSchema: zodToJsonSchema(tool.inputSchema),
      })),
    };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;

    const tool = getTool(name);
    if (!tool) {
      return {
        content: [
          {
            type: 'text',
            text: JSON.stringify({
              success: false,
              error: `Unknown tool: ${name}`,
            }),
          },
        ],
        isError: true,
      };
    }

    try {
      const result = await tool.handler(args);

      return {
        content: [
          {
            type: 'text',
            text: JSON.stringify(result, null, 2),
          },
        ],
        isError: !result.success,
      };
    } catch (error) {
      log.error({ err: error, tool: name }, 'Tool execution error');

      return {
        content: [
          {
            type: 'text',
            text: JSON.stringify({
              success: false,
              error: `Tool execution failed: ${sanitizeError(error)}`,
            }),
          },
        ],
        isError: true,
      };
    }
  });

  return server;
}

/**
 * Main entry point
 */
export async function main(): Promise<void> {
  try {
    // Build the pipeline up front so configuration errors stop startup
    getPipeline();
    const loaded = await getMetricsRecorder().load();
    log.info({ queries: loaded }, 'Loaded saved query metrics');

    const server = createServer();
    const transport = new StdioServerTransport();
    await server.connect(transport);

    const shutdown = async () => {
      await getMetricsRecorder().flush();
      await server.close();
      process.exit(0);
    };

    const onSignal = () => {
      shutdown().catch((error: unknown) => {
        log.error({ err: error }, 'Shutdown failed');
        process.exit(1);
      });
    };

    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);

    log.info({ version: SERVER_VERSION }, `${SERVER_NAME} MCP server started`);
  } catch (error) {
    log.fatal({ err: error }, 'Failed to start MCP server');
    process.exit(1);
  }
}

const isMain = process.argv[1]?.endsWith('mcp/server.js') || process.argv[1]?.endsWith('mcp/server.ts');
if (isMain) {
  main().catch((error: unknown) => {
    log.fatal({ err: error }, 'MCP server crashed');
    process.exit(1);
  });
}
