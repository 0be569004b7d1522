#!/usr/bin/env node

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  ListResourcesRequestSchema,
  ReadResourceRequestSchema,
  McpError,
  ErrorCode,
} from '@modelcontextprotocol/sdk/types.js';

import { RecallEngine } from './RecallEngine.js';
import { loadConfig } from './config.js';
import { ConfigError, RecallError, RecordStoreUnreachableError, errorMessage } from './errors.js';
import { RESOURCE_DEFINITIONS, TOOL_DEFINITIONS, ToolInputError, UnknownToolError, callTool, readResource } from './tools.js';
import { createLogger } from './utils/logger.js';

const log = createLogger('server');

const SERVER_NAME = 'recall-engine';
const SERVER_VERSION = '0.1.0';

function toMcpError(error: unknown): McpError {
  if (error instanceof McpError) return error;
  if (error instanceof UnknownToolError) return new McpError(ErrorCode.MethodNotFound, error.message);
  if (error instanceof ToolInputError) return new McpError(ErrorCode.InvalidParams, error.message);
  if (error instanceof RecordStoreUnreachableError) {
    return new McpError(ErrorCode.InternalError, error.message, { code: error.code, operation: error.operation });
  }
  if (error instanceof RecallError) return new McpError(ErrorCode.InternalError, error.message, { code: error.code });
  return new McpError(ErrorCode.InternalError, `Tool execution failed: ${errorMessage(error)}`);
}

class RecallServer {
  private server: Server;
  private engine: RecallEngine;
  private isShuttingDown = false;

  constructor(engine: RecallEngine) {
    this.engine = engine;
    this.server = new Server(
      { name: SERVER_NAME, version: SERVER_VERSION },
      { capabilities: { tools: {}, resources: {} } },
    );
    this.server.onerror = (error) => log.error('MCP transport error', { error: errorMessage(error) });
    this.server.onclose = () => log.info('MCP client disconnected');
    this.setupGracefulShutdown();
    this.setupHandlers();
  }

  private setupGracefulShutdown(): void {
    const shutdown = async (signal: string) => {
      if (this.isShuttingDown) return;
      this.isShuttingDown = true;
      log.info('Received signal, shutting down', { signal });
      try {
        await this.engine.shutdown();
        await this.server.close();
        process.exit(0);
      } catch (error) {
        log.error('Error during shutdown', { error: errorMessage(error) });
        process.exit(1);
      }
    };

    process.on('SIGTERM', () => void shutdown('SIGTERM'));
    process.on('SIGINT', () => void shutdown('SIGINT'));

    process.on('uncaughtException', (error) => {
      log.error('Uncaught exception', { error: error.message, stack: error.stack });
      void shutdown('uncaughtException');
    });
    process.on('unhandledRejection', (reason) => {
      log.error('Unhandled rejection', { reason: errorMessage(reason) });
      void shutdown('unhandledRejection');
    });
  }

  private setupHandlers(): void {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: TOOL_DEFINITIONS }));

    this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
      const { name, arguments: args } = request.params;
      const startTime = Date.now();
      log.debug('Tool called', { tool: name, args: Object.keys(args ?? {}) });
      try {
        const result = await callTool(this.engine, name, args ?? {});
        log.debug('Tool completed', { tool: name, durationMs: Date.now() - startTime });
        return { content: [{ type: 'text', text: JSON.stringify(result, null, 2) }] };
      } catch (error) {
        const mcpError = toMcpError(error);
        log.warn('Tool failed', { tool: name, durationMs: Date.now() - startTime, error: mcpError.message });
        throw mcpError;
      }
    });

    this.server.setRequestHandler(ListResourcesRequestSchema, async () => ({ resources: RESOURCE_DEFINITIONS }));

    this.server.setRequestHandler(ReadResourceRequestSchema, async (request) => {
      const uri = request.params.uri;
      const text = readResource(this.engine, uri);
      if (text === null) throw new McpError(ErrorCode.InvalidRequest, `Unknown resource: ${uri}`);
      return { contents: [{ uri, mimeType: 'application/json', text }] };
    });
  }

  async run(): Promise<void> {
    const transport = new StdioServerTransport();
    log.info('Starting MCP server on stdio', { name: SERVER_NAME, version: SERVER_VERSION });
    await this.server.connect(transport);
    log.info('MCP server ready');
  }
}

async function main(): Promise<void> {
  const config = loadConfig();
  const engine = new RecallEngine(config);
  await engine.init();
  await new RecallServer(engine).run();
}

main().catch((error: unknown) => {
  if (error instanceof ConfigError) log.error('Configuration problems', { problems: error.problems });
  else log.error('Failed to start MCP server', { error: errorMessage(error) });
  process.exit(1);
});
