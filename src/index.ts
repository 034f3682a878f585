#!/usr/bin/env node

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  CallToolResult,
  ErrorCode,
  McpError
} from '@modelcontextprotocol/sdk/types.js';
import { ZodError } from 'zod';
import { HealthExportError } from './errors.js';
import { describeSchema, runExtractTool, TOOLS } from './tools.js';

class HealthExportMCPServer {
  private server: Server;

  constructor() {
    this.server = new Server(
      {
        name: 'health-export-extractor',
        version: '1.0.0'
      },
      {
        capabilities: {
          tools: {}
        }
      }
    );

    this.setupToolHandlers();
  }

  private setupToolHandlers(): void {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => {
      return { tools: TOOLS };
    });

    this.server.setRequestHandler(CallToolRequestSchema, async (request): Promise<CallToolResult> => {
      const { name, arguments: args } = request.params;

      try {
        switch (name) {
          case 'health_export_extract':
            return await runExtractTool(args);
          case 'health_export_schema':
            return describeSchema();
          default:
            throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
        }
      } catch (error) {
        throw toMcpError(error);
      }
    });
  }

  async run(): Promise<void> {
    const transport = new StdioServerTransport();
    await this.server.connect(transport);
    console.error('Health Export extractor MCP server running on stdio');
  }
}

function toMcpError(error: unknown): McpError {
  if (error instanceof McpError) {
    return error;
  }
  if (error instanceof ZodError) {
    return new McpError(
      ErrorCode.InvalidParams,
      error.issues.map(issue => `${issue.path.join('.') || 'arguments'}: ${issue.message}`).join('; ')
    );
  }
  if (error instanceof HealthExportError) {
    return new McpError(ErrorCode.InternalError, error.message, { code: error.code });
  }
  return new McpError(
    ErrorCode.InternalError,
    error instanceof Error ? error.message : 'An unexpected error occurred'
  );
}

const server = new HealthExportMCPServer();
server.run().catch(console.error);
