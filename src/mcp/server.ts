/**
 * MCP (Model Context Protocol) server exposing the retrieval tools.
 *
 * Features:
 * - JSON-RPC 2.0 over stdio, one message per line
 * - Health check endpoints (ping, health)
 * - Graceful shutdown handling
 * - Optional token-based authentication
 */

import { createInterface } from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import { z } from 'zod';
import { closeDb } from '../storage/db.js';
import { checkHealth } from '../retrieval/status.js';
import { createRetrievalServices, type RetrievalServices } from '../retrieval/services.js';
import { createLogger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import { VERSION } from '../version.js';
import { createToolCatalog, type ToolCatalog } from './tools.js';

const log = createLogger('mcp-server');

export const PROTOCOL_VERSION = '2024-11-05';

/** MCP Server configuration */
export interface McpServerConfig {
  /** Authentication token (if set, requests must carry it as params._auth) */
  authToken?: string;
  /** Enable health check endpoint */
  enableHealthCheck?: boolean;
}

/** Standard error codes */
export const ErrorCodes = {
  PARSE_ERROR: -32700,
  INVALID_REQUEST: -32600,
  METHOD_NOT_FOUND: -32601,
  INVALID_PARAMS: -32602,
  INTERNAL_ERROR: -32603,
  UNAUTHORIZED: -32001,
} as const;

const RequestIdSchema = z.union([z.string(), z.number()]);

const McpRequestSchema = z.object({
  jsonrpc: z.literal('2.0'),
  id: RequestIdSchema.optional(),
  method: z.string().min(1),
  params: z.record(z.unknown()).optional(),
});

type McpRequest = z.infer<typeof McpRequestSchema>;
type RequestId = z.infer<typeof RequestIdSchema>;

const ToolsCallParamsSchema = z.object({
  name: z.string().min(1),
  arguments: z.record(z.unknown()).optional(),
});

/**
 * MCP response message.
 */
export interface McpResponse {
  jsonrpc: '2.0';
  id: RequestId | null;
  result?: unknown;
  error?: {
    code: number;
    message: string;
    data?: unknown;
  };
}

function createErrorResponse(
  id: RequestId | null,
  code: number,
  message: string,
  data?: unknown,
): McpResponse {
  const error: McpResponse['error'] = { code, message };
  if (data !== undefined) error.data = data;
  return { jsonrpc: '2.0', id, error };
}

/**
 * Handle MCP requests via JSON-RPC over stdio.
 */
export class McpServer {
  private running = false;
  private startTime = Date.now();
  private readonly config: Required<McpServerConfig>;
  private requestCount = 0;
  private errorCount = 0;
  private closeInput: (() => void) | null = null;

  constructor(
    private readonly services: RetrievalServices,
    private readonly catalog: ToolCatalog = createToolCatalog(services),
    config: McpServerConfig = {},
  ) {
    this.config = {
      authToken: config.authToken ?? process.env.CGR_MCP_AUTH_TOKEN ?? '',
      enableHealthCheck: config.enableHealthCheck ?? true,
    };
  }

  /**
   * Start reading requests. Responses are written one per line to `output`.
   */
  start(input: Readable = process.stdin, output: Writable = process.stdout): void {
    if (this.running) return;
    this.running = true;
    this.startTime = Date.now();

    log.info('Server started', { version: VERSION, tools: this.catalog.tools.length });

    const rl = createInterface({ input, terminal: false });
    this.closeInput = () => rl.close();

    rl.on('line', (line) => {
      if (line.trim() === '') return;
      this.handleLine(line)
        .then((response) => {
          if (response) output.write(JSON.stringify(response) + '\n');
        })
        .catch((error: unknown) => {
          log.error('Failed to write response', { error: errorMessage(error) });
        });
    });

    rl.on('close', () => {
      log.info('Input closed');
      this.stop();
    });
  }

  /**
   * Stop the server and release the database.
   */
  stop(): void {
    if (!this.running) return;
    this.running = false;

    log.info('Server stopping', {
      uptimeMs: Date.now() - this.startTime,
      requestCount: this.requestCount,
      errorCount: this.errorCount,
    });

    const close = this.closeInput;
    this.closeInput = null;
    close?.();

    try {
      closeDb();
    } catch (error) {
      log.error('Shutdown error', { error: errorMessage(error) });
    }
  }

  isRunning(): boolean {
    return this.running;
  }

  /**
   * Parse and handle one line. Notifications (no id) produce no response.
   */
  async handleLine(line: string): Promise<McpResponse | null> {
    this.requestCount++;

    let raw: unknown;
    try {
      raw = JSON.parse(line);
    } catch (error) {
      this.errorCount++;
      return createErrorResponse(null, ErrorCodes.PARSE_ERROR, 'Parse error', errorMessage(error));
    }

    const parsed = McpRequestSchema.safeParse(raw);
    if (!parsed.success) {
      this.errorCount++;
      return createErrorResponse(null, ErrorCodes.INVALID_REQUEST, 'Invalid request');
    }

    const request = parsed.data;
    const response = await this.handleRequest(request);
    return request.id === undefined ? null : response;
  }

  private checkAuth(params: Record<string, unknown> | undefined): boolean {
    if (!this.config.authToken) return true;
    return params?._auth === this.config.authToken;
  }

  /**
   * Handle a single MCP request.
   */
  async handleRequest(request: McpRequest): Promise<McpResponse> {
    const { method, params } = request;
    const id = request.id ?? null;
    const started = Date.now();

    if (method !== 'initialize' && !this.checkAuth(params)) {
      log.warn('Authentication failed', { id, method });
      return createErrorResponse(id, ErrorCodes.UNAUTHORIZED, 'Unauthorized');
    }

    try {
      switch (method) {
        case 'initialize':
          return this.handleInitialize(id);

        case 'notifications/initialized':
          return { jsonrpc: '2.0', id, result: null };

        case 'tools/list':
          return this.handleToolsList(id);

        case 'tools/call':
          return await this.handleToolsCall(id, params);

        case 'ping':
          return { jsonrpc: '2.0', id, result: { pong: true, timestamp: Date.now() } };

        case 'health':
          return this.handleHealth(id);

        case 'shutdown':
          this.stop();
          return { jsonrpc: '2.0', id, result: null };

        default:
          return createErrorResponse(id, ErrorCodes.METHOD_NOT_FOUND, `Method not found: ${method}`);
      }
    } catch (error) {
      this.errorCount++;
      log.error('Request failed', { id, method, error: errorMessage(error) });
      return createErrorResponse(id, ErrorCodes.INTERNAL_ERROR, 'Internal error', errorMessage(error));
    } finally {
      log.debug('Request completed', { id, method, durationMs: Date.now() - started });
    }
  }

  private handleHealth(id: RequestId | null): McpResponse {
    if (!this.config.enableHealthCheck) {
      return createErrorResponse(id, ErrorCodes.METHOD_NOT_FOUND, 'Health check disabled');
    }
    const report = checkHealth(this.services);
    return {
      jsonrpc: '2.0',
      id,
      result: { ...report, version: VERSION, uptimeMs: Date.now() - this.startTime },
    };
  }

  private handleInitialize(id: RequestId | null): McpResponse {
    return {
      jsonrpc: '2.0',
      id,
      result: {
        protocolVersion: PROTOCOL_VERSION,
        capabilities: { tools: {} },
        serverInfo: { name: 'clinical-graphrag', version: VERSION },
      },
    };
  }

  private handleToolsList(id: RequestId | null): McpResponse {
    const tools = this.catalog.tools.map((t) => ({
      name: t.name,
      description: t.description,
      inputSchema: t.inputSchema,
    }));
    return { jsonrpc: '2.0', id, result: { tools } };
  }

  /**
   * Run a tool. The ToolResult is returned as a JSON text block; `isError`
   * is set when its status is `error`.
   */
  private async handleToolsCall(
    id: RequestId | null,
    params: Record<string, unknown> | undefined,
  ): Promise<McpResponse> {
    const parsed = ToolsCallParamsSchema.safeParse(params ?? {});
    if (!parsed.success) {
      return createErrorResponse(id, ErrorCodes.INVALID_PARAMS, 'tools/call requires a tool name');
    }

    const { name } = parsed.data;
    if (!this.catalog.get(name)) {
      return createErrorResponse(id, ErrorCodes.INVALID_PARAMS, `Unknown tool: ${name}`);
    }

    const started = Date.now();
    const result = await this.catalog.call(name, parsed.data.arguments ?? {});
    log.info('Tool executed', { tool: name, status: result.status, durationMs: Date.now() - started });

    return {
      jsonrpc: '2.0',
      id,
      result: {
        content: [{ type: 'text', text: JSON.stringify(result, null, 2) }],
        isError: result.status === 'error',
      },
    };
  }

  getStats(): { requestCount: number; errorCount: number; uptimeMs: number } {
    return {
      requestCount: this.requestCount,
      errorCount: this.errorCount,
      uptimeMs: Date.now() - this.startTime,
    };
  }
}

/**
 * Create and start the MCP server on stdio, stopping on SIGINT/SIGTERM.
 */
export function startMcpServer(
  services: RetrievalServices = createRetrievalServices(),
  config?: McpServerConfig,
): McpServer {
  const server = new McpServer(services, undefined, config);
  const shutdown = (signal: string) => {
    log.info('Shutdown signal', { signal });
    server.stop();
    process.exit(0);
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
  server.start();
  return server;
}
