/**
 * Tests for the MCP server's JSON-RPC handling.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { PassThrough } from 'node:stream';
import type Database from 'better-sqlite3-multiple-ciphers';
import { ErrorCodes, McpServer, PROTOCOL_VERSION, type McpServerConfig } from '../../src/mcp/server.js';
import { ToolCatalog, type ToolDefinition } from '../../src/mcp/tools.js';
import { createTestDb, setupTestDb, teardownTestDb } from '../storage/test-utils.js';
import { makeServices } from '../retrieval/test-services.js';

function echoTool(): ToolDefinition {
  return {
    name: 'echo',
    description: 'Echo the arguments',
    inputSchema: { type: 'object', properties: { text: { type: 'string', description: 'Text' } }, required: [] },
    handler: async (args) => ({ status: 'ok', data: args }),
  };
}

function failingTool(): ToolDefinition {
  return {
    name: 'fail',
    description: 'Always fails',
    inputSchema: { type: 'object', properties: {}, required: [] },
    handler: async () => ({ status: 'error', error: { code: 'INVALID_INPUT', message: 'nope' } }),
  };
}

function createServer(config: McpServerConfig = {}): McpServer {
  return new McpServer(makeServices(), new ToolCatalog([echoTool(), failingTool()]), { authToken: '', ...config });
}

function request(method: string, params?: Record<string, unknown>, id: number | string = 1): string {
  return JSON.stringify(params ? { jsonrpc: '2.0', id, method, params } : { jsonrpc: '2.0', id, method });
}

describe('mcp-server', () => {
  let db: Database.Database;

  beforeEach(() => {
    db = createTestDb();
    setupTestDb(db);
  });

  afterEach(() => {
    teardownTestDb(db);
  });

  describe('message handling', () => {
    it('answers malformed JSON with a parse error', async () => {
      const response = await createServer().handleLine('{not json');

      expect(response).toMatchObject({ jsonrpc: '2.0', id: null, error: { code: ErrorCodes.PARSE_ERROR } });
    });

    it('rejects a message that is not JSON-RPC 2.0', async () => {
      const response = await createServer().handleLine('{"jsonrpc":"1.0","id":1,"method":"ping"}');

      expect(response).toEqual({
        jsonrpc: '2.0',
        id: null,
        error: { code: ErrorCodes.INVALID_REQUEST, message: 'Invalid request' },
      });
    });

    it('sends nothing back for a notification', async () => {
      const response = await createServer().handleLine('{"jsonrpc":"2.0","method":"notifications/initialized"}');

      expect(response).toBeNull();
    });

    it('reports an unknown method', async () => {
      const response = await createServer().handleLine(request('resources/list'));

      expect(response?.error).toEqual({ code: ErrorCodes.METHOD_NOT_FOUND, message: 'Method not found: resources/list' });
    });

    it('keeps string request ids', async () => {
      const response = await createServer().handleLine(request('ping', undefined, 'req-7'));

      expect(response).toMatchObject({ id: 'req-7', result: { pong: true } });
    });
  });

  it('returns protocol version and server info on initialize', async () => {
    const response = await createServer().handleLine(request('initialize'));

    expect(response?.result).toEqual({
      protocolVersion: PROTOCOL_VERSION,
      capabilities: { tools: {} },
      serverInfo: { name: 'clinical-graphrag', version: expect.any(String) },
    });
  });

  it('lists tools with their input schemas', async () => {
    const response = await createServer().handleLine(request('tools/list'));

    expect(response?.result).toEqual({
      tools: [
        {
          name: 'echo',
          description: 'Echo the arguments',
          inputSchema: { type: 'object', properties: { text: { type: 'string', description: 'Text' } }, required: [] },
        },
        {
          name: 'fail',
          description: 'Always fails',
          inputSchema: { type: 'object', properties: {}, required: [] },
        },
      ],
    });
  });

  describe('tools/call', () => {
    it('returns the tool result as a JSON text block', async () => {
      const response = await createServer().handleLine(
        request('tools/call', { name: 'echo', arguments: { text: 'hi' } }),
      );

      expect(response?.result).toEqual({
        content: [{ type: 'text', text: JSON.stringify({ status: 'ok', data: { text: 'hi' } }, null, 2) }],
        isError: false,
      });
    });

    it('flags error results', async () => {
      const response = await createServer().handleLine(request('tools/call', { name: 'fail' }));

      expect(response?.result).toMatchObject({ isError: true });
    });

    it('rejects an unknown tool with invalid params', async () => {
      const response = await createServer().handleLine(request('tools/call', { name: 'nope' }));

      expect(response?.error).toEqual({ code: ErrorCodes.INVALID_PARAMS, message: 'Unknown tool: nope' });
    });

    it('requires a tool name', async () => {
      const response = await createServer().handleLine(request('tools/call', {}));

      expect(response?.error).toEqual({ code: ErrorCodes.INVALID_PARAMS, message: 'tools/call requires a tool name' });
    });
  });

  describe('authentication', () => {
    it('rejects requests without the token', async () => {
      const response = await createServer({ authToken: 'test-secret' }).handleLine(request('tools/list'));

      expect(response?.error).toEqual({ code: ErrorCodes.UNAUTHORIZED, message: 'Unauthorized' });
    });

    it('accepts requests carrying the token', async () => {
      const response = await createServer({ authToken: 'test-secret' }).handleLine(
        request('tools/list', { _auth: 'test-secret' }),
      );

      expect(response?.error).toBeUndefined();
    });

    it('lets initialize through without the token', async () => {
      const response = await createServer({ authToken: 'test-secret' }).handleLine(request('initialize'));

      expect(response?.result).toBeDefined();
    });
  });

  describe('health', () => {
    it('reports store health', async () => {
      const response = await createServer().handleLine(request('health'));

      expect(response?.result).toMatchObject({
        status: 'degraded',
        checks: { database: true, knowledgeGraph: false, imageStore: false },
      });
    });

    it('can be disabled', async () => {
      const response = await createServer({ enableHealthCheck: false }).handleLine(request('health'));

      expect(response?.error).toEqual({ code: ErrorCodes.METHOD_NOT_FOUND, message: 'Health check disabled' });
    });
  });

  it('counts requests and errors', async () => {
    const server = createServer();

    await server.handleLine(request('ping'));
    await server.handleLine('garbage');

    expect(server.getStats()).toMatchObject({ requestCount: 2, errorCount: 1 });
  });

  it('serves line-delimited requests over streams and stops when input closes', async () => {
    const server = createServer();
    const input = new PassThrough();
    const output = new PassThrough();
    const line = new Promise<string>((resolve) => {
      output.once('data', (chunk: Buffer) => resolve(chunk.toString()));
    });

    server.start(input, output);
    input.write(`${request('ping', undefined, 7)}\n`);
    const response: unknown = JSON.parse(await line);

    expect(response).toMatchObject({ jsonrpc: '2.0', id: 7, result: { pong: true } });
    expect(server.isRunning()).toBe(true);

    input.end();
    await vi.waitFor(() => expect(server.isRunning()).toBe(false));
  });
});
