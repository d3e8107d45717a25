import type { Command } from '../types.js';
import { loadRuntime } from '../utils.js';

export const serveCommand: Command = {
  name: 'serve',
  description: 'Start the MCP server on stdio',
  usage: 'cgr serve [--no-health-check]',
  handler: async (args) => {
    const { services } = loadRuntime();
    const { startMcpServer } = await import('../../mcp/server.js');
    startMcpServer(services, { enableHealthCheck: !args.includes('--no-health-check') });
  },
};
