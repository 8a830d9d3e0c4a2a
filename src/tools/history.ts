import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ServiceFactory } from './index.js';
import { errorResult, jsonResult } from './result.js';

export function registerHistoryTool(server: McpServer, services: ServiceFactory): void {
  server.registerTool('call_history', {
    description: 'Show recent calls, oldest first.',
    inputSchema: {
      limit: z.number().int().positive().optional().default(20).describe('Max entries to return'),
    },
  }, async ({ limit }) => {
    try {
      const entries = await services().store.recentHistory(limit);
      return jsonResult({ count: entries.length, entries });
    } catch (err) {
      return errorResult(err);
    }
  });
}
