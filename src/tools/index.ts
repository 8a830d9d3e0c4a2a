import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { DialerServices } from '../services.js';
import { registerCallTool } from './call.js';
import { registerContactTools } from './contacts.js';
import { registerHistoryTool } from './history.js';

export type ServiceFactory = (options?: { dryRun?: boolean }) => DialerServices;

export function registerAllTools(server: McpServer, services: ServiceFactory): void {
  registerCallTool(server, services);
  registerContactTools(server, services);
  registerHistoryTool(server, services);
}
