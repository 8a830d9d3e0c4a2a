import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { registerAllTools, type ServiceFactory } from './tools/index.js';
import { registerAllResources } from './resources/index.js';
import { createServices, type ServiceDeps } from './services.js';

export const SERVER_NAME = 'voice-dial';
export const SERVER_VERSION = '0.1.0';

export function createServer(deps: ServiceDeps): { server: McpServer } {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  // Dry-run is chosen per tool call, so services are built per request.
  const services: ServiceFactory = (options = {}) =>
    createServices(deps, { dryRun: options.dryRun ?? false });

  registerAllTools(server, services);
  registerAllResources(server, services, deps.config.historyDisplayLimit);

  deps.logger.info('MCP server created, contacts file:', deps.config.contactsFile);

  return { server };
}

export async function startStdioServer(deps: ServiceDeps): Promise<void> {
  const { server } = createServer(deps);
  const transport = new StdioServerTransport();
  await server.connect(transport);
  deps.logger.info('voice-dial MCP server running on stdio');
}
