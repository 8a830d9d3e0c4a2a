import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ServiceFactory } from '../tools/index.js';

export function registerAllResources(server: McpServer, services: ServiceFactory, historyLimit: number): void {
  // contacts://all - saved contacts in file order
  server.registerResource('all-contacts', 'contacts://all', {
    title: 'Saved Contacts',
    description: 'Every saved contact name and number',
    mimeType: 'application/json',
  }, async (uri) => {
    const contacts = await services().store.list();
    return {
      contents: [{
        uri: uri.href,
        text: JSON.stringify(contacts, null, 2),
        mimeType: 'application/json',
      }],
    };
  });

  // calls://history - recent calls
  server.registerResource('call-history', 'calls://history', {
    title: 'Recent Calls',
    description: 'Most recent calls placed, oldest first',
    mimeType: 'application/json',
  }, async (uri) => {
    const entries = await services().store.recentHistory(historyLimit);
    return {
      contents: [{
        uri: uri.href,
        text: JSON.stringify(entries, null, 2),
        mimeType: 'application/json',
      }],
    };
  });
}
