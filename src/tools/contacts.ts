import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { normalizePhone } from '../contacts/index.js';
import type { ServiceFactory } from './index.js';
import { errorResult, jsonResult } from './result.js';

export function registerContactTools(server: McpServer, services: ServiceFactory): void {
  server.registerTool('lookup_contact', {
    description: 'Look up a saved contact number. Exact name first, then case-insensitive.',
    inputSchema: {
      name: z.string().describe('Contact name'),
    },
  }, async ({ name }) => {
    try {
      const number = await services().store.lookup(name);
      if (number === undefined) {
        return errorResult(new Error(`Contact not found: ${name}`));
      }
      return jsonResult({ name, number });
    } catch (err) {
      return errorResult(err);
    }
  });

  server.registerTool('add_contact', {
    description: 'Save a contact. The number is validated and stored in canonical +E.164 form; an existing contact with the same name is replaced.',
    inputSchema: {
      name: z.string().describe('Contact name'),
      number: z.string().describe('Phone number in any common format'),
    },
  }, async ({ name, number }) => {
    try {
      const result = await services().store.addOrReplace(name, normalizePhone(number));
      return jsonResult({ ...result, message: result.replaced ? 'Contact updated' : 'Contact added' });
    } catch (err) {
      return errorResult(err);
    }
  });

  server.registerTool('list_contacts', {
    description: 'List saved contacts in the order they were added.',
    inputSchema: {},
  }, async () => {
    try {
      const contacts = await services().store.list();
      return jsonResult({ count: contacts.length, contacts });
    } catch (err) {
      return errorResult(err);
    }
  });
}
