import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { browserNameSchema } from '../config.js';
import { describePhone } from '../contacts/index.js';
import type { ServiceFactory } from './index.js';
import { errorResult, jsonResult } from './result.js';

export function registerCallTool(server: McpServer, services: ServiceFactory): void {
  server.registerTool('place_call', {
    description: 'Start a Google Voice call to a phone number or saved contact by opening it in a browser.',
    inputSchema: {
      target: z.string().describe('Phone number (any common format) or saved contact name'),
      browser: browserNameSchema.optional().describe('Preferred browser'),
      saveAs: z.string().optional().describe('Also save the number as a contact with this name'),
      dryRun: z.boolean().optional().default(false).describe('Resolve and report without calling or saving'),
    },
  }, async ({ target, browser, saveAs, dryRun }) => {
    try {
      const { resolver } = services({ dryRun });
      const outcome = await resolver.place({ target, browser, saveAs });
      return jsonResult({
        ...outcome,
        display: describePhone(outcome.target.canonicalNumber),
      });
    } catch (err) {
      return errorResult(err);
    }
  });
}
