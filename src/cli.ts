import { parseArgs } from 'node:util';
import { z } from 'zod';
import { browserNameSchema, loadConfig } from './config.js';
import { createServices, type ServiceDeps } from './services.js';
import { startStdioServer, SERVER_VERSION } from './server.js';
import type { ContactStore } from './store/index.js';
import type { HostCapabilities } from './types/index.js';
import {
  createLogger, errorMessage, exitCodeFor,
  EXIT_GENERAL_ERROR, EXIT_INVALID_INPUT, EXIT_SUCCESS,
} from './utils/index.js';

export const HELP_TEXT = `voice-dial v${SERVER_VERSION}

Usage: voice-dial [OPTIONS] <phone_number_or_contact>

ARGUMENTS:
    phone_number    Phone number to call (various formats supported)
    contact         Contact name from your contact list

OPTIONS:
    -h, --help              Show this help message
    -v, --verbose           Enable verbose output
    -d, --dry-run           Show what would be done without executing
    -b, --browser BROWSER   Specify browser (chrome, safari, firefox, edge, default)
    -c, --add-contact NAME  Add number to contacts with given name
    --history               Show call history
    --list-contacts         Show saved contacts
    --mcp                   Serve these operations as MCP tools on stdio
                            (dry-run is then a per-call tool argument)

SUPPORTED PHONE NUMBER FORMATS:
    8558701311              10-digit US number
    +1-855-870-1311         International format with country code
    (855) 870-1311          US format with parentheses
    855.870.1311            Dotted format

EXAMPLES:
    voice-dial 8558701311
    voice-dial +44-20-7946-0958
    voice-dial -b safari 8558701311
    voice-dial --add-contact "Pizza Place" 8558701311
    voice-dial "Pizza Place"
    voice-dial --dry-run 8558701311

EXIT CODES:
    0  Success
    1  General error
    2  Invalid input
    3  No browser available
    4  Browser could not be opened`;

const cliOptionsSchema = z.object({
  browser: browserNameSchema.optional(),
  'add-contact': z.string().min(1, 'Contact name required').optional(),
  history: z.boolean().default(false),
  'list-contacts': z.boolean().default(false),
  verbose: z.boolean().default(false),
  'dry-run': z.boolean().default(false),
  help: z.boolean().default(false),
  mcp: z.boolean().default(false),
});

export type CliOptions = z.infer<typeof cliOptionsSchema> & { target?: string };

export interface CliDeps {
  host: HostCapabilities;
  env?: NodeJS.ProcessEnv;
  homeDir?: string;
  stdout?: (line: string) => void;
  stderr?: (line: string) => void;
  now?: () => Date;
  serve?: (deps: ServiceDeps) => Promise<void>;
}

export function parseCliArgs(argv: string[]): CliOptions {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    strict: true,
    options: {
      browser: { type: 'string', short: 'b' },
      'add-contact': { type: 'string', short: 'c' },
      history: { type: 'boolean' },
      'list-contacts': { type: 'boolean' },
      verbose: { type: 'boolean', short: 'v' },
      'dry-run': { type: 'boolean', short: 'd' },
      help: { type: 'boolean', short: 'h' },
      mcp: { type: 'boolean' },
    },
  });

  const parsed = cliOptionsSchema.safeParse(values);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(`Invalid --${issue?.path.join('.') ?? 'option'}: ${issue?.message ?? 'bad value'}`);
  }
  // The last positional wins, as repeated targets usually mean a retyped one.
  return { ...parsed.data, target: positionals.at(-1) };
}

/** Run one invocation and return its exit code. */
export async function runCli(argv: string[], deps: CliDeps): Promise<number> {
  const stdout = deps.stdout ?? ((line: string) => console.log(line));
  const stderr = deps.stderr ?? ((line: string) => console.error(line));

  let options: CliOptions;
  try {
    options = parseCliArgs(argv);
  } catch (err) {
    createLogger({ write: stderr }).error(errorMessage(err));
    stdout(HELP_TEXT);
    return EXIT_GENERAL_ERROR;
  }

  if (options.help) {
    stdout(HELP_TEXT);
    return EXIT_SUCCESS;
  }

  const logger = createLogger({ verbose: options.verbose, write: stderr });

  if (options.mcp && options['dry-run']) {
    logger.error('--dry-run cannot be combined with --mcp; pass dryRun to each place_call instead');
    stdout(HELP_TEXT);
    return EXIT_GENERAL_ERROR;
  }

  try {
    const config = await loadConfig(deps.env, deps.homeDir);
    const serviceDeps: ServiceDeps = { config, host: deps.host, logger, now: deps.now };

    if (options.mcp) {
      await (deps.serve ?? startStdioServer)(serviceDeps);
      return EXIT_SUCCESS;
    }

    const { store, resolver } = createServices(serviceDeps, { dryRun: options['dry-run'] });

    if (options['list-contacts']) {
      await printContacts(store, stdout, logger.info);
      return EXIT_SUCCESS;
    }

    if (options.history) {
      await printHistory(store, config.historyDisplayLimit, stdout, logger.info);
      return EXIT_SUCCESS;
    }

    if (options.target === undefined) {
      logger.error('Phone number or contact name required');
      stdout(HELP_TEXT);
      return EXIT_INVALID_INPUT;
    }

    logger.debug(`voice-dial v${SERVER_VERSION}`);
    await resolver.place({
      target: options.target,
      browser: options.browser,
      saveAs: options['add-contact'],
    });
    return EXIT_SUCCESS;
  } catch (err) {
    logger.error(errorMessage(err));
    return exitCodeFor(err);
  }
}

async function printContacts(
  store: ContactStore,
  stdout: (line: string) => void,
  info: (...args: unknown[]) => void,
): Promise<void> {
  const contacts = await store.list();
  if (contacts.length === 0) {
    info('No contacts found. Add contacts with --add-contact option.');
    return;
  }
  info('Saved contacts:');
  for (const { name, number } of contacts) {
    stdout(`  ${name.padEnd(20)} ${number}`);
  }
}

async function printHistory(
  store: ContactStore,
  limit: number,
  stdout: (line: string) => void,
  info: (...args: unknown[]) => void,
): Promise<void> {
  const entries = await store.recentHistory(limit);
  if (entries.length === 0) {
    info('No call history found.');
    return;
  }
  info('Recent call history:');
  for (const { timestamp, number } of entries) {
    stdout(`  ${timestamp.padEnd(19)} ${number}`);
  }
}
