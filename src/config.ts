import * as path from 'node:path';
import * as os from 'node:os';
import * as fs from 'node:fs/promises';
import { z } from 'zod';
import { BROWSER_NAMES, type BrowserName } from './types/index.js';
import { CONTACTS_FILENAME, HISTORY_FILENAME, DEFAULT_MAX_HISTORY_ENTRIES } from './store/index.js';
import { ConfigError, errorCode, errorMessage } from './utils/index.js';

export const browserNameSchema = z.enum(BROWSER_NAMES);

const configFileSchema = z.object({
  defaultBrowser: browserNameSchema.optional(),
  contactsFile: z.string().min(1).optional(),
  historyFile: z.string().min(1).optional(),
  maxHistoryEntries: z.number().int().positive().optional(),
  historyDisplayLimit: z.number().int().positive().optional(),
});

export interface AppConfig {
  defaultBrowser: BrowserName;
  contactsFile: string;
  historyFile: string;
  maxHistoryEntries: number;
  historyDisplayLimit: number;
}

export const DEFAULT_BROWSER: BrowserName = 'chrome';
export const DEFAULT_HISTORY_DISPLAY_LIMIT = 20;

export function defaultConfigPath(homeDir: string): string {
  return path.join(homeDir, '.voice-dial', 'config.json');
}

export async function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  homeDir: string = os.homedir(),
): Promise<AppConfig> {
  const configPath = env.VOICE_DIAL_CONFIG ?? defaultConfigPath(homeDir);
  const file = await readConfigFile(configPath);

  const envBrowser = env.VOICE_DIAL_BROWSER;
  let defaultBrowser = file.defaultBrowser ?? DEFAULT_BROWSER;
  if (envBrowser) {
    const parsed = browserNameSchema.safeParse(envBrowser);
    if (!parsed.success) {
      throw new ConfigError(`Unknown browser in VOICE_DIAL_BROWSER: ${envBrowser}`);
    }
    defaultBrowser = parsed.data;
  }

  return {
    defaultBrowser,
    contactsFile: expandHome(
      env.VOICE_DIAL_CONTACTS ?? file.contactsFile ?? path.join(homeDir, CONTACTS_FILENAME),
      homeDir,
    ),
    historyFile: expandHome(
      env.VOICE_DIAL_HISTORY ?? file.historyFile ?? path.join(homeDir, HISTORY_FILENAME),
      homeDir,
    ),
    maxHistoryEntries: file.maxHistoryEntries ?? DEFAULT_MAX_HISTORY_ENTRIES,
    historyDisplayLimit: file.historyDisplayLimit ?? DEFAULT_HISTORY_DISPLAY_LIMIT,
  };
}

async function readConfigFile(configPath: string): Promise<z.infer<typeof configFileSchema>> {
  let raw: string;
  try {
    raw = await fs.readFile(configPath, 'utf-8');
  } catch (err) {
    // No config file yet - use defaults
    if (errorCode(err) === 'ENOENT') return {};
    throw new ConfigError(`Cannot read config ${configPath}: ${errorMessage(err)}`);
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(`Invalid JSON in ${configPath}: ${errorMessage(err)}`);
  }

  const parsed = configFileSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new ConfigError(`Invalid config ${configPath}: ${issues.join('; ')}`);
  }
  return parsed.data;
}

export function expandHome(filePath: string, homeDir: string): string {
  if (filePath === '~') return homeDir;
  if (filePath.startsWith('~/')) return path.join(homeDir, filePath.slice(2));
  return filePath;
}
