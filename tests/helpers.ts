import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { ContactStore, type ContactStoreOptions } from '../src/store/index.js';
import type { BrowserBinding, HostCapabilities } from '../src/types/index.js';
import { createLogger, type Logger } from '../src/utils/index.js';

/** In-memory host: a fixed set of installed apps and a record of opened URLs. */
export class FakeHost implements HostCapabilities {
  installed: Set<string>;
  defaultOpener = true;
  openError: Error | undefined;
  opened: Array<{ url: string; browser: BrowserBinding }> = [];
  probes: string[] = [];

  constructor(installed: string[] = []) {
    this.installed = new Set(installed);
  }

  async isApplicationInstalled(appName: string): Promise<boolean> {
    this.probes.push(appName);
    return this.installed.has(appName);
  }

  async hasDefaultOpener(): Promise<boolean> {
    return this.defaultOpener;
  }

  async openUrl(url: string, browser: BrowserBinding): Promise<void> {
    if (this.openError) throw this.openError;
    this.opened.push({ url, browser });
  }
}

/** Logger that keeps its lines for assertions. */
export function captureLogger(verbose = false): { logger: Logger; lines: string[] } {
  const lines: string[] = [];
  return { logger: createLogger({ verbose, write: line => lines.push(line) }), lines };
}

/** Clock that advances one step per reading. */
export function steppingClock(start: Date, stepMs = 1000): () => Date {
  let t = start.getTime();
  return () => {
    const now = new Date(t);
    t += stepMs;
    return now;
  };
}

export async function makeTempDir(): Promise<{ dir: string; cleanup: () => Promise<void> }> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'voice-dial-test-'));
  return {
    dir,
    cleanup: async () => {
      await fs.rm(dir, { recursive: true, force: true });
    },
  };
}

/** Store backed by files in `dir`. */
export function createTestStore(
  dir: string,
  overrides: Partial<ContactStoreOptions> = {},
): ContactStore {
  return new ContactStore({
    contactsFile: path.join(dir, 'contacts.txt'),
    historyFile: path.join(dir, 'history.txt'),
    logger: captureLogger().logger,
    ...overrides,
  });
}

export async function exists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}
