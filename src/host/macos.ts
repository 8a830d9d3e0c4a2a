import { execFile } from 'node:child_process';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { promisify } from 'node:util';
import type { BrowserBinding, HostCapabilities } from '../types/index.js';
import { errorMessage, ExternalOpenError } from '../utils/index.js';

const execFileAsync = promisify(execFile);

const OPEN_COMMAND = '/usr/bin/open';

export interface MacOSHostOptions {
  /** Directories searched for `<App>.app` bundles. */
  applicationDirs?: string[];
  openCommand?: string;
}

/**
 * Host capabilities backed by macOS application bundles and `open(1)`.
 */
export class MacOSHost implements HostCapabilities {
  private applicationDirs: string[];
  private openCommand: string;

  constructor(options: MacOSHostOptions = {}) {
    this.applicationDirs = options.applicationDirs
      ?? ['/Applications', path.join(os.homedir(), 'Applications')];
    this.openCommand = options.openCommand ?? OPEN_COMMAND;
  }

  async isApplicationInstalled(appName: string): Promise<boolean> {
    for (const dir of this.applicationDirs) {
      if (await isDirectory(path.join(dir, `${appName}.app`))) return true;
    }
    return false;
  }

  async hasDefaultOpener(): Promise<boolean> {
    try {
      await fs.access(this.openCommand, fs.constants.X_OK);
      return true;
    } catch {
      return false;
    }
  }

  async openUrl(url: string, browser: BrowserBinding): Promise<void> {
    try {
      await execFileAsync(this.openCommand, openArgs(url, browser), { timeout: 30000 });
    } catch (err) {
      throw new ExternalOpenError(browser.appName, `open failed: ${errorMessage(err)}`);
    }
  }
}

/** Arguments for `open`: a new instance of the browser with the URL in a new tab. */
export function openArgs(url: string, browser: BrowserBinding): string[] {
  switch (browser.selected) {
    case 'default':
      return [url];
    case 'safari':
      return ['-na', browser.appName, url];
    case 'chrome':
    case 'firefox':
    case 'edge':
      return ['-na', browser.appName, '--args', '--new-tab', url];
  }
}

async function isDirectory(filePath: string): Promise<boolean> {
  try {
    return (await fs.stat(filePath)).isDirectory();
  } catch {
    return false;
  }
}
