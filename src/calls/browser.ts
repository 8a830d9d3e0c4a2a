import {
  BROWSER_APPS, BROWSER_FALLBACK_ORDER,
  type BrowserBinding, type BrowserName, type HostCapabilities,
} from '../types/index.js';
import { createLogger, NoBrowserAvailableError, type Logger } from '../utils/index.js';

export interface BrowserSelectorOptions {
  host: HostCapabilities;
  /** Configured default, tried after an explicit request. */
  defaultBrowser: BrowserName;
  logger?: Logger;
}

export function bindBrowser(name: BrowserName): BrowserBinding {
  return { selected: name, appName: BROWSER_APPS[name] };
}

/**
 * Picks the browser for a call: the requested one, then the configured
 * default, then the first installed of chrome, safari, firefox and edge,
 * then the system opener. Availability is probed on every call.
 */
export class BrowserSelector {
  private host: HostCapabilities;
  private defaultBrowser: BrowserName;
  private logger: Logger;

  constructor(options: BrowserSelectorOptions) {
    this.host = options.host;
    this.defaultBrowser = options.defaultBrowser;
    this.logger = options.logger ?? createLogger();
  }

  /** The system opener always counts as available here; `pick` checks it last. */
  async isAvailable(name: BrowserName): Promise<boolean> {
    this.logger.debug('Checking browser availability:', name);
    if (name === 'default') return true;

    const appName = BROWSER_APPS[name];
    const installed = await this.host.isApplicationInstalled(appName);
    this.logger.debug(installed ? `Found browser: ${appName}` : `Browser not found: ${appName}`);
    return installed;
  }

  async pick(requested?: BrowserName): Promise<BrowserBinding> {
    const selected = await this.choose(requested);
    if (selected === 'default' && !(await this.host.hasDefaultOpener())) {
      throw new NoBrowserAvailableError();
    }
    return bindBrowser(selected);
  }

  private async choose(requested?: BrowserName): Promise<BrowserName> {
    if (requested && await this.isAvailable(requested)) return requested;
    if (await this.isAvailable(this.defaultBrowser)) return this.defaultBrowser;

    for (const name of BROWSER_FALLBACK_ORDER) {
      if (await this.isAvailable(name)) return name;
    }
    return 'default';
  }
}
