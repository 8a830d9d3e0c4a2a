import type { AppConfig } from './config.js';
import type { HostCapabilities } from './types/index.js';
import { ContactStore } from './store/index.js';
import { BrowserSelector, CallResolver } from './calls/index.js';
import type { Logger } from './utils/index.js';

/** Per-invocation switches, passed explicitly rather than read from globals. */
export interface RuntimeOptions {
  dryRun: boolean;
}

export interface DialerServices {
  store: ContactStore;
  browsers: BrowserSelector;
  resolver: CallResolver;
}

export interface ServiceDeps {
  config: AppConfig;
  host: HostCapabilities;
  logger: Logger;
  now?: () => Date;
}

export function createServices(deps: ServiceDeps, options: RuntimeOptions): DialerServices {
  const { config, host, logger } = deps;

  const store = new ContactStore({
    contactsFile: config.contactsFile,
    historyFile: config.historyFile,
    maxHistoryEntries: config.maxHistoryEntries,
    dryRun: options.dryRun,
    logger,
    now: deps.now,
  });
  const browsers = new BrowserSelector({ host, defaultBrowser: config.defaultBrowser, logger });
  const resolver = new CallResolver({ store, browsers, host, dryRun: options.dryRun, logger });

  return { store, browsers, resolver };
}
