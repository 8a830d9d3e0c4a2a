import type { CallOutcome, CallRequest, CallTarget, HostCapabilities } from '../types/index.js';
import type { ContactStore } from '../store/index.js';
import { describePhone, normalizePhone, suggestContacts } from '../contacts/index.js';
import {
  createLogger, errorMessage, ExternalOpenError, InvalidInputError, StoreWriteError, type Logger,
} from '../utils/index.js';
import type { BrowserSelector } from './browser.js';
import { buildCallUrl } from './url.js';

export interface CallResolverOptions {
  store: ContactStore;
  browsers: BrowserSelector;
  host: HostCapabilities;
  /** Decide everything but skip the contact write, history append and open. */
  dryRun?: boolean;
  logger?: Logger;
}

export class CallResolver {
  private store: ContactStore;
  private browsers: BrowserSelector;
  private host: HostCapabilities;
  private dryRun: boolean;
  private logger: Logger;

  constructor(options: CallResolverOptions) {
    this.store = options.store;
    this.browsers = options.browsers;
    this.host = options.host;
    this.dryRun = options.dryRun ?? false;
    this.logger = options.logger ?? createLogger();
  }

  /** Map a contact name or phone number to its canonical dialable number. */
  async resolve(rawInput: string): Promise<CallTarget> {
    const stored = await this.store.find(rawInput);

    if (stored !== undefined) {
      this.logger.debug(`Found contact: ${stored.name} -> ${stored.number}`);
      return {
        rawInput,
        canonicalNumber: this.normalize(stored.number),
        sourceKind: 'contact',
        contactName: stored.name,
      };
    }

    if (!/\d/.test(rawInput)) {
      throw new InvalidInputError(await this.unknownContactMessage(rawInput));
    }

    return { rawInput, canonicalNumber: this.normalize(rawInput), sourceKind: 'direct' };
  }

  async place(request: CallRequest): Promise<CallOutcome> {
    const target = await this.resolve(request.target);

    let savedContact: string | undefined;
    if (request.saveAs !== undefined) {
      await this.store.addOrReplace(request.saveAs, target.canonicalNumber);
      savedContact = request.saveAs;
    }

    const browser = await this.browsers.pick(request.browser);
    const url = buildCallUrl(target.canonicalNumber);

    await this.recordHistory(target.canonicalNumber);

    this.logger.debug(`Opening URL in ${browser.selected}: ${url}`);
    if (this.dryRun) {
      this.logger.info(`[DRY RUN] Would open URL in ${browser.selected}: ${url}`);
      return { target, browser, url, dispatched: false, savedContact };
    }

    try {
      await this.host.openUrl(url, browser);
    } catch (err) {
      if (err instanceof ExternalOpenError) throw err;
      throw new ExternalOpenError(browser.appName, errorMessage(err));
    }

    this.logger.info(`Opening Google Voice call to ${target.canonicalNumber} in ${browser.appName}`);
    return { target, browser, url, dispatched: true, savedContact };
  }

  private normalize(raw: string): string {
    const canonical = normalizePhone(raw);
    const { international, country } = describePhone(canonical);
    this.logger.debug(`Formatted number: ${raw} -> ${canonical} (${country ?? 'unknown region'}, ${international})`);
    return canonical;
  }

  /** History is bookkeeping: losing it must not stop a call. */
  private async recordHistory(number: string): Promise<void> {
    try {
      await this.store.recordHistory(number);
    } catch (err) {
      if (!(err instanceof StoreWriteError)) throw err;
      this.logger.warn('Could not record call history:', err.message);
    }
  }

  private async unknownContactMessage(rawInput: string): Promise<string> {
    const message = `Contact '${rawInput}' not found and doesn't appear to be a phone number`;
    const suggestions = suggestContacts(await this.store.list(), rawInput);
    if (suggestions.length === 0) {
      return `${message}. Use --list-contacts to see available contacts`;
    }
    return `${message}. Did you mean: ${suggestions.map(c => c.name).join(', ')}?`;
  }
}
