export type { Contact, HistoryEntry, ContactWriteResult } from './contact.js';
export {
  BROWSER_NAMES, BROWSER_FALLBACK_ORDER, BROWSER_APPS,
  type BrowserName, type BrowserBinding, type CallSource, type CallTarget,
  type CallRequest, type CallOutcome,
} from './call.js';
export type { HostCapabilities } from './host.js';
