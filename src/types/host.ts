import type { BrowserBinding } from './call.js';

/** OS side effects the resolver depends on. */
export interface HostCapabilities {
  isApplicationInstalled(appName: string): Promise<boolean>;
  hasDefaultOpener(): Promise<boolean>;
  openUrl(url: string, browser: BrowserBinding): Promise<void>;
}
