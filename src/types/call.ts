export const BROWSER_NAMES = ['chrome', 'safari', 'firefox', 'edge', 'default'] as const;

export type BrowserName = (typeof BROWSER_NAMES)[number];

/** Browsers tried in order when neither the request nor the configured default is installed. */
export const BROWSER_FALLBACK_ORDER: readonly BrowserName[] = ['chrome', 'safari', 'firefox', 'edge'];

export const BROWSER_APPS: Record<BrowserName, string> = {
  chrome: 'Google Chrome',
  safari: 'Safari',
  firefox: 'Firefox',
  edge: 'Microsoft Edge',
  default: 'default',
};

export interface BrowserBinding {
  selected: BrowserName;
  appName: string;
}

export type CallSource = 'direct' | 'contact';

export interface CallTarget {
  rawInput: string;
  canonicalNumber: string;
  sourceKind: CallSource;
  contactName?: string;
}

export interface CallRequest {
  target: string;
  browser?: BrowserName;
  /** Save the canonical number under this contact name. */
  saveAs?: string;
}

export interface CallOutcome {
  target: CallTarget;
  browser: BrowserBinding;
  url: string;
  /** False when the run was a dry run and nothing was opened. */
  dispatched: boolean;
  savedContact?: string;
}
