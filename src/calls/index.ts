export { BrowserSelector, bindBrowser, type BrowserSelectorOptions } from './browser.js';
export { CallResolver, type CallResolverOptions } from './resolver.js';
export { buildCallUrl, VOICE_CALL_URL } from './url.js';
