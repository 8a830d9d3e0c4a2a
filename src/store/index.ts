export { ContactStore, DEFAULT_MAX_HISTORY_ENTRIES, type ContactStoreOptions } from './contact-store.js';
export * from './file-layout.js';
