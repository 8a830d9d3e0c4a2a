export { normalizePhone, describePhone, type PhoneDescription } from './normalize.js';
export { suggestContacts } from './search.js';
