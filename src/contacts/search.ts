import Fuse, { type IFuseOptions } from 'fuse.js';
import type { Contact } from '../types/index.js';

const FUSE_OPTIONS: IFuseOptions<Contact> = {
  keys: ['name'],
  threshold: 0.4,
  includeScore: true,
  ignoreLocation: true,
  minMatchCharLength: 2,
};

/** Contacts whose names are close to `query`, best match first. */
export function suggestContacts(
  contacts: Contact[],
  query: string,
  limit: number = 3,
): Contact[] {
  if (!query.trim() || contacts.length === 0) return [];

  const fuse = new Fuse(contacts, FUSE_OPTIONS);
  return fuse.search(query, { limit }).map(r => r.item);
}
