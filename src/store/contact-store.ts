import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { Contact, ContactWriteResult, HistoryEntry } from '../types/index.js';
import { createLogger, errorCode, errorMessage, InvalidInputError, StoreWriteError, type Logger } from '../utils/index.js';
import {
  formatContactLine, formatHistoryLine, formatTimestamp, joinLines,
  parseContactLine, parseHistoryLine, splitLines,
} from './file-layout.js';

export const DEFAULT_MAX_HISTORY_ENTRIES = 50;

export interface ContactStoreOptions {
  contactsFile: string;
  historyFile: string;
  maxHistoryEntries?: number;
  /** Report mutations without touching either file. */
  dryRun?: boolean;
  logger?: Logger;
  now?: () => Date;
}

/**
 * Flat-file contact list and capped call history. Every read goes back to
 * disk; every write replaces the whole file through a temp file and rename.
 */
export class ContactStore {
  readonly contactsFile: string;
  readonly historyFile: string;
  readonly maxHistoryEntries: number;
  readonly dryRun: boolean;
  private logger: Logger;
  private now: () => Date;

  constructor(options: ContactStoreOptions) {
    this.contactsFile = options.contactsFile;
    this.historyFile = options.historyFile;
    this.maxHistoryEntries = options.maxHistoryEntries ?? DEFAULT_MAX_HISTORY_ENTRIES;
    this.dryRun = options.dryRun ?? false;
    this.logger = options.logger ?? createLogger();
    this.now = options.now ?? (() => new Date());
  }

  // --- Contacts ---

  async lookup(name: string): Promise<string | undefined> {
    return (await this.find(name))?.number;
  }

  /** Exact-case match first, then the first case-insensitive one in file order. */
  async find(name: string): Promise<Contact | undefined> {
    const contacts = await this.list();
    this.logger.debug('Looking up contact:', name);

    const exact = contacts.find(c => c.name === name);
    if (exact) return exact;

    const lower = name.toLowerCase();
    return contacts.find(c => c.name.toLowerCase() === lower);
  }

  async list(): Promise<Contact[]> {
    const lines = await this.readLines(this.contactsFile);
    const contacts: Contact[] = [];
    for (const line of lines) {
      const contact = parseContactLine(line);
      if (contact) {
        contacts.push(contact);
      } else {
        this.logger.debug('Skipping malformed contact line:', line);
      }
    }
    return contacts;
  }

  async addOrReplace(name: string, number: string): Promise<ContactWriteResult> {
    assertStorable(name, number);

    const lines = await this.readLines(this.contactsFile);
    const kept = lines.filter(line => parseContactLine(line)?.name !== name);
    const replaced = kept.length !== lines.length;
    const contact: Contact = { name, number };

    if (this.dryRun) {
      this.logger.info(`[DRY RUN] Would add contact: ${name} -> ${number}`);
      return { contact, replaced };
    }

    if (replaced) {
      this.logger.warn(`Contact '${name}' already exists, updating...`);
    }
    kept.push(formatContactLine(contact));
    await this.replaceFile(this.contactsFile, joinLines(kept));

    this.logger.info(`Contact added: ${name} -> ${number}`);
    return { contact, replaced };
  }

  // --- History ---

  async recordHistory(number: string): Promise<HistoryEntry | undefined> {
    if (this.dryRun) return undefined;

    const entry: HistoryEntry = { timestamp: formatTimestamp(this.now()), number };
    this.logger.debug('Adding to call history:', number);

    let lines: string[];
    try {
      lines = await this.readLines(this.historyFile);
    } catch (err) {
      throw new StoreWriteError(`Cannot read ${this.historyFile}: ${errorMessage(err)}`);
    }
    lines.push(formatHistoryLine(entry));
    await this.replaceFile(this.historyFile, joinLines(lines.slice(-this.maxHistoryEntries)));
    return entry;
  }

  async recentHistory(limit: number): Promise<HistoryEntry[]> {
    if (limit <= 0) return [];
    const entries: HistoryEntry[] = [];
    for (const line of await this.readLines(this.historyFile)) {
      const entry = parseHistoryLine(line);
      if (entry) entries.push(entry);
    }
    return entries.slice(-limit);
  }

  // --- File access ---

  private async readLines(filePath: string): Promise<string[]> {
    try {
      return splitLines(await fs.readFile(filePath, 'utf-8'));
    } catch (err) {
      if (errorCode(err) === 'ENOENT') return [];
      throw err;
    }
  }

  /** Readers see either the old file or the new one, never a partial write. */
  private async replaceFile(filePath: string, content: string): Promise<void> {
    const tmpPath = `${filePath}.${process.pid}.tmp`;
    try {
      await fs.mkdir(path.dirname(filePath), { recursive: true });
      await fs.writeFile(tmpPath, content, 'utf-8');
      await fs.rename(tmpPath, filePath);
    } catch (err) {
      await fs.rm(tmpPath, { force: true }).catch((cleanupErr: unknown) => {
        this.logger.debug('Could not remove temp file:', tmpPath, cleanupErr);
      });
      throw new StoreWriteError(`Cannot write ${filePath}: ${errorMessage(err)}`);
    }
  }
}

function assertStorable(name: string, number: string): void {
  if (!name.trim()) {
    throw new InvalidInputError('Contact name required');
  }
  if (/[\r\n]/.test(name) || /[\r\n]/.test(number)) {
    throw new InvalidInputError('Contact name and number must be a single line');
  }
  if (number.includes(':')) {
    throw new InvalidInputError(`Invalid contact number: ${number}`);
  }
}
