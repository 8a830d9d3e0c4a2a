import type { Contact, HistoryEntry } from '../types/index.js';

export const CONTACTS_FILENAME = '.google-voice-contacts.txt';
export const HISTORY_FILENAME = '.google-voice-history.txt';
export const FIELD_SEPARATOR = ':';

/**
 * Split a `key:value` record at its last separator. Numbers never contain a
 * colon, so names and timestamps may.
 */
export function splitRecord(line: string): [string, string] | undefined {
  const at = line.lastIndexOf(FIELD_SEPARATOR);
  if (at <= 0 || at === line.length - 1) return undefined;
  return [line.slice(0, at), line.slice(at + 1)];
}

export function parseContactLine(line: string): Contact | undefined {
  const record = splitRecord(line);
  if (!record) return undefined;
  const [name, number] = record;
  return { name, number };
}

export function formatContactLine(contact: Contact): string {
  return `${contact.name}${FIELD_SEPARATOR}${contact.number}`;
}

export function parseHistoryLine(line: string): HistoryEntry | undefined {
  const record = splitRecord(line);
  if (!record) return undefined;
  const [timestamp, number] = record;
  return { timestamp, number };
}

export function formatHistoryLine(entry: HistoryEntry): string {
  return `${entry.timestamp}${FIELD_SEPARATOR}${entry.number}`;
}

/** Non-empty lines of a newline-delimited record file. */
export function splitLines(content: string): string[] {
  return content.split(/\r?\n/).filter(line => line.trim() !== '');
}

export function joinLines(lines: string[]): string {
  return lines.length > 0 ? `${lines.join('\n')}\n` : '';
}

/** Local time as `YYYY-MM-DD HH:mm:ss`. */
export function formatTimestamp(date: Date): string {
  const pad = (n: number) => n.toString().padStart(2, '0');
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`
    + ` ${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}
