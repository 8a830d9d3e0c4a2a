export interface Contact {
  name: string;
  number: string;
}

export interface HistoryEntry {
  /** Local time, `YYYY-MM-DD HH:mm:ss`. */
  timestamp: string;
  number: string;
}

export interface ContactWriteResult {
  contact: Contact;
  /** An entry with the same exact name existed and was replaced. */
  replaced: boolean;
}
