import { parsePhoneNumberFromString } from 'libphonenumber-js';
import { InvalidFormatError } from '../utils/index.js';

export const MIN_INTERNATIONAL_DIGITS = 7;
export const MAX_INTERNATIONAL_DIGITS = 15;

export interface CleanPhone {
  /** Digits only. */
  digits: string;
  /** The input carried a leading `+`. */
  international: boolean;
}

/** Keep the digits and a single leading `+`. */
export function cleanPhone(raw: string): CleanPhone {
  return {
    digits: raw.replace(/\D/g, ''),
    international: raw.trimStart().startsWith('+'),
  };
}

export function formatClean(clean: CleanPhone): string {
  return `${clean.international ? '+' : ''}${clean.digits}`;
}

/**
 * Check a phone number against the dialable shapes: `+` followed by 7-15
 * digits, or a US number of 10 digits (11 with a leading 1).
 */
export function validatePhone(raw: string): CleanPhone {
  const clean = cleanPhone(raw);
  const { digits } = clean;

  if (digits.length === 0) {
    throw new InvalidFormatError(`No valid digits found in phone number: ${raw}`);
  }

  if (clean.international) {
    if (digits.length < MIN_INTERNATIONAL_DIGITS || digits.length > MAX_INTERNATIONAL_DIGITS) {
      throw new InvalidFormatError(`Invalid international phone number length: ${formatClean(clean)}`);
    }
    return clean;
  }

  if (digits.length === 10 || (digits.length === 11 && digits.startsWith('1'))) {
    return clean;
  }
  throw new InvalidFormatError(
    `Invalid US phone number length: ${digits} (expected 10 or 11 digits)`,
  );
}

export function isValidPhone(raw: string): boolean {
  try {
    validatePhone(raw);
    return true;
  } catch {
    return false;
  }
}

/** Validate and convert to the canonical `+`-prefixed dialable form. */
export function normalizePhone(raw: string): string {
  const { digits, international } = validatePhone(raw);
  // Validation leaves 10 digits as the only shape without a country code.
  if (international || digits.length === 11) {
    return `+${digits}`;
  }
  return `+1${digits}`;
}

export interface PhoneDescription {
  number: string;
  international: string;
  country?: string;
}

/** Region and international formatting for display. Falls back to the number itself. */
export function describePhone(canonical: string): PhoneDescription {
  const parsed = parsePhoneNumberFromString(canonical);
  if (parsed && (parsed.isValid() || parsed.isPossible())) {
    return {
      number: canonical,
      international: parsed.formatInternational(),
      country: parsed.country,
    };
  }
  return { number: canonical, international: canonical };
}
