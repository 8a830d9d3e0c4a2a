import { describe, it, expect } from 'vitest';
import {
  formatContactLine, formatHistoryLine, formatTimestamp, joinLines,
  parseContactLine, parseHistoryLine, splitLines, splitRecord,
} from '../../src/store/file-layout.js';

describe('splitRecord', () => {
  it('should split at the last colon', () => {
    expect(splitRecord('Pizza Place:+18558701311')).toEqual(['Pizza Place', '+18558701311']);
    expect(splitRecord('Work: Front Desk:+12125550123')).toEqual(['Work: Front Desk', '+12125550123']);
  });

  it('should reject lines without both fields', () => {
    expect(splitRecord('no separator')).toBeUndefined();
    expect(splitRecord(':+18558701311')).toBeUndefined();
    expect(splitRecord('Pizza:')).toBeUndefined();
  });
});

describe('contact lines', () => {
  it('should format and parse name:number', () => {
    const line = formatContactLine({ name: 'Pizza', number: '+18558701311' });
    expect(line).toBe('Pizza:+18558701311');
    expect(parseContactLine(line)).toEqual({ name: 'Pizza', number: '+18558701311' });
  });
});

describe('history lines', () => {
  it('should keep the colons inside the timestamp', () => {
    const line = formatHistoryLine({ timestamp: '2026-01-02 03:04:05', number: '+18558701311' });
    expect(line).toBe('2026-01-02 03:04:05:+18558701311');
    expect(parseHistoryLine(line)).toEqual({ timestamp: '2026-01-02 03:04:05', number: '+18558701311' });
  });
});

describe('formatTimestamp', () => {
  it('should zero-pad local date and time', () => {
    expect(formatTimestamp(new Date(2026, 0, 2, 3, 4, 5))).toBe('2026-01-02 03:04:05');
  });
});

describe('splitLines / joinLines', () => {
  it('should drop blank lines and handle CRLF', () => {
    expect(splitLines('a:1\r\n\n  \nb:2\n')).toEqual(['a:1', 'b:2']);
  });

  it('should end a non-empty file with a newline', () => {
    expect(joinLines(['a:1', 'b:2'])).toBe('a:1\nb:2\n');
    expect(joinLines([])).toBe('');
  });
});
