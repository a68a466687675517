import { describe, it, expect } from 'vitest';
import {
  parseDate,
  formatIsoDate,
  toApiDateTime,
  formatDateStamp,
} from './date.utils.js';

describe('parseDate', () => {
  it('accepts ISO dates', () => {
    expect(parseDate('2024-01-10')).toBe('2024-01-10');
  });

  it('accepts remote date-times and keeps the calendar date', () => {
    expect(parseDate('2023-06-01T00:00:00')).toBe('2023-06-01');
    expect(parseDate('2023-06-01T08:30:00-06:00')).toBe('2023-06-01');
  });

  it('accepts US slash and dash dates', () => {
    expect(parseDate('1/10/2024')).toBe('2024-01-10');
    expect(parseDate('01-10-2024')).toBe('2024-01-10');
    expect(parseDate('01/10/2024 12:00:00 AM')).toBe('2024-01-10');
  });

  it('accepts year-first slash dates', () => {
    expect(parseDate('2024/01/10')).toBe('2024-01-10');
  });

  it('rejects impossible calendar dates', () => {
    expect(parseDate('2024-02-30')).toBeNull();
    expect(parseDate('13/01/2024')).toBeNull();
  });

  it('returns null for empty or unrecognised input', () => {
    expect(parseDate('')).toBeNull();
    expect(parseDate('   ')).toBeNull();
    expect(parseDate(null)).toBeNull();
    expect(parseDate(undefined)).toBeNull();
    expect(parseDate('next tuesday')).toBeNull();
  });
});

describe('date formatting', () => {
  it('formats UTC calendar parts', () => {
    expect(formatIsoDate(new Date(Date.UTC(2024, 0, 5)))).toBe('2024-01-05');
  });

  it('builds the remote date-time form', () => {
    expect(toApiDateTime('2024-01-10')).toBe('2024-01-10T00:00:00');
  });

  it('builds a compact date stamp', () => {
    expect(formatDateStamp(new Date(Date.UTC(2024, 11, 31, 23, 0, 0)))).toBe('20241231');
  });
});
