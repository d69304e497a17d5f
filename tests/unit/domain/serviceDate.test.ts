import { describe, it, expect } from 'vitest';
import { addDays, isWithinRange, parseServiceDate, todayIn } from '../../../src/domain/serviceDate.js';

describe('parseServiceDate', () => {
  it('accepts ISO dates with or without a time part', () => {
    expect(parseServiceDate('2025-01-05')).toBe('2025-01-05');
    expect(parseServiceDate(' 2025-01-05T10:30:00Z ')).toBe('2025-01-05');
    expect(parseServiceDate('2025-01-05 08:00')).toBe('2025-01-05');
  });

  it('reads slash dates day-first', () => {
    expect(parseServiceDate('05/01/2025')).toBe('2025-01-05');
    expect(parseServiceDate('5/1/2025')).toBe('2025-01-05');
  });

  it('rejects impossible and malformed dates', () => {
    expect(parseServiceDate('2025-02-30')).toBeNull();
    expect(parseServiceDate('31/02/2025')).toBeNull();
    expect(parseServiceDate('2025-1-5')).toBeNull();
    expect(parseServiceDate('yesterday')).toBeNull();
    expect(parseServiceDate('')).toBeNull();
    expect(parseServiceDate(20250105)).toBeNull();
  });
});

describe('addDays', () => {
  it('crosses month and year boundaries', () => {
    expect(addDays('2025-01-05', -2)).toBe('2025-01-03');
    expect(addDays('2025-03-01', -1)).toBe('2025-02-28');
    expect(addDays('2024-12-31', 1)).toBe('2025-01-01');
    expect(addDays('2025-01-05', 0)).toBe('2025-01-05');
  });
});

describe('todayIn', () => {
  it('uses the calendar date of the given time zone', () => {
    const now = new Date('2025-01-04T21:00:00Z');
    expect(todayIn('Asia/Dubai', now)).toBe('2025-01-05');
    expect(todayIn('UTC', now)).toBe('2025-01-04');
  });
});

describe('isWithinRange', () => {
  it('includes both ends', () => {
    expect(isWithinRange('2025-01-03', '2025-01-03', '2025-01-05')).toBe(true);
    expect(isWithinRange('2025-01-05', '2025-01-03', '2025-01-05')).toBe(true);
    expect(isWithinRange('2025-01-02', '2025-01-03', '2025-01-05')).toBe(false);
    expect(isWithinRange('2025-01-06', '2025-01-03', '2025-01-05')).toBe(false);
  });
});
