import { describe, expect, it } from 'vitest';
import { formatDuration, formatTimestamp, normalizeCompactDate } from './time-utils.js';

describe('normalizeCompactDate', () => {
  it('should convert YYYYMMDD to an ISO date', () => {
    expect(normalizeCompactDate('20240307')).toBe('2024-03-07');
  });

  it('should pass other values through unchanged', () => {
    expect(normalizeCompactDate('2024-03-07')).toBe('2024-03-07');
    expect(normalizeCompactDate('')).toBe('');
    expect(normalizeCompactDate('202403')).toBe('202403');
  });
});

describe('formatTimestamp', () => {
  it('should format local time with zero padding', () => {
    expect(formatTimestamp(new Date(2025, 0, 5, 7, 8, 9))).toBe('2025-01-05 07:08:09');
  });
});

describe('formatDuration', () => {
  it('should format seconds, minutes and hours', () => {
    expect(formatDuration(6_000)).toBe('6s');
    expect(formatDuration(245_000)).toBe('4m 5s');
    expect(formatDuration(3_723_000)).toBe('1h 2m 3s');
  });
});
