import { describe, it, expect } from 'vitest';
import { humanBytes, formatDateTime, formatTraceTimestamp } from './formatters';

describe('humanBytes', () => {
  it('formats sizes under 1 KB as bytes', () => {
    expect(humanBytes(0)).toBe('0 B');
    expect(humanBytes(500)).toBe('500 B');
    expect(humanBytes(1023)).toBe('1023 B');
  });

  it('formats kilobytes with one decimal', () => {
    expect(humanBytes(1024)).toBe('1.0 KB');
    expect(humanBytes(1536)).toBe('1.5 KB');
    expect(humanBytes(2048)).toBe('2.0 KB');
  });

  it('formats megabytes with two decimals', () => {
    expect(humanBytes(1048576)).toBe('1.00 MB');
    expect(humanBytes(5_242_880)).toBe('5.00 MB');
    expect(humanBytes(1_572_864)).toBe('1.50 MB');
  });
});

describe('formatDateTime', () => {
  it('formats as yyyy-MM-dd HH:mm:ss in local time', () => {
    expect(formatDateTime(new Date(2024, 0, 5, 9, 3, 7))).toBe('2024-01-05 09:03:07');
  });

  it('accepts epoch milliseconds', () => {
    const millis = new Date(2023, 10, 14, 22, 13, 20).getTime();
    expect(formatDateTime(millis)).toBe('2023-11-14 22:13:20');
  });
});

describe('formatTraceTimestamp', () => {
  it('falls back to an em-dash when there is no timestamp', () => {
    expect(formatTraceTimestamp(undefined)).toBe('—');
  });

  it('formats a present timestamp', () => {
    const millis = new Date(2024, 11, 31, 23, 59, 59).getTime();
    expect(formatTraceTimestamp(millis)).toBe('2024-12-31 23:59:59');
  });
});
