/**
 * Time Utility Tests
 */

import { describe, it, expect } from 'vitest';
import {
  addDays,
  addSeconds,
  ceilToSecond,
  floorToSecond,
  formatSearchTime,
  formatTableTime,
  parseTime,
} from '../../../core/utils/time.js';
import { ArgumentConflictError } from '../../../core/errors.js';

describe('parseTime', () => {
  it.each([
    ['2024-03-05', '2024-03-05T00:00:00.000Z'],
    ['2024-03-05T12:34:56', '2024-03-05T12:34:56.000Z'],
    ['2024-03-05 12:34:56', '2024-03-05T12:34:56.000Z'],
    ['2024-03-05T12:34:56.5', '2024-03-05T12:34:56.500Z'],
    ['2024-03-05T12:34:56.123456', '2024-03-05T12:34:56.123Z'],
    ['2024-03-05T12:34:56Z', '2024-03-05T12:34:56.000Z'],
    ['  2024-03-05  ', '2024-03-05T00:00:00.000Z'],
  ])('should parse %s as UTC', (input, expected) => {
    expect(parseTime(input).toISOString()).toBe(expected);
  });

  it.each(['yesterday', '2024-3-5', '2024-03-05T12:34', '2024-02-30', '2024-13-01'])(
    'should reject %s',
    (input) => {
      expect(() => parseTime(input)).toThrow(ArgumentConflictError);
      expect(() => parseTime(input)).toThrow(`Could not parse time or date from "${input}"`);
    }
  );
});

describe('formatting', () => {
  const instant = new Date('2024-03-05T12:34:56.789Z');

  it('should format search times to the second', () => {
    expect(formatSearchTime(instant)).toBe('2024-03-05T12:34:56');
  });

  it('should format table times to the millisecond', () => {
    expect(formatTableTime(instant)).toBe('2024-03-05T12:34:56.789');
  });
});

describe('arithmetic', () => {
  it('should add whole and negative days', () => {
    const start = new Date('2024-01-31T00:00:00Z');
    expect(addDays(start, 1).toISOString()).toBe('2024-02-01T00:00:00.000Z');
    expect(addDays(start, -30).toISOString()).toBe('2024-01-01T00:00:00.000Z');
  });

  it('should add seconds', () => {
    expect(addSeconds(new Date('2024-01-01T00:00:00Z'), -16).toISOString()).toBe('2023-12-31T23:59:44.000Z');
  });
});

describe('second rounding', () => {
  it('should round outward to whole seconds', () => {
    const instant = new Date('2024-01-09T00:00:00.999Z');
    expect(floorToSecond(instant).toISOString()).toBe('2024-01-09T00:00:00.000Z');
    expect(ceilToSecond(instant).toISOString()).toBe('2024-01-09T00:00:01.000Z');
  });

  it('should leave whole seconds unchanged', () => {
    const instant = new Date('2024-01-09T00:00:00Z');
    expect(floorToSecond(instant).toISOString()).toBe('2024-01-09T00:00:00.000Z');
    expect(ceilToSecond(instant).toISOString()).toBe('2024-01-09T00:00:00.000Z');
  });
});
