/**
 * CLI Option Parsing Tests
 */

import { Command, InvalidArgumentError } from 'commander';
import { describe, it, expect } from 'vitest';
import {
  addFilterOptions,
  filtersFromOptions,
  parseChoice,
  parseInteger,
  parseList,
  parseNumber,
  parseNumberList,
  parseTimeOption,
  type FilterOptions,
} from '../../../cli/lib/options.js';
import { ArgumentConflictError } from '../../../core/errors.js';

describe('argument parsers', () => {
  it('should parse numbers and integers', () => {
    expect(parseNumber('-4.5')).toBe(-4.5);
    expect(parseInteger('30')).toBe(30);
    expect(() => parseNumber('')).toThrow(InvalidArgumentError);
    expect(() => parseNumber('five')).toThrow('"five" is not a number.');
    expect(() => parseInteger('2.5')).toThrow('"2.5" is not an integer.');
  });

  it('should parse fixed-length number lists', () => {
    expect(parseNumberList(4)('-120, -110,30,40')).toEqual([-120, -110, 30, 40]);
    expect(() => parseNumberList(3)('1,2')).toThrow('Expected 3 comma-separated numbers, got "1,2".');
    expect(() => parseNumberList(2)('1,x')).toThrow('"x" is not a number.');
  });

  it('should parse times as UTC', () => {
    expect(parseTimeOption('2024-02-03T04:05:06').toISOString()).toBe('2024-02-03T04:05:06.000Z');
    expect(() => parseTimeOption('02/03/2024')).toThrow(InvalidArgumentError);
  });

  it('should accept only listed choices', () => {
    const parse = parseChoice(['none', 'preferred', 'all'] as const);
    expect(parse('all')).toBe('all');
    expect(() => parse('some')).toThrow('Allowed choices are none, preferred, all.');
  });

  it('should split lists and drop empty items', () => {
    expect(parseList(' origin, shakemap,,dyfi ')).toEqual(['origin', 'shakemap', 'dyfi']);
  });
});

describe('filtersFromOptions', () => {
  const now = new Date('2024-06-30T00:00:00Z');

  it('should default to the last 30 days', () => {
    const filters = filtersFromOptions({}, now);
    expect(filters.endTime).toEqual(now);
    expect(filters.startTime).toEqual(new Date('2024-05-31T00:00:00Z'));
  });

  it('should count --num-days back from the end time', () => {
    const filters = filtersFromOptions({ numDays: 7, endTime: new Date('2024-01-08T00:00:00Z') }, now);
    expect(filters.startTime).toEqual(new Date('2024-01-01T00:00:00Z'));
  });

  it('should refuse --num-days with --start-time', () => {
    expect(() => filtersFromOptions({ numDays: 7, startTime: now }, now)).toThrow(ArgumentConflictError);
    expect(() => filtersFromOptions({ numDays: 7, startTime: now }, now)).toThrow(
      '--num-days cannot be combined with --start-time'
    );
  });

  it('should unpack boxes, circles and ranges', () => {
    const options: FilterOptions = {
      bounds: [-120, -110, 30, 40],
      magRange: [4.5, 9],
      depthRange: [0, 70],
      sigRange: [600, 1000],
      catalog: 'us',
      alertLevel: 'yellow',
    };
    expect(filtersFromOptions(options, now)).toMatchObject({
      bounds: { minLongitude: -120, maxLongitude: -110, minLatitude: 30, maxLatitude: 40 },
      minMagnitude: 4.5,
      maxMagnitude: 9,
      minDepth: 0,
      maxDepth: 70,
      minSig: 600,
      maxSig: 1000,
      catalog: 'us',
      alertLevel: 'yellow',
    });

    expect(filtersFromOptions({ radius: [35, -118, 50] }, now).radius).toEqual({
      latitude: 35,
      longitude: -118,
      maxRadiusKm: 50,
    });
  });
});

describe('addFilterOptions', () => {
  function parse(args: string[]): FilterOptions {
    const command = addFilterOptions(new Command('search'))
      .exitOverride()
      .configureOutput({ writeErr: () => undefined });
    command.parse(args, { from: 'user' });
    return command.opts<FilterOptions>();
  }

  it('should parse the search flags', () => {
    const options = parse(['-s', '2024-01-01', '-b', '-120,-110,30,40', '-m', '5,9', '--limit', '100', '--scenario']);
    expect(options.startTime).toEqual(new Date('2024-01-01T00:00:00Z'));
    expect(options.bounds).toEqual([-120, -110, 30, 40]);
    expect(options.magRange).toEqual([5, 9]);
    expect(options.limit).toBe(100);
    expect(options.scenario).toBe(true);
  });

  it('should reject an unknown alert level', () => {
    expect(() => parse(['--alert-level', 'purple'])).toThrow();
  });
});
