import { describe, expect, it } from 'vitest';
import { ParseError } from '../src/errors.js';
import { createDateParser, parseDateText } from '../src/parsers/dateParser.js';

// Monday
const NOW = Date.parse('2026-03-02T12:00:00.000Z');
const parse = (text: string) => parseDateText(text, NOW);

describe('parseDateText', () => {
  it('handles keywords relative to now', () => {
    expect(parse('now')).toBe('2026-03-02T12:00:00.000Z');
    expect(parse('today')).toBe('2026-03-02T12:00:00.000Z');
    expect(parse(' Tomorrow ')).toBe('2026-03-03T12:00:00.000Z');
    expect(parse('yesterday')).toBe('2026-03-01T12:00:00.000Z');
  });

  it('handles +N offsets', () => {
    expect(parse('+6h')).toBe('2026-03-02T18:00:00.000Z');
    expect(parse('+3d')).toBe('2026-03-05T12:00:00.000Z');
    expect(parse('+2w')).toBe('2026-03-16T12:00:00.000Z');
    expect(parse('+1m')).toBe('2026-04-02T12:00:00.000Z');
  });

  it('handles "in N units"', () => {
    expect(parse('in 90 minutes')).toBe('2026-03-02T13:30:00.000Z');
    expect(parse('in 1 hour')).toBe('2026-03-02T13:00:00.000Z');
    expect(parse('In  2 days')).toBe('2026-03-04T12:00:00.000Z');
  });

  it('resolves weekday names to the next occurrence', () => {
    expect(parse('friday')).toBe('2026-03-06T12:00:00.000Z');
    expect(parse('wed')).toBe('2026-03-04T12:00:00.000Z');
    // today is Monday: a week ahead
    expect(parse('monday')).toBe('2026-03-09T12:00:00.000Z');
  });

  it('resolves month+day to the next such date', () => {
    expect(parse('mar10')).toBe('2026-03-10T00:00:00.000Z');
    expect(parse('Mar 2')).toBe('2026-03-02T00:00:00.000Z');
    expect(parse('jan15')).toBe('2027-01-15T00:00:00.000Z');
  });

  it('accepts ISO dates and date-times', () => {
    expect(parse('2026-04-01')).toBe('2026-04-01T00:00:00.000Z');
    expect(parse('2026-03-05T09:30:00Z')).toBe('2026-03-05T09:30:00.000Z');
    expect(parse('2026-03-05 09:30Z')).toBe('2026-03-05T09:30:00.000Z');
    expect(parse('2026-03-05T09:00:00+02:00')).toBe('2026-03-05T07:00:00.000Z');
  });

  it('reads date-times without an offset as UTC', () => {
    expect(parse('2026-04-01T10:00')).toBe('2026-04-01T10:00:00.000Z');
    expect(parse('2026-04-01 10:00:30.250')).toBe('2026-04-01T10:00:30.250Z');
  });

  it('rejects everything else with the offending text', () => {
    for (const bad of ['someday', 'feb30', '2026-02-30', '12', '', 'constructor', '+99999999999d']) {
      expect(() => parse(bad)).toThrow(ParseError);
    }
    expect(() => parse('someday')).toThrow('Could not parse date: "someday"');
  });
});

describe('createDateParser', () => {
  it('reads the injected clock on every call', () => {
    let now = NOW;
    const parser = createDateParser({ clock: { now: () => now } });
    expect(parser.parse('+1d')).toBe('2026-03-03T12:00:00.000Z');
    now += 60 * 60 * 1000;
    expect(parser.parse('+1d')).toBe('2026-03-03T13:00:00.000Z');
  });
});
