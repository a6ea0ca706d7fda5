import { describe, it, expect } from 'vitest';
import { parseHeaderLine, tryParseHeaderLine } from '../header-line.js';
import { MalformedHeaderError } from '../../core/errors.js';
import { headerLine } from './line-builders.js';

describe('parseHeaderLine', () => {
  it('extracts identity and entry count from fixed offsets', () => {
    expect(parseHeaderLine('AL092019,             DORIAN,     44,')).toEqual({
      basin: 'AL',
      cycloneNumber: '09',
      year: 2019,
      name: 'DORIAN',
      declaredEntries: 44,
    });
  });

  it('parses the entry count as the integer literal in its columns', () => {
    for (const entries of [0, 5, 42, 133]) {
      expect(parseHeaderLine(headerLine('AL', '01', '1851', 'UNNAMED', entries)).declaredEntries).toBe(entries);
    }
  });

  it('keeps UNNAMED as the name', () => {
    expect(parseHeaderLine(headerLine('AL', '01', '1851', 'UNNAMED', 5)).name).toBe('UNNAMED');
  });

  it('substitutes UNNAMED for a blank name field', () => {
    expect(parseHeaderLine(headerLine('AL', '02', '1852', '', 3)).name).toBe('UNNAMED');
  });

  it('accepts basins other than the Atlantic', () => {
    const header = parseHeaderLine(headerLine('CP', '01', '2015', 'HALOLA', 7));
    expect(header.basin).toBe('CP');
    expect(header.name).toBe('HALOLA');
  });

  it('rejects lines shorter than the entry-count columns', () => {
    expect(() => parseHeaderLine('AL011851,   UNNAMED,', 4)).toThrow(MalformedHeaderError);
    expect(() => parseHeaderLine('AL011851,   UNNAMED,', 4)).toThrow(
      'Header line has 20 characters, expected at least 36 (line 4)'
    );
  });

  it('rejects a non-integer entry count', () => {
    expect(() => parseHeaderLine(headerLine('AL', '01', '1851', 'UNNAMED', 'x5'))).toThrow(
      'Invalid entry count "x5"'
    );
    expect(() => parseHeaderLine(headerLine('AL', '01', '1851', 'UNNAMED', '-1'))).toThrow(
      MalformedHeaderError
    );
  });

  it('rejects a non-numeric year', () => {
    expect(() => parseHeaderLine(headerLine('AL', '01', '18X1', 'UNNAMED', 5))).toThrow(
      'Invalid year "18X1"'
    );
  });

  it('rejects an implausible year', () => {
    expect(() => parseHeaderLine(headerLine('AL', '01', '0000', 'UNNAMED', 5))).toThrow(
      'Year 0 outside 1800-2200'
    );
    expect(() => parseHeaderLine(headerLine('AL', '01', '2201', 'UNNAMED', 5))).toThrow(
      MalformedHeaderError
    );
    expect(parseHeaderLine(headerLine('AL', '01', '1800', 'UNNAMED', 5)).year).toBe(1800);
  });

  it('records the line number on the error', () => {
    let caught: unknown;
    try {
      parseHeaderLine('short', 12);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(MalformedHeaderError);
    expect(caught instanceof MalformedHeaderError && caught.lineNumber).toBe(12);
  });
});

describe('tryParseHeaderLine', () => {
  it('returns null for data lines', () => {
    const line =
      '18510625, 0000,  , HU, 28.0N,  94.8W,  80, -999, -999, -999, -999, -999, -999, -999, -999, -999, -999, -999, -999, -999, -999,';
    expect(tryParseHeaderLine(line)).toBeNull();
  });

  it('returns null for header-shaped lines with a year of zeros', () => {
    expect(tryParseHeaderLine(headerLine('XX', '00', '0000', '', 12))).toBeNull();
  });

  it('returns null for blank lines', () => {
    expect(tryParseHeaderLine('')).toBeNull();
  });

  it('returns the header for well-formed lines', () => {
    expect(tryParseHeaderLine(headerLine('EP', '03', '2010', 'MARLOW', 3))?.cycloneNumber).toBe('03');
  });
});
