import { MalformedHeaderError } from '../core/errors.js';
import type { HeaderRecord } from '../schemas/storm.js';
import { HEADER_LAYOUT, HEADER_MIN_LENGTH, sliceField } from './fixed-width.js';

const UNNAMED = 'UNNAMED';

export const MIN_HEADER_YEAR = 1800;
export const MAX_HEADER_YEAR = 2200;

/**
 * Parse a storm header line, e.g. `AL092019,             DORIAN,     44,`.
 * Shape is checked field by field; no particular basin is assumed.
 */
export function parseHeaderLine(line: string, lineNumber?: number): HeaderRecord {
  if (line.length < HEADER_MIN_LENGTH) {
    throw new MalformedHeaderError(
      `Header line has ${line.length} characters, expected at least ${HEADER_MIN_LENGTH}`,
      { lineNumber }
    );
  }

  const basin = sliceField(line, HEADER_LAYOUT.basin);
  if (!/^[A-Z]{2}$/.test(basin)) {
    throw new MalformedHeaderError(`Invalid basin code "${basin}"`, { lineNumber });
  }

  const cycloneNumber = sliceField(line, HEADER_LAYOUT.cycloneNumber);
  if (!/^\d{2}$/.test(cycloneNumber)) {
    throw new MalformedHeaderError(`Invalid cyclone number "${cycloneNumber}"`, { lineNumber });
  }

  const yearStr = sliceField(line, HEADER_LAYOUT.year);
  if (!/^\d{4}$/.test(yearStr)) {
    throw new MalformedHeaderError(`Invalid year "${yearStr}"`, { lineNumber });
  }
  const year = parseInt(yearStr, 10);
  if (year < MIN_HEADER_YEAR || year > MAX_HEADER_YEAR) {
    throw new MalformedHeaderError(
      `Year ${year} outside ${MIN_HEADER_YEAR}-${MAX_HEADER_YEAR}`,
      { lineNumber }
    );
  }

  const entriesStr = sliceField(line, HEADER_LAYOUT.declaredEntries);
  if (!/^\d+$/.test(entriesStr)) {
    throw new MalformedHeaderError(`Invalid entry count "${entriesStr}"`, { lineNumber });
  }

  return {
    basin,
    cycloneNumber,
    year,
    name: sliceField(line, HEADER_LAYOUT.name) || UNNAMED,
    declaredEntries: parseInt(entriesStr, 10),
  };
}

/**
 * Structural header detection: a line is a header iff it parses as one.
 */
export function tryParseHeaderLine(line: string, lineNumber?: number): HeaderRecord | null {
  try {
    return parseHeaderLine(line, lineNumber);
  } catch (err) {
    if (err instanceof MalformedHeaderError) return null;
    throw err;
  }
}
