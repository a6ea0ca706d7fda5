/**
 * Column layout of the best-track text format.
 * Spans are 0-indexed, start inclusive, end exclusive.
 */
import { WIND_RADII_KEYS, type WindRadiiKey } from '../schemas/storm.js';

export interface FieldSpan {
  start: number;
  end: number;
}

export const HEADER_LAYOUT = {
  basin: { start: 0, end: 2 },
  cycloneNumber: { start: 2, end: 4 },
  year: { start: 4, end: 8 },
  name: { start: 18, end: 28 },
  declaredEntries: { start: 33, end: 36 },
} as const satisfies Record<string, FieldSpan>;

// 12 radii: 34/50/64 kt thresholds x NE/SE/SW/NW quadrants
const WIND_RADII_START = 49;
const WIND_RADII_STRIDE = 6;
const WIND_RADII_WIDTH = 4;

export function windRadiiSpan(key: WindRadiiKey): FieldSpan {
  const start = WIND_RADII_START + WIND_RADII_KEYS.indexOf(key) * WIND_RADII_STRIDE;
  return { start, end: start + WIND_RADII_WIDTH };
}

export const DATA_LAYOUT = {
  year: { start: 0, end: 4 },
  month: { start: 4, end: 6 },
  day: { start: 6, end: 8 },
  hour: { start: 10, end: 12 },
  minute: { start: 12, end: 14 },
  recordIdentifier: { start: 16, end: 17 },
  status: { start: 19, end: 21 },
  latitude: { start: 23, end: 27 },
  latitudeHemisphere: { start: 27, end: 28 },
  longitude: { start: 30, end: 35 },
  longitudeHemisphere: { start: 35, end: 36 },
  maxWind: { start: 38, end: 41 },
  minPressure: { start: 43, end: 47 },
  radiusMaxWind: { start: 121, end: 125 },
} as const satisfies Record<string, FieldSpan>;

function maxEnd(layout: Record<string, FieldSpan>): number {
  return Math.max(...Object.values(layout).map((span) => span.end));
}

export const HEADER_MIN_LENGTH = maxEnd(HEADER_LAYOUT);
export const DATA_MIN_LENGTH = maxEnd(DATA_LAYOUT);

export function sliceField(line: string, span: FieldSpan): string {
  return line.slice(span.start, span.end).trim();
}
