import { MalformedDataLineError, type ErrorContext } from '../core/errors.js';
import { mapWindRadii, type RawTrackPoint } from '../schemas/storm.js';
import {
  DATA_LAYOUT,
  DATA_MIN_LENGTH,
  sliceField,
  windRadiiSpan,
  type FieldSpan,
} from './fixed-width.js';

const DATA_DATE_FIELDS = [DATA_LAYOUT.year, DATA_LAYOUT.month, DATA_LAYOUT.day];

/**
 * Cheap shape test for a data line: long enough, with an all-digit date.
 */
export function looksLikeDataLine(line: string): boolean {
  if (line.length < DATA_MIN_LENGTH) return false;
  const date = DATA_DATE_FIELDS.map((span) => sliceField(line, span)).join('');
  return /^\d{8}$/.test(date);
}

/**
 * Cut a data line into its fields. Values stay as trimmed strings;
 * coercion and sentinel handling belong to the normalizer.
 */
export function parseDataLine(line: string, context: ErrorContext = {}): RawTrackPoint {
  if (line.length < DATA_MIN_LENGTH) {
    throw new MalformedDataLineError(
      `Data line has ${line.length} characters, expected at least ${DATA_MIN_LENGTH}`,
      context
    );
  }

  const field = (span: FieldSpan) => sliceField(line, span);

  return {
    year: field(DATA_LAYOUT.year),
    month: field(DATA_LAYOUT.month),
    day: field(DATA_LAYOUT.day),
    hour: field(DATA_LAYOUT.hour),
    minute: field(DATA_LAYOUT.minute),
    recordIdentifier: field(DATA_LAYOUT.recordIdentifier),
    status: field(DATA_LAYOUT.status),
    latitude: field(DATA_LAYOUT.latitude),
    latitudeHemisphere: field(DATA_LAYOUT.latitudeHemisphere),
    longitude: field(DATA_LAYOUT.longitude),
    longitudeHemisphere: field(DATA_LAYOUT.longitudeHemisphere),
    maxWind: field(DATA_LAYOUT.maxWind),
    minPressure: field(DATA_LAYOUT.minPressure),
    windRadii: mapWindRadii((key) => field(windRadiiSpan(key))),
    radiusMaxWind: field(DATA_LAYOUT.radiusMaxWind),
  };
}
