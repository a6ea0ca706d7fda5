import {
  InvalidCoordinateError,
  InvalidHemisphereError,
  type ErrorContext,
} from '../core/errors.js';

export type CoordinateAxis = 'latitude' | 'longitude';

const HEMISPHERES: Record<CoordinateAxis, { positive: string; negative: string }> = {
  latitude: { positive: 'N', negative: 'S' },
  longitude: { positive: 'E', negative: 'W' },
};

/**
 * "28.0" is decimal degrees; a bare digit run like "283" is tenths (28.3).
 */
export function parseMagnitude(
  magnitude: string,
  axis: CoordinateAxis,
  context: ErrorContext = {}
): number {
  const str = magnitude.trim();
  if (/^(\d+\.\d*|\.\d+)$/.test(str)) {
    return parseFloat(str);
  }
  if (/^\d+$/.test(str)) {
    return parseInt(str, 10) / 10;
  }
  throw new InvalidCoordinateError(`Invalid ${axis} magnitude "${magnitude}"`, context);
}

/**
 * Combine a magnitude and hemisphere into signed decimal degrees:
 * positive for N/E, negative for S/W.
 */
export function toSignedDegrees(
  magnitude: string,
  hemisphere: string,
  axis: CoordinateAxis,
  context: ErrorContext = {}
): number {
  const { positive, negative } = HEMISPHERES[axis];
  if (hemisphere !== positive && hemisphere !== negative) {
    throw new InvalidHemisphereError(hemisphere, axis, context);
  }

  const value = parseMagnitude(magnitude, axis, context);
  // Avoid -0 for points on the equator / prime meridian
  return hemisphere === negative && value !== 0 ? -value : value;
}
