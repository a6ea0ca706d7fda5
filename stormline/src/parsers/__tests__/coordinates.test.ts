import { describe, it, expect } from 'vitest';
import { parseMagnitude, toSignedDegrees } from '../coordinates.js';
import {
  InvalidCoordinateError,
  InvalidHemisphereError,
  MalformedDataLineError,
} from '../../core/errors.js';

describe('toSignedDegrees', () => {
  it('keeps northern and eastern values positive', () => {
    expect(toSignedDegrees('28.0', 'N', 'latitude')).toBe(28.0);
    expect(toSignedDegrees('28.0', 'E', 'longitude')).toBe(28.0);
  });

  it('negates southern and western values', () => {
    expect(toSignedDegrees('28.0', 'S', 'latitude')).toBe(-28.0);
    expect(toSignedDegrees('94.8', 'W', 'longitude')).toBe(-94.8);
  });

  it('reads a bare digit run as tenths of a degree', () => {
    expect(toSignedDegrees('283', 'N', 'latitude')).toBe(28.3);
    expect(toSignedDegrees('1795', 'W', 'longitude')).toBe(-179.5);
  });

  it('never returns negative zero', () => {
    expect(Object.is(toSignedDegrees('0.0', 'S', 'latitude'), 0)).toBe(true);
  });

  it('rejects hemispheres outside the axis', () => {
    expect(() => toSignedDegrees('28.0', 'E', 'latitude')).toThrow(InvalidHemisphereError);
    expect(() => toSignedDegrees('94.8', 'N', 'longitude')).toThrow(InvalidHemisphereError);
    expect(() => toSignedDegrees('28.0', 'X', 'latitude')).toThrow('Invalid latitude hemisphere "X"');
    expect(() => toSignedDegrees('28.0', '', 'latitude')).toThrow(InvalidHemisphereError);
    expect(() => toSignedDegrees('28.0', 'n', 'latitude')).toThrow(InvalidHemisphereError);
  });
});

describe('parseMagnitude', () => {
  it('parses decimal degrees', () => {
    expect(parseMagnitude(' 94.8', 'longitude')).toBe(94.8);
    expect(parseMagnitude('5.', 'latitude')).toBe(5);
  });

  it('rejects non-numeric magnitudes as malformed data', () => {
    expect(() => parseMagnitude('2x.0', 'latitude')).toThrow(InvalidCoordinateError);
    expect(() => parseMagnitude('', 'latitude')).toThrow(MalformedDataLineError);
    expect(() => parseMagnitude('-28.0', 'latitude')).toThrow('Invalid latitude magnitude "-28.0"');
  });
});
