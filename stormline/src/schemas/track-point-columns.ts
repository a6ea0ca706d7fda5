import type { ColumnSchema, ColumnValue } from '../core/columnar.js';
import { isStormStatus, mapWindRadii, WIND_RADII_KEYS, type TrackPoint } from './storm.js';

type TrackColumn = ColumnSchema<keyof TrackPoint>;

const radiiColumns = WIND_RADII_KEYS.map((name): TrackColumn => ({
  name,
  type: 'integer',
  nullable: true,
}));

/** Output column order, types and nullability. */
export const TRACK_POINT_SCHEMA: readonly TrackColumn[] = [
  { name: 'uniqueId', type: 'text', nullable: false },
  { name: 'basin', type: 'text', nullable: false },
  { name: 'cycloneNumber', type: 'text', nullable: false },
  { name: 'stormYear', type: 'integer', nullable: false },
  { name: 'name', type: 'text', nullable: false },
  { name: 'declaredEntries', type: 'integer', nullable: false },
  { name: 'year', type: 'integer', nullable: false },
  { name: 'month', type: 'integer', nullable: false },
  { name: 'day', type: 'integer', nullable: false },
  { name: 'hour', type: 'integer', nullable: false },
  { name: 'minute', type: 'integer', nullable: false },
  { name: 'timestamp', type: 'text', nullable: true },
  { name: 'recordIdentifier', type: 'text', nullable: true },
  { name: 'status', type: 'text', nullable: true },
  { name: 'latitude', type: 'real', nullable: false },
  { name: 'longitude', type: 'real', nullable: false },
  { name: 'maxWind', type: 'integer', nullable: true },
  { name: 'minPressure', type: 'integer', nullable: true },
  ...radiiColumns,
  { name: 'radiusMaxWind', type: 'integer', nullable: true },
];

function text(row: Record<string, ColumnValue>, key: string): string {
  const value = row[key];
  if (typeof value !== 'string') throw new Error(`Column "${key}": expected text`);
  return value;
}

function num(row: Record<string, ColumnValue>, key: string): number {
  const value = row[key];
  if (typeof value !== 'number') throw new Error(`Column "${key}": expected number`);
  return value;
}

function optionalText(row: Record<string, ColumnValue>, key: string): string | null {
  return row[key] === null ? null : text(row, key);
}

function optionalNum(row: Record<string, ColumnValue>, key: string): number | null {
  return row[key] === null ? null : num(row, key);
}

/**
 * Read a row back into a TrackPoint. Every column of TRACK_POINT_SCHEMA
 * must be present; rows from a dataset with dropped columns will not load.
 */
export function trackPointFromRow(row: Record<string, ColumnValue>): TrackPoint {
  const status = optionalText(row, 'status');
  if (status !== null && !isStormStatus(status)) {
    throw new Error(`Column "status": unknown code "${status}"`);
  }

  return {
    uniqueId: text(row, 'uniqueId'),
    basin: text(row, 'basin'),
    cycloneNumber: text(row, 'cycloneNumber'),
    stormYear: num(row, 'stormYear'),
    name: text(row, 'name'),
    declaredEntries: num(row, 'declaredEntries'),
    year: num(row, 'year'),
    month: num(row, 'month'),
    day: num(row, 'day'),
    hour: num(row, 'hour'),
    minute: num(row, 'minute'),
    timestamp: optionalText(row, 'timestamp'),
    recordIdentifier: optionalText(row, 'recordIdentifier'),
    status,
    latitude: num(row, 'latitude'),
    longitude: num(row, 'longitude'),
    maxWind: optionalNum(row, 'maxWind'),
    minPressure: optionalNum(row, 'minPressure'),
    ...mapWindRadii((key) => optionalNum(row, key)),
    radiusMaxWind: optionalNum(row, 'radiusMaxWind'),
  };
}
