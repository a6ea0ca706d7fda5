export const STORM_STATUSES = [
  "TD",  // Tropical Depression
  "TS",  // Tropical Storm
  "HU",  // Hurricane
  "EX",  // Extratropical
  "SD",  // Subtropical Depression
  "SS",  // Subtropical Storm
  "LO",  // Low
  "WV",  // Tropical Wave
  "DB",  // Disturbance
] as const;

export type StormStatus = typeof STORM_STATUSES[number];

export function isStormStatus(value: string): value is StormStatus {
  return (STORM_STATUSES as readonly string[]).includes(value);
}

/** Basin, cyclone number, year and name: the key of one header block. */
export interface StormIdentity {
  basin: string;
  cycloneNumber: string;
  year: number;
  name: string;
}

export interface HeaderRecord extends StormIdentity {
  declaredEntries: number;
}

export const WIND_RADII_KEYS = [
  "ne34", "se34", "sw34", "nw34",
  "ne50", "se50", "sw50", "nw50",
  "ne64", "se64", "sw64", "nw64",
] as const;

export type WindRadiiKey = typeof WIND_RADII_KEYS[number];

export type WindRadii<T> = Record<WindRadiiKey, T>;

export function mapWindRadii<T>(fn: (key: WindRadiiKey, index: number) => T): WindRadii<T> {
  const v = WIND_RADII_KEYS.map(fn);
  return {
    ne34: v[0], se34: v[1], sw34: v[2], nw34: v[3],
    ne50: v[4], se50: v[5], sw50: v[6], nw50: v[7],
    ne64: v[8], se64: v[9], sw64: v[10], nw64: v[11],
  };
}

/**
 * One data line, cut into its fixed-width fields and trimmed.
 * Nothing is coerced: sentinels such as "-999" are kept verbatim.
 */
export interface RawTrackPoint {
  year: string;
  month: string;
  day: string;
  hour: string;
  minute: string;
  recordIdentifier: string;
  status: string;
  latitude: string;
  latitudeHemisphere: string;
  longitude: string;
  longitudeHemisphere: string;
  maxWind: string;
  minPressure: string;
  windRadii: WindRadii<string>;
  radiusMaxWind: string;
}

/** A data line merged with its header, coordinates already signed. */
export interface CompositeRecord extends Omit<RawTrackPoint, "latitude" | "longitude"> {
  header: HeaderRecord;
  /** Ordinal of the header block in the source, starting at 0. */
  blockIndex: number;
  lineNumber: number;
  latitude: number;
  longitude: number;
}

export interface TrackPoint extends WindRadii<number | null> {
  uniqueId: string;
  basin: string;
  cycloneNumber: string;
  stormYear: number;
  name: string;
  declaredEntries: number;
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  timestamp: string | null; // ISO 8601, UTC
  recordIdentifier: string | null;
  status: StormStatus | null;
  latitude: number;
  longitude: number;
  maxWind: number | null;     // knots
  minPressure: number | null; // mb
  radiusMaxWind: number | null; // nmi
}

export interface Landfall {
  timestamp: string | null;
  lat: number;
  lon: number;
  wind: number | null;
}

export interface StormSummary {
  uniqueId: string;
  name: string | null;     // null for UNNAMED
  basin: string;
  year: number;
  startTime: string | null;
  endTime: string | null;
  maxWind: number | null;  // Peak intensity (knots), null when no wind was recorded
  minPressure: number | null;
  landfalls: Landfall[];
  category: number | null; // Peak Saffir-Simpson (0-5)
  trackPointCount: number;
}

export function windToCategory(wind: number): number {
  if (wind >= 137) return 5;
  if (wind >= 113) return 4;
  if (wind >= 96) return 3;
  if (wind >= 83) return 2;
  if (wind >= 64) return 1;
  return 0; // TD or TS
}

export function formatStormIdentity(storm: StormIdentity): string {
  return `${storm.basin}${storm.cycloneNumber}${storm.year} ${storm.name}`;
}
