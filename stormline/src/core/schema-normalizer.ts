/**
 * Schema normalizer for assembled best-track records.
 * Casts raw string fields into the final track-point schema: integer date parts,
 * a composed UTC timestamp, the closed status enum, and numeric measurements with
 * sentinels mapped to null.
 */
import {
  InvalidDateError,
  UnknownStatusError,
  type ErrorContext,
} from './errors.js';
import { defaultLogger, type Logger } from './logger.js';
import {
  isStormStatus,
  mapWindRadii,
  type CompositeRecord,
  type HeaderRecord,
  type StormStatus,
  type TrackPoint,
} from '../schemas/storm.js';

// ============================================================================
// Configuration
// ============================================================================

export type IssuePolicy = 'error' | 'warn';

export interface NormalizerConfig {
  /** Literal values meaning "not measured" (default: -999, -99). */
  sentinels?: number[];
  /** 'warn' logs and stores null instead of throwing UnknownStatusError. */
  onUnknownStatus?: IssuePolicy;
  /** 'warn' logs and stores a null timestamp instead of throwing InvalidDateError. */
  onInvalidDate?: IssuePolicy;
  /** Extra spellings mapped onto known codes, e.g. { ET: 'EX' }. */
  statusAliases?: Record<string, StormStatus>;
}

export const DEFAULT_SENTINELS: readonly number[] = [-999, -99];

// ============================================================================
// Field Parsing
// ============================================================================

/**
 * Parse a signed integer literal; anything else (blank, text, decimals) is null.
 */
export function parseInteger(value: string): number | null {
  const str = value.trim();
  if (!/^[-+]?\d+$/.test(str)) return null;
  return parseInt(str, 10);
}

export function parseMeasurement(
  value: string,
  sentinels: readonly number[] = DEFAULT_SENTINELS
): number | null {
  const num = parseInteger(value);
  if (num === null || sentinels.includes(num)) return null;
  return num;
}

export function mapStatus(
  code: string,
  aliases: Record<string, StormStatus> = {}
): StormStatus | null {
  const normalized = code.trim();
  if (isStormStatus(normalized)) return normalized;
  return aliases[normalized] ?? null;
}

function daysInMonth(year: number, month: number): number {
  // Day 0 of the following month is the last day of this one
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

const pad = (n: number, width = 2) => String(n).padStart(width, '0');

/**
 * Compose an ISO 8601 UTC timestamp, or null for an impossible date.
 */
export function composeTimestamp(
  year: number,
  month: number,
  day: number,
  hour: number,
  minute: number
): string | null {
  if (month < 1 || month > 12) return null;
  if (day < 1 || day > daysInMonth(year, month)) return null;
  if (hour < 0 || hour > 23 || minute < 0 || minute > 59) return null;

  return `${pad(year, 4)}-${pad(month)}-${pad(day)}T${pad(hour)}:${pad(minute)}:00Z`;
}

export function buildUniqueId(header: Pick<HeaderRecord, 'year' | 'basin' | 'cycloneNumber'>): string {
  return `${header.year}${header.basin}${header.cycloneNumber}`;
}

// ============================================================================
// Schema Normalizer
// ============================================================================

export class TrackNormalizer {
  private config: NormalizerConfig;
  private logger: Logger;
  private sentinels: readonly number[];

  constructor(config: NormalizerConfig = {}, logger: Logger = defaultLogger) {
    this.config = config;
    this.logger = logger;
    this.sentinels = config.sentinels ?? DEFAULT_SENTINELS;
  }

  /**
   * Normalize one composite record to the track-point schema.
   */
  normalize(record: CompositeRecord): TrackPoint {
    const { header } = record;
    const context: ErrorContext = { lineNumber: record.lineNumber, storm: header };

    const year = this.requireDatePart(record.year, 'year', context);
    const month = this.requireDatePart(record.month, 'month', context);
    const day = this.requireDatePart(record.day, 'day', context);
    const hour = this.requireDatePart(record.hour, 'hour', context);
    const minute = this.requireDatePart(record.minute, 'minute', context);

    const timestamp = composeTimestamp(year, month, day, hour, minute);
    if (timestamp === null) {
      const raw = `${record.year}-${record.month}-${record.day} ${record.hour}:${record.minute}`;
      this.report(this.config.onInvalidDate, new InvalidDateError(`Impossible date ${raw}`, context));
    }

    const status = mapStatus(record.status, this.config.statusAliases);
    if (status === null) {
      this.report(this.config.onUnknownStatus, new UnknownStatusError(record.status, context));
    }

    const measure = (value: string) => parseMeasurement(value, this.sentinels);

    return {
      uniqueId: buildUniqueId(header),
      basin: header.basin,
      cycloneNumber: header.cycloneNumber,
      stormYear: header.year,
      name: header.name,
      declaredEntries: header.declaredEntries,
      year,
      month,
      day,
      hour,
      minute,
      timestamp,
      recordIdentifier: record.recordIdentifier || null,
      status,
      latitude: record.latitude,
      longitude: record.longitude,
      maxWind: measure(record.maxWind),
      minPressure: measure(record.minPressure),
      ...mapWindRadii((key) => measure(record.windRadii[key])),
      radiusMaxWind: measure(record.radiusMaxWind),
    };
  }

  /**
   * Normalize a batch of records, preserving order.
   */
  normalizeBatch(records: Iterable<CompositeRecord>): TrackPoint[] {
    const points: TrackPoint[] = [];
    for (const record of records) {
      points.push(this.normalize(record));
    }
    return points;
  }

  /**
   * Date parts must be integers whatever the policy: a non-numeric date
   * means the column offsets are wrong.
   */
  private requireDatePart(value: string, part: string, context: ErrorContext): number {
    const num = parseInteger(value);
    if (num === null) {
      throw new InvalidDateError(`Non-numeric ${part} "${value}"`, context);
    }
    return num;
  }

  private report(policy: IssuePolicy | undefined, error: Error): void {
    if (policy !== 'warn') throw error;
    this.logger.warn(`${error.message}; storing null`);
  }
}
