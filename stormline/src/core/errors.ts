/**
 * Error taxonomy for best-track ingestion.
 * Every parse-time error carries the source line number and, where known,
 * the identity of the storm block being read.
 */
import { formatStormIdentity, type StormIdentity } from '../schemas/storm.js';

export interface ErrorContext {
  lineNumber?: number;
  storm?: StormIdentity;
}

function describeContext(context: ErrorContext): string {
  const parts: string[] = [];
  if (context.lineNumber !== undefined) parts.push(`line ${context.lineNumber}`);
  if (context.storm) parts.push(formatStormIdentity(context.storm));
  return parts.length > 0 ? ` (${parts.join(', ')})` : '';
}

export class StormlineError extends Error {
  readonly lineNumber?: number;
  readonly storm?: StormIdentity;

  constructor(message: string, context: ErrorContext = {}) {
    super(`${message}${describeContext(context)}`);
    this.name = new.target.name;
    this.lineNumber = context.lineNumber;
    this.storm = context.storm;
  }
}

export class MalformedHeaderError extends StormlineError {}

export class MalformedDataLineError extends StormlineError {}

/** A coordinate magnitude that is not a number. */
export class InvalidCoordinateError extends MalformedDataLineError {}

export class TruncatedStormError extends StormlineError {
  readonly declaredEntries: number;
  readonly foundEntries: number;

  constructor(declaredEntries: number, foundEntries: number, context: ErrorContext = {}) {
    super(
      `Storm declares ${declaredEntries} entries but input ended after ${foundEntries}`,
      context
    );
    this.declaredEntries = declaredEntries;
    this.foundEntries = foundEntries;
  }
}

export class InvalidHemisphereError extends StormlineError {
  readonly hemisphere: string;

  constructor(hemisphere: string, axis: 'latitude' | 'longitude', context: ErrorContext = {}) {
    super(`Invalid ${axis} hemisphere "${hemisphere}"`, context);
    this.hemisphere = hemisphere;
  }
}

export class UnknownStatusError extends StormlineError {
  readonly status: string;

  constructor(status: string, context: ErrorContext = {}) {
    super(`Unknown status code "${status}"`, context);
    this.status = status;
  }
}

export class InvalidDateError extends StormlineError {}

export class EntryCountMismatchError extends StormlineError {
  readonly mismatchCount: number;

  constructor(mismatchCount: number, detail: string) {
    super(`${mismatchCount} unexpected entry-count mismatch(es): ${detail}`);
    this.mismatchCount = mismatchCount;
  }
}

export class FetchError extends StormlineError {
  readonly status: number;

  constructor(url: string, status: number, body: string) {
    super(`HTTP ${status} fetching ${url}: ${body}`);
    this.status = status;
  }
}
