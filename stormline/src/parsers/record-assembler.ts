/**
 * Drives the line cursor: pairs every header with its declared run of data
 * lines and emits one composite record per data line, in source order.
 */
import { TruncatedStormError } from '../core/errors.js';
import type { Line, LineCursor } from '../core/line-cursor.js';
import { defaultLogger, type Logger } from '../core/logger.js';
import type { CompositeRecord, HeaderRecord } from '../schemas/storm.js';
import { toSignedDegrees } from './coordinates.js';
import { looksLikeDataLine, parseDataLine } from './data-line.js';
import { tryParseHeaderLine } from './header-line.js';

export interface AssemblyStats {
  headers: number;
  records: number;
  /** Line numbers outside any storm block that were not headers. */
  skippedLines: number[];
  /** The subset of skippedLines shaped like data lines, i.e. a header is missing. */
  orphanLines: number[];
}

export interface AssembleOptions {
  /** Filled in as the generator runs; read it once iteration finishes. */
  stats?: AssemblyStats;
  logger?: Logger;
}

export function createAssemblyStats(): AssemblyStats {
  return { headers: 0, records: 0, skippedLines: [], orphanLines: [] };
}

function toCompositeRecord(
  header: HeaderRecord,
  blockIndex: number,
  line: Line
): CompositeRecord {
  const context = { lineNumber: line.number, storm: header };
  const { latitude, longitude, ...fields } = parseDataLine(line.text, context);

  return {
    ...fields,
    header,
    blockIndex,
    lineNumber: line.number,
    latitude: toSignedDegrees(latitude, fields.latitudeHemisphere, 'latitude', context),
    longitude: toSignedDegrees(longitude, fields.longitudeHemisphere, 'longitude', context),
  };
}

export function* assembleRecords(
  cursor: LineCursor,
  options: AssembleOptions = {}
): Generator<CompositeRecord, AssemblyStats, undefined> {
  const stats = options.stats ?? createAssemblyStats();
  const logger = options.logger ?? defaultLogger;
  let blockIndex = 0;

  for (let line = cursor.next(); line; line = cursor.next()) {
    const header = tryParseHeaderLine(line.text, line.number);

    if (!header) {
      // Blank lines and stray trailing content do not abort the run
      stats.skippedLines.push(line.number);
      if (looksLikeDataLine(line.text)) {
        stats.orphanLines.push(line.number);
        logger.warn(`Data line ${line.number} is outside any storm block`);
      } else if (line.text.trim()) {
        logger.warn(`Skipping unrecognized line ${line.number}: ${line.text.trim().slice(0, 40)}`);
      }
      continue;
    }

    stats.headers++;
    for (let found = 0; found < header.declaredEntries; found++) {
      const dataLine = cursor.next();
      if (!dataLine) {
        throw new TruncatedStormError(header.declaredEntries, found, {
          lineNumber: cursor.position,
          storm: header,
        });
      }
      stats.records++;
      yield toCompositeRecord(header, blockIndex, dataLine);
    }
    blockIndex++;
  }

  return stats;
}
