/**
 * End-to-end build of the track-point dataset from best-track text:
 * assemble -> validate -> normalize -> columnar (-> optional column drop).
 */
import {
  dropColumns,
  findUninformativeColumns,
  toColumnar,
  type ColumnarDataset,
} from '../../core/columnar.js';
import { MalformedHeaderError } from '../../core/errors.js';
import { LineCursor } from '../../core/line-cursor.js';
import { defaultLogger, type Logger } from '../../core/logger.js';
import { TrackNormalizer, type NormalizerConfig } from '../../core/schema-normalizer.js';
import {
  assembleRecords,
  createAssemblyStats,
  type AssemblyStats,
} from '../../parsers/record-assembler.js';
import type { CompositeRecord, TrackPoint } from '../../schemas/storm.js';
import { TRACK_POINT_SCHEMA } from '../../schemas/track-point-columns.js';
import {
  assertNoUnexpectedMismatches,
  validateEntryCounts,
  type ValidationReport,
} from '../../validation/entry-counts.js';

export interface TrackDatasetOptions {
  normalizer?: NormalizerConfig;
  /** Basins expected in the input; records from others are counted in a warning. */
  basins?: string[];
  /** Treat unexpected entry-count mismatches and orphaned data lines as fatal. */
  strict?: boolean;
  /** Drop single-valued columns after normalization. */
  dropUninformative?: boolean;
  /** Columns never dropped by the uninformative-column pass. */
  keepColumns?: string[];
  logger?: Logger;
}

export interface TrackDatasetResult {
  records: CompositeRecord[];
  report: ValidationReport;
  points: TrackPoint[];
  dataset: ColumnarDataset;
  stats: AssemblyStats;
  droppedColumns: string[];
}

const DEFAULT_KEEP = ['uniqueId', 'timestamp', 'latitude', 'longitude'];

export function buildTrackDataset(
  text: string,
  options: TrackDatasetOptions = {}
): TrackDatasetResult {
  const logger = options.logger ?? defaultLogger;
  const stats = createAssemblyStats();

  const records = [...assembleRecords(LineCursor.fromText(text), { stats, logger })];
  logger.log(`Assembled ${records.length} track points from ${stats.headers} storms`);

  if (options.strict && stats.orphanLines.length > 0) {
    const [first] = stats.orphanLines;
    throw new MalformedHeaderError(
      `${stats.orphanLines.length} data line(s) outside any storm block: ` +
        `lines ${stats.orphanLines.join(', ')}`,
      { lineNumber: first }
    );
  }

  if (options.basins) {
    const expected = new Set(options.basins);
    const foreign = records.filter((r) => !expected.has(r.header.basin)).length;
    if (foreign > 0) {
      logger.warn(`${foreign} track points from basins outside ${options.basins.join(', ')}`);
    }
  }

  const report = validateEntryCounts(records, logger);
  logger.log(
    `Entry counts: ${report.expectedCount} expected and ${report.unexpectedCount} unexpected mismatches`
  );
  if (options.strict) {
    assertNoUnexpectedMismatches(report);
  }

  const normalizer = new TrackNormalizer(options.normalizer, logger);
  const points = normalizer.normalizeBatch(records);

  let dataset = toColumnar(points, TRACK_POINT_SCHEMA);
  let droppedColumns: string[] = [];
  if (options.dropUninformative) {
    droppedColumns = findUninformativeColumns(dataset, {
      keep: options.keepColumns ?? DEFAULT_KEEP,
    });
    dataset = dropColumns(dataset, droppedColumns, logger);
  }

  return { records, report, points, dataset, stats, droppedColumns };
}
