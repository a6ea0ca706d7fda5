import { describe, it, expect, vi } from 'vitest';
import { assembleRecords, createAssemblyStats } from '../record-assembler.js';
import { LineCursor } from '../../core/line-cursor.js';
import {
  InvalidHemisphereError,
  MalformedDataLineError,
  TruncatedStormError,
} from '../../core/errors.js';
import { TrackNormalizer } from '../../core/schema-normalizer.js';
import { validateEntryCounts } from '../../validation/entry-counts.js';
import { dataLine, headerLine } from './line-builders.js';

function quietLogger() {
  return { log: vi.fn(), warn: vi.fn() };
}

function unnamed1851(count: number): string[] {
  const lines = [headerLine('AL', '01', '1851', 'UNNAMED', 5)];
  for (let i = 0; i < count; i++) {
    lines.push(
      dataLine({
        date: '18510625',
        time: `${String(i * 4).padStart(2, '0')}00`,
        status: 'HU',
        latitude: `${28 + i}.0N`,
        longitude: '94.8W',
        wind: '80',
      })
    );
  }
  return lines;
}

describe('assembleRecords', () => {
  it('emits one record per declared data line, all sharing the storm identity', () => {
    const logger = quietLogger();
    const records = [...assembleRecords(new LineCursor(unnamed1851(5)), { logger })];

    expect(records).toHaveLength(5);
    for (const record of records) {
      expect(record.header).toEqual({
        basin: 'AL',
        cycloneNumber: '01',
        year: 1851,
        name: 'UNNAMED',
        declaredEntries: 5,
      });
      expect(record.blockIndex).toBe(0);
    }
    expect(records.map((r) => r.lineNumber)).toEqual([2, 3, 4, 5, 6]);
    expect(records.map((r) => r.latitude)).toEqual([28, 29, 30, 31, 32]);
    expect(records[0].longitude).toBe(-94.8);

    const points = new TrackNormalizer({}, logger).normalizeBatch(records);
    expect(new Set(points.map((p) => p.uniqueId))).toEqual(new Set(['1851AL01']));

    const report = validateEntryCounts(records, logger);
    expect(report.mismatches).toEqual([]);
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it('raises TruncatedStormError when input ends inside a block', () => {
    const lines = [headerLine('AL', '01', '1851', 'UNNAMED', 3), ...unnamed1851(2).slice(1)];
    const run = () => [...assembleRecords(new LineCursor(lines), { logger: quietLogger() })];

    expect(run).toThrow(TruncatedStormError);
    expect(run).toThrow('Storm declares 3 entries but input ended after 2 (line 3, AL011851 UNNAMED)');
  });

  it('converts implied-tenths latitudes', () => {
    const lines = [
      headerLine('AL', '02', '1999', 'TESTER', 1),
      dataLine({ date: '19990901', latitude: '283N', longitude: '945W' }),
    ];
    const [record] = assembleRecords(new LineCursor(lines), { logger: quietLogger() });
    expect(record.latitude).toBe(28.3);
    expect(record.longitude).toBe(-94.5);
  });

  it('skips blank and unrecognized lines between blocks', () => {
    const logger = quietLogger();
    const stats = createAssemblyStats();
    const lines = [
      '',
      headerLine('AL', '01', '1851', 'UNNAMED', 1),
      dataLine({ date: '18510625' }),
      'garbage',
      headerLine('AL', '02', '1851', 'UNNAMED', 1),
      dataLine({ date: '18510705' }),
    ];

    const records = [...assembleRecords(new LineCursor(lines), { stats, logger })];

    expect(records.map((r) => r.blockIndex)).toEqual([0, 1]);
    expect(stats).toEqual({ headers: 2, records: 2, skippedLines: [1, 4], orphanLines: [] });
    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(logger.warn).toHaveBeenCalledWith('Skipping unrecognized line 4: garbage');
  });

  it('records data lines that have no header as orphans', () => {
    const logger = quietLogger();
    const stats = createAssemblyStats();
    const lines = [
      dataLine({ date: '18510625' }),
      headerLine('AL', '02', '1851', 'UNNAMED', 1),
      dataLine({ date: '18510705' }),
    ];

    const records = [...assembleRecords(new LineCursor(lines), { stats, logger })];

    expect(records).toHaveLength(1);
    expect(stats).toEqual({ headers: 1, records: 1, skippedLines: [1], orphanLines: [1] });
    expect(logger.warn).toHaveBeenCalledWith('Data line 1 is outside any storm block');
  });

  it('recognizes headers of any basin by shape', () => {
    const lines = [
      headerLine('CP', '01', '2015', 'HALOLA', 1),
      dataLine({ date: '20150710', longitude: '178.0E' }),
    ];
    const records = [...assembleRecords(new LineCursor(lines), { logger: quietLogger() })];
    expect(records).toHaveLength(1);
    expect(records[0].header.basin).toBe('CP');
    expect(records[0].longitude).toBe(178);
  });

  it('handles headers that declare no entries', () => {
    const lines = [
      headerLine('AL', '03', '1900', 'UNNAMED', 0),
      headerLine('AL', '04', '1900', 'UNNAMED', 1),
      dataLine({ date: '19000801' }),
    ];
    const stats = createAssemblyStats();
    const records = [...assembleRecords(new LineCursor(lines), { stats, logger: quietLogger() })];
    expect(records).toHaveLength(1);
    expect(records[0].header.cycloneNumber).toBe('04');
    expect(records[0].blockIndex).toBe(1);
    expect(stats.headers).toBe(2);
  });

  it('aborts on a short data line inside a block', () => {
    const lines = [headerLine('AL', '01', '1851', 'UNNAMED', 2), dataLine({ date: '18510625' }), ''];
    const run = () => [...assembleRecords(new LineCursor(lines), { logger: quietLogger() })];
    expect(run).toThrow(MalformedDataLineError);
    expect(run).toThrow('(line 3, AL011851 UNNAMED)');
  });

  it('aborts on an invalid hemisphere', () => {
    const lines = [headerLine('AL', '01', '1851', 'UNNAMED', 1), dataLine({ date: '18510625', latitude: '28.0Q' })];
    expect(() => [...assembleRecords(new LineCursor(lines), { logger: quietLogger() })]).toThrow(
      InvalidHemisphereError
    );
  });

  it('reads lines lazily from the cursor', () => {
    let pulled = 0;
    const lines = unnamed1851(5);
    function* source() {
      for (const line of lines) {
        pulled++;
        yield line;
      }
    }

    const records = assembleRecords(new LineCursor(source()), { logger: quietLogger() });
    const first = records.next();

    expect(first.done).toBe(false);
    expect(pulled).toBe(2);
  });

  it('returns the stats when iteration completes', () => {
    const records = assembleRecords(new LineCursor(unnamed1851(5)), { logger: quietLogger() });
    let result = records.next();
    while (!result.done) result = records.next();
    expect(result.value).toEqual({ headers: 1, records: 5, skippedLines: [], orphanLines: [] });
  });
});
