export * from './schemas/storm.js';
export * from './schemas/track-point-columns.js';
export * from './core/errors.js';
export * from './core/logger.js';
export * from './core/line-cursor.js';
export * from './core/columnar.js';
export * from './core/dataset-store.js';
export * from './core/fetcher.js';
export * from './core/schema-normalizer.js';
export * from './parsers/fixed-width.js';
export * from './parsers/coordinates.js';
export * from './parsers/header-line.js';
export * from './parsers/data-line.js';
export * from './parsers/record-assembler.js';
export * from './validation/entry-counts.js';
export * from './registry/sources.js';
export * from './sources/best-track.js';
export * from './pipelines/lib/track-dataset.js';
export * from './pipelines/lib/storm-summary.js';
export * from './pipelines/lib/geojson.js';
