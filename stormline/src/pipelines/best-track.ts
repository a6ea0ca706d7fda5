/**
 * Best-track pipeline: read (or download) the fixed-width best-track file, build the
 * validated track-point dataset, and write it out.
 *
 * Usage: tsx stormline/src/pipelines/best-track.ts [--source <id>] [--input <path>]
 *        [--strict] [--drop-uninformative]
 */
import { readFile, writeFile, mkdir } from 'node:fs/promises';
import { parseArgs } from 'node:util';
import { openDatasetStore } from '../core/dataset-store.js';
import { getSource } from '../registry/sources.js';
import { fetchBestTrack } from '../sources/best-track.js';
import { buildTrackDataset } from './lib/track-dataset.js';
import { summarizeStorms } from './lib/storm-summary.js';
import { createPointsGeoJSON, createTracksGeoJSON } from './lib/geojson.js';

const OUTPUT_DIR = new URL('../../data/processed', import.meta.url).pathname;

async function main() {
  const { values } = parseArgs({
    options: {
      source: { type: 'string', default: 'best-track-atlantic' },
      input: { type: 'string' },
      output: { type: 'string', default: OUTPUT_DIR },
      strict: { type: 'boolean', default: false },
      'drop-uninformative': { type: 'boolean', default: false },
    },
  });

  const source = getSource(values.source);
  const outputDir = values.output;

  let data: string;
  if (values.input) {
    console.log(`Reading ${values.input}...`);
    data = await readFile(values.input, 'utf-8');
  } else {
    data = await fetchBestTrack(source);
  }

  const { points, dataset, report, stats, droppedColumns } = buildTrackDataset(data, {
    normalizer: source.normalizer,
    basins: source.basins,
    strict: values.strict,
    dropUninformative: values['drop-uninformative'],
  });

  if (stats.skippedLines.length > 0) {
    console.log(`Skipped ${stats.skippedLines.length} lines outside storm blocks`);
  }
  if (stats.orphanLines.length > 0) {
    console.warn(`  ${stats.orphanLines.length} of them look like data lines without a header`);
  }
  for (const m of report.mismatches.filter((m) => m.expected)) {
    console.log(
      `  Year-boundary split: ${m.identity.basin}${m.identity.cycloneNumber} ${m.identity.name} ` +
        `${m.identity.year} (${m.observed} of ${m.declaredEntries})`
    );
  }

  await mkdir(outputDir, { recursive: true });

  // Columnar dataset
  const dbPath = `${outputDir}/tracks.sqlite`;
  const store = await openDatasetStore(dbPath);
  try {
    store.writeDataset('track_points', dataset);
  } finally {
    store.close();
  }
  console.log(`Wrote ${dbPath} (${dataset.rowCount} rows, ${dataset.schema.length} columns)`);
  if (droppedColumns.length > 0) {
    console.log(`  Dropped uninformative columns: ${droppedColumns.join(', ')}`);
  }

  // Storm summaries
  const summaries = summarizeStorms(points);
  const stormsPath = `${outputDir}/storms.json`;
  await writeFile(stormsPath, JSON.stringify(summaries, null, 2));
  console.log(`Wrote ${stormsPath} (${summaries.length} storms)`);

  const tracksPath = `${outputDir}/tracks.geojson`;
  await writeFile(tracksPath, JSON.stringify(createTracksGeoJSON(summaries, points)));
  console.log(`Wrote ${tracksPath}`);

  const pointsPath = `${outputDir}/points.geojson`;
  await writeFile(pointsPath, JSON.stringify(createPointsGeoJSON(points)));
  console.log(`Wrote ${pointsPath} (${points.length} points)`);

  // Stats
  const byCategory = summaries.reduce<Record<string, number>>((acc, s) => {
    const key = s.category === null ? 'unknown' : String(s.category);
    acc[key] = (acc[key] || 0) + 1;
    return acc;
  }, {});

  console.log('\nStorms by category:');
  for (const [cat, count] of Object.entries(byCategory).sort()) {
    console.log(`  Cat ${cat}: ${count}`);
  }

  if (summaries.length > 0) {
    const years = summaries.map((s) => s.year);
    console.log(`\nYear range: ${Math.min(...years)} - ${Math.max(...years)}`);
  }
}

main().catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
