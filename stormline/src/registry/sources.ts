/**
 * Source registry for best-track datasets.
 * Defines download locations, expected basins and normalization settings.
 */
import type { NormalizerConfig } from '../core/schema-normalizer.js';

// ============================================================================
// Types
// ============================================================================

export interface SourceDefinition {
  id: string;
  name: string;

  /** Plain-text download */
  url: string;

  /** Basin codes expected in the file; others parse but are logged */
  basins: string[];

  /** Schema normalization config */
  normalizer: NormalizerConfig;

  /** Source attribution */
  attribution: string;
  attributionUrl: string;

  /** License type */
  license?: string;

  /** Notes about data quality or limitations */
  notes?: string;
}

// ============================================================================
// Sources
// ============================================================================

export const BEST_TRACK_ATLANTIC: SourceDefinition = {
  id: 'best-track-atlantic',
  name: 'Atlantic Hurricane Best Track (HURDAT2)',
  url: 'https://www.nhc.noaa.gov/data/hurdat/hurdat2-1851-2023-051124.txt',
  basins: ['AL'],
  normalizer: {
    sentinels: [-999, -99],
    onUnknownStatus: 'error',
    onInvalidDate: 'error',
  },
  attribution: 'NOAA National Hurricane Center',
  attributionUrl: 'https://www.nhc.noaa.gov/data/#hurdat',
  license: 'Public Domain',
  notes:
    'Wind radii are only populated from 2004 onward; earlier rows carry -999. ' +
    'Storms active across 31 December split into two calendar-year groups.',
};

export const BEST_TRACK_PACIFIC: SourceDefinition = {
  id: 'best-track-pacific',
  name: 'Northeast and North Central Pacific Best Track (HURDAT2)',
  url: 'https://www.nhc.noaa.gov/data/hurdat/hurdat2-nepac-1949-2023-042624.txt',
  basins: ['EP', 'CP'],
  normalizer: {
    sentinels: [-999, -99],
    onUnknownStatus: 'error',
    onInvalidDate: 'error',
  },
  attribution: 'NOAA National Hurricane Center',
  attributionUrl: 'https://www.nhc.noaa.gov/data/#hurdat',
  license: 'Public Domain',
};

export const SOURCES: Record<string, SourceDefinition> = {
  [BEST_TRACK_ATLANTIC.id]: BEST_TRACK_ATLANTIC,
  [BEST_TRACK_PACIFIC.id]: BEST_TRACK_PACIFIC,
};

export function getSource(id: string): SourceDefinition {
  const source = SOURCES[id];
  if (!source) {
    throw new Error(`Unknown source: ${id}. Available: ${Object.keys(SOURCES).join(', ')}`);
  }
  return source;
}
