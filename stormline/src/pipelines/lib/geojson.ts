import type { Feature, FeatureCollection, LineString, Point } from 'geojson';
import { windToCategory, type StormSummary, type TrackPoint } from '../../schemas/storm.js';

// Saffir-Simpson colors
export const CATEGORY_COLORS: Record<number, string> = {
  0: '#6ec4e8',  // TD/TS
  1: '#ffe066',  // Cat 1 - yellow
  2: '#ffb347',  // Cat 2 - orange
  3: '#ff6b6b',  // Cat 3 - red-orange
  4: '#d63031',  // Cat 4 - red
  5: '#6c3483',  // Cat 5 - purple
};

export const UNKNOWN_CATEGORY_COLOR = '#9e9e9e';

export interface TrackProperties {
  id: string;
  name: string | null;
  year: number;
  maxWind: number | null;
  minPressure: number | null;
  category: number | null;
  color: string;
  startTime: string | null;
  endTime: string | null;
}

export interface PointProperties {
  stormId: string;
  stormName: string;
  timestamp: string | null;
  wind: number | null;
  pressure: number | null;
  status: string | null;
  category: number | null;
  color: string;
}

function categoryColor(category: number | null): string {
  if (category === null) return UNKNOWN_CATEGORY_COLOR;
  return CATEGORY_COLORS[category] ?? CATEGORY_COLORS[0];
}

export function createTracksGeoJSON(
  summaries: readonly StormSummary[],
  points: readonly TrackPoint[]
): FeatureCollection<LineString, TrackProperties> {
  const coordinates = new Map<string, number[][]>();
  for (const p of points) {
    const line = coordinates.get(p.uniqueId) ?? [];
    line.push([p.longitude, p.latitude]);
    coordinates.set(p.uniqueId, line);
  }

  const features = summaries.map((storm): Feature<LineString, TrackProperties> => ({
    type: 'Feature',
    properties: {
      id: storm.uniqueId,
      name: storm.name,
      year: storm.year,
      maxWind: storm.maxWind,
      minPressure: storm.minPressure,
      category: storm.category,
      color: categoryColor(storm.category),
      startTime: storm.startTime,
      endTime: storm.endTime,
    },
    geometry: {
      type: 'LineString',
      coordinates: coordinates.get(storm.uniqueId) ?? [],
    },
  }));

  return { type: 'FeatureCollection', features };
}

export function createPointsGeoJSON(
  points: readonly TrackPoint[]
): FeatureCollection<Point, PointProperties> {
  const features = points.map((point): Feature<Point, PointProperties> => {
    const category = point.maxWind === null ? null : windToCategory(point.maxWind);
    return {
      type: 'Feature',
      properties: {
        stormId: point.uniqueId,
        stormName: point.name,
        timestamp: point.timestamp,
        wind: point.maxWind,
        pressure: point.minPressure,
        status: point.status,
        category,
        color: categoryColor(category),
      },
      geometry: {
        type: 'Point',
        coordinates: [point.longitude, point.latitude],
      },
    };
  });

  return { type: 'FeatureCollection', features };
}
