import {
  windToCategory,
  type Landfall,
  type StormSummary,
  type TrackPoint,
} from '../../schemas/storm.js';

const LANDFALL = 'L';

function summarize(points: TrackPoint[]): StormSummary {
  const first = points[0];
  const last = points[points.length - 1];

  const winds = points
    .map((p) => p.maxWind)
    .filter((w): w is number => w !== null);
  const maxWind = winds.length > 0 ? Math.max(...winds) : null;

  const pressures = points
    .map((p) => p.minPressure)
    .filter((p): p is number => p !== null && p > 0);

  const landfalls: Landfall[] = points
    .filter((p) => p.recordIdentifier === LANDFALL)
    .map((p) => ({ timestamp: p.timestamp, lat: p.latitude, lon: p.longitude, wind: p.maxWind }));

  return {
    uniqueId: first.uniqueId,
    name: first.name === 'UNNAMED' ? null : first.name,
    basin: first.basin,
    year: first.stormYear,
    startTime: first.timestamp,
    endTime: last.timestamp,
    maxWind,
    minPressure: pressures.length > 0 ? Math.min(...pressures) : null,
    landfalls,
    category: maxWind === null ? null : windToCategory(maxWind),
    trackPointCount: points.length,
  };
}

/**
 * One summary per storm, in order of first appearance.
 */
export function summarizeStorms(points: readonly TrackPoint[]): StormSummary[] {
  const byStorm = new Map<string, TrackPoint[]>();
  for (const point of points) {
    const track = byStorm.get(point.uniqueId);
    if (track) {
      track.push(point);
    } else {
      byStorm.set(point.uniqueId, [point]);
    }
  }
  return [...byStorm.values()].map(summarize);
}
