import { writeFile } from 'fs/promises';
import path from 'path';
import type { Feature, FeatureCollection, Point } from 'geojson';
import type { Situation } from '../../adapters/datex2/types.js';
import { logger } from '../../utils/logger.js';

export type SituationFeatureProperties = Omit<Situation, 'latitude' | 'longitude'>;

export type SituationFeatureCollection = FeatureCollection<Point, SituationFeatureProperties>;

/**
 * GeoJSON point feature for a situation (RFC 7946 axis order: longitude, latitude)
 */
export function toFeature(situation: Situation): Feature<Point, SituationFeatureProperties> {
  const { latitude, longitude, ...properties } = situation;
  return {
    type: 'Feature',
    geometry: {
      type: 'Point',
      coordinates: [longitude, latitude],
    },
    properties,
  };
}

export function toFeatureCollection(situations: readonly Situation[]): SituationFeatureCollection {
  return {
    type: 'FeatureCollection',
    features: situations.map(toFeature),
  };
}

/**
 * Write the situations as a GeoJSON FeatureCollection
 *
 * @returns Absolute path of the written file
 */
export async function writeGeoJson(situations: readonly Situation[], filePath: string): Promise<string> {
  const resolvedPath = path.resolve(filePath);
  await writeFile(resolvedPath, JSON.stringify(toFeatureCollection(situations), null, 2), 'utf-8');
  logger.info({ path: resolvedPath, features: situations.length }, 'Wrote GeoJSON export');
  return resolvedPath;
}
