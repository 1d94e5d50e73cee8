/**
 * Feature Batch Builder
 *
 * Turns generated rows and assembled shape lines into publish-ready
 * features. Only whitelisted attributes are carried over.
 */

import { ROW_ID_FIELD } from '../core/constants.js';
import type {
  AttributeValue,
  EsriFeature,
  EsriPointGeometry,
  EsriPolylineGeometry,
  GeneratedFeature,
  ShapeLine,
  StopRecord,
  XY,
} from '../core/types/index.js';
import type { CoordinateTable } from './coordinate-translator.js';

export const STOP_ATTRIBUTES = ['stop_name', 'stop_lat', 'stop_lon'] as const;

function toText(value: AttributeValue | undefined): string {
  return value === null || value === undefined ? '' : String(value);
}

function toNumber(value: AttributeValue | undefined): number {
  if (typeof value === 'number') return value;
  const parsed = Number.parseFloat(toText(value));
  return Number.isFinite(parsed) ? parsed : 0;
}

/**
 * The stops table sent for translation
 */
export function buildStopsTable(stops: readonly StopRecord[]): CoordinateTable {
  return {
    columns: STOP_ATTRIBUTES,
    latitudeField: 'stop_lat',
    longitudeField: 'stop_lon',
    rows: stops.map((stop) => ({ stop_name: stop.name, stop_lat: stop.lat, stop_lon: stop.lon })),
  };
}

/**
 * Point features for a generated batch of stops
 */
export function buildStopFeatures(generated: readonly GeneratedFeature[]): EsriFeature<EsriPointGeometry>[] {
  return generated.map(({ geometry, attributes }) => ({
    geometry: {
      x: geometry.x,
      y: geometry.y,
      ...(geometry.spatialReference ? { spatialReference: geometry.spatialReference } : {}),
    },
    attributes: {
      stop_name: toText(attributes.stop_name),
      stop_lat: toNumber(attributes.stop_lat),
      stop_lon: toNumber(attributes.stop_lon),
      [ROW_ID_FIELD]: toNumber(attributes[ROW_ID_FIELD]),
    },
  }));
}

/**
 * Cut a flat list of translated points back into one path per line
 *
 * @throws RangeError when the point count does not match the lines
 */
export function splitShapeCoordinates(lines: readonly ShapeLine[], points: readonly XY[]): XY[][] {
  const expected = lines.reduce((total, line) => total + line.coordinates.length, 0);
  if (expected !== points.length) {
    throw new RangeError(`Expected ${expected} translated points, got ${points.length}`);
  }

  const paths: XY[][] = [];
  let offset = 0;
  for (const line of lines) {
    paths.push(points.slice(offset, offset + line.coordinates.length));
    offset += line.coordinates.length;
  }
  return paths;
}

/**
 * One polyline feature per shape. The shape id is both the business key
 * and the synthetic row identifier.
 */
export function buildShapeFeatures(
  lines: readonly ShapeLine[],
  paths: readonly (readonly XY[])[],
  wkid?: number
): EsriFeature<EsriPolylineGeometry>[] {
  return lines.map((line, index) => ({
    geometry: {
      paths: [(paths[index] ?? []).map(([x, y]): [number, number] => [x, y])],
      ...(wkid === undefined ? {} : { spatialReference: { wkid } }),
    },
    attributes: {
      shape_id: line.shapeId,
      [ROW_ID_FIELD]: line.shapeId,
    },
  }));
}
