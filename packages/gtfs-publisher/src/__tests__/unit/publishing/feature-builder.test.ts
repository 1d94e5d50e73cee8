/**
 * Feature batch builder tests
 */

import { describe, it, expect } from 'vitest';
import {
  buildShapeFeatures,
  buildStopFeatures,
  buildStopsTable,
  splitShapeCoordinates,
} from '../../../publishing/feature-builder.js';
import type { ShapeLine } from '../../../core/types/index.js';

const lines: ShapeLine[] = [
  {
    shapeId: 'A',
    coordinates: [
      [1, 2],
      [3, 4],
    ],
  },
  { shapeId: 'B', coordinates: [[5, 6]] },
];

describe('buildStopsTable', () => {
  it('lays stops out as name, latitude and longitude columns', () => {
    const table = buildStopsTable([{ stopId: 's1', name: 'Main & 1st', lat: 45.5, lon: -122.6 }]);

    expect(table).toEqual({
      columns: ['stop_name', 'stop_lat', 'stop_lon'],
      latitudeField: 'stop_lat',
      longitudeField: 'stop_lon',
      rows: [{ stop_name: 'Main & 1st', stop_lat: 45.5, stop_lon: -122.6 }],
    });
  });
});

describe('buildStopFeatures', () => {
  it('keeps only whitelisted attributes and the pairing key', () => {
    const features = buildStopFeatures([
      {
        geometry: { x: 100, y: 200, spatialReference: { wkid: 102100 } },
        attributes: { stop_name: 'Main', stop_lat: 45.5, stop_lon: '-122.6', row_id: 3, zone_id: 'z1' },
      },
    ]);

    expect(features).toEqual([
      {
        geometry: { x: 100, y: 200, spatialReference: { wkid: 102100 } },
        attributes: { stop_name: 'Main', stop_lat: 45.5, stop_lon: -122.6, row_id: 3 },
      },
    ]);
  });

  it('fills absent attributes with empty text and zero', () => {
    const [feature] = buildStopFeatures([{ geometry: { x: 1, y: 2 }, attributes: { stop_name: null } }]);

    expect(feature).toEqual({
      geometry: { x: 1, y: 2 },
      attributes: { stop_name: '', stop_lat: 0, stop_lon: 0, row_id: 0 },
    });
  });
});

describe('splitShapeCoordinates', () => {
  it('cuts translated points back into one path per line', () => {
    expect(
      splitShapeCoordinates(lines, [
        [10, 20],
        [30, 40],
        [50, 60],
      ])
    ).toEqual([
      [
        [10, 20],
        [30, 40],
      ],
      [[50, 60]],
    ]);
  });

  it('rejects a point count that does not match the lines', () => {
    expect(() => splitShapeCoordinates(lines, [[1, 1]])).toThrow('Expected 3 translated points, got 1');
  });
});

describe('buildShapeFeatures', () => {
  it('builds one polyline per shape keyed by shape id', () => {
    const features = buildShapeFeatures(lines, [[[10, 20], [30, 40]], [[50, 60]]], 102100);

    expect(features).toEqual([
      {
        geometry: {
          paths: [
            [
              [10, 20],
              [30, 40],
            ],
          ],
          spatialReference: { wkid: 102100 },
        },
        attributes: { shape_id: 'A', row_id: 'A' },
      },
      {
        geometry: { paths: [[[50, 60]]], spatialReference: { wkid: 102100 } },
        attributes: { shape_id: 'B', row_id: 'B' },
      },
    ]);
  });

  it('omits the spatial reference when none is given', () => {
    const [feature] = buildShapeFeatures([{ shapeId: 'B', coordinates: [[5, 6]] }], [[[50, 60]]]);
    expect(feature?.geometry).toEqual({ paths: [[[50, 60]]] });
  });
});
