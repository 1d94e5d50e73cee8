/**
 * Record parser tests
 */

import { describe, it, expect } from 'vitest';
import {
  parseInteger,
  parseNumber,
  parseRoutes,
  parseShapePoints,
  parseStops,
  parseTrips,
} from '../../../gtfs/record-parser.js';

describe('parseNumber', () => {
  it('parses decimals and leading numeric text', () => {
    expect(parseNumber('-74.006')).toBe(-74.006);
    expect(parseNumber('12.5abc')).toBe(12.5);
  });

  it('reads malformed or missing text as zero', () => {
    expect(parseNumber('abc')).toBe(0);
    expect(parseNumber('')).toBe(0);
    expect(parseNumber(undefined)).toBe(0);
  });
});

describe('parseInteger', () => {
  it('truncates to the leading integer', () => {
    expect(parseInteger('7.9')).toBe(7);
    expect(parseInteger('12')).toBe(12);
  });

  it('reads malformed text as zero', () => {
    expect(parseInteger('x')).toBe(0);
    expect(parseInteger(undefined)).toBe(0);
  });
});

describe('record parsing', () => {
  it('parses shape points', () => {
    expect(
      parseShapePoints([
        { shape_id: 's1', shape_pt_lat: '40.1', shape_pt_lon: '-73.2', shape_pt_sequence: '3', shape_dist_traveled: '' },
      ])
    ).toEqual([{ shapeId: 's1', lat: 40.1, lon: -73.2, sequence: 3, distTraveled: 0 }]);
  });

  it('parses routes with missing optional fields', () => {
    expect(parseRoutes([{ route_id: 'r1', route_type: '3' }])).toEqual([
      { routeId: 'r1', shortName: '', longName: '', routeType: 3, color: '', textColor: '' },
    ]);
  });

  it('parses trips', () => {
    expect(parseTrips([{ trip_id: 't1', route_id: 'r1', service_id: 'weekday' }])).toEqual([
      { tripId: 't1', routeId: 'r1', serviceId: 'weekday', shapeId: '' },
    ]);
  });

  it('parses stops', () => {
    expect(parseStops([{ stop_id: 's1', stop_name: 'Main St', stop_lat: '40.7128', stop_lon: 'bad' }])).toEqual([
      { stopId: 's1', name: 'Main St', lat: 40.7128, lon: 0 },
    ]);
  });
});
