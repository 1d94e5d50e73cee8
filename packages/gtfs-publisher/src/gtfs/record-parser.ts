/**
 * GTFS Record Parser
 *
 * Turns header-keyed rows into typed records. Numeric fields use a
 * leading-number parse; text that holds no number at all reads as 0.
 * Parsing never throws on bad field content.
 */

import type { CsvRow, RouteRecord, ShapePoint, StopRecord, TripRecord } from '../core/types/index.js';

/**
 * Parse a decimal field. `"12.5abc"` reads as 12.5, `"abc"` and `""` as 0.
 */
export function parseNumber(text: string | undefined): number {
  const value = Number.parseFloat(text ?? '');
  return Number.isFinite(value) ? value : 0;
}

/**
 * Parse an integer field. `"7.9"` reads as 7, `"x"` as 0.
 */
export function parseInteger(text: string | undefined): number {
  const value = Number.parseInt(text ?? '', 10);
  return Number.isFinite(value) ? value : 0;
}

const field = (row: CsvRow, name: string): string => row[name] ?? '';

export function parseShapePoints(rows: readonly CsvRow[]): ShapePoint[] {
  return rows.map((row) => ({
    shapeId: field(row, 'shape_id'),
    lat: parseNumber(row.shape_pt_lat),
    lon: parseNumber(row.shape_pt_lon),
    sequence: parseInteger(row.shape_pt_sequence),
    distTraveled: parseNumber(row.shape_dist_traveled),
  }));
}

export function parseRoutes(rows: readonly CsvRow[]): RouteRecord[] {
  return rows.map((row) => ({
    routeId: field(row, 'route_id'),
    shortName: field(row, 'route_short_name'),
    longName: field(row, 'route_long_name'),
    routeType: parseInteger(row.route_type),
    color: field(row, 'route_color'),
    textColor: field(row, 'route_text_color'),
  }));
}

export function parseTrips(rows: readonly CsvRow[]): TripRecord[] {
  return rows.map((row) => ({
    tripId: field(row, 'trip_id'),
    routeId: field(row, 'route_id'),
    serviceId: field(row, 'service_id'),
    shapeId: field(row, 'shape_id'),
  }));
}

export function parseStops(rows: readonly CsvRow[]): StopRecord[] {
  return rows.map((row) => ({
    stopId: field(row, 'stop_id'),
    name: field(row, 'stop_name'),
    lat: parseNumber(row.stop_lat),
    lon: parseNumber(row.stop_lon),
  }));
}
