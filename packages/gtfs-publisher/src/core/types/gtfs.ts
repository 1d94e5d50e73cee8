/**
 * GTFS Record Types
 *
 * Typed views over the delimited text files of a GTFS bundle.
 * All records are immutable once parsed.
 */

import type { LatLon, Rgba } from './geometry.js';

/**
 * Whether a file is mandated by the GTFS reference or merely recognized
 */
export type GtfsFileKind = 'required' | 'optional';

/**
 * A recognized file extracted from a GTFS bundle
 */
export interface GtfsFile {
  /** Display title derived from the file name (`stop_times.txt` -> `Stop Times`) */
  readonly name: string;
  /** Member name inside the archive (`stops.txt`) */
  readonly fileName: string;
  readonly fileKind: GtfsFileKind;
  /** Location of the extracted, UTF-8 decoded content */
  readonly path: string;
}

/**
 * A delimited row keyed by header name. Numeric fields are still text.
 */
export type CsvRow = Readonly<Record<string, string>>;

export interface ShapePoint {
  readonly shapeId: string;
  readonly lat: number;
  readonly lon: number;
  readonly sequence: number;
  readonly distTraveled: number;
}

/**
 * All points of one shape, ordered by ascending sequence (ties in input order)
 */
export interface ShapeLine {
  readonly shapeId: string;
  readonly coordinates: readonly LatLon[];
}

export interface RouteRecord {
  readonly routeId: string;
  readonly shortName: string;
  readonly longName: string;
  readonly routeType: number;
  /** Raw six-digit hex color, possibly empty or malformed */
  readonly color: string;
  readonly textColor: string;
}

export interface TripRecord {
  readonly tripId: string;
  readonly routeId: string;
  readonly serviceId: string;
  /** Empty when the trip has no shape */
  readonly shapeId: string;
}

export interface StopRecord {
  readonly stopId: string;
  readonly name: string;
  readonly lat: number;
  readonly lon: number;
}

export interface RouteColor {
  readonly routeId: string;
  readonly rgba: Rgba;
}

/**
 * Parsed contents of a feed, as consumed by the publish pipeline
 */
export interface ParsedFeed {
  readonly stops: readonly StopRecord[];
  readonly routes: readonly RouteRecord[];
  readonly trips: readonly TripRecord[];
  /** Raw shape rows; empty when the feed ships no shapes.txt */
  readonly shapes: readonly CsvRow[];
}
