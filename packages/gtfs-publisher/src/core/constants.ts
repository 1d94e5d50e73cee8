/**
 * GTFS Publisher Constants
 */

import type { Rgba } from './types/index.js';

/**
 * Files a bundle must contain before anything is uploaded
 */
export const REQUIRED_FILES = [
  'agency.txt',
  'stops.txt',
  'routes.txt',
  'trips.txt',
  'stop_times.txt',
  'calendar.txt',
] as const;

/**
 * Recognized optional files. Anything outside both lists is ignored.
 */
export const OPTIONAL_FILES = [
  'calendar_dates.txt',
  'fare_attributes.txt',
  'fare_rules.txt',
  'shapes.txt',
  'frequencies.txt',
  'transfers.txt',
  'feed_info.txt',
] as const;

/** Mid-grey, used when a route color is empty or malformed */
export const DEFAULT_ROUTE_COLOR: Rgba = [136, 136, 136, 255];

/** Upper bound on records per analyze/generate/addFeatures payload */
export const MAX_CHUNK_SIZE = 1000;

/** Web Mercator */
export const DEFAULT_TARGET_WKID = 102100;

export const DEFAULT_PORTAL_URL = 'https://www.arcgis.com';

export const DEFAULT_GROUP = {
  title: 'GTFS Import',
  access: 'account',
  description: 'An import of GTFS data',
} as const;

export const ITEM_TAGS = ['gtfs'] as const;

/** Layer ids inside the published feature service */
export const STOPS_LAYER_ID = 0;
export const SHAPES_LAYER_ID = 1;

/** Synthetic identifier column carried by every published feature */
export const ROW_ID_FIELD = 'row_id';
