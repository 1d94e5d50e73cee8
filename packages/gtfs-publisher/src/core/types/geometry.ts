/**
 * Geometry primitives
 *
 * Flat coordinate pairs only. Source coordinates are WGS84 latitude/longitude,
 * translated coordinates are whatever spatial reference the portal projected
 * them into (Web Mercator by default).
 */

/** Source coordinate as `[latitude, longitude]` */
export type LatLon = readonly [lat: number, lon: number];

/** Projected coordinate as `[x, y]` in the target spatial reference */
export type XY = readonly [x: number, y: number];

/** Color as `[red, green, blue, alpha]`, each channel in 0-255 */
export type Rgba = readonly [r: number, g: number, b: number, a: number];
