/**
 * Shape Styling Engine
 *
 * Resolves a color for every shape through trip -> route -> route_color and
 * builds the line symbols used by the shapes layer renderer.
 *
 * Every function here is pure: the same routes and trips always produce the
 * same colors, however many times they are evaluated.
 */

import { DEFAULT_ROUTE_COLOR } from '../core/constants.js';
import type {
  RouteColor,
  RouteRecord,
  Rgba,
  SimpleLineSymbol,
  TripRecord,
  UniqueValueInfo,
} from '../core/types/index.js';

const HEX_COLOR = /^[0-9a-fA-F]{6}$/;

/** Line width, in points, of rendered shapes */
export const SHAPE_LINE_WIDTH = 2;

/**
 * Decode a GTFS `route_color` value.
 *
 * Exactly six hex digits decode to opaque RGB; anything else (empty,
 * wrong length, non-hex characters) yields the default grey.
 */
export function parseRouteColor(hex: string | undefined): Rgba {
  if (hex === undefined || !HEX_COLOR.test(hex)) {
    return DEFAULT_ROUTE_COLOR;
  }

  return [
    Number.parseInt(hex.slice(0, 2), 16),
    Number.parseInt(hex.slice(2, 4), 16),
    Number.parseInt(hex.slice(4, 6), 16),
    255,
  ];
}

export function resolveRouteColors(routes: readonly RouteRecord[]): RouteColor[] {
  return routes.map((route) => ({ routeId: route.routeId, rgba: parseRouteColor(route.color) }));
}

/**
 * Map each route id to its decoded color
 */
export function buildRouteColors(routes: readonly RouteRecord[]): Map<string, Rgba> {
  return resolveRouteColors(routes).reduce(
    (colors, { routeId, rgba }) => colors.set(routeId, rgba),
    new Map<string, Rgba>()
  );
}

/**
 * Map each shape id to the color of the route its trips run on.
 *
 * Trips without a shape, or on a route that does not exist, contribute
 * nothing. When several trips share a shape the last one wins.
 */
export function buildShapeColors(
  routes: readonly RouteRecord[],
  trips: readonly TripRecord[]
): Map<string, Rgba> {
  const routeColors = buildRouteColors(routes);

  return trips.reduce((colors, trip) => {
    const color = routeColors.get(trip.routeId);
    if (trip.shapeId !== '' && color !== undefined) {
      colors.set(trip.shapeId, color);
    }
    return colors;
  }, new Map<string, Rgba>());
}

export function lineSymbol(color: Rgba): SimpleLineSymbol {
  return {
    type: 'esriSLS',
    style: 'esriSLSSolid',
    color,
    width: SHAPE_LINE_WIDTH,
  };
}

/**
 * Unique-value entries for the shapes renderer, in shape order.
 *
 * Shapes without a resolved color get no entry and draw with the
 * renderer's default symbol.
 */
export function buildShapeSymbols(
  shapeIds: Iterable<string>,
  colors: ReadonlyMap<string, Rgba>
): UniqueValueInfo[] {
  const infos: UniqueValueInfo[] = [];
  const seen = new Set<string>();

  for (const shapeId of shapeIds) {
    const color = colors.get(shapeId);
    if (color === undefined || seen.has(shapeId)) {
      continue;
    }
    seen.add(shapeId);
    infos.push({ value: shapeId, label: shapeId, symbol: lineSymbol(color) });
  }

  return infos;
}
