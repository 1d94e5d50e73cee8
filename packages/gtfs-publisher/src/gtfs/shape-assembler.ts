/**
 * Shape Assembler
 *
 * Groups shape points by shape id and orders each group by
 * `shape_pt_sequence`. Ids keep the order they were first seen in.
 */

import type { CsvRow, LatLon, ShapeLine, ShapePoint } from '../core/types/index.js';
import { parseShapePoints } from './record-parser.js';

/**
 * Group points by shape id, preserving first-seen id order
 */
export function groupShapePoints(points: readonly ShapePoint[]): Map<string, ShapePoint[]> {
  const groups = new Map<string, ShapePoint[]>();
  for (const point of points) {
    const group = groups.get(point.shapeId);
    if (group) {
      group.push(point);
    } else {
      groups.set(point.shapeId, [point]);
    }
  }
  return groups;
}

/**
 * Yield one line per distinct shape id.
 *
 * Points within a line are stably sorted by sequence, so equal sequences
 * keep their input order. The generator is single-pass: materialize it
 * before anything needs the lines twice.
 */
export function* assembleShapes(rows: readonly CsvRow[]): Generator<ShapeLine, void, undefined> {
  for (const [shapeId, points] of groupShapePoints(parseShapePoints(rows))) {
    const ordered = [...points].sort((a, b) => a.sequence - b.sequence);
    yield {
      shapeId,
      coordinates: ordered.map((point): LatLon => [point.lat, point.lon]),
    };
  }
}

export function materializeShapes(rows: readonly CsvRow[]): ShapeLine[] {
  return Array.from(assembleShapes(rows));
}
