/**
 * Feature service definition tests
 */

import { describe, it, expect } from 'vitest';
import {
  buildLayerDefinitions,
  buildServiceDefinition,
  shapesLayerDefinition,
} from '../../../publishing/service-definition.js';
import { lineSymbol } from '../../../gtfs/shape-styling.js';

describe('buildServiceDefinition', () => {
  it('names the service and sets its spatial reference', () => {
    const definition = buildServiceDefinition('GTFS Stops', 3857);

    expect(definition.name).toBe('GTFS Stops');
    expect(definition.spatialReference).toEqual({ wkid: 3857 });
    expect(definition.maxRecordCount).toBe(1000);
  });
});

describe('buildLayerDefinitions', () => {
  it('defines only the stops layer for a feed without shapes', () => {
    const layers = buildLayerDefinitions(false, []);

    expect(layers.map((layer) => [layer.id, layer.name, layer.geometryType])).toEqual([
      [0, 'Stops', 'esriGeometryPoint'],
    ]);
    expect(layers[0]?.fields.map((field) => field.name)).toEqual(['FID', 'stop_name', 'stop_lat', 'stop_lon', 'row_id']);
  });

  it('adds the shapes layer when the feed has shapes', () => {
    const layers = buildLayerDefinitions(true, []);

    expect(layers.map((layer) => [layer.id, layer.name, layer.geometryType])).toEqual([
      [0, 'Stops', 'esriGeometryPoint'],
      [1, 'Routes', 'esriGeometryPolyline'],
    ]);
  });
});

describe('shapesLayerDefinition', () => {
  it('renders each shape with its own symbol and grey otherwise', () => {
    const symbols = [{ value: 'A', label: 'A', symbol: lineSymbol([255, 0, 0, 255]) }];

    expect(shapesLayerDefinition(symbols).drawingInfo.renderer).toEqual({
      type: 'uniqueValue',
      field1: 'shape_id',
      defaultSymbol: { type: 'esriSLS', style: 'esriSLSSolid', color: [136, 136, 136, 255], width: 2 },
      uniqueValueInfos: [
        {
          value: 'A',
          label: 'A',
          symbol: { type: 'esriSLS', style: 'esriSLSSolid', color: [255, 0, 0, 255], width: 2 },
        },
      ],
    });
  });
});
