/**
 * Feature Service Definitions
 *
 * JSON definitions for the hosted service and its layers: stops (points,
 * always present) and shapes (polylines, only when the feed has shapes).
 */

import { DEFAULT_ROUTE_COLOR, MAX_CHUNK_SIZE, ROW_ID_FIELD, SHAPES_LAYER_ID, STOPS_LAYER_ID } from '../core/constants.js';
import type {
  FieldDefinition,
  LayerDefinition,
  ServiceDefinition,
  UniqueValueInfo,
} from '../core/types/index.js';
import { lineSymbol } from '../gtfs/shape-styling.js';

const OBJECT_ID_FIELD = 'FID';

const objectIdField: FieldDefinition = {
  name: OBJECT_ID_FIELD,
  alias: OBJECT_ID_FIELD,
  type: 'esriFieldTypeOID',
  nullable: false,
  editable: false,
};

function stringField(name: string, alias: string, length = 256): FieldDefinition {
  return { name, alias, type: 'esriFieldTypeString', nullable: true, editable: true, length };
}

function doubleField(name: string, alias: string): FieldDefinition {
  return { name, alias, type: 'esriFieldTypeDouble', nullable: true, editable: true };
}

export function buildServiceDefinition(name: string, wkid: number): ServiceDefinition {
  return {
    name,
    serviceDescription: 'GTFS stops and route shapes',
    hasStaticData: false,
    maxRecordCount: MAX_CHUNK_SIZE,
    supportedQueryFormats: 'JSON',
    capabilities: 'Create,Delete,Query,Update,Editing',
    spatialReference: { wkid },
    allowGeometryUpdates: true,
    units: 'esriMeters',
  };
}

export function stopsLayerDefinition(): LayerDefinition {
  return {
    id: STOPS_LAYER_ID,
    name: 'Stops',
    type: 'Feature Layer',
    geometryType: 'esriGeometryPoint',
    objectIdField: OBJECT_ID_FIELD,
    displayField: 'stop_name',
    fields: [
      objectIdField,
      stringField('stop_name', 'Stop Name'),
      doubleField('stop_lat', 'Latitude'),
      doubleField('stop_lon', 'Longitude'),
      { name: ROW_ID_FIELD, alias: 'Row', type: 'esriFieldTypeInteger', nullable: true, editable: true },
    ],
    drawingInfo: {
      renderer: {
        type: 'simple',
        symbol: { type: 'esriSMS', style: 'esriSMSCircle', color: [0, 92, 230, 255], size: 6 },
      },
    },
    maxRecordCount: MAX_CHUNK_SIZE,
  };
}

/**
 * Shapes layer, colored per shape. Shapes without a color fall back to
 * the default grey symbol.
 */
export function shapesLayerDefinition(symbols: readonly UniqueValueInfo[]): LayerDefinition {
  return {
    id: SHAPES_LAYER_ID,
    name: 'Routes',
    type: 'Feature Layer',
    geometryType: 'esriGeometryPolyline',
    objectIdField: OBJECT_ID_FIELD,
    displayField: 'shape_id',
    fields: [objectIdField, stringField('shape_id', 'Shape ID'), stringField(ROW_ID_FIELD, 'Row')],
    drawingInfo: {
      renderer: {
        type: 'uniqueValue',
        field1: 'shape_id',
        defaultSymbol: lineSymbol(DEFAULT_ROUTE_COLOR),
        uniqueValueInfos: symbols,
      },
    },
    maxRecordCount: MAX_CHUNK_SIZE,
  };
}

export function buildLayerDefinitions(
  hasShapes: boolean,
  symbols: readonly UniqueValueInfo[]
): LayerDefinition[] {
  return hasShapes ? [stopsLayerDefinition(), shapesLayerDefinition(symbols)] : [stopsLayerDefinition()];
}
