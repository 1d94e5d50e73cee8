/**
 * Core Types - Barrel Export
 */

export type { LatLon, XY, Rgba } from './geometry.js';
export type {
  GtfsFileKind,
  GtfsFile,
  CsvRow,
  ShapePoint,
  ShapeLine,
  RouteRecord,
  TripRecord,
  StopRecord,
  RouteColor,
  ParsedFeed,
} from './gtfs.js';
export type {
  PortalGroup,
  PortalItem,
  ShareOptions,
  ItemUpload,
  CreatedService,
  SpatialReference,
  PublishParameters,
  LocationDescriptor,
  GeneratedFeature,
  EsriPointGeometry,
  EsriPolylineGeometry,
  EsriFeature,
  AttributeValue,
  FieldDefinition,
  LayerDefinition,
  ServiceDefinition,
  AddFeaturesResult,
  SimpleLineSymbol,
  SimpleMarkerSymbol,
  UniqueValueInfo,
  Renderer,
} from './portal.js';
