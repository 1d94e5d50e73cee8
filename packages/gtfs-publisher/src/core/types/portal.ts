/**
 * ArcGIS Portal Types
 *
 * Shapes of the values exchanged with the portal's sharing REST API and
 * hosted feature services. Only the fields the publisher reads or writes
 * are modelled; everything else passes through untouched.
 */

import type { Rgba } from './geometry.js';

// ============================================================================
// Portal Content
// ============================================================================

export interface PortalGroup {
  readonly id: string;
  readonly title: string;
}

export interface PortalItem {
  readonly id: string;
}

export interface ShareOptions {
  /** Group ids to share with */
  readonly groups: readonly string[];
  readonly everyone: boolean;
  readonly org: boolean;
}

/**
 * A file uploaded as a portal item
 */
export interface ItemUpload {
  readonly title: string;
  /** Portal item type (`CSV`, `KML`) */
  readonly type: string;
  readonly tags: readonly string[];
  readonly fileName: string;
  readonly content: string;
}

/**
 * A hosted feature service created on the portal
 */
export interface CreatedService {
  readonly itemId: string;
  readonly serviceUrl: string;
  readonly name: string;
}

// ============================================================================
// Analyze / Generate
// ============================================================================

export interface SpatialReference {
  readonly wkid: number;
  readonly latestWkid?: number;
}

/**
 * Schema description inferred by the portal's analyze endpoint.
 *
 * Treated as opaque: the publisher merges a location descriptor and a
 * target spatial reference into it and hands it back to generate.
 */
export type PublishParameters = Readonly<Record<string, unknown>>;

/**
 * Names the two columns holding latitude and longitude
 */
export interface LocationDescriptor {
  readonly locationType: 'coordinates';
  readonly latitudeFieldName: string;
  readonly longitudeFieldName: string;
}

export type AttributeValue = string | number | boolean | null;

/**
 * One row of a generate response: projected point plus echoed attributes
 */
export interface GeneratedFeature {
  readonly geometry: EsriPointGeometry;
  readonly attributes: Readonly<Record<string, AttributeValue>>;
}

// ============================================================================
// Features
// ============================================================================

export interface EsriPointGeometry {
  readonly x: number;
  readonly y: number;
  readonly spatialReference?: SpatialReference;
}

export interface EsriPolylineGeometry {
  readonly paths: ReadonlyArray<ReadonlyArray<readonly [number, number]>>;
  readonly spatialReference?: SpatialReference;
}

export interface EsriFeature<
  G extends EsriPointGeometry | EsriPolylineGeometry = EsriPointGeometry | EsriPolylineGeometry,
> {
  readonly geometry: G;
  readonly attributes: Readonly<Record<string, AttributeValue>>;
}

export interface AddFeaturesResult {
  readonly added: number;
  readonly objectIds: readonly number[];
}

// ============================================================================
// Service Definitions
// ============================================================================

export interface FieldDefinition {
  readonly name: string;
  readonly alias: string;
  readonly type:
    | 'esriFieldTypeOID'
    | 'esriFieldTypeString'
    | 'esriFieldTypeDouble'
    | 'esriFieldTypeInteger';
  readonly nullable: boolean;
  readonly editable: boolean;
  readonly length?: number;
}

export interface SimpleLineSymbol {
  readonly type: 'esriSLS';
  readonly style: 'esriSLSSolid';
  readonly color: Rgba;
  readonly width: number;
}

export interface SimpleMarkerSymbol {
  readonly type: 'esriSMS';
  readonly style: 'esriSMSCircle';
  readonly color: Rgba;
  readonly size: number;
}

export interface UniqueValueInfo {
  readonly value: string;
  readonly label: string;
  readonly symbol: SimpleLineSymbol;
}

export type Renderer =
  | { readonly type: 'simple'; readonly symbol: SimpleMarkerSymbol | SimpleLineSymbol }
  | {
      readonly type: 'uniqueValue';
      readonly field1: string;
      readonly defaultSymbol: SimpleLineSymbol;
      readonly uniqueValueInfos: readonly UniqueValueInfo[];
    };

export interface LayerDefinition {
  readonly id: number;
  readonly name: string;
  readonly type: 'Feature Layer';
  readonly geometryType: 'esriGeometryPoint' | 'esriGeometryPolyline';
  readonly objectIdField: string;
  readonly displayField: string;
  readonly fields: readonly FieldDefinition[];
  readonly drawingInfo: { readonly renderer: Renderer };
  readonly maxRecordCount: number;
}

/**
 * Create parameters for a hosted feature service
 */
export interface ServiceDefinition {
  readonly name: string;
  readonly serviceDescription: string;
  readonly hasStaticData: boolean;
  readonly maxRecordCount: number;
  readonly supportedQueryFormats: string;
  readonly capabilities: string;
  readonly spatialReference: SpatialReference;
  readonly allowGeometryUpdates: boolean;
  readonly units: string;
}
