/**
 * Portal Connection
 *
 * The remote-connection contract the publish pipeline is written against,
 * and its implementation over the ArcGIS sharing REST API.
 *
 * CONCURRENCY: connections hold no mutable state. One instance is shared by
 * every concurrent task; `forService()` derives a new immutable connection
 * scoped to a created feature service.
 */

import type {
  AddFeaturesResult,
  CreatedService,
  EsriFeature,
  GeneratedFeature,
  ItemUpload,
  LayerDefinition,
  PortalGroup,
  PortalItem,
  PublishParameters,
  ServiceDefinition,
  ShareOptions,
} from '../core/types/index.js';
import { RemoteCallError } from '../core/errors.js';
import type { PortalCredentials } from '../core/config.js';
import { PortalHttpClient } from './http-client.js';
import {
  AddFeaturesResponseSchema,
  AddItemResponseSchema,
  AnalyzeResponseSchema,
  CreateGroupResponseSchema,
  CreateServiceResponseSchema,
  GenerateResponseSchema,
  ShareResponseSchema,
  SuccessResponseSchema,
} from './schemas.js';

// ============================================================================
// Contract
// ============================================================================

export interface CreateGroupParams {
  readonly title: string;
  readonly access: 'private' | 'org' | 'account' | 'public';
  readonly description: string;
}

/**
 * Connection scoped to one hosted feature service
 */
export interface FeatureServiceConnection {
  readonly service: CreatedService;

  /** Append layers to the service definition */
  addToDefinition(layers: readonly LayerDefinition[]): Promise<void>;

  /** Append features to a layer of the service */
  addFeatures(layerId: number, features: readonly EsriFeature[]): Promise<AddFeaturesResult>;
}

/**
 * Authenticated portal handle. Every call may reject with RemoteCallError.
 */
export interface RemoteConnection {
  createGroup(params: CreateGroupParams): Promise<PortalGroup>;

  addItem(upload: ItemUpload): Promise<PortalItem>;

  createFeatureService(definition: ServiceDefinition): Promise<CreatedService>;

  forService(service: CreatedService): FeatureServiceConnection;

  /** Infer publish parameters from delimited text */
  analyze(csv: string): Promise<PublishParameters>;

  /** Generate one projected feature per input row */
  generate(csv: string, publishParameters: PublishParameters): Promise<GeneratedFeature[]>;

  shareItem(itemId: string, options: ShareOptions): Promise<void>;
}

// ============================================================================
// ArcGIS REST implementation
// ============================================================================

/**
 * `.../rest/services/Name/FeatureServer` -> `.../rest/admin/services/Name/FeatureServer`
 */
export function toAdminServiceUrl(serviceUrl: string): string {
  return serviceUrl.replace('/rest/services/', '/rest/admin/services/');
}

class ArcGISFeatureServiceConnection implements FeatureServiceConnection {
  constructor(
    readonly service: CreatedService,
    private readonly http: PortalHttpClient
  ) {}

  async addToDefinition(layers: readonly LayerDefinition[]): Promise<void> {
    const response = await this.http.postForm(
      'addToDefinition',
      `${toAdminServiceUrl(this.service.serviceUrl)}/addToDefinition`,
      { addToDefinition: JSON.stringify({ layers }) },
      SuccessResponseSchema
    );
    if (!response.success) {
      throw new RemoteCallError('addToDefinition', `service ${this.service.name} rejected the layer definitions`);
    }
  }

  async addFeatures(layerId: number, features: readonly EsriFeature[]): Promise<AddFeaturesResult> {
    const operation = `addFeatures(layer ${layerId})`;
    const response = await this.http.postForm(
      operation,
      `${this.service.serviceUrl}/${layerId}/addFeatures`,
      { features: JSON.stringify(features), rollbackOnFailure: true },
      AddFeaturesResponseSchema
    );

    const rejected = response.addResults.filter((result) => !result.success);
    if (rejected.length > 0) {
      throw new RemoteCallError(
        operation,
        `${rejected.length} of ${features.length} features rejected`,
        rejected[0]?.error?.code,
        rejected.map((result) => result.error?.description ?? 'unknown error')
      );
    }

    const objectIds = response.addResults.flatMap((result) =>
      result.objectId === undefined ? [] : [result.objectId]
    );
    return { added: response.addResults.length, objectIds };
  }
}

/**
 * Connection to an ArcGIS Online or Enterprise portal
 *
 * @example
 * ```typescript
 * const connection = new ArcGISConnection({
 *   url: 'https://www.arcgis.com',
 *   username: 'transit_admin',
 *   token: process.env.ARCGIS_TOKEN ?? '',
 * });
 * const group = await connection.createGroup({ title: 'GTFS Import', access: 'account', description: '' });
 * ```
 */
export class ArcGISConnection implements RemoteConnection {
  private readonly restBase: string;
  private readonly http: PortalHttpClient;

  constructor(
    private readonly credentials: PortalCredentials,
    http?: PortalHttpClient
  ) {
    this.restBase = `${credentials.url.replace(/\/+$/, '')}/sharing/rest`;
    this.http = http ?? new PortalHttpClient({ token: credentials.token });
  }

  private get userContent(): string {
    return `${this.restBase}/content/users/${encodeURIComponent(this.credentials.username)}`;
  }

  async createGroup(params: CreateGroupParams): Promise<PortalGroup> {
    const response = await this.http.postForm(
      'createGroup',
      `${this.restBase}/community/createGroup`,
      { title: params.title, access: params.access, description: params.description },
      CreateGroupResponseSchema
    );
    return response.group;
  }

  async addItem(upload: ItemUpload): Promise<PortalItem> {
    const form = new FormData();
    form.set('title', upload.title);
    form.set('type', upload.type);
    form.set('tags', upload.tags.join(','));
    form.set('file', new Blob([upload.content], { type: 'text/plain' }), upload.fileName);

    const response = await this.http.postMultipart(
      `addItem(${upload.fileName})`,
      `${this.userContent}/addItem`,
      form,
      AddItemResponseSchema
    );
    return { id: response.id };
  }

  async createFeatureService(definition: ServiceDefinition): Promise<CreatedService> {
    const response = await this.http.postForm(
      'createService',
      `${this.userContent}/createService`,
      { createParameters: JSON.stringify(definition), outputType: 'featureService' },
      CreateServiceResponseSchema
    );
    return {
      itemId: response.itemId,
      serviceUrl: response.serviceurl,
      name: response.name ?? definition.name,
    };
  }

  forService(service: CreatedService): FeatureServiceConnection {
    return new ArcGISFeatureServiceConnection(service, this.http);
  }

  async analyze(csv: string): Promise<PublishParameters> {
    const response = await this.http.postForm(
      'analyze',
      `${this.restBase}/content/features/analyze`,
      {
        filetype: 'csv',
        text: csv,
        analyzeParameters: JSON.stringify({ enableGlobalGeocoding: false, sourceLocale: 'en' }),
      },
      AnalyzeResponseSchema
    );
    return response.publishParameters;
  }

  async generate(csv: string, publishParameters: PublishParameters): Promise<GeneratedFeature[]> {
    const response = await this.http.postForm(
      'generate',
      `${this.restBase}/content/features/generate`,
      { filetype: 'csv', text: csv, publishParameters: JSON.stringify(publishParameters) },
      GenerateResponseSchema
    );
    return response.featureCollection.layers.flatMap((layer) => layer.featureSet.features);
  }

  async shareItem(itemId: string, options: ShareOptions): Promise<void> {
    const response = await this.http.postForm(
      `share(${itemId})`,
      `${this.userContent}/items/${encodeURIComponent(itemId)}/share`,
      { groups: options.groups.join(','), everyone: options.everyone, org: options.org },
      ShareResponseSchema
    );
    if (response.notSharedWith.length > 0) {
      throw new RemoteCallError(`share(${itemId})`, `not shared with ${response.notSharedWith.join(', ')}`);
    }
  }
}
