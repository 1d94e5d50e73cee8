/**
 * Batch Coordinate Translator
 *
 * Projects latitude/longitude rows into the target spatial reference using
 * the portal's analyze and generate endpoints.
 *
 * PROTOCOL:
 * 1. analyze runs once over the whole table, so every chunk shares the same
 *    publish parameters
 * 2. the table is split into chunks of at most `chunkSize` rows
 * 3. each chunk is one generate call, carrying the shared parameters plus a
 *    descriptor naming the latitude and longitude columns
 * 4. chunk outputs are concatenated in chunk order
 *
 * Chunks run concurrently through the worker pool. Every row carries a
 * `row_id` pairing key; output whose keys do not line up with the input
 * positions is rejected with CoordinateOrderError.
 */

import { MAX_CHUNK_SIZE, ROW_ID_FIELD } from '../core/constants.js';
import { CoordinateOrderError } from '../core/errors.js';
import type { GeneratedFeature, LatLon, LocationDescriptor, PublishParameters, XY } from '../core/types/index.js';
import { chunk } from '../core/utils/chunk.js';
import { createLogger } from '../core/utils/logger.js';
import type { RemoteConnection } from '../arcgis/connection.js';
import { joinChunks } from '../concurrency/join-chunks.js';
import type { WorkerPool } from '../concurrency/worker-pool.js';
import { toCsv } from '../gtfs/csv.js';

const log = createLogger({ module: 'coordinate-translator' });

export type TableRow = Readonly<Record<string, string | number>>;

/**
 * Tabular input for analyze/generate
 */
export interface CoordinateTable {
  /** Columns to send, not including the pairing key */
  readonly columns: readonly string[];
  readonly latitudeField: string;
  readonly longitudeField: string;
  readonly rows: readonly TableRow[];
}

/**
 * A contiguous slice of a table, remembering where it starts
 */
export interface CoordinateBatch {
  readonly index: number;
  readonly offset: number;
  readonly rows: readonly TableRow[];
}

export interface TranslatorOptions {
  readonly chunkSize: number;
  readonly targetWkid: number;
}

/**
 * Numeric value of a generated row's pairing key, or null if absent
 */
function rowNumber(feature: GeneratedFeature): number | null {
  const value = feature.attributes[ROW_ID_FIELD];
  if (typeof value === 'number') return value;
  if (typeof value === 'string' && value.trim() !== '' && Number.isFinite(Number(value))) return Number(value);
  return null;
}

/**
 * Check generated output against the batch it was produced from
 */
export function verifyBatchOrder(batch: CoordinateBatch, features: readonly GeneratedFeature[]): void {
  batch.rows.forEach((_, position) => {
    const expected = batch.offset + position;
    const feature = features[position];
    if (feature === undefined) {
      throw new CoordinateOrderError(expected, null);
    }
    const received = rowNumber(feature);
    if (received !== expected) {
      throw new CoordinateOrderError(expected, received);
    }
  });

  const extra = features[batch.rows.length];
  if (extra !== undefined) {
    throw new CoordinateOrderError(batch.offset + batch.rows.length, rowNumber(extra));
  }
}

export class BatchCoordinateTranslator {
  private readonly options: TranslatorOptions;

  constructor(
    private readonly connection: RemoteConnection,
    private readonly pool: WorkerPool,
    options: TranslatorOptions
  ) {
    if (options.chunkSize < 1 || options.chunkSize > MAX_CHUNK_SIZE) {
      throw new RangeError(`Chunk size must be between 1 and ${MAX_CHUNK_SIZE}, got ${options.chunkSize}`);
    }
    this.options = options;
  }

  private toText(table: CoordinateTable, rows: readonly TableRow[], offset: number): string {
    return toCsv(
      [...table.columns, ROW_ID_FIELD],
      rows.map((row, position) => ({ ...row, [ROW_ID_FIELD]: offset + position }))
    );
  }

  /**
   * Infer publish parameters from the full table, targeting the configured
   * spatial reference
   */
  async analyze(table: CoordinateTable): Promise<PublishParameters> {
    const text = this.toText(table, table.rows, 0);
    const inferred = await this.pool.execute(() => this.connection.analyze(text));
    log.debug('Analyzed table', { rows: table.rows.length });
    return { ...inferred, targetSR: { wkid: this.options.targetWkid } };
  }

  batches(table: CoordinateTable): CoordinateBatch[] {
    return chunk(table.rows, this.options.chunkSize).map((rows, index) => ({
      index,
      offset: index * this.options.chunkSize,
      rows,
    }));
  }

  /**
   * Generate one batch. Output is in input order or the call fails.
   */
  async generateBatch(
    table: CoordinateTable,
    batch: CoordinateBatch,
    parameters: PublishParameters
  ): Promise<GeneratedFeature[]> {
    const location: LocationDescriptor = {
      locationType: 'coordinates',
      latitudeFieldName: table.latitudeField,
      longitudeFieldName: table.longitudeField,
    };
    const text = this.toText(table, batch.rows, batch.offset);

    const features = await this.pool.execute(() =>
      this.connection.generate(text, { ...parameters, ...location })
    );
    verifyBatchOrder(batch, features);
    return features;
  }

  /**
   * Analyze once and generate every batch, concatenated in input order.
   * A failed batch fails the whole translation once every batch has settled.
   */
  async generateAll(table: CoordinateTable): Promise<GeneratedFeature[]> {
    if (table.rows.length === 0) {
      return [];
    }

    const parameters = await this.analyze(table);
    const outputs = await joinChunks(
      this.batches(table).map((batch) => this.generateBatch(table, batch, parameters))
    );
    return outputs.flat();
  }

  /**
   * Project `[lat, lon]` pairs to `[x, y]`, same length and order as the input
   */
  async translate(coordinates: readonly LatLon[]): Promise<XY[]> {
    const table: CoordinateTable = {
      columns: ['latitude', 'longitude'],
      latitudeField: 'latitude',
      longitudeField: 'longitude',
      rows: coordinates.map(([latitude, longitude]) => ({ latitude, longitude })),
    };

    const features = await this.generateAll(table);
    return features.map((feature): XY => [feature.geometry.x, feature.geometry.y]);
  }
}
