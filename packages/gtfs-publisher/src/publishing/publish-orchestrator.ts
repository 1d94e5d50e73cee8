/**
 * Concurrent Publish Orchestrator
 *
 * Publishes a parsed feed as a hosted feature service through a fixed task
 * graph:
 *
 * ```
 * createService ──► addLayers ──► uploadStops
 *       │               └───────► uploadShapes   (feeds with shapes only)
 *       └─────────► shareService
 * ```
 *
 * Upload steps fan out one sub-task per chunk and join them before the step
 * resolves. A failed step fails only what depends on it; features already
 * uploaded stay on the service.
 */

import { SHAPES_LAYER_ID, STOPS_LAYER_ID } from '../core/constants.js';
import type { PublishingOptions } from '../core/config.js';
import { DEFAULT_PUBLISHING_OPTIONS } from '../core/config.js';
import type { AddFeaturesResult, EsriFeature, ParsedFeed, ShapeLine } from '../core/types/index.js';
import { chunk } from '../core/utils/chunk.js';
import { createLogger } from '../core/utils/logger.js';
import type { FeatureServiceConnection, RemoteConnection } from '../arcgis/connection.js';
import { joinChunks } from '../concurrency/join-chunks.js';
import { TaskGraph, type TaskGraphResult, type TaskHandle } from '../concurrency/task-graph.js';
import { WorkerPool } from '../concurrency/worker-pool.js';
import { materializeShapes } from '../gtfs/shape-assembler.js';
import { buildShapeColors, buildShapeSymbols } from '../gtfs/shape-styling.js';
import { BatchCoordinateTranslator } from './coordinate-translator.js';
import {
  buildShapeFeatures,
  buildStopFeatures,
  buildStopsTable,
  splitShapeCoordinates,
} from './feature-builder.js';
import { buildLayerDefinitions, buildServiceDefinition } from './service-definition.js';

const log = createLogger({ module: 'publish' });

// ============================================================================
// Types
// ============================================================================

export interface ImportResult extends TaskGraphResult {
  /** True only when no task failed */
  readonly success: boolean;
}

export interface UploadSummary {
  readonly chunks: number;
  readonly added: number;
}

export interface PublishContext {
  /** Group the service is shared with */
  readonly groupId: string;
  readonly connection: RemoteConnection;
  readonly feed: ParsedFeed;
  readonly serviceName: string;
  readonly options: PublishingOptions;
  /** Pool every remote call goes through */
  readonly pool: WorkerPool;
}

export interface PublishTasks {
  readonly createService: TaskHandle<FeatureServiceConnection>;
  readonly addLayers: TaskHandle<number>;
  readonly uploadStops: TaskHandle<UploadSummary>;
  readonly uploadShapes?: TaskHandle<UploadSummary>;
  readonly shareService: TaskHandle<void>;
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Run one upload per chunk concurrently and join them
 */
async function uploadChunks<T>(
  step: string,
  chunks: readonly T[],
  upload: (chunk: T, index: number) => Promise<AddFeaturesResult>
): Promise<UploadSummary> {
  const results = await joinChunks(chunks.map((c, index) => upload(c, index)));
  const added = results.reduce((total, result) => total + result.added, 0);

  log.info('Upload step complete', { step, chunks: chunks.length, added });
  return { chunks: chunks.length, added };
}

export function toImportResult(result: TaskGraphResult): ImportResult {
  return { ...result, success: result.failures.length === 0 };
}

// ============================================================================
// Task registration
// ============================================================================

/**
 * Declare the publish steps on `graph`. Styling and shape assembly run
 * here, before any task, since they are pure and need no remote call.
 */
export function registerPublishTasks(graph: TaskGraph, context: PublishContext): PublishTasks {
  const { connection, feed, options, pool } = context;
  const translator = new BatchCoordinateTranslator(connection, pool, options);

  const lines: ShapeLine[] = materializeShapes(feed.shapes);
  const hasShapes = lines.length > 0;
  const symbols = buildShapeSymbols(
    lines.map((line) => line.shapeId),
    buildShapeColors(feed.routes, feed.trips)
  );

  const createService = graph.add('createService', [], async () => {
    const service = await pool.execute(() =>
      connection.createFeatureService(buildServiceDefinition(context.serviceName, options.targetWkid))
    );
    log.info('Feature service created', { name: service.name, itemId: service.itemId });
    return connection.forService(service);
  });

  const addLayers = graph.add('addLayers', [createService], async () => {
    const layers = buildLayerDefinitions(hasShapes, symbols);
    await pool.execute(() => createService.result.addToDefinition(layers));
    return layers.length;
  });

  const uploadStops = graph.add('uploadStops', [addLayers], async () => {
    const service = createService.result;
    const table = buildStopsTable(feed.stops);
    if (table.rows.length === 0) {
      return { chunks: 0, added: 0 };
    }

    const parameters = await translator.analyze(table);
    return uploadChunks('uploadStops', translator.batches(table), async (batch) => {
      const generated = await translator.generateBatch(table, batch, parameters);
      const features = buildStopFeatures(generated);
      return pool.execute(() => service.addFeatures(STOPS_LAYER_ID, features));
    });
  });

  const uploadShapes = hasShapes
    ? graph.add('uploadShapes', [addLayers], async () => {
        const service = createService.result;
        const translated = await translator.translate(lines.flatMap((line) => line.coordinates));
        const features: EsriFeature[] = buildShapeFeatures(
          lines,
          splitShapeCoordinates(lines, translated),
          options.targetWkid
        );
        return uploadChunks('uploadShapes', chunk(features, options.chunkSize), (batch) =>
          pool.execute(() => service.addFeatures(SHAPES_LAYER_ID, batch))
        );
      })
    : undefined;

  const shareService = graph.add('shareService', [createService], async () => {
    const { itemId } = createService.result.service;
    await pool.execute(() =>
      connection.shareItem(itemId, { groups: [context.groupId], everyone: true, org: true })
    );
  });

  return { createService, addLayers, uploadStops, uploadShapes, shareService };
}

/**
 * Publish a parsed feed as a feature service shared with `groupId`.
 *
 * Resolves once every step is terminal; never rejects for remote failures,
 * which are reported in the result instead.
 */
export async function publish(
  groupId: string,
  connection: RemoteConnection,
  feed: ParsedFeed,
  serviceName: string,
  options: PublishingOptions = DEFAULT_PUBLISHING_OPTIONS
): Promise<ImportResult> {
  const graph = new TaskGraph();
  const pool = new WorkerPool({ name: 'publish', maxConcurrent: options.concurrency });
  registerPublishTasks(graph, { groupId, connection, feed, serviceName, options, pool });

  const result = toImportResult(await graph.run());
  log.info('Publish finished', {
    serviceName,
    success: result.success,
    succeeded: result.succeededTasks.length,
    failures: result.failures.length,
  });
  return result;
}
