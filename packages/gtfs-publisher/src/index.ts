/**
 * GTFS Publisher
 *
 * Batch conversion of GTFS feeds and concurrent publishing to ArcGIS
 * hosted feature services.
 */

export * from './core/types/index.js';
export * from './core/errors.js';
export * from './core/constants.js';
export {
  loadPublisherConfig,
  DEFAULT_PUBLISHING_OPTIONS,
  DEFAULT_SERVICE_NAME,
  type PublisherConfig,
  type PublishingOptions,
  type PortalCredentials,
} from './core/config.js';
export { createLogger, type LogLevel, type LogMetadata } from './core/utils/logger.js';
export { chunk } from './core/utils/chunk.js';

export { parseCsv, toCsv } from './gtfs/csv.js';
export {
  parseNumber,
  parseInteger,
  parseShapePoints,
  parseRoutes,
  parseTrips,
  parseStops,
} from './gtfs/record-parser.js';
export {
  parseRouteColor,
  resolveRouteColors,
  buildRouteColors,
  buildShapeColors,
  buildShapeSymbols,
  lineSymbol,
} from './gtfs/shape-styling.js';
export { assembleShapes, materializeShapes, groupShapePoints } from './gtfs/shape-assembler.js';
export {
  withTempDir,
  extractArchive,
  validateGtfsFiles,
  classifyFiles,
  displayName,
  loadFeed,
  type ExtractedFile,
} from './gtfs/archive.js';

export { WorkerPool, createWorkerPool, type WorkerPoolConfig, type WorkerPoolStats } from './concurrency/worker-pool.js';
export {
  TaskGraph,
  TaskHandle,
  type TaskState,
  type PublishTask,
  type TaskGraphResult,
} from './concurrency/task-graph.js';

export { PortalHttpClient, type PortalHttpClientConfig } from './arcgis/http-client.js';
export {
  ArcGISConnection,
  toAdminServiceUrl,
  type RemoteConnection,
  type FeatureServiceConnection,
  type CreateGroupParams,
} from './arcgis/connection.js';

export {
  BatchCoordinateTranslator,
  verifyBatchOrder,
  type CoordinateTable,
  type CoordinateBatch,
  type TranslatorOptions,
} from './publishing/coordinate-translator.js';
export {
  buildStopsTable,
  buildStopFeatures,
  buildShapeFeatures,
  splitShapeCoordinates,
} from './publishing/feature-builder.js';
export {
  buildServiceDefinition,
  buildLayerDefinitions,
  stopsLayerDefinition,
  shapesLayerDefinition,
} from './publishing/service-definition.js';
export {
  publish,
  registerPublishTasks,
  toImportResult,
  type ImportResult,
  type PublishContext,
  type PublishTasks,
  type UploadSummary,
} from './publishing/publish-orchestrator.js';

export {
  importGtfs,
  importFromConfig,
  registerRawFileTasks,
  registerKmlTasks,
  type ImportOptions,
  type RegistrationContext,
} from './importer/gtfs-import.js';
export { CommandKmlWriter, type KmlWriter } from './importer/kml-writer.js';
