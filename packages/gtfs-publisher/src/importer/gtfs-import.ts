/**
 * GTFS Import
 *
 * Runs a whole import of one bundle:
 * 1. extract into a run-owned temporary directory (removed on every exit path)
 * 2. validate required files; a missing file aborts before any upload
 * 3. resolve the target group, creating "GTFS Import" when none is configured
 * 4. one task graph holding:
 *    - a CSV item per recognized file, shared once created
 *    - a KML rendering of the feed, when a KML writer is available
 *    - the feature service publish steps
 * 5. wait for every task, then report all failures together
 */

import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { DEFAULT_GROUP, ITEM_TAGS } from '../core/constants.js';
import type { PublisherConfig, PublishingOptions } from '../core/config.js';
import { DEFAULT_PUBLISHING_OPTIONS, DEFAULT_SERVICE_NAME } from '../core/config.js';
import { ImportFailedError } from '../core/errors.js';
import type { GtfsFile, ShareOptions } from '../core/types/index.js';
import { createLogger } from '../core/utils/logger.js';
import { ArcGISConnection, type RemoteConnection } from '../arcgis/connection.js';
import { TaskGraph } from '../concurrency/task-graph.js';
import { WorkerPool } from '../concurrency/worker-pool.js';
import { classifyFiles, extractArchive, loadFeed, validateGtfsFiles, withTempDir } from '../gtfs/archive.js';
import { registerPublishTasks, toImportResult, type ImportResult } from '../publishing/publish-orchestrator.js';
import { CommandKmlWriter, type KmlWriter } from './kml-writer.js';

const log = createLogger({ module: 'import' });

export interface ImportOptions {
  readonly archivePath: string;
  readonly connection: RemoteConnection;
  /** Existing group to share into; a new group is created when omitted */
  readonly groupId?: string;
  readonly serviceName?: string;
  readonly publishing?: PublishingOptions;
  /** KML rendering is skipped when omitted */
  readonly kmlWriter?: KmlWriter;
}

export interface RegistrationContext {
  readonly graph: TaskGraph;
  readonly pool: WorkerPool;
  readonly connection: RemoteConnection;
  readonly share: ShareOptions;
}

const shareWith = (groupId: string): ShareOptions => ({ groups: [groupId], everyone: true, org: true });

/**
 * Upload each file as-is as a CSV item, then share it
 */
export function registerRawFileTasks(context: RegistrationContext, files: readonly GtfsFile[]): void {
  const { graph, pool, connection, share } = context;

  for (const file of files) {
    const created = graph.add(`createItem:${file.fileName}`, [], async () => {
      const content = await readFile(file.path, 'utf8');
      return pool.execute(() =>
        connection.addItem({ title: file.name, type: 'CSV', tags: ITEM_TAGS, fileName: file.fileName, content })
      );
    });

    graph.add(`shareItem:${file.fileName}`, [created], () =>
      pool.execute(() => connection.shareItem(created.result.id, share))
    );
  }
}

/**
 * Render the bundle to KML, upload it as an item, then share it
 */
export function registerKmlTasks(
  context: RegistrationContext,
  kmlWriter: KmlWriter,
  archivePath: string,
  outputPath: string
): void {
  const { graph, pool, connection, share } = context;

  const generateKml = graph.add('generateKml', [], async () => {
    const written = await kmlWriter.generate(archivePath, outputPath);
    if (!written) {
      throw new Error(`KML generation failed for ${archivePath}`);
    }
    return outputPath;
  });

  const createKmlItem = graph.add('createKmlItem', [generateKml], async () => {
    const content = await readFile(generateKml.result, 'utf8');
    return pool.execute(() =>
      connection.addItem({ title: 'gtfs.kml', type: 'KML', tags: ITEM_TAGS, fileName: 'gtfs.kml', content })
    );
  });

  graph.add('shareKml', [createKmlItem], () =>
    pool.execute(() => connection.shareItem(createKmlItem.result.id, share))
  );
}

/**
 * Import a GTFS bundle
 *
 * @throws GtfsValidationError when required files are missing (nothing uploaded)
 * @throws ImportFailedError after all tasks resolved, when any failed
 */
export async function importGtfs(options: ImportOptions): Promise<ImportResult> {
  const { archivePath, connection } = options;
  const publishing = options.publishing ?? DEFAULT_PUBLISHING_OPTIONS;

  return withTempDir('gtfs-import-', async (dir) => {
    const extracted = await extractArchive(archivePath, dir);
    validateGtfsFiles(extracted);

    const files = classifyFiles(extracted);
    const feed = await loadFeed(files);

    let groupId = options.groupId;
    if (groupId === undefined) {
      log.info('Creating GTFS group', { title: DEFAULT_GROUP.title });
      groupId = (await connection.createGroup(DEFAULT_GROUP)).id;
    }

    const graph = new TaskGraph();
    const pool = new WorkerPool({ name: 'import', maxConcurrent: publishing.concurrency });
    const context: RegistrationContext = { graph, pool, connection, share: shareWith(groupId) };

    registerRawFileTasks(context, files);
    if (options.kmlWriter) {
      registerKmlTasks(context, options.kmlWriter, archivePath, join(dir, 'gtfs.kml'));
    } else {
      log.info('No KML writer configured, skipping KML item');
    }
    registerPublishTasks(graph, {
      groupId,
      connection,
      feed,
      serviceName: options.serviceName ?? DEFAULT_SERVICE_NAME,
      options: publishing,
      pool,
    });

    log.info('Running import', { archivePath, files: files.length, tasks: graph.size });
    const result = toImportResult(await graph.run());

    if (!result.success) {
      for (const failure of result.failures) {
        log.error('Import task failed', { reason: failure });
      }
      throw new ImportFailedError(result.failures);
    }

    log.info('Everything has been imported successfully', { tasks: result.succeededTasks.length });
    return result;
  });
}

/**
 * Import using environment configuration and the ArcGIS REST connection
 */
export function importFromConfig(config: PublisherConfig, archivePath: string): Promise<ImportResult> {
  return importGtfs({
    archivePath,
    connection: new ArcGISConnection(config.portal),
    groupId: config.groupId,
    serviceName: config.serviceName,
    publishing: config.publishing,
    kmlWriter: config.kmlWriterPath ? new CommandKmlWriter(config.kmlWriterPath) : undefined,
  });
}
