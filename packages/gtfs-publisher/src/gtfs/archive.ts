/**
 * GTFS Archive Handling
 *
 * Extraction of a bundle into a run-owned temporary directory, file
 * classification against the GTFS reference, and loading the files the
 * publish pipeline consumes.
 */

import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { basename, join } from 'node:path';
import AdmZip from 'adm-zip';
import { OPTIONAL_FILES, REQUIRED_FILES } from '../core/constants.js';
import { GtfsValidationError } from '../core/errors.js';
import type { GtfsFile, GtfsFileKind, ParsedFeed } from '../core/types/index.js';
import { createLogger } from '../core/utils/logger.js';
import { parseCsv } from './csv.js';
import { parseRoutes, parseStops, parseTrips } from './record-parser.js';

const log = createLogger({ module: 'archive' });

export interface ExtractedFile {
  readonly fileName: string;
  readonly path: string;
}

/**
 * Run `fn` with a fresh temporary directory that is removed afterwards,
 * whether `fn` resolves or throws.
 */
export async function withTempDir<T>(prefix: string, fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await mkdtemp(join(tmpdir(), prefix));
  try {
    return await fn(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

/**
 * Extract every file member of a zip archive into `dir`.
 *
 * Members are flattened to their base name, as GTFS bundles are flat.
 * Content is written back as UTF-8 text.
 */
export async function extractArchive(zipPath: string, dir: string): Promise<ExtractedFile[]> {
  const zip = new AdmZip(zipPath);
  const files: ExtractedFile[] = [];

  for (const entry of zip.getEntries()) {
    if (entry.isDirectory) {
      continue;
    }

    const fileName = basename(entry.entryName);
    const path = join(dir, fileName);
    await writeFile(path, entry.getData().toString('utf8'), 'utf8');
    files.push({ fileName, path });
  }

  log.debug('Extracted archive', { zipPath, files: files.length });
  return files;
}

/**
 * `stop_times.txt` -> `Stop Times`
 */
export function displayName(fileName: string): string {
  return fileName
    .replace(/\.txt$/, '')
    .split('_')
    .map((part) => part.charAt(0).toUpperCase() + part.slice(1))
    .join(' ');
}

const requiredFiles = new Set<string>(REQUIRED_FILES);
const optionalFiles = new Set<string>(OPTIONAL_FILES);

function fileKind(fileName: string): GtfsFileKind | null {
  if (requiredFiles.has(fileName)) return 'required';
  if (optionalFiles.has(fileName)) return 'optional';
  return null;
}

/**
 * Throw if any required file is absent
 */
export function validateGtfsFiles(files: readonly ExtractedFile[]): void {
  const present = new Set(files.map((file) => file.fileName));
  const missing = REQUIRED_FILES.filter((name) => !present.has(name));
  if (missing.length > 0) {
    throw new GtfsValidationError(missing);
  }
}

/**
 * Keep only recognized GTFS files, tagged with their kind
 */
export function classifyFiles(files: readonly ExtractedFile[]): GtfsFile[] {
  const recognized: GtfsFile[] = [];
  for (const file of files) {
    const kind = fileKind(file.fileName);
    if (kind === null) {
      log.debug('Ignoring nonstandard file', { fileName: file.fileName });
      continue;
    }
    recognized.push({ name: displayName(file.fileName), fileName: file.fileName, fileKind: kind, path: file.path });
  }
  return recognized;
}

async function readRows(files: readonly GtfsFile[], fileName: string) {
  const file = files.find((f) => f.fileName === fileName);
  return file ? parseCsv(await readFile(file.path, 'utf8')) : [];
}

/**
 * Load the files the publish pipeline consumes
 */
export async function loadFeed(files: readonly GtfsFile[]): Promise<ParsedFeed> {
  const [stops, routes, trips, shapes] = await Promise.all([
    readRows(files, 'stops.txt'),
    readRows(files, 'routes.txt'),
    readRows(files, 'trips.txt'),
    readRows(files, 'shapes.txt'),
  ]);

  return {
    stops: parseStops(stops),
    routes: parseRoutes(routes),
    trips: parseTrips(trips),
    shapes,
  };
}
