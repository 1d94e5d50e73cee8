/**
 * GTFS Publisher Configuration
 *
 * Loaded from environment variables and validated with zod.
 * The resulting configuration is immutable.
 *
 * Environment variables:
 * - ARCGIS_PORTAL_URL (default https://www.arcgis.com)
 * - ARCGIS_USERNAME, ARCGIS_TOKEN (required; obtaining the token is the caller's job)
 * - GTFS_GROUP_ID (unset: a "GTFS Import" group is created)
 * - GTFS_SERVICE_NAME
 * - GTFS_CHUNK_SIZE, GTFS_PUBLISH_CONCURRENCY, GTFS_TARGET_WKID
 * - GTFS_KML_WRITER (unset: no KML item is produced)
 */

import { z } from 'zod';
import { ConfigurationError } from './errors.js';
import { DEFAULT_PORTAL_URL, DEFAULT_TARGET_WKID, MAX_CHUNK_SIZE } from './constants.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Tuning for the batch translation and upload steps
 */
export interface PublishingOptions {
  /** Records per analyze/generate/addFeatures payload (1-1000) */
  readonly chunkSize: number;

  /** Maximum remote calls in flight at once */
  readonly concurrency: number;

  /** Spatial reference generated geometry is projected into */
  readonly targetWkid: number;
}

export interface PortalCredentials {
  readonly url: string;
  readonly username: string;
  readonly token: string;
}

export interface PublisherConfig {
  readonly portal: PortalCredentials;
  readonly groupId?: string;
  readonly serviceName: string;
  readonly publishing: PublishingOptions;
  readonly kmlWriterPath?: string;
}

export const DEFAULT_PUBLISHING_OPTIONS: PublishingOptions = {
  chunkSize: MAX_CHUNK_SIZE,
  concurrency: 8,
  targetWkid: DEFAULT_TARGET_WKID,
};

export const DEFAULT_SERVICE_NAME = 'GTFS Stops';

// ============================================================================
// Schema
// ============================================================================

/** Empty environment values count as unset */
const optionalText = z.preprocess(
  (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
  z.string().trim().optional()
);

const optionalInt = (min: number, max: number) =>
  z.preprocess(
    (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
    z.coerce.number().int().min(min).max(max).optional()
  );

const EnvSchema = z.object({
  ARCGIS_PORTAL_URL: optionalText.pipe(z.string().url().optional()),
  ARCGIS_USERNAME: z.string({ required_error: 'ARCGIS_USERNAME is required' }).trim().min(1, 'ARCGIS_USERNAME is required'),
  ARCGIS_TOKEN: z.string({ required_error: 'ARCGIS_TOKEN is required' }).trim().min(1, 'ARCGIS_TOKEN is required'),
  GTFS_GROUP_ID: optionalText,
  GTFS_SERVICE_NAME: optionalText,
  GTFS_CHUNK_SIZE: optionalInt(1, MAX_CHUNK_SIZE),
  GTFS_PUBLISH_CONCURRENCY: optionalInt(1, 64),
  GTFS_TARGET_WKID: optionalInt(1, 999_999),
  GTFS_KML_WRITER: optionalText,
});

// ============================================================================
// Loader
// ============================================================================

/**
 * Build the publisher configuration from environment variables
 *
 * @throws ConfigurationError listing every invalid variable
 */
export function loadPublisherConfig(
  env: Readonly<Record<string, string | undefined>> = process.env
): PublisherConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigurationError(
      'Invalid publisher configuration',
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const vars = parsed.data;

  return {
    portal: {
      url: (vars.ARCGIS_PORTAL_URL ?? DEFAULT_PORTAL_URL).replace(/\/+$/, ''),
      username: vars.ARCGIS_USERNAME,
      token: vars.ARCGIS_TOKEN,
    },
    groupId: vars.GTFS_GROUP_ID,
    serviceName: vars.GTFS_SERVICE_NAME ?? DEFAULT_SERVICE_NAME,
    publishing: {
      chunkSize: vars.GTFS_CHUNK_SIZE ?? DEFAULT_PUBLISHING_OPTIONS.chunkSize,
      concurrency: vars.GTFS_PUBLISH_CONCURRENCY ?? DEFAULT_PUBLISHING_OPTIONS.concurrency,
      targetWkid: vars.GTFS_TARGET_WKID ?? DEFAULT_PUBLISHING_OPTIONS.targetWkid,
    },
    kmlWriterPath: vars.GTFS_KML_WRITER,
  };
}
