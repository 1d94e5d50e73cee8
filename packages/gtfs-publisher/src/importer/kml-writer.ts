/**
 * KML Writer Collaborator
 *
 * Renders a GTFS bundle to KML with an external command-line tool, invoked
 * as `<tool> <archive> <output>`. Only success or failure matters to the
 * importer.
 */

import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { toError } from '../core/errors.js';
import { createLogger } from '../core/utils/logger.js';

const execFileAsync = promisify(execFile);
const log = createLogger({ module: 'kml-writer' });

export interface KmlWriter {
  /** Resolve true when `outputPath` was written */
  generate(archivePath: string, outputPath: string): Promise<boolean>;
}

/**
 * Runs an executable such as transitfeed's `kmlwriter.py`
 */
export class CommandKmlWriter implements KmlWriter {
  constructor(private readonly command: string) {}

  async generate(archivePath: string, outputPath: string): Promise<boolean> {
    try {
      await execFileAsync(this.command, [archivePath, outputPath]);
      return true;
    } catch (error) {
      log.warn('KML generation failed', { command: this.command, error: toError(error).message });
      return false;
    }
  }
}
