/**
 * Binary collection into the per-version output directory
 */

import { createHash } from 'crypto';
import { existsSync } from 'fs';
import { chmod, copyFile, mkdir, readFile } from 'fs/promises';
import { basename, join } from 'path';
import { BuildErrorCode, createFailure, fail, ok, type StageResult } from './errors';
import type { BuildResult } from './types';
import { createLogger } from './utils/logger';

const logger = createLogger('collect');

/** Mode applied to every collected binary */
export const ARTIFACT_MODE = 0o755;

export class ArtifactCollector {
  /**
   * Copy every candidate that exists into `destDir`.
   *
   * Absent candidates are recorded as missing and never abort the copy of
   * the rest. Collecting nothing at all is a failure that still carries the
   * result.
   */
  async collect(candidates: readonly string[], destDir: string): Promise<StageResult<BuildResult>> {
    try {
      await mkdir(destDir, { recursive: true });
    } catch (error) {
      return fail(createFailure(
        BuildErrorCode.SourceDirectoryFailed,
        `${destDir}: ${error instanceof Error ? error.message : String(error)}`
      ));
    }

    const result: BuildResult = {
      outputDir: destDir,
      copiedArtifacts: [],
      missingArtifacts: [],
      checksums: {}
    };

    for (const source of candidates) {
      const name = basename(source);

      if (!existsSync(source)) {
        logger.warn(`Binary not found: ${name}`);
        result.missingArtifacts.push(name);
        continue;
      }

      const destination = join(destDir, name);
      try {
        await copyFile(source, destination);
        await chmod(destination, ARTIFACT_MODE);
        result.checksums[name] = await this.checksum(destination);
        result.copiedArtifacts.push(destination);
        logger.debug(`Copied ${name}`);
      } catch (error) {
        logger.warn(`Failed to copy ${name}: ${error instanceof Error ? error.message : String(error)}`);
        result.missingArtifacts.push(name);
      }
    }

    if (result.copiedArtifacts.length === 0) {
      return fail(createFailure(
        BuildErrorCode.NoArtifactsCollected,
        `none of ${candidates.length} expected binaries were found`,
        { result }
      ));
    }

    logger.success(`Collected ${result.copiedArtifacts.length} binaries to ${destDir}`);
    return ok(result);
  }

  private async checksum(path: string): Promise<string> {
    const hash = createHash('sha256');
    hash.update(await readFile(path));
    return hash.digest('hex');
  }
}
