/**
 * Upstream source acquisition
 */

import { existsSync } from 'fs';
import { mkdir } from 'fs/promises';
import { dirname } from 'path';
import {
  BuildErrorCode,
  createFailure,
  fail,
  ok,
  type StageResult
} from './errors';
import type { BuildEnvironment, SourceCheckout } from './types';
import { GitClient } from './utils/git';
import { createLogger } from './utils/logger';
import type { CommandRunner, LineListener } from './utils/process';

const logger = createLogger('fetch-source');

/**
 * Shallow, tag-pinned checkouts into deterministic directories.
 *
 * Re-running against an existing checkout fetches the one tag and switches the
 * working tree to it; history is never fetched in full.
 */
export class SourceAcquirer {
  constructor(private readonly runner: CommandRunner) {}

  async acquire(
    repoUrl: string,
    tag: string,
    destDir: string,
    env: BuildEnvironment,
    onLine?: LineListener
  ): Promise<StageResult<SourceCheckout>> {
    const git = new GitClient(this.runner, env);
    const checkout: SourceCheckout = { path: destDir, requestedTag: tag };
    const parentDir = dirname(destDir);

    try {
      await mkdir(parentDir, { recursive: true });
    } catch (error) {
      return fail(createFailure(
        BuildErrorCode.SourceDirectoryFailed,
        `${parentDir}: ${error instanceof Error ? error.message : String(error)}`
      ));
    }

    if (!existsSync(destDir)) {
      logger.info(`Cloning ${repoUrl} at ${tag} into ${destDir}`);
      const cloned = await git.clone(repoUrl, tag, destDir, parentDir, onLine);
      if (!cloned.ok) {
        return cloned;
      }
    } else {
      logger.info(`Source directory already exists, updating ${destDir} to ${tag}`);
      const fetched = await git.fetchTag(destDir, tag, onLine);
      if (!fetched.ok) {
        return fetched;
      }
      const switched = await git.checkout(destDir, tag, onLine);
      if (!switched.ok) {
        return switched;
      }
    }

    const head = await git.headCommit(destDir);
    if (!head.ok) {
      return head;
    }

    return ok({ ...checkout, resolvedCommit: head.value });
  }
}
