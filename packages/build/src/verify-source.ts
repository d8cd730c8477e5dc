/**
 * Checkout integrity verification
 */

import type { BuildEnvironment, IntegrityReport } from './types';
import { GitClient } from './utils/git';
import { createLogger } from './utils/logger';
import type { CommandRunner } from './utils/process';

const logger = createLogger('verify-source');

function shortCommit(commit: string): string {
  return `${commit.slice(0, 16)}...`;
}

/**
 * Compares the checked-out commit with the commit the release tag points to.
 *
 * This runs after checkout: a bad tree may already be on disk. A negative
 * report is handed to the caller, who decides whether an override applies.
 */
export class IntegrityVerifier {
  constructor(private readonly runner: CommandRunner) {}

  async verify(checkoutPath: string, expectedTag: string, env?: BuildEnvironment): Promise<IntegrityReport> {
    const git = new GitClient(this.runner, env);

    const head = await git.headCommit(checkoutPath);
    if (!head.ok || head.value.length === 0) {
      logger.warn('Could not get commit hash');
      return { verified: false, expectedTag, reason: 'current commit could not be resolved' };
    }

    const tagged = await git.tagCommit(checkoutPath, expectedTag);
    if (!tagged.ok || tagged.value.length === 0) {
      logger.warn('Could not get tag commit hash');
      return {
        verified: false,
        expectedTag,
        currentCommit: head.value,
        reason: `commit for ${expectedTag} could not be resolved`
      };
    }

    if (head.value !== tagged.value) {
      logger.warn(`Repository commit mismatch: current ${shortCommit(head.value)}, expected ${shortCommit(tagged.value)}`);
      return {
        verified: false,
        expectedTag,
        currentCommit: head.value,
        expectedCommit: tagged.value,
        reason: 'checked-out commit differs from the tagged commit'
      };
    }

    logger.debug(`Git repository verified at ${expectedTag} (${shortCommit(head.value)})`);
    return {
      verified: true,
      expectedTag,
      currentCommit: head.value,
      expectedCommit: tagged.value
    };
  }
}
