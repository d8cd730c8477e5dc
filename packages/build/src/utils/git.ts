/**
 * Git utilities for upstream source fetching and verification
 */

import type { StageResult } from '../errors';
import { ok } from '../errors';
import type { BuildEnvironment } from '../types';
import {
  captureCommand,
  type CommandOutcome,
  type CommandRunner,
  type LineListener
} from './process';

/**
 * Git command-line contract used by the acquirer and the verifier
 */
export class GitClient {
  constructor(
    private readonly runner: CommandRunner,
    private readonly env?: BuildEnvironment
  ) {}

  /**
   * Shallow clone of a single tag
   */
  clone(
    url: string,
    tag: string,
    targetPath: string,
    cwd: string,
    onLine?: LineListener
  ): Promise<StageResult<CommandOutcome>> {
    return this.git(['clone', '--depth', '1', '--branch', tag, url, targetPath], cwd, onLine);
  }

  /**
   * Fetch one tag without history
   */
  fetchTag(repoPath: string, tag: string, onLine?: LineListener): Promise<StageResult<CommandOutcome>> {
    return this.git(['fetch', '--depth', '1', 'origin', 'tag', tag], repoPath, onLine);
  }

  /**
   * Check out a ref; the trailing `--` keeps git from reading it as a path
   */
  checkout(repoPath: string, ref: string, onLine?: LineListener): Promise<StageResult<CommandOutcome>> {
    return this.git(['checkout', ref, '--'], repoPath, onLine);
  }

  /**
   * Commit hash of HEAD
   */
  headCommit(repoPath: string): Promise<StageResult<string>> {
    return this.singleLine(['rev-parse', 'HEAD'], repoPath);
  }

  /**
   * Commit hash a tag points to
   */
  tagCommit(repoPath: string, tag: string): Promise<StageResult<string>> {
    return this.singleLine(['rev-list', '-n', '1', tag], repoPath);
  }

  private git(args: string[], cwd: string, onLine?: LineListener): Promise<StageResult<CommandOutcome>> {
    return this.runner.run({ command: 'git', args, cwd, env: this.env }, onLine);
  }

  private async singleLine(args: string[], cwd: string): Promise<StageResult<string>> {
    const result = await captureCommand(this.runner, { command: 'git', args, cwd, env: this.env });
    if (!result.ok) {
      return result;
    }
    return ok(result.value.map(line => line.trim()).find(line => line.length > 0) ?? '');
  }
}
