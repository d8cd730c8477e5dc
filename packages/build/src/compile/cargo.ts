/**
 * @fileoverview Cargo release pipeline for the indexer
 */

import { join } from 'path';
import { findExecutable } from '../environment';
import { BuildErrorCode, createFailure, fail, ok, type StageResult } from '../errors';
import { BuildSystem, type BuildEnvironment } from '../types';
import { createLogger } from '../utils/logger';
import { CommandSequenceStrategy, type BuildContext, type BuildStep } from './strategy';

const logger = createLogger('cargo');

export interface RustToolchain {
  rustc: string;
  cargo: string;
}

/**
 * Resolve `rustc` and `cargo` on a composed environment's PATH
 */
export function resolveRustToolchain(
  env: BuildEnvironment,
  isExecutable?: (path: string) => boolean
): StageResult<RustToolchain> {
  const cargo = findExecutable('cargo', env, isExecutable);
  if (!cargo) {
    return fail(createFailure(
      BuildErrorCode.CargoNotFound,
      'Cargo is required to compile the indexer. Run `binforge doctor` to install Rust, ' +
        `or add ~/.cargo/bin to PATH (current PATH: ${(env.PATH ?? '').slice(0, 200)})`
    ));
  }

  const rustc = findExecutable('rustc', env, isExecutable);
  if (!rustc) {
    return fail(createFailure(
      BuildErrorCode.RustcNotFound,
      'rustc is required to compile the indexer. Run `binforge doctor` to install Rust'
    ));
  }

  return ok({ rustc, cargo });
}

export class CargoReleaseStrategy extends CommandSequenceStrategy {
  readonly system = BuildSystem.CargoRelease;

  constructor(private readonly isExecutable?: (path: string) => boolean) {
    super();
  }

  binaryDir(sourceDir: string): string {
    return join(sourceDir, 'target', 'release');
  }

  /**
   * Fail before compiling when the toolchain is absent; a partial Rust build
   * is expensive to discover late.
   */
  preflight(context: BuildContext): StageResult<void> {
    const toolchain = resolveRustToolchain(context.env, this.isExecutable);
    if (!toolchain.ok) {
      return toolchain;
    }
    logger.debug(`Using cargo at ${toolchain.value.cargo}, rustc at ${toolchain.value.rustc}`);
    return ok(undefined);
  }

  steps(context: BuildContext): BuildStep[] {
    return [
      {
        label: `Building with Cargo (${context.jobs} jobs)`,
        spec: this.command(context, 'cargo', ['build', '--release', '--jobs', String(context.jobs)])
      }
    ];
  }
}
