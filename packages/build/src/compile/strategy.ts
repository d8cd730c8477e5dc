/**
 * @fileoverview Build strategy contract and the shared command-sequence runner
 */

import { join } from 'path';
import { ok, type StageResult } from '../errors';
import type { BuildEnvironment, BuildSystem, TargetDefinition } from '../types';
import type { CommandRunner, CommandSpec, LineListener } from '../utils/process';

/** Everything a strategy needs to configure and compile one checkout */
export interface BuildContext {
  target: TargetDefinition;
  sourceDir: string;
  jobs: number;
  env: BuildEnvironment;
}

/** One labelled command of a build pipeline */
export interface BuildStep {
  label: string;
  spec: CommandSpec;
}

export interface BuildHooks {
  /** Called before each step starts */
  onStep?: (step: BuildStep) => void;
  /** Receives merged output lines */
  onLine?: LineListener;
}

export interface BuildStrategy {
  readonly system: BuildSystem;
  /** Directory the build leaves binaries in */
  binaryDir(sourceDir: string): string;
  /** Absolute paths of binaries the build is expected to produce */
  expectedArtifacts(context: BuildContext): string[];
  /** Checks that must pass before any build work starts */
  preflight(context: BuildContext): StageResult<void>;
  /** Configure and compile, stopping at the first failing step */
  run(context: BuildContext, runner: CommandRunner, hooks?: BuildHooks): Promise<StageResult<void>>;
}

/**
 * Base for strategies that are an ordered list of commands
 */
export abstract class CommandSequenceStrategy implements BuildStrategy {
  abstract readonly system: BuildSystem;

  abstract binaryDir(sourceDir: string): string;

  abstract steps(context: BuildContext): BuildStep[];

  expectedArtifacts(context: BuildContext): string[] {
    const names = context.target.binaries[this.system] ?? [];
    const dir = this.binaryDir(context.sourceDir);
    return names.map(name => join(dir, name));
  }

  preflight(_context: BuildContext): StageResult<void> {
    return ok(undefined);
  }

  async run(context: BuildContext, runner: CommandRunner, hooks: BuildHooks = {}): Promise<StageResult<void>> {
    for (const step of this.steps(context)) {
      hooks.onStep?.(step);
      const result = await runner.run(step.spec, hooks.onLine);
      if (!result.ok) {
        return result;
      }
    }
    return ok(undefined);
  }

  protected command(context: BuildContext, command: string, args: string[]): CommandSpec {
    return { command, args, cwd: context.sourceDir, env: context.env };
  }
}
