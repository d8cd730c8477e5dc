/**
 * Host dependency checks and Homebrew installs
 */

import { resolveRustToolchain } from './compile/cargo';
import { HOMEBREW_FORMULAE } from './config';
import { EnvironmentComposer } from './environment';
import { BuildErrorCode, createFailure, fail, ok, type StageResult } from './errors';
import { getHostArchitecture } from './platforms';
import { OptimizationTier, type Architecture, type BuildEnvironment } from './types';
import { createLogger } from './utils/logger';
import { captureCommand, type CommandRunner, type LineListener } from './utils/process';

const logger = createLogger('doctor');

export interface FormulaStatus {
  name: string;
  installed: boolean;
}

export interface DependencyReport {
  /** Homebrew executable */
  brew: string;
  brewPrefix: string;
  formulae: FormulaStatus[];
  /** Formulae `brew list` did not report as installed */
  missing: string[];
  rust: {
    available: boolean;
    rustc?: string;
    cargo?: string;
  };
}

export interface InstallReport {
  installed: string[];
  /** Formula name to failure message */
  failed: Record<string, string>;
  declined: boolean;
}

export interface InstallGate {
  confirmInstall(formulae: readonly string[]): Promise<boolean>;
}

export interface DependencyDoctorOptions {
  composer?: EnvironmentComposer;
  architecture?: Architecture;
  formulae?: readonly string[];
  isExecutable?: (path: string) => boolean;
}

export class DependencyDoctor {
  private readonly composer: EnvironmentComposer;
  private readonly architecture: Architecture;
  private readonly formulae: readonly string[];
  private readonly isExecutable?: (path: string) => boolean;

  constructor(private readonly runner: CommandRunner, options: DependencyDoctorOptions = {}) {
    this.composer = options.composer ?? new EnvironmentComposer();
    this.architecture = options.architecture ?? getHostArchitecture();
    this.formulae = options.formulae ?? HOMEBREW_FORMULAE;
    this.isExecutable = options.isExecutable;
  }

  async check(): Promise<StageResult<DependencyReport>> {
    const brew = this.composer.findBrew();
    const brewPrefix = this.composer.findBrewPrefix();
    if (!brew || !brewPrefix) {
      return fail(createFailure(
        BuildErrorCode.PackageManagerNotFound,
        'install it from https://brew.sh and re-run `binforge doctor`'
      ));
    }

    const env = this.environment();
    const formulae: FormulaStatus[] = [];
    for (const name of this.formulae) {
      const listed = await captureCommand(this.runner, { command: brew, args: ['list', name], cwd: brewPrefix, env });
      formulae.push({ name, installed: listed.ok });
      logger.debug(`${name}: ${listed.ok ? 'installed' : 'missing'}`);
    }

    const toolchain = resolveRustToolchain(env, this.isExecutable);
    const rust = toolchain.ok
      ? { available: true, rustc: toolchain.value.rustc, cargo: toolchain.value.cargo }
      : { available: false };

    return ok({
      brew,
      brewPrefix,
      formulae,
      missing: formulae.filter(formula => !formula.installed).map(formula => formula.name),
      rust
    });
  }

  /**
   * Install the missing formulae one by one once the gate approves.
   * A failed install is recorded and the next formula is attempted.
   */
  async installMissing(report: DependencyReport, gate: InstallGate, onLine?: LineListener): Promise<InstallReport> {
    const result: InstallReport = { installed: [], failed: {}, declined: false };
    if (report.missing.length === 0) {
      return result;
    }

    if (!(await gate.confirmInstall(report.missing))) {
      result.declined = true;
      return result;
    }

    const env = this.environment();
    for (const name of report.missing) {
      logger.info(`Installing ${name}`);
      const installed = await this.runner.run(
        { command: report.brew, args: ['install', name], cwd: report.brewPrefix, env },
        onLine
      );
      if (installed.ok) {
        result.installed.push(name);
      } else {
        logger.warn(`Failed to install ${name}: ${installed.failure.message}`);
        result.failed[name] = installed.failure.message;
      }
    }

    return result;
  }

  private environment(): BuildEnvironment {
    return this.composer.compose(this.architecture, OptimizationTier.Standard);
  }
}
