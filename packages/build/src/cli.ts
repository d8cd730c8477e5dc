#!/usr/bin/env node
/**
 * Command-line front end for the binforge build engine
 */

import chalk from 'chalk';
import { Command, InvalidArgumentError } from 'commander';
import ora from 'ora';
import { table } from 'table';
import {
  DEFAULT_CONFIG,
  ENV_VARS,
  getDefaultJobs,
  getHostCoreCount,
  resolveBuildRequest,
  TARGETS,
  type BuildRequestInput
} from './config';
import { DependencyDoctor } from './doctor';
import { EnvironmentComposer, getCompilerFlags, getRustFlags } from './environment';
import { BuildError, isBuildError, unwrap } from './errors';
import { BuildOrchestrator } from './orchestrator';
import { describeArchitecture, getHostArchitecture } from './platforms';
import { PromptGate, promptTarget, promptVersion } from './presentation/prompts';
import { ConsoleReporter, formatFailure } from './presentation/reporter';
import { LogLevel, OptimizationTier, TargetId, type TargetSelection } from './types';
import { configureLogger, createLogger, parseLogLevel } from './utils/logger';
import { SpawnCommandRunner } from './utils/process';
import { VersionCatalog } from './version-catalog';

const logger = createLogger('cli');
const program = new Command();

type GlobalOptions = {
  verbose?: boolean;
};

interface BuildCommandOptions {
  target?: string;
  jobs?: number;
  buildDir?: string;
  nodeVersion?: string;
  indexerVersion?: string;
  aggressive?: boolean;
  allowUnverified?: boolean;
  continueOnFailure?: boolean;
  yes?: boolean;
}

interface DoctorCommandOptions {
  install?: boolean;
  yes?: boolean;
}

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
}

function isInteractive(): boolean {
  return Boolean(process.stdin.isTTY && process.stdout.isTTY);
}

function setupLogging(options: GlobalOptions): void {
  configureLogger({
    level: options.verbose ? LogLevel.Debug : parseLogLevel(process.env[ENV_VARS.LOG_LEVEL], LogLevel.Warn),
    colors: Boolean(process.stderr.isTTY)
  });
}

function handleError(error: unknown): never {
  if (isBuildError(error)) {
    for (const line of formatFailure(error.toFailure())) {
      console.error(chalk.red(line));
    }
  } else {
    logger.failure(error instanceof Error ? error.message : String(error));
  }
  process.exit(1);
}

/**
 * Fill target and versions from prompts when a terminal is attached
 */
async function completeInteractively(input: BuildRequestInput): Promise<BuildRequestInput> {
  const target: TargetSelection = input.target === undefined ? await promptTarget() : parseSelection(input.target);
  const versions = { ...input.versions };

  if ((target === TargetId.NodeDaemon || target === 'both') && !versions.nodeDaemon) {
    versions.nodeDaemon = await chooseVersion(TargetId.NodeDaemon);
  }
  if ((target === TargetId.Indexer || target === 'both') && !versions.indexer) {
    versions.indexer = await chooseVersion(TargetId.Indexer);
  }

  return { ...input, target, versions };
}

function parseSelection(value: string): TargetSelection {
  if (value === TargetId.NodeDaemon || value === TargetId.Indexer || value === 'both') {
    return value;
  }
  throw new InvalidArgumentError(`Unknown target "${value}". Use node-daemon, indexer, or both.`);
}

async function chooseVersion(id: TargetId): Promise<string | undefined> {
  const target = TARGETS[id];
  const spinner = ora(`Fetching ${target.displayName} releases...`).start();
  const versions = await new VersionCatalog(target).listVersions();

  if (versions.length === 0) {
    spinner.warn(`Could not fetch ${target.displayName} releases`);
    return undefined;
  }
  spinner.stop();
  return promptVersion(target, versions);
}

program
  .name('binforge')
  .description('Fetch, configure and compile Bitcoin Core and Electrs from source')
  .version('0.1.0')
  .option('--verbose', 'Show debug logs and full build output');

program
  .command('build')
  .description('Build one or both targets')
  .option('-t, --target <target>', 'node-daemon, indexer, or both')
  .option('-j, --jobs <n>', `Parallel compile jobs (default: ${getDefaultJobs()})`, parseInteger)
  .option('-d, --build-dir <dir>', `Build directory (default: ${DEFAULT_CONFIG.BUILD_DIR})`)
  .option('--node-version <tag>', 'Bitcoin Core release tag')
  .option('--indexer-version <tag>', 'Electrs release tag')
  .option('--aggressive', 'Use aggressive optimizations (-O3, LTO)')
  .option('--allow-unverified', 'Build even if the checkout does not match the release tag')
  .option('--continue-on-failure', 'Keep building the remaining targets after a failure')
  .option('-y, --yes', 'Answer yes to every confirmation')
  .action(async (options: BuildCommandOptions) => {
    const globals = program.opts<GlobalOptions>();
    setupLogging(globals);

    try {
      let input: BuildRequestInput = {
        target: options.target,
        jobs: options.jobs,
        buildDir: options.buildDir,
        aggressiveOptimizations: options.aggressive,
        versions: { nodeDaemon: options.nodeVersion, indexer: options.indexerVersion },
        allowUnverifiedSource: options.allowUnverified,
        continueOnFailure: options.continueOnFailure
      };
      if (isInteractive() && !options.yes) {
        input = await completeInteractively(input);
      }

      const request = unwrap(resolveBuildRequest(input));
      const reporter = new ConsoleReporter({ verbose: Boolean(globals.verbose) });
      const gate = new PromptGate({
        assumeYes: Boolean(options.yes),
        interactive: isInteractive(),
        beforePrompt: () => reporter.pause()
      });

      const orchestrator = new BuildOrchestrator({ runner: new SpawnCommandRunner(), gate });
      reporter.attach(orchestrator);

      console.log(chalk.cyan.bold(`\nbinforge: building ${request.target} with ${request.jobs} jobs into ${request.buildDir}\n`));
      const report = await orchestrator.run(request);
      reporter.summary(report);

      process.exitCode = report.ok ? 0 : 1;
    } catch (error) {
      handleError(error);
    }
  });

program
  .command('versions')
  .description('List selectable release versions')
  .option('-t, --target <target>', 'node-daemon, indexer, or both', 'both')
  .action(async (options: { target: string }) => {
    setupLogging(program.opts<GlobalOptions>());

    try {
      const selection = parseSelection(options.target);
      const ids = selection === 'both' ? [TargetId.NodeDaemon, TargetId.Indexer] : [selection];
      for (const id of ids) {
        const target = TARGETS[id];
        const spinner = ora(`Fetching ${target.displayName} releases...`).start();
        const versions = await new VersionCatalog(target).listVersions();

        if (versions.length === 0) {
          spinner.warn(`No ${target.displayName} versions available`);
          continue;
        }
        spinner.succeed(`${target.displayName}: ${versions.join(', ')}`);
      }
    } catch (error) {
      handleError(error);
    }
  });

program
  .command('doctor')
  .description('Check Homebrew formulae and the Rust toolchain')
  .option('--install', 'Install missing Homebrew formulae')
  .option('-y, --yes', 'Install without asking')
  .action(async (options: DoctorCommandOptions) => {
    setupLogging(program.opts<GlobalOptions>());

    try {
      const runner = new SpawnCommandRunner();
      const doctor = new DependencyDoctor(runner);
      const spinner = ora('Checking dependencies...').start();
      const checked = await doctor.check();
      if (!checked.ok) {
        spinner.fail('Homebrew not found');
        throw BuildError.fromFailure(checked.failure);
      }
      const report = checked.value;
      spinner.succeed(`Homebrew found at ${report.brewPrefix}`);

      const rows = [['Formula', 'Status']];
      for (const formula of report.formulae) {
        rows.push([formula.name, formula.installed ? chalk.green('installed') : chalk.red('missing')]);
      }
      rows.push(['rustc / cargo', report.rust.available ? chalk.green(report.rust.cargo ?? 'installed') : chalk.red('missing')]);
      console.log(table(rows));

      if (report.missing.length > 0 && options.install) {
        const gate = new PromptGate({ assumeYes: Boolean(options.yes), interactive: isInteractive() });
        const installs = await doctor.installMissing(report, gate, line => logger.debug(line));
        if (installs.declined) {
          console.log(chalk.yellow('Installation skipped'));
        }
        for (const name of installs.installed) {
          console.log(chalk.green(`Installed ${name}`));
        }
        for (const [name, message] of Object.entries(installs.failed)) {
          console.log(chalk.red(`Failed to install ${name}: ${message}`));
        }
        process.exitCode = Object.keys(installs.failed).length > 0 ? 1 : 0;
      } else if (report.missing.length > 0) {
        console.log(chalk.yellow(`Missing: ${report.missing.join(' ')}. Run \`binforge doctor --install\` to install them.`));
      }

      if (!report.rust.available) {
        console.log(chalk.yellow('Install Rust with https://rustup.rs or `brew install rust` to build Electrs.'));
      }
    } catch (error) {
      handleError(error);
    }
  });

program
  .command('info')
  .description('Show host and build configuration')
  .action(() => {
    setupLogging(program.opts<GlobalOptions>());

    const arch = getHostArchitecture();
    const composer = new EnvironmentComposer();
    const flags = getCompilerFlags(arch, OptimizationTier.Standard);
    const aggressive = getCompilerFlags(arch, OptimizationTier.Aggressive);
    const rows = [
      ['Setting', 'Value'],
      ['Architecture', describeArchitecture(arch)],
      ['CPU cores', String(getHostCoreCount())],
      ['Default jobs', String(getDefaultJobs())],
      ['Build directory', process.env[ENV_VARS.BUILD_DIR] ?? DEFAULT_CONFIG.BUILD_DIR],
      ['Homebrew prefix', composer.findBrewPrefix() ?? 'not found'],
      ['CFLAGS (standard)', flags.CFLAGS],
      ['CFLAGS (aggressive)', aggressive.CFLAGS],
      ['RUSTFLAGS (standard)', getRustFlags(OptimizationTier.Standard).RUSTFLAGS]
    ];
    console.log(table(rows));
  });

program.parseAsync(process.argv).catch(handleError);
