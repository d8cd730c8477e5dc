/**
 * Console rendering of the orchestrator event stream
 */

import chalk from 'chalk';
import ora from 'ora';
import { table } from 'table';
import { FailureKind, type BuildFailure } from '../errors';
import type { BuildOrchestrator } from '../orchestrator';
import { BuildPhase, LogLevel, type OrchestrationReport, type TargetOutcome } from '../types';

const PHASE_LABELS: Record<BuildPhase, string> = {
  [BuildPhase.ResolveVersion]: 'Resolving version',
  [BuildPhase.ComposeEnvironment]: 'Preparing build environment',
  [BuildPhase.FetchSource]: 'Fetching source',
  [BuildPhase.Verify]: 'Verifying source',
  [BuildPhase.Compile]: 'Compiling',
  [BuildPhase.Collect]: 'Collecting binaries',
  [BuildPhase.Complete]: 'Done'
};

const STATUS_LABELS: Record<TargetOutcome['status'], string> = {
  succeeded: 'built',
  failed: 'failed',
  cancelled: 'cancelled',
  skipped: 'skipped'
};

const HINTS: Partial<Record<FailureKind, string>> = {
  [FailureKind.ToolchainMissing]: 'Run `binforge doctor` to check the toolchain.',
  [FailureKind.VerificationFailure]: 'Re-run with --allow-unverified to build the checkout anyway.',
  [FailureKind.NetworkFailure]: 'Check the network connection or pass a version explicitly.',
  [FailureKind.Cancelled]: 'Re-run with --yes to skip confirmation prompts.'
};

/** Table rows for a finished run, header first */
export function formatOutcomeRows(report: OrchestrationReport): string[][] {
  const rows = [['Target', 'Status', 'Version', 'Build system', 'Binaries', 'Output']];
  for (const outcome of report.outcomes) {
    rows.push([
      outcome.target,
      STATUS_LABELS[outcome.status],
      outcome.version ?? '-',
      outcome.buildSystem ?? '-',
      outcome.result
        ? `${outcome.result.copiedArtifacts.length} copied, ${outcome.result.missingArtifacts.length} missing`
        : '-',
      outcome.result?.outputDir ?? '-'
    ]);
  }
  return rows;
}

/**
 * Plain-text lines describing a failure, most useful first
 */
export function formatFailure(failure: BuildFailure): string[] {
  const { context } = failure;
  const lines = [failure.message];

  if (context.target) {
    lines.push(`Target: ${context.target}${context.version ? ` ${context.version}` : ''}`);
  }
  if (context.command) {
    lines.push(`Command: ${context.command}`);
  }
  if (context.cwd) {
    lines.push(`Directory: ${context.cwd}`);
  }
  if (context.signal) {
    lines.push(`Signal: ${context.signal}`);
  } else if (context.exitCode !== undefined && context.exitCode !== null) {
    lines.push(`Exit code: ${context.exitCode}`);
  }
  if (context.outputTail && context.outputTail.length > 0) {
    lines.push(`Last ${context.outputTail.length} lines of output:`);
    lines.push(...context.outputTail.map(line => `  ${line}`));
  }

  const hint = HINTS[failure.kind];
  if (hint) {
    lines.push(hint);
  }
  return lines;
}

export interface ConsoleReporterOptions {
  /** Print every subprocess line instead of the latest one */
  verbose: boolean;
}

/**
 * Spinner while a target builds, plain lines for logs and failures
 */
export class ConsoleReporter {
  private readonly spinner = ora({ stream: process.stderr });
  private phase = '';
  private target = '';
  private percent = 0;

  constructor(private readonly options: ConsoleReporterOptions) {}

  attach(orchestrator: BuildOrchestrator): void {
    orchestrator.on('target:start', target => {
      this.target = target;
      this.phase = '';
      this.spinner.start(this.text());
    });

    orchestrator.on('phase', (phase: BuildPhase) => {
      this.phase = PHASE_LABELS[phase];
      this.spinner.text = this.text();
    });

    orchestrator.on('progress', fraction => {
      this.percent = Math.round(fraction * 100);
      this.spinner.text = this.text();
    });

    orchestrator.on('output', line => {
      if (this.options.verbose) {
        this.print(chalk.dim(line));
      } else if (this.spinner.isSpinning) {
        this.spinner.text = `${this.text()} ${chalk.dim(line.slice(0, 80))}`;
      }
    });

    orchestrator.on('log', (level, message) => {
      if (level === LogLevel.Error || level === LogLevel.Warn) {
        this.print(level === LogLevel.Error ? chalk.red(message) : chalk.yellow(message));
      } else if (level === LogLevel.Info && this.options.verbose) {
        this.print(chalk.cyan(message));
      }
    });

    orchestrator.on('target:complete', outcome => this.complete(outcome));
  }

  /** Stop the spinner so a prompt can take over the terminal */
  pause(): void {
    if (this.spinner.isSpinning) {
      this.spinner.stop();
    }
  }

  summary(report: OrchestrationReport): void {
    this.pause();
    console.log(chalk.blue.bold('\nBuild summary:'));
    console.log(table(formatOutcomeRows(report)));

    for (const outcome of report.outcomes) {
      if (outcome.result && Object.keys(outcome.result.checksums).length > 0) {
        console.log(chalk.bold(`${outcome.target} checksums (sha256):`));
        for (const [name, digest] of Object.entries(outcome.result.checksums)) {
          console.log(`  ${digest}  ${name}`);
        }
      }
    }
  }

  private complete(outcome: TargetOutcome): void {
    const label = `${outcome.target}${outcome.version ? ` ${outcome.version}` : ''}`;
    switch (outcome.status) {
      case 'succeeded':
        this.spinner.succeed(`${label} built in ${(outcome.duration / 1000).toFixed(1)}s`);
        return;
      case 'skipped':
        this.spinner.info(`${label} skipped after an earlier failure`);
        return;
      default:
        this.spinner.fail(`${label} ${STATUS_LABELS[outcome.status]}`);
        if (outcome.failure) {
          for (const line of formatFailure(outcome.failure)) {
            console.error(chalk.red(line));
          }
        }
    }
  }

  private print(line: string): void {
    if (this.spinner.isSpinning) {
      this.spinner.clear();
      console.error(line);
      this.spinner.render();
    } else {
      console.error(line);
    }
  }

  private text(): string {
    return `[${this.percent}%] ${this.target}${this.phase ? `: ${this.phase}` : ''}`;
  }
}
