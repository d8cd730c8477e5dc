/**
 * Interactive prompts and confirmation gates for the command-line front end
 */

import chalk from 'chalk';
import inquirer from 'inquirer';
import type { InstallGate } from '../doctor';
import type { ConfirmationGate } from '../orchestrator';
import { TargetId, type IntegrityReport, type TargetDefinition, type TargetSelection } from '../types';

export interface PromptGateOptions {
  /** Answer yes without asking */
  assumeYes: boolean;
  /** Whether a terminal is attached; without one every question is declined */
  interactive: boolean;
  /** Called before a question is shown, e.g. to pause a spinner */
  beforePrompt?: () => void;
}

export class PromptGate implements ConfirmationGate, InstallGate {
  constructor(private readonly options: PromptGateOptions) {}

  async confirmAggressiveOptimizations(): Promise<boolean> {
    return this.confirm(
      'Aggressive optimizations (-O3, LTO) can break builds or produce unstable binaries. Continue?'
    );
  }

  async confirmIntegrityOverride(report: IntegrityReport, target: TargetDefinition): Promise<boolean> {
    const details = report.currentCommit && report.expectedCommit
      ? `HEAD ${report.currentCommit.slice(0, 12)} does not match ${report.expectedTag} (${report.expectedCommit.slice(0, 12)})`
      : report.reason ?? 'commit could not be verified';
    return this.confirm(`${target.displayName} source failed verification: ${details}. Build it anyway?`);
  }

  async confirmInstall(formulae: readonly string[]): Promise<boolean> {
    return this.confirm(`Install ${formulae.length} missing Homebrew formulae (${formulae.join(', ')})?`);
  }

  private async confirm(message: string): Promise<boolean> {
    if (this.options.assumeYes) {
      return true;
    }
    if (!this.options.interactive) {
      console.error(chalk.yellow(`${message} Declined: no terminal attached, pass --yes to approve.`));
      return false;
    }

    this.options.beforePrompt?.();
    const { proceed } = await inquirer.prompt<{ proceed: boolean }>([
      {
        type: 'confirm',
        name: 'proceed',
        message,
        default: false
      }
    ]);
    return proceed;
  }
}

export async function promptTarget(): Promise<TargetSelection> {
  const { target } = await inquirer.prompt<{ target: TargetSelection }>([
    {
      type: 'list',
      name: 'target',
      message: 'What would you like to build?',
      choices: [
        { name: 'Bitcoin Core', value: TargetId.NodeDaemon },
        { name: 'Electrs', value: TargetId.Indexer },
        { name: 'Both', value: 'both' }
      ]
    }
  ]);
  return target;
}

export async function promptVersion(target: TargetDefinition, versions: readonly string[]): Promise<string> {
  const { version } = await inquirer.prompt<{ version: string }>([
    {
      type: 'list',
      name: 'version',
      message: `${target.displayName} version`,
      choices: versions.map((tag, index) => ({ name: index === 0 ? `${tag} (latest)` : tag, value: tag }))
    }
  ]);
  return version;
}
