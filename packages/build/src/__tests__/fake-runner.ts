/**
 * In-process stand-in for subprocess execution
 */

import { BuildErrorCode, createFailure, fail, ok, type StageResult } from '../errors';
import {
  formatCommandLine,
  type CommandOutcome,
  type CommandRunner,
  type CommandSpec,
  type LineListener
} from '../utils/process';

/**
 * Reacts to one matched command. Lines passed to `emit` reach the caller's
 * listener; returning nothing means exit code 0.
 */
export type FakeHandler = (
  spec: CommandSpec,
  emit: LineListener
) => StageResult<CommandOutcome> | undefined | Promise<StageResult<CommandOutcome> | undefined>;

export class FakeCommandRunner implements CommandRunner {
  readonly calls: CommandSpec[] = [];
  private readonly handlers: Array<{ prefix: string; handle: FakeHandler }> = [];

  /**
   * Register a handler for command lines starting with `prefix`.
   * Later registrations take precedence.
   */
  on(prefix: string, handle: FakeHandler): this {
    this.handlers.unshift({ prefix, handle });
    return this;
  }

  async run(spec: CommandSpec, onLine?: LineListener): Promise<StageResult<CommandOutcome>> {
    this.calls.push(spec);
    const line = formatCommandLine(spec);
    const lines: string[] = [];
    const emit = (output: string): void => {
      lines.push(output);
      onLine?.(output);
    };

    const handler = this.handlers.find(entry => line.startsWith(entry.prefix));
    const result = handler ? await handler.handle(spec, emit) : undefined;
    return result ?? ok({ exitCode: 0, tail: lines });
  }

  /** Every command line run so far, in order */
  commandLines(): string[] {
    return this.calls.map(spec => formatCommandLine(spec));
  }
}

export function exitedWith(spec: CommandSpec, exitCode: number, tail: string[] = []): StageResult<CommandOutcome> {
  const command = formatCommandLine(spec);
  return fail(createFailure(BuildErrorCode.ProcessFailed, `${command} exited with code ${exitCode}`, {
    command,
    cwd: spec.cwd,
    exitCode,
    outputTail: tail
  }));
}
