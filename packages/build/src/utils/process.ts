/**
 * Subprocess execution with merged, line-streamed output
 */

import { spawn } from 'child_process';
import { createInterface } from 'readline';
import { DEFAULT_CONFIG } from '../config';
import { BuildErrorCode, createFailure, fail, ok, type StageResult } from '../errors';
import type { BuildEnvironment } from '../types';
import { createLogger } from './logger';

const logger = createLogger('process');

export interface CommandSpec {
  /** Executable, looked up on the environment's PATH */
  command: string;
  args: string[];
  cwd: string;
  /** Complete environment for the child; the parent's is not merged in */
  env?: BuildEnvironment;
}

export interface CommandOutcome {
  exitCode: number;
  /** Last lines of merged output */
  tail: string[];
}

/** Receives each output line as it arrives */
export type LineListener = (line: string) => void;

/**
 * Runs one command to completion. Implementations never throw for a failing
 * command; a non-zero exit comes back as a CommandFailure.
 */
export interface CommandRunner {
  run(spec: CommandSpec, onLine?: LineListener): Promise<StageResult<CommandOutcome>>;
}

/**
 * Render a command for logs and failure reports
 */
export function formatCommandLine(spec: Pick<CommandSpec, 'command' | 'args'>): string {
  return [spec.command, ...spec.args]
    .map(part => (/^[\w@%+=:,./-]+$/.test(part) ? part : `'${part.replace(/'/g, `'\\''`)}'`))
    .join(' ');
}

/**
 * Bounded buffer of the most recent output lines
 */
export class OutputTail {
  private readonly lines: string[] = [];

  constructor(private readonly capacity: number = DEFAULT_CONFIG.OUTPUT_TAIL_LINES) {}

  push(line: string): void {
    this.lines.push(line);
    if (this.lines.length > this.capacity) {
      this.lines.shift();
    }
  }

  toArray(): string[] {
    return [...this.lines];
  }
}

/**
 * Run a command and collect its output lines, for short probes like `git rev-parse`
 */
export async function captureCommand(
  runner: CommandRunner,
  spec: CommandSpec
): Promise<StageResult<string[]>> {
  const lines: string[] = [];
  const result = await runner.run(spec, line => lines.push(line));
  return result.ok ? ok(lines) : result;
}

/**
 * Redirects stderr into stdout, then replaces the shell with the command.
 * Arguments arrive as positional parameters and are never interpolated.
 */
const MERGE_STREAMS_SCRIPT = 'exec "$0" "$@" 2>&1';

/** Shell exit statuses for a command that was not found or not executable */
const NOT_RUNNABLE_EXIT_CODES = new Set([126, 127]);

/**
 * Command runner backed by `child_process.spawn`.
 *
 * The child writes both streams to one pipe, so lines keep the order the
 * command wrote them in.
 */
export class SpawnCommandRunner implements CommandRunner {
  constructor(
    private readonly tailLines: number = DEFAULT_CONFIG.OUTPUT_TAIL_LINES,
    private readonly shell: string = '/bin/sh'
  ) {}

  run(spec: CommandSpec, onLine?: LineListener): Promise<StageResult<CommandOutcome>> {
    const commandLine = formatCommandLine(spec);
    const tail = new OutputTail(this.tailLines);
    logger.debug(`$ ${commandLine} (cwd: ${spec.cwd})`);

    return new Promise(resolve => {
      const child = spawn(this.shell, ['-c', MERGE_STREAMS_SCRIPT, spec.command, ...spec.args], {
        cwd: spec.cwd,
        env: spec.env ?? process.env,
        stdio: ['ignore', 'pipe', 'ignore']
      });

      const reader = createInterface({ input: child.stdout, crlfDelay: Infinity });
      reader.on('line', line => {
        tail.push(line);
        onLine?.(line);
      });
      const drained = new Promise<void>(done => reader.once('close', () => done()));

      let settled = false;
      const settle = (result: StageResult<CommandOutcome>): void => {
        if (!settled) {
          settled = true;
          resolve(result);
        }
      };

      child.once('error', error => {
        settle(fail(createFailure(BuildErrorCode.ProcessSpawnFailed, `${commandLine}: ${error.message}`, {
          command: commandLine,
          cwd: spec.cwd,
          outputTail: tail.toArray()
        })));
      });

      child.once('close', (code, signal) => {
        void drained.then(() => {
          if (code === 0) {
            settle(ok({ exitCode: 0, tail: tail.toArray() }));
            return;
          }

          const context = {
            command: commandLine,
            cwd: spec.cwd,
            exitCode: code,
            signal,
            outputTail: tail.toArray()
          };
          if (code !== null && NOT_RUNNABLE_EXIT_CODES.has(code)) {
            settle(fail(createFailure(
              BuildErrorCode.ProcessSpawnFailed,
              `${spec.command} could not be run (exit code ${code})`,
              context
            )));
            return;
          }

          settle(fail(createFailure(
            BuildErrorCode.ProcessFailed,
            signal ? `${commandLine} terminated by ${signal}` : `${commandLine} exited with code ${code}`,
            context
          )));
        });
      });
    });
  }
}
