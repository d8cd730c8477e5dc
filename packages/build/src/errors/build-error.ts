/**
 * @fileoverview Structured failures for the build pipeline
 *
 * Pipeline stages report failures as {@link BuildFailure} values. The
 * {@link BuildError} class wraps one for callers that prefer exceptions at the
 * API boundary (the CLI, `runOrThrow`).
 */

import {
  BuildErrorCode,
  FailureKind,
  getFailureKind,
  getMessageForCode,
} from './codes';
import type { BuildResult } from '../types';

/**
 * Context carried with a failure so it can be rendered as an actionable message
 */
export interface FailureContext {
  /** Command line that failed */
  command?: string;
  /** Working directory of the failed command */
  cwd?: string;
  /** Exit code of the failed command */
  exitCode?: number | null;
  /** Signal that terminated the failed command */
  signal?: string | null;
  /** Last lines of merged command output */
  outputTail?: string[];
  /** Target being built */
  target?: string;
  /** Release tag being built */
  version?: string;
  /** Pipeline phase */
  phase?: string;
  /** Partial collection result of an artifact failure */
  result?: BuildResult;
  /** Additional contextual data */
  metadata?: Record<string, unknown>;
}

export interface BuildFailure {
  kind: FailureKind;
  code: BuildErrorCode;
  message: string;
  details: string;
  context: FailureContext;
}

export function createFailure(
  code: BuildErrorCode,
  details: string,
  context: FailureContext = {}
): BuildFailure {
  return {
    kind: getFailureKind(code),
    code,
    message: details ? `${getMessageForCode(code)}: ${details}` : getMessageForCode(code),
    details,
    context,
  };
}

/**
 * Merge extra context (target, version, phase) into an existing failure
 */
export function withFailureContext(failure: BuildFailure, context: FailureContext): BuildFailure {
  return {
    ...failure,
    context: { ...failure.context, ...context },
  };
}

export class BuildError extends Error {
  public readonly name = 'BuildError';
  public readonly code: BuildErrorCode;
  public readonly kind: FailureKind;
  public readonly details: string;
  public readonly context: FailureContext;
  public readonly recoverable: boolean;

  constructor(
    code: BuildErrorCode,
    details: string,
    options: {
      context?: FailureContext;
      recoverable?: boolean;
      cause?: Error;
    } = {}
  ) {
    super(details ? `${getMessageForCode(code)}: ${details}` : getMessageForCode(code));

    this.code = code;
    this.kind = getFailureKind(code);
    this.details = details;
    this.context = options.context ?? {};
    this.recoverable = options.recoverable ?? BuildError.isRecoverableByDefault(this.kind);

    if (options.cause) {
      this.cause = options.cause;
    }

    Object.setPrototypeOf(this, BuildError.prototype);
  }

  static fromFailure(failure: BuildFailure): BuildError {
    return new BuildError(failure.code, failure.details, { context: failure.context });
  }

  /**
   * Network hiccups and declined prompts can be retried by re-running;
   * the rest need the user to change something first.
   */
  static isRecoverableByDefault(kind: FailureKind): boolean {
    return kind === FailureKind.NetworkFailure || kind === FailureKind.Cancelled;
  }

  toFailure(): BuildFailure {
    return {
      kind: this.kind,
      code: this.code,
      message: this.message,
      details: this.details,
      context: this.context,
    };
  }

  toJSON(): object {
    return {
      name: this.name,
      code: this.code,
      kind: this.kind,
      message: this.message,
      details: this.details,
      context: this.context,
      recoverable: this.recoverable,
      stack: this.stack,
    };
  }
}

export function isBuildError(error: unknown): error is BuildError {
  return error instanceof BuildError;
}
