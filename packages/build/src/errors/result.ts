/**
 * @fileoverview Result values returned by pipeline stages
 */

import { BuildError, type BuildFailure } from './build-error';

export interface StageSuccess<T> {
  ok: true;
  value: T;
}

export interface StageFailed {
  ok: false;
  failure: BuildFailure;
}

export type StageResult<T> = StageSuccess<T> | StageFailed;

export function ok<T>(value: T): StageSuccess<T> {
  return { ok: true, value };
}

export function fail(failure: BuildFailure): StageFailed {
  return { ok: false, failure };
}

/**
 * Return the value or throw the failure as a {@link BuildError}
 */
export function unwrap<T>(result: StageResult<T>): T {
  if (result.ok) {
    return result.value;
  }
  throw BuildError.fromFailure(result.failure);
}
