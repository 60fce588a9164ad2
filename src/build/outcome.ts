import { AggregateBuildError, type BuildError } from "../errors.js";

export interface Success<T> {
  readonly ok: true;
  /** undefined when the unit of work produced nothing worth collecting */
  readonly value: T | undefined;
}

export interface Failure {
  readonly ok: false;
  readonly error: BuildError;
}

/** Result of one unit of work. */
export type Outcome<T> = Success<T> | Failure;

export function success<T>(value: T): Success<T> {
  return { ok: true, value };
}

export function nothing<T = never>(): Success<T> {
  return { ok: true, value: undefined };
}

export function failure(error: BuildError): Failure {
  return { ok: false, error };
}

/**
 * Fold one outcome into an accumulated one.
 *
 *   success + success  -> success, value appended when there is one
 *   success + failure  -> the failure
 *   failure + success  -> unchanged
 *   failure + failure  -> failure, messages joined with ", "
 */
export function mergeOutcome<T>(
  acc: Outcome<T[]>,
  next: Outcome<T>
): Outcome<T[]> {
  if (!acc.ok) {
    return next.ok
      ? acc
      : failure(new AggregateBuildError([acc.error, next.error]));
  }

  if (!next.ok) {
    return next;
  }

  if (next.value === undefined) {
    return acc;
  }

  return success([...(acc.value ?? []), next.value]);
}

/**
 * Collapse a phase's outcomes into one, keeping input order.
 * An all-empty phase collects to `success([])`.
 */
export function collectOutcomes<T>(
  outcomes: readonly Outcome<T>[]
): Outcome<T[]> {
  return outcomes.reduce<Outcome<T[]>>(
    (acc, next) => mergeOutcome(acc, next),
    success<T[]>([])
  );
}
