/**
 * Two-step scope narrowing: try the full scope, and if the outcome is not
 * acceptable try exactly once more with a narrower scope, then give up.
 */

import { CyclicDependencyError, InvalidInputError, NotFoundError } from "../utils/errors.js";

export type AttemptOutcome<T> = { ok: true; result: T } | { ok: false; error: unknown };

export interface NarrowingPolicy<S, T> {
  full: S;
  narrowed: S;
  attempt: (scope: S) => Promise<T>;
  /** Whether a result is good enough to stop */
  accept: (result: T) => boolean;
  /** Called with the rejected full-scope outcome before narrowing */
  onNarrow?: (outcome: AttemptOutcome<T>) => void;
  /** Builds the error thrown when the narrowed attempt is rejected too */
  fail: (outcome: AttemptOutcome<T>) => Error;
}

export async function attemptWithNarrowing<S, T>(policy: NarrowingPolicy<S, T>): Promise<T> {
  const first = await settle(policy.attempt, policy.full);
  if (first.ok && policy.accept(first.result)) return first.result;
  if (!first.ok && isPermanent(first.error)) throw first.error;

  policy.onNarrow?.(first);

  const second = await settle(policy.attempt, policy.narrowed);
  if (second.ok && policy.accept(second.result)) return second.result;
  if (!second.ok && isPermanent(second.error)) throw second.error;
  throw policy.fail(second);
}

/** Problems with the request itself fail the same way for any scope */
function isPermanent(err: unknown): boolean {
  return (
    err instanceof NotFoundError ||
    err instanceof InvalidInputError ||
    err instanceof CyclicDependencyError
  );
}

async function settle<S, T>(attempt: (scope: S) => Promise<T>, scope: S): Promise<AttemptOutcome<T>> {
  try {
    return { ok: true, result: await attempt(scope) };
  } catch (error) {
    return { ok: false, error };
  }
}
