/**
 * Lazy sequence helpers
 */

import type { Transformer } from "./transformer.js";

/**
 * Map each present element through the transformer, lazily, in one pass.
 * null and undefined elements are skipped.
 */
export function* mapSequence<S, D>(
  sources: Iterable<S | null | undefined>,
  transformer: Transformer<S, D>
): Generator<D, void, undefined> {
  for (const source of sources) {
    if (source === null || source === undefined) {
      continue;
    }
    yield transformer.map(source);
  }
}

/**
 * Replay already-consumed leading elements, then continue the same iterator.
 * Stopping early closes `rest`.
 */
export function* resumeSequence<T>(
  leading: readonly T[],
  rest: Iterator<T>
): Generator<T, void, undefined> {
  let exhausted = false;
  try {
    yield* leading;
    for (let step = rest.next(); !step.done; step = rest.next()) {
      yield step.value;
    }
    exhausted = true;
  } finally {
    if (!exhausted) {
      rest.return?.();
    }
  }
}
