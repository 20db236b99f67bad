/**
 * Report Output
 * Adapts a metric function into a contextual op that records its result
 */

import type { Awaitable, ContextualOp } from "../types";

/**
 * Build an op that stores `compute(item)` under `key` in the item's run
 * report record and passes the item through unchanged
 *
 * @example
 * const pipeline = new Pipeline({
 *   reportingMode: "contextual",
 *   load: loadImage,
 *   ops: [reportOutput("meanBrightness", meanBrightness)],
 * });
 */
export function reportOutput<T, R>(
  key: string,
  compute: (item: T) => Awaitable<R>,
): ContextualOp<T> {
  return async (item, _inpath, record) => {
    record.set(key, await compute(item));
    return item;
  };
}
