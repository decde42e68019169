import { logger } from "./index";
import type { Log } from "./log";

/**
 * Wraps `fn` so every call is logged at debug as `name(arg1, arg2)`.
 *
 * @example
 * ```typescript
 * const add = logFunctionCall(function add(a: number, b: number) {
 *   return a + b;
 * });
 * add(1, 2); // debug: add(1, 2)
 * ```
 */
export const logFunctionCall = <A extends unknown[], R>(
  fn: (...args: A) => R,
  log: Log = logger,
): ((...args: A) => R) => {
  const name = fn.name || "<anonymous>";
  return function (this: unknown, ...args: A): R {
    log.debug("%s(%s)", name, args.map((arg) => String(arg)).join(", "));
    return fn.apply(this, args);
  };
};
