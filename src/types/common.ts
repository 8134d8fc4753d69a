/**
 * Success-or-error value returned by the marshaller, the unmarshaller, the
 * JSON bindings and the conversion driver. A malformed attribute comes back
 * as `{ success: false, error }`; nothing in the conversion path throws.
 */
export type Result<T, E = Error> =
  | { readonly success: true; readonly data: T }
  | { readonly success: false; readonly error: E };

/** Creates a successful Result. */
export const ok = <T>(data: T): Result<T, never> =>
  Object.freeze({ success: true as const, data });

/** Creates a failed Result. */
export const err = <E>(error: E): Result<never, E> =>
  Object.freeze({ success: false as const, error });

/**
 * Maps over a successful Result, passing through errors unchanged.
 */
export const mapResult = <T, U, E>(
  result: Result<T, E>,
  fn: (data: T) => U,
): Result<U, E> => (result.success ? ok(fn(result.data)) : result);

/**
 * Chains Result-returning operations, short-circuiting on the first error.
 */
export const flatMapResult = <T, U, E>(
  result: Result<T, E>,
  fn: (data: T) => Result<U, E>,
): Result<U, E> => (result.success ? fn(result.data) : result);

/**
 * Runs `fn` over every element in order and collects the successes.
 * Stops at the first failure and returns it; later elements are not visited.
 *
 * @example
 * ```ts
 * traverseResults(["1", "x"], (s) => (/^\d+$/.test(s) ? ok(Number(s)) : err(s)));
 * // => { success: false, error: "x" }
 * ```
 */
export const traverseResults = <T, U, E>(
  items: readonly T[],
  fn: (item: T, index: number) => Result<U, E>,
): Result<U[], E> => {
  const out: U[] = [];
  for (const [index, item] of items.entries()) {
    const result = fn(item, index);
    if (!result.success) return result;
    out.push(result.data);
  }
  return ok(out);
};
