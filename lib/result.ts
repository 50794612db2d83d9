/**
 * Result type for composable error handling.
 *
 * Represents either success (Ok) or failure (Err).
 * Lets the batch runner keep one document's failure from aborting the rest.
 *
 * @example
 * ```typescript
 * const result = await tryCatchWith(() => loadDocument(path, options), toAppError)
 *
 * if (!result.ok) {
 *   return { status: "failed", errors: [result.error.toJSON()] }
 * }
 *
 * return { status: "success", document: result.value }
 * ```
 */

/**
 * Result type - represents either success or failure.
 */
export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E }

/**
 * Create a success result.
 */
export const Ok = <T>(value: T): Result<T, never> => ({
  ok: true,
  value,
})

/**
 * Create a failure result.
 */
export const Err = <E>(error: E): Result<never, E> => ({
  ok: false,
  error,
})

/**
 * Transform the success value.
 * Error passes through unchanged.
 */
export function map<T, U, E>(
  result: Result<T, E>,
  fn: (value: T) => U
): Result<U, E> {
  return result.ok ? Ok(fn(result.value)) : result
}

/**
 * Wrap with a custom error mapper.
 */
export async function tryCatchWith<T, E>(
  fn: () => Promise<T>,
  mapError: (e: unknown) => E
): Promise<Result<T, E>> {
  try {
    return Ok(await fn())
  } catch (e) {
    return Err(mapError(e))
  }
}

/**
 * Split results into successes and failures, preserving order.
 */
export function partition<T, E>(
  results: Result<T, E>[]
): { values: T[]; errors: E[] } {
  const values: T[] = []
  const errors: E[] = []
  for (const result of results) {
    if (result.ok) values.push(result.value)
    else errors.push(result.error)
  }
  return { values, errors }
}
