/**
 * Outcome of an operation that can fail without throwing.
 *
 * @example
 * ```typescript
 * const result = safeParse('PORT=8080');
 * if (result.ok) {
 *   console.log(result.value.PORT);
 * } else {
 *   console.error(result.error.line);
 * }
 * ```
 */
export type Result<T, E = Error> = { ok: true; value: T } | { ok: false; error: E };

export const ok = <T>(value: T): Result<T, never> => ({
	ok: true,
	value,
});

export const err = <E>(error: E): Result<never, E> => ({
	ok: false,
	error,
});
