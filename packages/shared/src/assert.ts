/**
 * Assertion helpers for states the surrounding code guarantees.
 *
 * A failed assertion means a bug in the caller, not bad input.
 *
 * @module
 */

/**
 * Assert that a value is neither null nor undefined.
 *
 * @example
 * ```ts
 * assertValue(blobHeader, "Blob header has not been read")
 * // TypeScript now knows blobHeader is non-nullable
 * ```
 */
export function assertValue<T>(
	value?: T,
	message?: string,
): asserts value is NonNullable<T> {
	if (value === undefined || value === null) {
		throw Error(message ?? "Value is undefined or null")
	}
}
