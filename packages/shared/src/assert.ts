/**
 * Assertion helpers for index lookups and parsed input.
 *
 * @module
 */

/**
 * Assert that a value is neither null nor undefined.
 *
 * @example
 * ```ts
 * const vertex = vertices[index]
 * assertValue(vertex, `No vertex at index ${index}`)
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

/**
 * Read `array[index]`, throwing when the slot is empty.
 */
export function at<T>(array: ArrayLike<T>, index: number, message?: string): T {
	const value = array[index]
	assertValue(
		value,
		message ?? `Index ${index} out of range (length ${array.length})`,
	)
	return value
}
