/**
 * Type guards for values parsed from JSON.
 *
 * @module
 */

export function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value)
}

/** An array of exactly `size` finite numbers. */
export function isNumberTuple(value: unknown, size: number): value is number[] {
	return (
		Array.isArray(value) &&
		value.length === size &&
		value.every((v) => typeof v === "number" && Number.isFinite(v))
	)
}
