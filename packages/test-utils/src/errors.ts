/**
 * Run `fn` and return what it throws. Fails when it returns normally.
 */
export function catchError(fn: () => unknown): unknown {
	try {
		fn()
	} catch (error) {
		return error
	}
	throw Error("Expected function to throw")
}
