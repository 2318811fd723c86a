/**
 * Error taxonomy shared by all stages.
 *
 * `IndexEmpty` and `NotBuilt` are programming errors around the geometry index
 * and are fatal to a run. `GeometryMismatch`, `DegenerateSolid` and `WriteError`
 * concern one OSM object and are recorded by the batch driver, which then
 * carries on. `InvalidInput` and `FetchError` come from the collaborators that
 * read files and talk to remote services.
 *
 * @module
 */

export type FuseErrorKind =
	| "IndexEmpty"
	| "NotBuilt"
	| "GeometryMismatch"
	| "DegenerateSolid"
	| "WriteError"
	| "InvalidInput"
	| "FetchError"

export interface FuseErrorOptions {
	/** Identifier of the OSM object the failure belongs to. */
	objectId?: string
	cause?: unknown
}

export class FuseError extends Error {
	readonly kind: FuseErrorKind
	readonly objectId?: string

	constructor(kind: FuseErrorKind, message: string, options?: FuseErrorOptions) {
		super(message, { cause: options?.cause })
		this.name = `${kind}Error`
		this.kind = kind
		this.objectId = options?.objectId
	}
}

/**
 * Narrow an unknown thrown value to a `FuseError`, optionally of one kind.
 */
export function isFuseError(
	error: unknown,
	kind?: FuseErrorKind,
): error is FuseError {
	if (!(error instanceof FuseError)) return false
	return kind === undefined || error.kind === kind
}

/**
 * Message text of an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
	if (error instanceof Error) return error.message
	return String(error)
}
