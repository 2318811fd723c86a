/**
 * Destinations for the files a run produces.
 *
 * @module
 */

import { join } from "node:path"
import { writeFileAtomic } from "@cityfuse/shared/atomic-write"

export interface OutputSink {
	/**
	 * Store `data` under `name` and return where it went.
	 *
	 * @throws FuseError `WriteError`
	 */
	write(name: string, data: string | Uint8Array, objectId?: string): Promise<string>
}

/**
 * Writes every file into one directory with temp-then-rename writes.
 */
export class FileSystemSink implements OutputSink {
	readonly dir: string

	constructor(dir: string) {
		this.dir = dir
	}

	async write(name: string, data: string | Uint8Array, objectId?: string) {
		const destination = join(this.dir, name)
		await writeFileAtomic(destination, data, objectId)
		return destination
	}
}

/**
 * Keeps written files in memory.
 */
export class MemorySink implements OutputSink {
	readonly files = new Map<string, string | Uint8Array>()

	async write(name: string, data: string | Uint8Array) {
		this.files.set(name, data)
		return name
	}

	/** Text content of a written file. */
	text(name: string): string | undefined {
		const data = this.files.get(name)
		if (data === undefined) return undefined
		return typeof data === "string" ? data : new TextDecoder().decode(data)
	}
}
