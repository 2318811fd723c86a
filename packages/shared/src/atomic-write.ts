import { randomUUID } from "node:crypto"
import { mkdir, rename, rm, writeFile } from "node:fs/promises"
import { basename, dirname, join } from "node:path"
import { FuseError } from "./errors"

/**
 * Write `data` to `destination` through a temporary file in the same
 * directory that is renamed into place once fully written. A failed write
 * leaves no file at `destination` and removes the temporary file.
 *
 * @throws FuseError `WriteError`
 */
export async function writeFileAtomic(
	destination: string,
	data: string | Uint8Array,
	objectId?: string,
): Promise<void> {
	const dir = dirname(destination)
	const temporary = join(dir, `.${basename(destination)}.${randomUUID()}.tmp`)
	try {
		await mkdir(dir, { recursive: true })
	} catch (error) {
		throw new FuseError("WriteError", `Cannot create directory ${dir}`, {
			objectId,
			cause: error,
		})
	}
	try {
		await writeFile(temporary, data)
		await rename(temporary, destination)
	} catch (error) {
		await rm(temporary, { force: true })
		throw new FuseError("WriteError", `Failed to write ${destination}`, {
			objectId,
			cause: error,
		})
	}
}
