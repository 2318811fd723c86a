import { readFile } from "node:fs/promises"
import {
	type Mesh,
	type MeshOptions,
	buildMesh,
	exportMesh,
	parseMergedRecord,
} from "@cityfuse/core"
import { FuseError } from "@cityfuse/shared/errors"

export interface MeshFileResult {
	destination: string
	mesh: Mesh
	bytes: number
}

/** `out/node_1_bld.json` → `out/node_1.glb` */
export function meshPathFor(recordPath: string) {
	return `${recordPath.replace(/(_bld)?\.json$/i, "")}.glb`
}

/**
 * Rebuild the mesh of a merged-record file and write it as GLB.
 *
 * @throws FuseError `InvalidInput` for an unreadable record, `DegenerateSolid`
 * or `WriteError` from the mesh and export stages.
 */
export async function meshRecordFile(
	path: string,
	destination = meshPathFor(path),
	options: Partial<MeshOptions> = {},
): Promise<MeshFileResult> {
	let text: string
	try {
		text = await readFile(path, "utf-8")
	} catch (error) {
		throw new FuseError("InvalidInput", `Cannot read ${path}`, { cause: error })
	}
	const mesh = buildMesh(parseMergedRecord(text, path), options)
	const bytes = await exportMesh(mesh, destination)
	return { destination, mesh, bytes }
}
