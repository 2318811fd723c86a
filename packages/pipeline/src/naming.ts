/**
 * File names of the per-object outputs. Every name is derived from the OSM
 * object id, so reruns overwrite instead of accumulating files.
 */

/** `node/1` → `node_1`. Characters outside `[A-Za-z0-9_.-]` become `_`. */
export function fileStem(objectId: string) {
	return objectId.replace(/[^A-Za-z0-9_.-]/g, "_")
}

export function pointFileName(objectId: string) {
	return `${fileStem(objectId)}.json`
}

export function recordFileName(objectId: string) {
	return `${fileStem(objectId)}_bld.json`
}

export function meshFileName(objectId: string) {
	return `${fileStem(objectId)}.glb`
}
