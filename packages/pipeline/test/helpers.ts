import { mkdir, writeFile } from "node:fs/promises"
import { join } from "node:path"
import type { CityJsonDocument } from "@cityfuse/cityjson"
import type { OsmRecord } from "@cityfuse/osm"
import type { LonLat, OsmTags } from "@cityfuse/shared/types"

export function osmRecord(
	id: number,
	[lon, lat]: LonLat,
	tags: OsmTags = {},
	accessibility: OsmTags = {},
): OsmRecord {
	return { osm_id: id, osm_type: "node", tags, lat, lon, accessibility }
}

export async function writeJson(path: string, value: unknown) {
	await writeFile(path, JSON.stringify(value))
	return path
}

/** Write each document as `<name>` into `dir`. */
export async function writeTiles(dir: string, tiles: Record<string, CityJsonDocument>) {
	await mkdir(dir, { recursive: true })
	for (const [name, doc] of Object.entries(tiles)) {
		await writeJson(join(dir, name), doc)
	}
	return dir
}
