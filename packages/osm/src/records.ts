import { FuseError } from "@cityfuse/shared/errors"
import { isRecord } from "@cityfuse/shared/guards"
import type { LonLat, OsmEntityType, OsmTags } from "@cityfuse/shared/types"
import type { OsmRecord } from "./types"

function isEntityType(value: unknown): value is OsmEntityType {
	return value === "node" || value === "way" || value === "relation"
}

function stringTags(value: unknown): OsmTags {
	const tags: OsmTags = {}
	if (!isRecord(value)) return tags
	for (const [key, v] of Object.entries(value)) {
		if (typeof v === "string") tags[key] = v
		else if (typeof v === "number" || typeof v === "boolean") tags[key] = String(v)
	}
	return tags
}

function isLonLat(value: unknown): value is LonLat {
	return (
		Array.isArray(value) &&
		value.length >= 2 &&
		typeof value[0] === "number" &&
		typeof value[1] === "number"
	)
}

export interface ParsedRecords {
	records: OsmRecord[]
	/** Entries without an id, a type or a position. */
	skipped: number
}

/**
 * Validate the JSON array written by the fetch step. Entries lacking an id,
 * a type or coordinates are counted and skipped.
 *
 * @throws FuseError `InvalidInput` when the value is not an array.
 */
export function parseOsmRecords(value: unknown): ParsedRecords {
	if (!Array.isArray(value)) {
		throw new FuseError("InvalidInput", "Expected an array of OSM records")
	}
	const records: OsmRecord[] = []
	let skipped = 0
	for (const entry of value) {
		if (!isRecord(entry)) {
			skipped++
			continue
		}
		const { osm_id, osm_type, lat, lon } = entry
		if (
			typeof osm_id !== "number" ||
			!isEntityType(osm_type) ||
			typeof lat !== "number" ||
			typeof lon !== "number"
		) {
			skipped++
			continue
		}
		const record: OsmRecord = {
			osm_id,
			osm_type,
			tags: stringTags(entry["tags"]),
			lat,
			lon,
			accessibility: stringTags(entry["accessibility"]),
		}
		const footprint = entry["footprint"]
		if (Array.isArray(footprint) && footprint.every(isLonLat)) {
			record.footprint = footprint.map(([x, y]): LonLat => [x, y])
		}
		records.push(record)
	}
	return { records, skipped }
}
