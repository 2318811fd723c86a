import { closeRing, ringSignedArea } from "@cityfuse/shared/planar"
import type { LonLat, OsmTags } from "@cityfuse/shared/types"
import {
	type OsmObject,
	type OsmRecord,
	type OverpassElement,
	osmObjectId,
} from "./types"

/**
 * Tags describing step-free access, in the order they are reported.
 */
export const ACCESSIBILITY_KEYS = [
	"wheelchair",
	"accessibility",
	"elevator",
	"toilets:wheelchair",
	"wheelchair_toilet",
	"wheelchair:description",
	"step_free",
	"ramp",
	"ramp:wheelchair",
] as const

/**
 * Pull the known accessibility tags out of a tag set.
 */
export function extractAccessibility(tags: OsmTags): OsmTags {
	const accessibility: OsmTags = {}
	for (const key of ACCESSIBILITY_KEYS) {
		const value = tags[key]
		if (value !== undefined) accessibility[key] = value
	}
	return accessibility
}

/**
 * Position of an element: its own coordinate for nodes, else its `center`.
 */
export function elementPosition(element: OverpassElement): LonLat | null {
	if (element.lat !== undefined && element.lon !== undefined) {
		return [element.lon, element.lat]
	}
	if (element.center) return [element.center.lon, element.center.lat]
	return null
}

/**
 * Normalize a ring to closed and counterclockwise. Returns undefined for rings
 * with fewer than three distinct points.
 */
export function normalizeFootprint(ring: LonLat[]): LonLat[] | undefined {
	const closed = closeRing(ring)
	if (closed.length < 4) return undefined
	return ringSignedArea(closed) < 0 ? closed.reverse() : closed
}

function elementFootprint(element: OverpassElement): LonLat[] | undefined {
	if (element.type !== "way" || !element.geometry) return undefined
	const ring = element.geometry.map(({ lat, lon }): LonLat => [lon, lat])
	const first = ring[0]
	const last = ring[ring.length - 1]
	if (!first || !last || first[0] !== last[0] || first[1] !== last[1]) {
		return undefined
	}
	return normalizeFootprint(ring)
}

/**
 * Compact a raw Overpass element into a POI record. Elements without a
 * position yield null.
 */
export function simplifyElement(element: OverpassElement): OsmRecord | null {
	const position = elementPosition(element)
	if (!position) return null
	const tags = element.tags ?? {}
	const record: OsmRecord = {
		osm_id: element.id,
		osm_type: element.type,
		tags,
		lat: position[1],
		lon: position[0],
		accessibility: extractAccessibility(tags),
	}
	const footprint = elementFootprint(element)
	if (footprint) record.footprint = footprint
	return record
}

/**
 * Convert a stored POI record into an `OsmObject`.
 */
export function toOsmObject(record: OsmRecord): OsmObject {
	const object: OsmObject = {
		id: osmObjectId(record.osm_type, record.osm_id),
		type: record.osm_type,
		osmId: record.osm_id,
		lonLat: [record.lon, record.lat],
		tags: { ...record.tags },
	}
	if (record.footprint) object.footprint = record.footprint
	return object
}
