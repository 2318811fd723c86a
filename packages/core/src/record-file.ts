/**
 * Merged-record file format: pretty-printed JSON with a fixed key order and
 * no timestamps, so merging the same inputs twice yields identical files.
 *
 * @module
 */

import { isCityJsonDocument } from "@cityfuse/cityjson"
import { FuseError } from "@cityfuse/shared/errors"
import { isNumberTuple, isRecord } from "@cityfuse/shared/guards"
import type { MergedRecord } from "./types"

const ROLES = new Set(["roof", "wall", "ground"])
const ORIGINS = new Set(["osm", "cityjson", "derived"])
const OSM_TYPES = new Set(["node", "way", "relation"])

function isRing(value: unknown): boolean {
	return Array.isArray(value) && value.every((p) => isNumberTuple(p, 3))
}

function isSurface(value: unknown): boolean {
	if (!isRecord(value)) return false
	const { role, semantic, exterior, interiors } = value
	return (
		typeof role === "string" &&
		ROLES.has(role) &&
		(semantic === null || typeof semantic === "string") &&
		isRing(exterior) &&
		Array.isArray(interiors) &&
		interiors.every(isRing)
	)
}

function isSolid(value: unknown): boolean {
	if (!isRecord(value)) return false
	const { buildingId, origin, surfaces } = value
	return (
		typeof buildingId === "string" &&
		origin === "cityjson" &&
		Array.isArray(surfaces) &&
		surfaces.every(isSurface)
	)
}

function isAttribute(value: unknown): boolean {
	if (!isRecord(value)) return false
	const { value: v, origin } = value
	return (
		(typeof v === "string" || typeof v === "number" || typeof v === "boolean") &&
		typeof origin === "string" &&
		ORIGINS.has(origin)
	)
}

function isOsmPart(value: unknown): boolean {
	if (!isRecord(value)) return false
	const { type, osmId, lonLat, position, anchor, footprint } = value
	return (
		typeof type === "string" &&
		OSM_TYPES.has(type) &&
		typeof osmId === "number" &&
		isNumberTuple(lonLat, 2) &&
		isNumberTuple(position, 2) &&
		isNumberTuple(anchor, 2) &&
		(footprint === undefined ||
			(Array.isArray(footprint) && footprint.every((p) => isNumberTuple(p, 2))))
	)
}

function isMatchedBuilding(value: unknown): boolean {
	if (!isRecord(value)) return false
	const { buildingId, contains, distance, score } = value
	return (
		typeof buildingId === "string" &&
		typeof contains === "boolean" &&
		typeof distance === "number" &&
		typeof score === "number"
	)
}

export function isMergedRecord(value: unknown): value is MergedRecord {
	if (!isRecord(value)) return false
	const { attributes, buildings, solids, issues, cityjson } = value
	return (
		value["formatVersion"] === 1 &&
		typeof value["id"] === "string" &&
		typeof value["epsg"] === "number" &&
		isOsmPart(value["osm"]) &&
		isRecord(attributes) &&
		Object.values(attributes).every(isAttribute) &&
		Array.isArray(buildings) &&
		buildings.every(isMatchedBuilding) &&
		Array.isArray(solids) &&
		solids.every(isSolid) &&
		Array.isArray(issues) &&
		(cityjson === undefined || isCityJsonDocument(cityjson))
	)
}

export function serializeMergedRecord(record: MergedRecord): string {
	return `${JSON.stringify(record, null, 2)}\n`
}

/**
 * Parse and check a merged-record file.
 *
 * @throws FuseError `InvalidInput` when the text is not a merged record.
 */
export function parseMergedRecord(text: string, source = "merged record"): MergedRecord {
	let value: unknown
	try {
		value = JSON.parse(text)
	} catch (error) {
		throw new FuseError("InvalidInput", `${source} is not valid JSON`, { cause: error })
	}
	if (!isMergedRecord(value)) {
		throw new FuseError("InvalidInput", `${source} is not a merged building record`)
	}
	return value
}
