/**
 * Conversion between POI records, inspection GeoJSON and `OsmObject`s.
 *
 * The inspection export keeps only positions, the descriptive type tags and
 * `acc_*` accessibility properties so that the file opens quickly in a GIS.
 *
 * @module
 */

import { FuseError } from "@cityfuse/shared/errors"
import {
	type ProgressCallback,
	logProgress,
	progressLogger,
} from "@cityfuse/shared/progress"
import type { LonLat, OsmEntityType, OsmTags } from "@cityfuse/shared/types"
import { centroid } from "@turf/turf"
import type {
	Feature,
	FeatureCollection,
	Geometry,
	GeoJsonProperties,
	Point,
	Position,
} from "geojson"
import { normalizeFootprint } from "./simplify"
import { type OsmObject, type OsmRecord, osmObjectId } from "./types"

/** Descriptive tags copied into the inspection export. */
export const TYPE_TAG_KEYS = [
	"amenity",
	"public_transport",
	"highway",
	"railway",
	"name",
] as const

/** Accessibility keys exported with an `acc_` prefix. */
export const ACCESS_TAG_KEYS = [
	"wheelchair",
	"toilets:wheelchair",
	"wheelchair:description",
	"wheelchair_toilet",
	"step_free",
	"ramp",
	"ramp:wheelchair",
	"accessibility",
] as const

const WHEELCHAIR_YES = new Set(["yes", "true", "1", "designated", "limited"])
const WHEELCHAIR_NO = new Set([
	"no",
	"false",
	"0",
	"null",
	"none",
	"nan",
	"unknown",
	"",
])

export type InspectionProperties = {
	osm_id: number
	osm_type: OsmEntityType
	lat: number
	lon: number
	[key: string]: string | number
}

export type InspectionCollection = FeatureCollection<Point, InspectionProperties>

/** Property names that describe the feature rather than being OSM tags. */
const BOOKKEEPING_KEYS = new Set(["osm_id", "osm_type", "lat", "lon", "id", "type"])

/**
 * Build the inspection GeoJSON from POI records.
 *
 * @throws FuseError `InvalidInput` when there is nothing to write.
 */
export function recordsToGeoJSON(
	records: OsmRecord[],
	onProgress: ProgressCallback = logProgress,
): InspectionCollection {
	const log = progressLogger(onProgress)
	const features = records.map((record): Feature<Point, InspectionProperties> => {
		const properties: InspectionProperties = {
			osm_id: record.osm_id,
			osm_type: record.osm_type,
			lat: record.lat,
			lon: record.lon,
		}
		for (const key of TYPE_TAG_KEYS) {
			const value = record.tags[key]
			if (value !== undefined) properties[key] = value
		}
		for (const key of ACCESS_TAG_KEYS) {
			const value = record.accessibility[key] ?? record.tags[key]
			if (value !== undefined) properties[`acc_${key}`] = value
		}
		return {
			type: "Feature",
			id: osmObjectId(record.osm_type, record.osm_id),
			geometry: { type: "Point", coordinates: [record.lon, record.lat] },
			properties,
		}
	})
	if (features.length === 0) {
		throw new FuseError("InvalidInput", "No records to write")
	}
	log.info(`Converted ${features.length} records to GeoJSON`)
	return { type: "FeatureCollection", features }
}

/**
 * Split an inspection export by its `acc_wheelchair` value. Features whose
 * value is in neither the yes nor the no set, or that have none, are left out.
 */
export function splitByWheelchair(collection: InspectionCollection): {
	yes: InspectionCollection
	no: InspectionCollection
} {
	const yes: Feature<Point, InspectionProperties>[] = []
	const no: Feature<Point, InspectionProperties>[] = []
	for (const feature of collection.features) {
		const raw = feature.properties.acc_wheelchair
		if (raw === undefined) continue
		const value = String(raw).toLowerCase()
		if (WHEELCHAIR_YES.has(value)) yes.push(feature)
		else if (WHEELCHAIR_NO.has(value)) no.push(feature)
	}
	return {
		yes: { type: "FeatureCollection", features: yes },
		no: { type: "FeatureCollection", features: no },
	}
}

function isEntityType(value: unknown): value is OsmEntityType {
	return value === "node" || value === "way" || value === "relation"
}

function propertiesToTags(properties: GeoJsonProperties): OsmTags {
	const tags: OsmTags = {}
	for (const [key, value] of Object.entries(properties ?? {})) {
		if (BOOKKEEPING_KEYS.has(key)) continue
		if (typeof value === "string") tags[key] = value
		else if (typeof value === "number" || typeof value === "boolean")
			tags[key] = String(value)
	}
	return tags
}

function toLonLat(position: Position): LonLat {
	const [lon, lat] = position
	if (lon === undefined || lat === undefined) {
		throw new FuseError("InvalidInput", "GeoJSON position without coordinates")
	}
	return [lon, lat]
}

function polygonExterior(geometry: Geometry): Position[] | undefined {
	if (geometry.type === "Polygon") return geometry.coordinates[0]
	if (geometry.type === "MultiPolygon") {
		// Largest polygon by vertex count stands in for the object.
		let best: Position[] | undefined
		for (const polygon of geometry.coordinates) {
			const exterior = polygon[0]
			if (exterior && exterior.length > (best?.length ?? 0)) best = exterior
		}
		return best
	}
	return undefined
}

function featureIdentity(
	feature: Feature,
	next: () => number,
): { type: OsmEntityType; osmId: number } {
	const props = feature.properties ?? {}
	const osmType = props["osm_type"]
	const osmId = props["osm_id"]
	const type: OsmEntityType = isEntityType(osmType)
		? osmType
		: feature.geometry.type === "Point"
			? "node"
			: "way"
	if (typeof osmId === "number") return { type, osmId }
	if (typeof osmId === "string" && /^-?\d+$/.test(osmId))
		return { type, osmId: Number.parseInt(osmId, 10) }
	if (typeof feature.id === "number") return { type, osmId: feature.id }
	return { type, osmId: next() }
}

/**
 * Read OSM objects from a GeoJSON FeatureCollection of points and polygons.
 *
 * Identity comes from `osm_type`/`osm_id` properties, else from a numeric
 * feature id, else sequential negative ids are assigned. Other properties
 * become tags. Polygon exteriors become footprints; the position of a polygon
 * object is its `lat`/`lon` properties when given, else the vertex centroid.
 */
export function osmObjectsFromGeoJSON(
	collection: FeatureCollection,
	onProgress: ProgressCallback = logProgress,
): OsmObject[] {
	const log = progressLogger(onProgress)
	let nextId = -1
	const next = () => nextId--
	const objects: OsmObject[] = []
	let skipped = 0
	for (const feature of collection.features) {
		if (!feature.geometry) {
			skipped++
			continue
		}
		const { type, osmId } = featureIdentity(feature, next)
		const tags = propertiesToTags(feature.properties)
		const base = { id: osmObjectId(type, osmId), type, osmId, tags }
		if (feature.geometry.type === "Point") {
			objects.push({ ...base, lonLat: toLonLat(feature.geometry.coordinates) })
			continue
		}
		const exterior = polygonExterior(feature.geometry)
		const footprint = exterior ? normalizeFootprint(exterior.map(toLonLat)) : undefined
		if (!footprint) {
			skipped++
			continue
		}
		const props = feature.properties ?? {}
		const lat = props["lat"]
		const lon = props["lon"]
		const lonLat: LonLat =
			typeof lon === "number" && typeof lat === "number"
				? [lon, lat]
				: toLonLat(
						centroid({
							type: "Feature",
							properties: {},
							geometry: { type: "Polygon", coordinates: [footprint] },
						}).geometry.coordinates,
					)
		objects.push({ ...base, lonLat, footprint })
	}
	if (skipped > 0) log.warn(`Skipped ${skipped} features without usable geometry`)
	return objects
}

/**
 * Check that a parsed JSON value is a FeatureCollection.
 *
 * @throws FuseError `InvalidInput`
 */
export function assertFeatureCollection(
	value: unknown,
): asserts value is FeatureCollection {
	if (
		typeof value !== "object" ||
		value === null ||
		!("type" in value) ||
		value.type !== "FeatureCollection" ||
		!("features" in value) ||
		!Array.isArray(value.features)
	) {
		throw new FuseError("InvalidInput", "Expected a GeoJSON FeatureCollection")
	}
}
