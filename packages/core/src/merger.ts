/**
 * Fuse an OSM object with its matched buildings into one merged record.
 *
 * OSM tags are taken as they are. CityJSON attributes are added next, under
 * OSM style names where one exists; a name already taken keeps its value and
 * the newcomer is stored under `<origin>:<name>`. Derived values come last
 * under the same rule. Building geometry is copied without change.
 *
 * @module
 */

import type { AttributeValue, CityBuilding } from "@cityfuse/cityjson"
import type { OsmObject } from "@cityfuse/osm"
import { FuseError } from "@cityfuse/shared/errors"
import { closeRing } from "@cityfuse/shared/planar"
import type { Provenance, XYZ } from "@cityfuse/shared/types"
import { buildingFootprint } from "./footprint"
import type {
	BuildingLookup,
	MatchedBuilding,
	MatchResult,
	MergedAttribute,
	MergedRecord,
	MergedSolid,
	MergeOutcome,
} from "./types"
import { DEFAULT_VALIDATION_OPTIONS, type ValidationOptions, validateSolids } from "./validate"

export type MergeOptions = ValidationOptions

/**
 * CityJSON attribute names and the OSM keys they are merged under.
 */
export const CITYJSON_ATTRIBUTE_KEYS: Record<string, string> = {
	measuredHeight: "height",
	roofType: "roof:shape",
	yearOfConstruction: "start_date",
	storeysAboveGround: "building:levels",
}

function round(value: number, decimals = 2) {
	const factor = 10 ** decimals
	return Math.round(value * factor) / factor
}

class AttributeSet {
	private values = new Map<string, MergedAttribute>()

	has(key: string) {
		return this.values.has(key)
	}

	/**
	 * Add a value. When the name is taken, the value goes under
	 * `<origin>:<key>` unless that is taken too.
	 */
	put(key: string, value: AttributeValue, origin: Provenance) {
		const name = this.values.has(key) ? `${origin}:${key}` : key
		if (this.values.has(name)) return
		this.values.set(name, { value, origin })
	}

	/** Plain object with keys in sorted order. */
	toRecord(): Record<string, MergedAttribute> {
		const record: Record<string, MergedAttribute> = {}
		for (const key of [...this.values.keys()].sort()) {
			const attribute = this.values.get(key)
			if (attribute) record[key] = attribute
		}
		return record
	}
}

/**
 * The best building's values are merged first. A later building's differing
 * value for the same attribute is kept as `cityjson:<buildingId>:<key>`.
 */
function cityJsonAttributes(attributes: AttributeSet, buildings: CityBuilding[]) {
	const seen = new Map<string, AttributeValue>()
	for (const building of buildings) {
		for (const [source, value] of Object.entries(building.attributes)) {
			const key = CITYJSON_ATTRIBUTE_KEYS[source] ?? source
			const first = seen.get(source)
			if (first === undefined) {
				seen.set(source, value)
				attributes.put(key, value, "cityjson")
			} else if (first !== value) {
				attributes.put(`cityjson:${building.id}:${key}`, value, "cityjson")
			}
		}
	}
}

function copySolids(building: CityBuilding): MergedSolid[] {
	const closed = (ring: XYZ[]) => closeRing(ring).map((p): XYZ => [p[0], p[1], p[2]])
	return building.solids.map((solid): MergedSolid => ({
		buildingId: building.id,
		origin: "cityjson",
		surfaces: solid.surfaces.map((surface) => ({
			role: surface.role,
			semantic: surface.semantic,
			exterior: closed(surface.exterior),
			interiors: surface.interiors.map(closed),
		})),
	}))
}

function heightRange(solids: MergedSolid[]) {
	let min = Number.POSITIVE_INFINITY
	let max = Number.NEGATIVE_INFINITY
	for (const solid of solids) {
		for (const surface of solid.surfaces) {
			for (const [, , z] of surface.exterior) {
				if (z < min) min = z
				if (z > max) max = z
			}
		}
	}
	return max >= min ? max - min : undefined
}

/**
 * Merge an OSM object with the buildings selected for it.
 *
 * @returns `no-match` when the match result selected no building.
 * @throws FuseError `GeometryMismatch` when a selected building is missing or
 * lies in another reference system than the aligned object.
 */
export function merge(
	object: OsmObject,
	result: MatchResult,
	buildings: BuildingLookup,
	options: Partial<MergeOptions> = {},
): MergeOutcome {
	if (result.selected.length === 0) return { status: "no-match", osmId: object.id }
	const { aligned } = result

	const matched: CityBuilding[] = result.selected.map(({ buildingId }) => {
		const building = buildings.get(buildingId)
		if (building === undefined) {
			throw new FuseError("GeometryMismatch", `Matched building ${buildingId} is not loaded`, {
				objectId: object.id,
			})
		}
		if (building.epsg !== aligned.epsg) {
			throw new FuseError(
				"GeometryMismatch",
				`Building ${buildingId} is in EPSG:${building.epsg ?? "unknown"}, expected EPSG:${aligned.epsg}`,
				{ objectId: object.id },
			)
		}
		return building
	})

	const attributes = new AttributeSet()
	for (const [key, value] of Object.entries(object.tags)) attributes.put(key, value, "osm")
	cityJsonAttributes(attributes, matched)

	const solids = matched.flatMap(copySolids)
	const height = heightRange(solids)
	if (height !== undefined && !attributes.has("height")) {
		attributes.put("height", round(height), "derived")
	}
	const footprintArea = matched.reduce(
		(sum, building) => sum + (buildingFootprint(building)?.area ?? 0),
		0,
	)
	attributes.put("footprint:area", round(footprintArea), "derived")
	const [best] = result.selected
	if (best) attributes.put("match:distance", round(best.distance), "derived")

	const matchedBuildings = result.selected.map((candidate, i): MatchedBuilding => {
		const entry: MatchedBuilding = {
			buildingId: candidate.buildingId,
			contains: candidate.contains,
			distance: round(candidate.distance, 3),
			score: round(candidate.score, 3),
		}
		const tile = matched[i]?.tile
		if (tile !== undefined) entry.tile = tile
		return entry
	})

	const osm: MergedRecord["osm"] = {
		type: object.type,
		osmId: object.osmId,
		lonLat: object.lonLat,
		position: aligned.position,
		anchor: aligned.anchor,
	}
	if (aligned.footprint) osm.footprint = aligned.footprint

	return {
		status: "merged",
		record: {
			formatVersion: 1,
			id: object.id,
			osm,
			epsg: aligned.epsg,
			attributes: attributes.toRecord(),
			buildings: matchedBuildings,
			solids,
			issues: validateSolids(solids, { ...DEFAULT_VALIDATION_OPTIONS, ...options }),
		},
	}
}
