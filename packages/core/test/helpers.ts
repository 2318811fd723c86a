import type { CityBuilding } from "@cityfuse/cityjson"
import type { MergedRecord, MergedSurface } from "../src/types"

/** Merged record holding the solids of the given buildings. */
export function recordOf(buildings: CityBuilding[], id = "way/42"): MergedRecord {
	return {
		formatVersion: 1,
		id,
		osm: { type: "way", osmId: 42, lonLat: [0, 0], position: [0, 0], anchor: [0, 0] },
		epsg: 25832,
		attributes: {},
		buildings: [],
		solids: buildings.flatMap((building) =>
			building.solids.map((solid) => ({
				buildingId: building.id,
				origin: "cityjson" as const,
				surfaces: solid.surfaces,
			})),
		),
		issues: [],
	}
}

/** Merged record of a single solid made of loose surfaces. */
export function surfaceRecord(surfaces: MergedSurface[]): MergedRecord {
	return recordOf([{ id: "s", attributes: {}, solids: [{ surfaces }] }])
}
