/**
 * Synthetic buildings and POIs for tests.
 *
 * Houses are axis aligned around a projected centre point, with every ring
 * wound counterclockwise when seen from outside the solid.
 */

import {
	type CityBuilding,
	type CityJsonDocument,
	type CityJsonGeometry,
	referenceSystemUrl,
	type SurfaceRole,
} from "@cityfuse/cityjson"
import { type OsmObject, osmObjectId } from "@cityfuse/osm"
import { at } from "@cityfuse/shared/assert"
import { createProjector } from "@cityfuse/shared/projection"
import type { LonLat, OsmTags, XY, XYZ } from "@cityfuse/shared/types"

export type SemanticType = "GroundSurface" | "WallSurface" | "RoofSurface"

const ROLES: Record<SemanticType, SurfaceRole> = {
	GroundSurface: "ground",
	WallSurface: "wall",
	RoofSurface: "roof",
}

export interface IndexedHouse {
	vertices: XYZ[]
	surfaces: { type: SemanticType; ring: number[] }[]
}

/** A point in Karlsruhe, used for end-to-end scenarios. */
export const KARLSRUHE: LonLat = [8.404, 49.014]

export const ETRS89_UTM32 = 25832

/** Project a geographic position into EPSG:25832. */
export function utm32(lonLat: LonLat): XY {
	return createProjector(ETRS89_UTM32).forward(lonLat)
}

/**
 * Flat-roofed box: 8 vertices, ground, roof and four walls.
 */
export function flatHouse(
	[cx, cy]: XY,
	{ width = 10, depth = 10, height = 6, base = 0 } = {},
): IndexedHouse {
	const x0 = cx - width / 2
	const x1 = cx + width / 2
	const y0 = cy - depth / 2
	const y1 = cy + depth / 2
	const top = base + height
	return {
		vertices: [
			[x0, y0, base],
			[x1, y0, base],
			[x1, y1, base],
			[x0, y1, base],
			[x0, y0, top],
			[x1, y0, top],
			[x1, y1, top],
			[x0, y1, top],
		],
		surfaces: [
			{ type: "GroundSurface", ring: [0, 3, 2, 1] },
			{ type: "RoofSurface", ring: [4, 5, 6, 7] },
			{ type: "WallSurface", ring: [0, 1, 5, 4] },
			{ type: "WallSurface", ring: [1, 2, 6, 5] },
			{ type: "WallSurface", ring: [2, 3, 7, 6] },
			{ type: "WallSurface", ring: [3, 0, 4, 7] },
		],
	}
}

/**
 * Gable-roofed house with the ridge along x: 10 vertices, one ground, four
 * walls (two of them pentagonal gables) and two roof surfaces.
 */
export function gableHouse(
	[cx, cy]: XY,
	{ width = 12, depth = 8, eave = 6, ridge = 9, base = 0 } = {},
): IndexedHouse {
	const x0 = cx - width / 2
	const x1 = cx + width / 2
	const y0 = cy - depth / 2
	const y1 = cy + depth / 2
	return {
		vertices: [
			[x0, y0, base],
			[x1, y0, base],
			[x1, y1, base],
			[x0, y1, base],
			[x0, y0, base + eave],
			[x1, y0, base + eave],
			[x1, y1, base + eave],
			[x0, y1, base + eave],
			[x0, cy, base + ridge],
			[x1, cy, base + ridge],
		],
		surfaces: [
			{ type: "GroundSurface", ring: [0, 3, 2, 1] },
			{ type: "WallSurface", ring: [0, 1, 5, 4] },
			{ type: "WallSurface", ring: [1, 2, 6, 9, 5] },
			{ type: "WallSurface", ring: [2, 3, 7, 6] },
			{ type: "WallSurface", ring: [3, 0, 4, 8, 7] },
			{ type: "RoofSurface", ring: [4, 5, 9, 8] },
			{ type: "RoofSurface", ring: [6, 7, 8, 9] },
		],
	}
}

/** Reverse every ring of a house, turning all normals inward. */
export function invertHouse(house: IndexedHouse): IndexedHouse {
	return {
		vertices: house.vertices,
		surfaces: house.surfaces.map(({ type, ring }) => ({
			type,
			ring: [...ring].reverse(),
		})),
	}
}

/**
 * Building record with real-world coordinates for an indexed house.
 */
export function houseToBuilding(
	id: string,
	house: IndexedHouse,
	{
		epsg = ETRS89_UTM32,
		attributes = {},
		tile,
	}: {
		epsg?: number
		attributes?: CityBuilding["attributes"]
		tile?: string
	} = {},
): CityBuilding {
	const building: CityBuilding = {
		id,
		epsg,
		attributes,
		solids: [
			{
				surfaces: house.surfaces.map(({ type, ring }) => ({
					role: ROLES[type],
					semantic: type,
					exterior: ring.map((i) => at(house.vertices, i)),
					interiors: [],
				})),
			},
		],
	}
	if (tile !== undefined) building.tile = tile
	return building
}

const SEMANTIC_SURFACES: { type: SemanticType }[] = [
	{ type: "GroundSurface" },
	{ type: "WallSurface" },
	{ type: "RoofSurface" },
]

function semanticIndex(type: SemanticType) {
	return SEMANTIC_SURFACES.findIndex((s) => s.type === type)
}

export interface DocumentBuilding {
	id: string
	house: IndexedHouse
	attributes?: Record<string, unknown>
}

/**
 * CityJSON document holding the given houses as LOD2 buildings.
 *
 * With `compress`, vertices are stored as integers with a millimetre
 * `transform`, as official exports do.
 */
export function houseDocument(
	buildings: DocumentBuilding[],
	{
		epsg = ETRS89_UTM32,
		geometryType = "MultiSurface",
		compress = false,
	}: {
		epsg?: number
		geometryType?: "MultiSurface" | "Solid"
		compress?: boolean
	} = {},
): CityJsonDocument {
	const vertices: XYZ[] = []
	const CityObjects: CityJsonDocument["CityObjects"] = {}
	for (const { id, house, attributes } of buildings) {
		const offset = vertices.length
		vertices.push(...house.vertices)
		const boundaries = house.surfaces.map(({ ring }) => [
			ring.map((i) => i + offset),
		])
		const values = house.surfaces.map(({ type }) => semanticIndex(type))
		const geometry: CityJsonGeometry =
			geometryType === "Solid"
				? {
						type: "Solid",
						lod: "2",
						boundaries: [boundaries],
						semantics: { surfaces: SEMANTIC_SURFACES, values: [values] },
					}
				: {
						type: "MultiSurface",
						lod: "2",
						boundaries,
						semantics: { surfaces: SEMANTIC_SURFACES, values },
					}
		CityObjects[id] = {
			type: "Building",
			attributes: attributes ?? {},
			geometry: [geometry],
		}
	}

	const xs = vertices.map((v) => v[0])
	const ys = vertices.map((v) => v[1])
	const zs = vertices.map((v) => v[2])
	const min: XYZ = [Math.min(...xs), Math.min(...ys), Math.min(...zs)]
	const max: XYZ = [Math.max(...xs), Math.max(...ys), Math.max(...zs)]
	const doc: CityJsonDocument = {
		type: "CityJSON",
		version: "1.1",
		metadata: {
			referenceSystem: referenceSystemUrl(epsg),
			geographicalExtent: [...min, ...max],
		},
		vertices,
		CityObjects,
	}
	if (compress) {
		const scale: XYZ = [0.001, 0.001, 0.001]
		doc.transform = { scale, translate: min }
		doc.vertices = vertices.map((v) => [
			Math.round((v[0] - min[0]) / scale[0]),
			Math.round((v[1] - min[1]) / scale[1]),
			Math.round((v[2] - min[2]) / scale[2]),
		])
	}
	return doc
}

/** Point OSM object. */
export function osmPoint(id: number, lonLat: LonLat, tags: OsmTags = {}): OsmObject {
	return {
		id: osmObjectId("node", id),
		type: "node",
		osmId: id,
		lonLat,
		tags,
	}
}

/**
 * Closed counterclockwise rectangle of the given size in meters around a
 * geographic point, for polygon OSM objects.
 */
export function lonLatRectangle(
	[lon, lat]: LonLat,
	widthMeters: number,
	depthMeters: number,
): LonLat[] {
	const dLon = widthMeters / 2 / (111_320 * Math.cos((lat * Math.PI) / 180))
	const dLat = depthMeters / 2 / 110_574
	return [
		[lon - dLon, lat - dLat],
		[lon + dLon, lat - dLat],
		[lon + dLon, lat + dLat],
		[lon - dLon, lat + dLat],
		[lon - dLon, lat - dLat],
	]
}
