/**
 * Read LOD2 building geometry out of CityJSON documents.
 *
 * Vertices are decompressed with the document `transform`, geometries are
 * flattened into solids of semantically tagged surfaces, and `BuildingPart`
 * children are folded into their parent `Building`.
 *
 * @module
 */

import { at } from "@cityfuse/shared/assert"
import { FuseError } from "@cityfuse/shared/errors"
import { bboxOf } from "@cityfuse/shared/planar"
import type { Bbox2D, XYZ } from "@cityfuse/shared/types"
import { newellNormal, normalize } from "@cityfuse/shared/vec3"
import { parseReferenceSystem } from "./reference-system"
import type {
	AttributeValue,
	BuildingSolid,
	BuildingSurface,
	CityBuilding,
	CityJsonDocument,
	CityJsonGeometry,
	CityJsonObject,
	CityJsonSemanticSurface,
	ShellBoundary,
	SurfaceBoundary,
	SurfaceRole,
} from "./types"

/**
 * Semantic surface types and the material class they map to. Surfaces with
 * any other type, or without semantics, are classified by their normal.
 */
export const SEMANTIC_ROLES: Record<string, SurfaceRole> = {
	RoofSurface: "roof",
	OuterCeilingSurface: "roof",
	WallSurface: "wall",
	ClosureSurface: "wall",
	Window: "wall",
	Door: "wall",
	GroundSurface: "ground",
	OuterFloorSurface: "ground",
}

/** Object types whose geometry is folded into the parent building. */
const PART_TYPES = new Set(["BuildingPart"])

export interface ParseCityJsonOptions {
	/** Tile name recorded on every building. */
	tile?: string
	/** Level of detail to read; geometries of other LODs are ignored. */
	lod?: string
}

export interface ParsedCityJson {
	buildings: CityBuilding[]
	epsg?: number
	/** [minx, miny, minz, maxx, maxy, maxz] from the metadata. */
	extent?: number[]
	/** Buildings without any geometry of the requested LOD. */
	skipped: string[]
}

/**
 * Classify a surface without usable semantics from its normal: facing up is
 * roof, facing down is ground, everything else is wall.
 */
export function roleFromNormal(ring: XYZ[]): SurfaceRole {
	const [, , nz] = normalize(newellNormal(ring))
	if (nz > 0.5) return "roof"
	if (nz < -0.5) return "ground"
	return "wall"
}

/**
 * Vertex list with the `transform` applied.
 */
export function decodeVertices(doc: CityJsonDocument): XYZ[] {
	const transform = doc.transform
	return doc.vertices.map((v, i) => {
		const x = v[0]
		const y = v[1]
		const z = v[2]
		if (x === undefined || y === undefined || z === undefined) {
			throw new FuseError("InvalidInput", `Vertex ${i} has fewer than 3 values`)
		}
		if (!transform) return [x, y, z]
		return [
			x * transform.scale[0] + transform.translate[0],
			y * transform.scale[1] + transform.translate[1],
			z * transform.scale[2] + transform.translate[2],
		]
	})
}

function matchesLod(geometry: CityJsonGeometry, lod: string) {
	if (geometry.lod === undefined) return true
	const value = String(geometry.lod)
	return value === lod || value.startsWith(`${lod}.`)
}

class SurfaceReader {
	constructor(private vertices: XYZ[]) {}

	ring(indices: number[]): XYZ[] {
		return indices.map((index) => {
			const vertex = this.vertices[index]
			if (!vertex) {
				throw new FuseError("InvalidInput", `Vertex index ${index} out of range`)
			}
			return vertex
		})
	}

	surface(
		boundary: SurfaceBoundary,
		semantic: CityJsonSemanticSurface | null,
	): BuildingSurface | null {
		const [exteriorIndices, ...interiorIndices] = boundary
		if (!exteriorIndices || exteriorIndices.length < 3) return null
		const exterior = this.ring(exteriorIndices)
		const type = semantic?.type ?? null
		const role =
			(type !== null ? SEMANTIC_ROLES[type] : undefined) ??
			roleFromNormal(exterior)
		return {
			role,
			semantic: type,
			exterior,
			interiors: interiorIndices
				.filter((ring) => ring.length >= 3)
				.map((ring) => this.ring(ring)),
		}
	}

	shell(
		shell: ShellBoundary,
		semanticOf: (surfaceIndex: number) => CityJsonSemanticSurface | null,
	): BuildingSurface[] {
		const surfaces: BuildingSurface[] = []
		shell.forEach((boundary, i) => {
			const surface = this.surface(boundary, semanticOf(i))
			if (surface) surfaces.push(surface)
		})
		return surfaces
	}
}

function semanticLookup(
	surfaces: CityJsonSemanticSurface[] | undefined,
	value: number | null | undefined,
): CityJsonSemanticSurface | null {
	if (surfaces === undefined || value === null || value === undefined)
		return null
	return surfaces[value] ?? null
}

/**
 * Convert one CityJSON geometry into solids. Surface geometries become a
 * single solid; for (multi-)solids only the exterior shell is read.
 */
export function geometryToSolids(
	geometry: CityJsonGeometry,
	vertices: XYZ[],
): BuildingSolid[] {
	const reader = new SurfaceReader(vertices)
	switch (geometry.type) {
		case "MultiSurface":
		case "CompositeSurface": {
			const semantics = geometry.semantics
			const solid = {
				surfaces: reader.shell(geometry.boundaries, (i) =>
					semanticLookup(semantics?.surfaces, semantics?.values?.[i]),
				),
			}
			return solid.surfaces.length > 0 ? [solid] : []
		}
		case "Solid": {
			const exterior = geometry.boundaries[0]
			if (!exterior) return []
			const semantics = geometry.semantics
			const solid = {
				surfaces: reader.shell(exterior, (i) =>
					semanticLookup(semantics?.surfaces, semantics?.values?.[0]?.[i]),
				),
			}
			return solid.surfaces.length > 0 ? [solid] : []
		}
		case "MultiSolid":
		case "CompositeSolid": {
			const semantics = geometry.semantics
			const solids: BuildingSolid[] = []
			geometry.boundaries.forEach((solid, s) => {
				const exterior = solid[0]
				if (!exterior) return
				const read = reader.shell(exterior, (i) =>
					semanticLookup(semantics?.surfaces, semantics?.values?.[s]?.[0]?.[i]),
				)
				if (read.length > 0) solids.push({ surfaces: read })
			})
			return solids
		}
		default:
			return []
	}
}

function scalarAttributes(
	attributes: Record<string, unknown> | undefined,
): Record<string, AttributeValue> {
	const result: Record<string, AttributeValue> = {}
	if (!attributes) return result
	for (const [key, value] of Object.entries(attributes)) {
		if (
			typeof value === "string" ||
			typeof value === "boolean" ||
			(typeof value === "number" && Number.isFinite(value))
		) {
			result[key] = value
		}
	}
	return result
}

function objectSolids(
	object: CityJsonObject,
	vertices: XYZ[],
	lod: string,
): BuildingSolid[] {
	return (object.geometry ?? [])
		.filter((geometry) => matchesLod(geometry, lod))
		.flatMap((geometry) => geometryToSolids(geometry, vertices))
}

/**
 * Read every `Building` of a CityJSON document.
 */
export function parseCityJson(
	doc: CityJsonDocument,
	{ tile, lod = "2" }: ParseCityJsonOptions = {},
): ParsedCityJson {
	const vertices = decodeVertices(doc)
	const epsg = parseReferenceSystem(doc.metadata?.referenceSystem)
	const extent = doc.metadata?.geographicalExtent
	const buildings: CityBuilding[] = []
	const skipped: string[] = []

	for (const [id, object] of Object.entries(doc.CityObjects)) {
		if (object.type !== "Building") continue
		const solids = objectSolids(object, vertices, lod)
		for (const childId of object.children ?? []) {
			const child = doc.CityObjects[childId]
			if (!child || !PART_TYPES.has(child.type)) continue
			solids.push(...objectSolids(child, vertices, lod))
		}
		if (solids.length === 0) {
			skipped.push(id)
			continue
		}
		const building: CityBuilding = {
			id,
			attributes: scalarAttributes(object.attributes),
			solids,
		}
		if (tile !== undefined) building.tile = tile
		if (epsg !== undefined) building.epsg = epsg
		buildings.push(building)
	}

	return {
		buildings,
		epsg,
		extent: extent?.length === 6 ? extent : undefined,
		skipped,
	}
}

/**
 * Ground-plane extent of a document, from the metadata when present, else
 * computed from the vertices.
 */
export function documentExtent2D(doc: CityJsonDocument): Bbox2D | undefined {
	const extent = doc.metadata?.geographicalExtent
	if (extent?.length === 6) {
		return [at(extent, 0), at(extent, 1), at(extent, 3), at(extent, 4)]
	}
	const vertices = decodeVertices(doc)
	if (vertices.length === 0) return undefined
	return bboxOf(vertices)
}
