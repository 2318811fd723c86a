import { FuseError } from "@cityfuse/shared/errors"
import type {
	CityJsonDocument,
	CityJsonGeometry,
	CityJsonObject,
	SurfaceBoundary,
} from "./types"

function surfaceIndices(surface: SurfaceBoundary, visit: (i: number) => void) {
	for (const ring of surface) for (const index of ring) visit(index)
}

function visitGeometry(geometry: CityJsonGeometry, visit: (i: number) => void) {
	switch (geometry.type) {
		case "MultiSurface":
		case "CompositeSurface":
			for (const surface of geometry.boundaries) surfaceIndices(surface, visit)
			return
		case "Solid":
			for (const shell of geometry.boundaries)
				for (const surface of shell) surfaceIndices(surface, visit)
			return
		case "MultiSolid":
		case "CompositeSolid":
			for (const solid of geometry.boundaries)
				for (const shell of solid)
					for (const surface of shell) surfaceIndices(surface, visit)
			return
		default:
			return
	}
}

function remapSurface(
	surface: SurfaceBoundary,
	remap: (i: number) => number,
): SurfaceBoundary {
	return surface.map((ring) => ring.map(remap))
}

function remapGeometry(
	geometry: CityJsonGeometry,
	remap: (i: number) => number,
): CityJsonGeometry {
	switch (geometry.type) {
		case "MultiSurface":
		case "CompositeSurface":
			return {
				...geometry,
				boundaries: geometry.boundaries.map((s) => remapSurface(s, remap)),
			}
		case "Solid":
			return {
				...geometry,
				boundaries: geometry.boundaries.map((shell) =>
					shell.map((s) => remapSurface(s, remap)),
				),
			}
		case "MultiSolid":
		case "CompositeSolid":
			return {
				...geometry,
				boundaries: geometry.boundaries.map((solid) =>
					solid.map((shell) => shell.map((s) => remapSurface(s, remap))),
				),
			}
		default:
			return { ...geometry }
	}
}

/**
 * Build a self-contained CityJSON document holding the given buildings and
 * their `BuildingPart` children.
 *
 * Only the vertices the buildings use are kept, re-indexed in ascending order
 * of their original index. Every other top-level member (metadata, transform,
 * extensions, appearance) is copied unchanged.
 */
export function extractBuildingsDocument(
	doc: CityJsonDocument,
	buildingIds: string[],
): CityJsonDocument {
	const objects: [string, CityJsonObject][] = []
	for (const buildingId of buildingIds) {
		const building = doc.CityObjects[buildingId]
		if (!building) {
			throw new FuseError(
				"InvalidInput",
				`Building ${buildingId} not found in CityJSON document`,
			)
		}
		objects.push([buildingId, building])
		for (const childId of building.children ?? []) {
			const child = doc.CityObjects[childId]
			if (child) objects.push([childId, child])
		}
	}

	const used = new Set<number>()
	for (const [, object] of objects) {
		for (const geometry of object.geometry ?? []) {
			visitGeometry(geometry, (i) => used.add(i))
		}
	}
	const sorted = [...used].sort((a, b) => a - b)
	const indexMap = new Map(sorted.map((oldIndex, newIndex) => [oldIndex, newIndex]))
	const remap = (i: number) => {
		const mapped = indexMap.get(i)
		if (mapped === undefined) throw Error(`Vertex ${i} was not collected`)
		return mapped
	}
	const vertices = sorted.map((i) => {
		const vertex = doc.vertices[i]
		if (!vertex) {
			throw new FuseError("InvalidInput", `Vertex index ${i} out of range`)
		}
		return [...vertex]
	})

	const CityObjects: Record<string, CityJsonObject> = {}
	for (const [id, object] of objects) {
		const copy: CityJsonObject = structuredClone(object)
		if (copy.geometry) {
			copy.geometry = copy.geometry.map((g) => remapGeometry(g, remap))
		}
		CityObjects[id] = copy
	}

	const { CityObjects: _objects, vertices: _vertices, ...rest } = doc
	return {
		...structuredClone(rest),
		type: "CityJSON",
		vertices,
		CityObjects,
	}
}

/** Self-contained CityJSON document of a single building. */
export function extractBuildingDocument(doc: CityJsonDocument, buildingId: string) {
	return extractBuildingsDocument(doc, [buildingId])
}
