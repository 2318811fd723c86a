/**
 * Turn the surfaces of a merged record into one indexed triangle mesh.
 *
 * Vertices are re-based on the mean of the record's vertices, merged within
 * the vertex tolerance, and only kept when a face uses them. Faces are
 * wound counterclockwise when seen from outside and grouped by material.
 *
 * @module
 */

import type { SurfaceRole } from "@cityfuse/cityjson"
import { at } from "@cityfuse/shared/assert"
import { FuseError } from "@cityfuse/shared/errors"
import { openRing } from "@cityfuse/shared/planar"
import type { XY, XYZ } from "@cityfuse/shared/types"
import {
	add,
	dot,
	length,
	mean,
	newellNormal,
	scale,
	sub,
	triangleArea,
} from "@cityfuse/shared/vec3"
import { type Footprint, footprintContains, groundFootprint } from "./footprint"
import { MATERIAL_ORDER } from "./materials"
import { polygonPoints, triangulate } from "./triangulate"
import type {
	Face,
	MergedRecord,
	MergedSurface,
	Mesh,
	MeshGroup,
	MeshStats,
} from "./types"
import { VertexWelder } from "./validate"

export interface MeshOptions {
	/** Vertices closer than this (m) are merged. */
	vertexTolerance: number
	/** Triangles with a smaller area (m²) are dropped. */
	areaTolerance: number
}

export const DEFAULT_MESH_OPTIONS: MeshOptions = {
	vertexTolerance: 0.001,
	areaTolerance: 1e-6,
}

/** Distance (m) in front of a wall at which the footprint is probed. */
const WALL_PROBE = 0.1

type Orientation = "outward" | "inward"

function surfaceRings(surface: MergedSurface) {
	return [surface.exterior, ...surface.interiors].map((ring) => openRing(ring))
}

/**
 * Orientation of a closed, consistently wound shell from its signed volume,
 * or undefined when the shell is open or its rings disagree.
 */
export function shellOrientation(
	surfaces: MergedSurface[],
	tolerance: number,
): Orientation | undefined {
	const welder = new VertexWelder(tolerance)
	const edges = new Map<string, number>()
	for (const surface of surfaces) {
		for (const ring of surfaceRings(surface)) {
			const keys = ring.map((p) => welder.id(p))
			for (let i = 0; i < keys.length; i++) {
				const a = keys[i]
				const b = keys[(i + 1) % keys.length]
				if (a === undefined || b === undefined || a === b) continue
				const edge = `${a}>${b}`
				edges.set(edge, (edges.get(edge) ?? 0) + 1)
			}
		}
	}
	for (const [edge, count] of edges) {
		const [a, b] = edge.split(">")
		if (count !== 1 || edges.get(`${b}>${a}`) !== 1) return undefined
	}

	let volume = 0
	for (const surface of surfaces) {
		const [exterior, ...interiors] = surfaceRings(surface)
		if (exterior === undefined || exterior.length === 0) continue
		let normal = newellNormal(exterior)
		for (const ring of interiors) normal = add(normal, newellNormal(ring))
		volume += dot(at(exterior, 0), normal) / 6
	}
	if (Math.abs(volume) < 1e-9) return undefined
	return volume > 0 ? "outward" : "inward"
}

interface SolidContext {
	orientation: Orientation | undefined
	footprint: Footprint | undefined
	centroid: XYZ
}

/**
 * Whether a surface must be reversed to face out of its solid.
 */
function facesInward(
	surface: MergedSurface,
	normal: XYZ,
	solid: SolidContext,
): boolean {
	if (solid.orientation !== undefined) return solid.orientation === "inward"
	if (length(normal) === 0) return false
	const center = mean(openRing(surface.exterior))
	const [nx, ny, nz] = normal
	if (surface.role === "roof") return nz < 0
	if (surface.role === "ground") return nz > 0

	const horizontal = Math.hypot(nx, ny)
	if (solid.footprint && horizontal > 1e-9) {
		const probe: XY = [
			center[0] + (nx / horizontal) * WALL_PROBE,
			center[1] + (ny / horizontal) * WALL_PROBE,
		]
		return footprintContains(solid.footprint, probe)
	}
	return dot(normal, sub(center, solid.centroid)) < 0
}

/** Welded vertices, numbered in the order faces first use them. */
class VertexPool {
	readonly vertices: XYZ[] = []
	private welder: VertexWelder
	private indices = new Map<number, number>()

	constructor(tolerance: number) {
		this.welder = new VertexWelder(tolerance)
	}

	weld(point: XYZ) {
		return this.welder.id(point)
	}

	index(welded: number) {
		let index = this.indices.get(welded)
		if (index === undefined) {
			index = this.vertices.length
			this.vertices.push(at(this.welder.points, welded))
			this.indices.set(welded, index)
		}
		return index
	}
}

/**
 * Build the render mesh of a merged record.
 *
 * @throws FuseError `DegenerateSolid` when no surface yields a triangle.
 */
export function buildMesh(
	record: MergedRecord,
	options: Partial<MeshOptions> = {},
): Mesh {
	const { vertexTolerance, areaTolerance } = { ...DEFAULT_MESH_OPTIONS, ...options }
	const allPoints = record.solids.flatMap((solid) =>
		solid.surfaces.flatMap((surface) => openRing(surface.exterior)),
	)
	if (allPoints.length === 0) {
		throw new FuseError("DegenerateSolid", `${record.id} has no geometry`, {
			objectId: record.id,
		})
	}
	const origin = mean(allPoints)
	const toLocal = (ring: XYZ[]) => ring.map((p) => sub(p, origin))

	const pool = new VertexPool(vertexTolerance)
	const facesByRole: Record<SurfaceRole, Face[]> = { roof: [], wall: [], ground: [] }
	const stats: MeshStats = {
		surfaces: 0,
		flippedSurfaces: 0,
		skippedTriangles: 0,
		skippedSurfaces: 0,
	}

	for (const solid of record.solids) {
		const surfaces: MergedSurface[] = solid.surfaces.map((surface) => ({
			...surface,
			exterior: toLocal(surface.exterior),
			interiors: surface.interiors.map(toLocal),
		}))
		const solidPoints = surfaces.flatMap((s) => openRing(s.exterior))
		if (solidPoints.length === 0) continue
		const context: SolidContext = {
			orientation: shellOrientation(surfaces, vertexTolerance),
			footprint: groundFootprint(surfaces),
			centroid: mean(solidPoints),
		}

		for (const surface of surfaces) {
			stats.surfaces++
			const normal = newellNormal(surface.exterior)
			const flip = facesInward(surface, normal, context)
			if (flip) stats.flippedSurfaces++
			const polygon = polygonPoints(surface.exterior, surface.interiors)
			const triangles = triangulate(polygon, flip ? scale(normal, -1) : normal)

			let emitted = 0
			for (const [i, j, k] of triangles) {
				const a = at(polygon.points, i)
				const b = at(polygon.points, j)
				const c = at(polygon.points, k)
				const wa = pool.weld(a)
				const wb = pool.weld(b)
				const wc = pool.weld(c)
				if (
					wa === wb ||
					wb === wc ||
					wa === wc ||
					triangleArea(a, b, c) < areaTolerance
				) {
					stats.skippedTriangles++
					continue
				}
				facesByRole[surface.role].push([pool.index(wa), pool.index(wb), pool.index(wc)])
				emitted++
			}
			if (emitted === 0) stats.skippedSurfaces++
		}
	}

	const faces: Face[] = []
	const groups: MeshGroup[] = []
	for (const material of MATERIAL_ORDER) {
		const group = facesByRole[material]
		if (group.length === 0) continue
		groups.push({ material, start: faces.length, count: group.length })
		faces.push(...group)
	}
	if (faces.length === 0) {
		throw new FuseError(
			"DegenerateSolid",
			`${record.id} has no non-degenerate triangle`,
			{ objectId: record.id },
		)
	}

	return {
		id: record.id,
		epsg: record.epsg,
		origin,
		vertices: pool.vertices,
		faces,
		groups,
		stats,
	}
}
