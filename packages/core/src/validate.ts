/**
 * Geometry checks for merged solids. Problems are reported, never repaired.
 *
 * @module
 */

import { at } from "@cityfuse/shared/assert"
import { openRing } from "@cityfuse/shared/planar"
import type { XYZ } from "@cityfuse/shared/types"
import { length, newellNormal, planarityDeviation, sub } from "@cityfuse/shared/vec3"
import type { GeometryIssue, MergedSolid, MergedSurface } from "./types"

export interface ValidationOptions {
	/** Largest distance (m) of a ring vertex from the ring's plane. */
	planarityTolerance: number
	/** Vertices closer than this (m) are the same vertex. */
	vertexTolerance: number
}

export const DEFAULT_VALIDATION_OPTIONS: ValidationOptions = {
	planarityTolerance: 0.05,
	vertexTolerance: 0.001,
}

/**
 * Assigns one id to every point within `tolerance` of an earlier point.
 * Points are bucketed in cells of the tolerance size and a lookup searches
 * the 27 cells around the point for the nearest match, so the result does not
 * depend on where the cell boundaries fall.
 */
export class VertexWelder {
	readonly points: XYZ[] = []
	private cells = new Map<string, number[]>()
	private cellSize: number

	constructor(private tolerance: number) {
		this.cellSize = tolerance > 0 ? tolerance : 1
	}

	private cellOf(point: XYZ): XYZ {
		return [
			Math.floor(point[0] / this.cellSize),
			Math.floor(point[1] / this.cellSize),
			Math.floor(point[2] / this.cellSize),
		]
	}

	/** Id of the nearest known point within tolerance. */
	find(point: XYZ): number | undefined {
		const [cx, cy, cz] = this.cellOf(point)
		let nearest: number | undefined
		let nearestDistance = Number.POSITIVE_INFINITY
		for (let dx = -1; dx <= 1; dx++) {
			for (let dy = -1; dy <= 1; dy++) {
				for (let dz = -1; dz <= 1; dz++) {
					const ids = this.cells.get(`${cx + dx},${cy + dy},${cz + dz}`)
					if (ids === undefined) continue
					for (const id of ids) {
						const d = length(sub(at(this.points, id), point))
						if (d <= this.tolerance && d < nearestDistance) {
							nearest = id
							nearestDistance = d
						}
					}
				}
			}
		}
		return nearest
	}

	/** Id of `point`, registering it when no known point is close enough. */
	id(point: XYZ): number {
		const found = this.find(point)
		if (found !== undefined) return found
		const id = this.points.length
		this.points.push(point)
		const key = this.cellOf(point).join(",")
		const ids = this.cells.get(key)
		if (ids) ids.push(id)
		else this.cells.set(key, [id])
		return id
	}
}

function isDegenerateRing(ring: XYZ[], tolerance: number) {
	const points = openRing(ring)
	const welder = new VertexWelder(tolerance)
	const distinct = new Set(points.map((p) => welder.id(p)))
	return distinct.size < 3 || length(newellNormal(points)) === 0
}

function surfaceRings(surface: MergedSurface) {
	return [surface.exterior, ...surface.interiors]
}

/**
 * Edges not shared by exactly two ring edges of the solid. Zero for a closed
 * shell.
 */
export function openEdgeCount(surfaces: MergedSurface[], tolerance: number) {
	const welder = new VertexWelder(tolerance)
	const edges = new Map<string, number>()
	for (const surface of surfaces) {
		for (const ring of surfaceRings(surface)) {
			const keys = openRing(ring).map((p) => welder.id(p))
			for (let i = 0; i < keys.length; i++) {
				const a = keys[i]
				const b = keys[(i + 1) % keys.length]
				if (a === undefined || b === undefined || a === b) continue
				const edge = a < b ? `${a}|${b}` : `${b}|${a}`
				edges.set(edge, (edges.get(edge) ?? 0) + 1)
			}
		}
	}
	let open = 0
	for (const count of edges.values()) if (count !== 2) open++
	return open
}

export function validateSolids(
	solids: MergedSolid[],
	options: ValidationOptions = DEFAULT_VALIDATION_OPTIONS,
): GeometryIssue[] {
	const issues: GeometryIssue[] = []
	solids.forEach((solid, s) => {
		solid.surfaces.forEach((surface, i) => {
			const rings = surfaceRings(surface)
			if (rings.some((ring) => isDegenerateRing(ring, options.vertexTolerance))) {
				issues.push({
					kind: "degenerate-ring",
					solid: s,
					surface: i,
					detail: "ring has fewer than three distinct vertices or no area",
				})
				return
			}
			const deviation = Math.max(...rings.map((ring) => planarityDeviation(ring)))
			if (deviation > options.planarityTolerance) {
				issues.push({
					kind: "non-planar",
					solid: s,
					surface: i,
					detail: `vertex ${deviation.toFixed(3)} m off the surface plane`,
				})
			}
		})
		const open = openEdgeCount(solid.surfaces, options.vertexTolerance)
		if (open > 0) {
			issues.push({
				kind: "open-shell",
				solid: s,
				detail: `${open} edges not shared by exactly two surfaces`,
			})
		}
	})
	return issues
}
