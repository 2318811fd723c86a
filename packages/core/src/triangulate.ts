/**
 * Triangulation of planar polygons with holes.
 *
 * @module
 */

import { at } from "@cityfuse/shared/assert"
import { openRing } from "@cityfuse/shared/planar"
import type { XYZ } from "@cityfuse/shared/types"
import { cross, dot, newellNormal, sub } from "@cityfuse/shared/vec3"
import earcut from "earcut"
import type { Face } from "./types"

export interface Polygon3D {
	/** Open rings: exterior first, then holes. */
	points: XYZ[]
	/** Start index of each hole in `points`. */
	holes: number[]
}

/** Flatten a surface's rings into one open point list with hole offsets. */
export function polygonPoints(exterior: XYZ[], interiors: XYZ[][]): Polygon3D {
	const points = openRing(exterior)
	const holes: number[] = []
	for (const ring of interiors) {
		const open = openRing(ring)
		if (open.length < 3) continue
		holes.push(points.length)
		points.push(...open)
	}
	return { points, holes }
}

/**
 * Drop the coordinate axis the normal points along most, leaving the
 * projection with the largest area.
 */
function projectTo2D(points: XYZ[], normal: XYZ): number[] {
	const nx = Math.abs(normal[0])
	const ny = Math.abs(normal[1])
	const nz = Math.abs(normal[2])
	const [u, v]: [number, number] =
		nz >= nx && nz >= ny ? [0, 1] : ny >= nx ? [2, 0] : [1, 2]
	const flat: number[] = []
	for (const point of points) flat.push(at(point, u), at(point, v))
	return flat
}

/**
 * Triangulate a polygon. Triangles index into `polygon.points` and wind
 * counterclockwise around `facing` (the exterior ring's normal by default).
 * Triangles pass through unchanged apart from winding.
 */
export function triangulate(
	polygon: Polygon3D,
	facing?: XYZ,
): Face[] {
	const { points, holes } = polygon
	if (points.length < 3) return []
	const normal = newellNormal(points.slice(0, holes[0] ?? points.length))
	let faces: Face[]
	if (points.length === 3 && holes.length === 0) {
		faces = [[0, 1, 2]]
	} else {
		const indices = earcut(projectTo2D(points, normal), holes, 2)
		faces = []
		for (let i = 0; i + 2 < indices.length; i += 3) {
			faces.push([at(indices, i), at(indices, i + 1), at(indices, i + 2)])
		}
	}
	return faces.map((face) => orientFace(face, points, facing ?? normal))
}

function orientFace(face: Face, points: XYZ[], facing: XYZ): Face {
	const [a, b, c] = face
	const pa = at(points, a)
	const normal = cross(sub(at(points, b), pa), sub(at(points, c), pa))
	return dot(normal, facing) < 0 ? [a, c, b] : face
}
