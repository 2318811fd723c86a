/**
 * Small 3D vector helpers over `XYZ` tuples.
 *
 * @module
 */

import { at } from "./assert"
import { openRing } from "./planar"
import type { XYZ } from "./types"

export function sub(a: XYZ, b: XYZ): XYZ {
	return [a[0] - b[0], a[1] - b[1], a[2] - b[2]]
}

export function add(a: XYZ, b: XYZ): XYZ {
	return [a[0] + b[0], a[1] + b[1], a[2] + b[2]]
}

export function scale(a: XYZ, s: number): XYZ {
	return [a[0] * s, a[1] * s, a[2] * s]
}

export function dot(a: XYZ, b: XYZ): number {
	return a[0] * b[0] + a[1] * b[1] + a[2] * b[2]
}

export function cross(a: XYZ, b: XYZ): XYZ {
	return [
		a[1] * b[2] - a[2] * b[1],
		a[2] * b[0] - a[0] * b[2],
		a[0] * b[1] - a[1] * b[0],
	]
}

export function length(a: XYZ): number {
	return Math.hypot(a[0], a[1], a[2])
}

/** Unit vector in the direction of `a`, or the zero vector. */
export function normalize(a: XYZ): XYZ {
	const len = length(a)
	if (len === 0) return [0, 0, 0]
	return [a[0] / len, a[1] / len, a[2] / len]
}

/** Area of the triangle `a`, `b`, `c`. */
export function triangleArea(a: XYZ, b: XYZ, c: XYZ): number {
	return length(cross(sub(b, a), sub(c, a))) / 2
}

/**
 * Newell's method: a normal of a (possibly non-convex, slightly non-planar)
 * polygon whose length is twice the polygon area. The direction follows the
 * ring's winding by the right-hand rule.
 */
export function newellNormal(ring: XYZ[]): XYZ {
	const points = openRing(ring)
	let nx = 0
	let ny = 0
	let nz = 0
	for (let i = 0; i < points.length; i++) {
		const [x1, y1, z1] = at(points, i)
		const [x2, y2, z2] = at(points, (i + 1) % points.length)
		nx += (y1 - y2) * (z1 + z2)
		ny += (z1 - z2) * (x1 + x2)
		nz += (x1 - x2) * (y1 + y2)
	}
	return [nx, ny, nz]
}

/** Mean of a set of points. */
export function mean(points: XYZ[]): XYZ {
	if (points.length === 0) throw Error("Cannot average an empty point set")
	let sum: XYZ = [0, 0, 0]
	for (const p of points) sum = add(sum, p)
	const n = points.length
	return [sum[0] / n, sum[1] / n, sum[2] / n]
}

/**
 * Largest distance of any ring point from the plane through the ring's mean
 * with the ring's Newell normal. Zero for rings without area.
 */
export function planarityDeviation(ring: XYZ[]): number {
	const points = openRing(ring)
	if (points.length < 4) return 0
	const normal = normalize(newellNormal(points))
	if (length(normal) === 0) return 0
	const origin = mean(points)
	let max = 0
	for (const p of points) {
		const d = Math.abs(dot(sub(p, origin), normal))
		if (d > max) max = d
	}
	return max
}
