/**
 * Planar (projected, meter based) 2D geometry helpers.
 *
 * Rings may be passed open or closed; a closing point equal to the first
 * point contributes nothing to areas and distances.
 *
 * @module
 */

import { at } from "./assert"
import type { Bbox2D, XY } from "./types"

/** Check whether the last point of a ring repeats the first. */
export function isRingClosed<T extends readonly number[]>(ring: T[]): boolean {
	if (ring.length < 2) return false
	const first = at(ring, 0)
	const last = at(ring, ring.length - 1)
	return first.every((v, i) => v === last[i])
}

/** Return a closed copy of the ring. */
export function closeRing<T extends readonly number[]>(ring: T[]): T[] {
	if (ring.length === 0 || isRingClosed(ring)) return [...ring]
	return [...ring, at(ring, 0)]
}

/** Return the ring without its closing point. */
export function openRing<T extends readonly number[]>(ring: T[]): T[] {
	return isRingClosed(ring) ? ring.slice(0, -1) : [...ring]
}

/**
 * Signed area of a ring (shoelace). Counterclockwise rings are positive.
 * Coordinates are taken relative to the first point, which keeps the result
 * exact enough for projected coordinates in the millions.
 */
export function ringSignedArea(ring: XY[]): number {
	const points = openRing(ring)
	if (points.length < 3) return 0
	const [ox, oy] = at(points, 0)
	let sum = 0
	for (let i = 0; i < points.length; i++) {
		const [x1, y1] = at(points, i)
		const [x2, y2] = at(points, (i + 1) % points.length)
		sum += (x1 - ox) * (y2 - oy) - (x2 - ox) * (y1 - oy)
	}
	return sum / 2
}

/**
 * Area centroid of a ring. Falls back to the vertex mean for rings without area.
 */
export function ringCentroid(ring: XY[]): XY {
	const points = openRing(ring)
	const first = points[0]
	if (first === undefined) throw Error("Cannot compute centroid of empty ring")
	const [ox, oy] = first
	const area = ringSignedArea(points)
	if (Math.abs(area) < 1e-12) {
		let sx = 0
		let sy = 0
		for (const [x, y] of points) {
			sx += x - ox
			sy += y - oy
		}
		return [ox + sx / points.length, oy + sy / points.length]
	}
	let cx = 0
	let cy = 0
	for (let i = 0; i < points.length; i++) {
		const [x1, y1] = at(points, i)
		const [x2, y2] = at(points, (i + 1) % points.length)
		const ax = x1 - ox
		const ay = y1 - oy
		const bx = x2 - ox
		const by = y2 - oy
		const f = ax * by - bx * ay
		cx += (ax + bx) * f
		cy += (ay + by) * f
	}
	return [ox + cx / (6 * area), oy + cy / (6 * area)]
}

/** Euclidean distance between two points. */
export function distance2D(a: XY, b: XY): number {
	return Math.hypot(b[0] - a[0], b[1] - a[1])
}

/** Distance from point `p` to the segment `a`–`b`. */
export function pointSegmentDistance(p: XY, a: XY, b: XY): number {
	const dx = b[0] - a[0]
	const dy = b[1] - a[1]
	const lengthSq = dx * dx + dy * dy
	if (lengthSq === 0) return distance2D(p, a)
	const t = Math.max(
		0,
		Math.min(1, ((p[0] - a[0]) * dx + (p[1] - a[1]) * dy) / lengthSq),
	)
	return distance2D(p, [a[0] + t * dx, a[1] + t * dy])
}

/** Distance from a point to the nearest edge of a ring. */
export function pointRingDistance(p: XY, ring: XY[]): number {
	const points = openRing(ring)
	if (points.length === 0) return Number.POSITIVE_INFINITY
	if (points.length === 1) return distance2D(p, at(points, 0))
	let min = Number.POSITIVE_INFINITY
	for (let i = 0; i < points.length; i++) {
		const d = pointSegmentDistance(
			p,
			at(points, i),
			at(points, (i + 1) % points.length),
		)
		if (d < min) min = d
	}
	return min
}

/** Bounding box of a set of points. */
export function bboxOf(points: Iterable<readonly number[]>): Bbox2D {
	let minX = Number.POSITIVE_INFINITY
	let minY = Number.POSITIVE_INFINITY
	let maxX = Number.NEGATIVE_INFINITY
	let maxY = Number.NEGATIVE_INFINITY
	for (const point of points) {
		const x = at(point, 0)
		const y = at(point, 1)
		if (x < minX) minX = x
		if (x > maxX) maxX = x
		if (y < minY) minY = y
		if (y > maxY) maxY = y
	}
	return [minX, minY, maxX, maxY]
}

/** Check if a point lies within a bounding box (edges inclusive). */
export function bboxContains(bbox: Bbox2D, [x, y]: XY): boolean {
	return x >= bbox[0] && x <= bbox[2] && y >= bbox[1] && y <= bbox[3]
}
