import { assert, describe, expect, it } from "vitest"
import {
	bboxContains,
	bboxOf,
	closeRing,
	isRingClosed,
	openRing,
	pointRingDistance,
	ringCentroid,
	ringSignedArea,
} from "../src/planar"
import type { XY } from "../src/types"

const square: XY[] = [
	[0, 0],
	[4, 0],
	[4, 4],
	[0, 4],
]

describe("rings", () => {
	it("closes and opens rings", () => {
		const closed = closeRing(square)
		expect(closed).toHaveLength(5)
		expect(isRingClosed(closed)).toBe(true)
		expect(closeRing(closed)).toEqual(closed)
		expect(openRing(closed)).toEqual(square)
		expect(isRingClosed(square)).toBe(false)
	})

	it("signs the area by winding", () => {
		expect(ringSignedArea(square)).toBe(16)
		expect(ringSignedArea([...square].reverse())).toBe(-16)
		expect(ringSignedArea(closeRing(square))).toBe(16)
	})

	it("keeps precision far from the origin", () => {
		const far = square.map(([x, y]): XY => [x + 456_789.123, y + 5_429_876.456])
		assert.closeTo(ringSignedArea(far), 16, 1e-6)
		const [cx, cy] = ringCentroid(far)
		assert.closeTo(cx, 456_791.123, 1e-6)
		assert.closeTo(cy, 5_429_878.456, 1e-6)
	})

	it("finds the centroid of an L shape", () => {
		const l: XY[] = [
			[0, 0],
			[2, 0],
			[2, 1],
			[1, 1],
			[1, 2],
			[0, 2],
		]
		const [x, y] = ringCentroid(l)
		assert.closeTo(x, 5 / 6, 1e-12)
		assert.closeTo(y, 5 / 6, 1e-12)
	})

	it("measures distance to the nearest edge", () => {
		expect(pointRingDistance([2, 6], square)).toBe(2)
		expect(pointRingDistance([7, 8], square)).toBe(5)
		expect(pointRingDistance([2, 1], square)).toBe(1)
	})
})

describe("bbox", () => {
	it("bounds points and tests containment", () => {
		const bbox = bboxOf([
			[1, 5],
			[-2, 3],
			[4, -1],
		])
		expect(bbox).toEqual([-2, -1, 4, 5])
		expect(bboxContains(bbox, [4, 5])).toBe(true)
		expect(bboxContains(bbox, [4.1, 0])).toBe(false)
	})
})
