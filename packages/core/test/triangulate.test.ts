import type { XYZ } from "@cityfuse/shared/types"
import { cross, dot, triangleArea } from "@cityfuse/shared/vec3"
import { describe, expect, it } from "vitest"
import { polygonPoints, triangulate } from "../src/triangulate"
import type { Face } from "../src/types"

function totalArea(points: XYZ[], faces: Face[]) {
	let sum = 0
	for (const [a, b, c] of faces) {
		const pa = points[a]
		const pb = points[b]
		const pc = points[c]
		if (!pa || !pb || !pc) throw Error("face index out of range")
		sum += triangleArea(pa, pb, pc)
	}
	return sum
}

function faceNormal(points: XYZ[], [a, b, c]: Face): XYZ {
	const pa = points[a]
	const pb = points[b]
	const pc = points[c]
	if (!pa || !pb || !pc) throw Error("face index out of range")
	return cross(
		[pb[0] - pa[0], pb[1] - pa[1], pb[2] - pa[2]],
		[pc[0] - pa[0], pc[1] - pa[1], pc[2] - pa[2]],
	)
}

describe("triangulate", () => {
	it("cuts holes out of a horizontal polygon", () => {
		const polygon = polygonPoints(
			[
				[0, 0, 5],
				[10, 0, 5],
				[10, 10, 5],
				[0, 10, 5],
				[0, 0, 5],
			],
			[
				[
					[4, 4, 5],
					[4, 6, 5],
					[6, 6, 5],
					[6, 4, 5],
					[4, 4, 5],
				],
			],
		)
		expect(polygon.points).toHaveLength(8)
		expect(polygon.holes).toEqual([4])

		const faces = triangulate(polygon)
		expect(faces).toHaveLength(8)
		expect(totalArea(polygon.points, faces)).toBeCloseTo(96)
		for (const face of faces) {
			expect(faceNormal(polygon.points, face)[2]).toBeGreaterThan(0)
		}
	})

	it("triangulates vertical walls", () => {
		const polygon = polygonPoints(
			[
				[0, 0, 0],
				[4, 0, 0],
				[4, 0, 3],
				[2, 0, 4],
				[0, 0, 3],
			],
			[],
		)
		const faces = triangulate(polygon)
		expect(faces).toHaveLength(3)
		expect(totalArea(polygon.points, faces)).toBeCloseTo(14)
		for (const face of faces) {
			expect(faceNormal(polygon.points, face)[1]).toBeLessThan(0)
		}
	})

	it("winds every face around the requested direction", () => {
		const polygon = polygonPoints(
			[
				[0, 0, 0],
				[1, 0, 0],
				[1, 1, 0],
				[0, 1, 0],
			],
			[],
		)
		const down: XYZ = [0, 0, -1]
		for (const face of triangulate(polygon, down)) {
			expect(dot(faceNormal(polygon.points, face), down)).toBeGreaterThan(0)
		}
	})

	it("triangulates a non-convex ring", () => {
		const polygon = polygonPoints(
			[
				[0, 0, 0],
				[4, 0, 0],
				[4, 2, 0],
				[2, 2, 0],
				[2, 4, 0],
				[0, 4, 0],
				[0, 0, 0],
			],
			[],
		)
		const faces = triangulate(polygon)
		expect(faces).toHaveLength(4)
		expect(totalArea(polygon.points, faces)).toBeCloseTo(12)
		for (const face of faces) {
			expect(faceNormal(polygon.points, face)[2]).toBeGreaterThan(0)
		}
	})

	it("covers a closed rectangle with two triangles", () => {
		const polygon = polygonPoints(
			[
				[0, 0, 3],
				[4, 0, 3],
				[4, 2, 3],
				[0, 2, 3],
				[0, 0, 3],
			],
			[],
		)
		expect(polygon.points).toHaveLength(4)
		const faces = triangulate(polygon)
		expect(faces).toHaveLength(2)
		expect(totalArea(polygon.points, faces)).toBeCloseTo(8)
	})

	it("keeps a single triangle as it is", () => {
		const polygon = polygonPoints(
			[
				[0, 0, 0],
				[1, 0, 0],
				[0, 0, 1],
			],
			[],
		)
		expect(triangulate(polygon)).toEqual([[0, 1, 2]])
		expect(triangulate(polygon, [0, 1, 0])).toEqual([[0, 2, 1]])
	})
})
