import { assert, describe, expect, it } from "vitest"
import type { XYZ } from "../src/types"
import {
	cross,
	mean,
	newellNormal,
	normalize,
	planarityDeviation,
	triangleArea,
} from "../src/vec3"

describe("vec3", () => {
	it("computes cross products and triangle areas", () => {
		expect(cross([1, 0, 0], [0, 1, 0])).toEqual([0, 0, 1])
		expect(triangleArea([0, 0, 0], [4, 0, 0], [0, 3, 0])).toBe(6)
	})

	it("follows the winding of a ring with Newell's normal", () => {
		const ring: XYZ[] = [
			[0, 0, 2],
			[3, 0, 2],
			[3, 2, 2],
			[0, 2, 2],
		]
		expect(newellNormal(ring)).toEqual([0, 0, 12])
		expect(normalize(newellNormal([...ring].reverse()))).toEqual([0, 0, -1])
	})

	it("averages points", () => {
		expect(
			mean([
				[0, 0, 0],
				[2, 4, 6],
			]),
		).toEqual([1, 2, 3])
		expect(() => mean([])).toThrow()
	})

	it("measures how far a ring leaves its plane", () => {
		const flat: XYZ[] = [
			[0, 0, 0],
			[1, 0, 0],
			[1, 1, 0],
			[0, 1, 0],
		]
		expect(planarityDeviation(flat)).toBe(0)
		const warped: XYZ[] = [
			[0, 0, 0],
			[1, 0, 0],
			[1, 1, 0.4],
			[0, 1, 0],
		]
		assert.isAbove(planarityDeviation(warped), 0.05)
	})
})
