import { describe, expect, it } from "vitest"
import { TileIndex } from "../src/tiles"

const index = new TileIndex([
	{ name: "a.json", extent: [0, 0, 1000, 1000] },
	{ name: "b.json", extent: [1000, 0, 2000, 1000] },
	{ name: "c.json", extent: [0, 1000, 1000, 2000] },
])

describe("TileIndex", () => {
	it("finds the tiles covering a point", () => {
		expect(index.tilesCovering([500, 500]).map((t) => t.name)).toEqual(["a.json"])
		expect(index.tilesCovering([990, 500], 20).map((t) => t.name)).toEqual(["a.json", "b.json"])
		expect(index.tilesCovering([5000, 5000], 20)).toEqual([])
	})

	it("finds the tiles intersecting a box in insertion order", () => {
		expect(index.tilesIntersecting([900, 900, 1100, 1100]).map((t) => t.name)).toEqual([
			"a.json",
			"b.json",
			"c.json",
		])
	})

	it("handles an empty export", () => {
		const empty = new TileIndex([])
		expect(empty.size).toBe(0)
		expect(empty.tilesCovering([0, 0], 100)).toEqual([])
	})
})
