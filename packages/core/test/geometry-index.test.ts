import { silentProgress } from "@cityfuse/shared/progress"
import { catchError } from "@cityfuse/test-utils/errors"
import { flatHouse, houseToBuilding } from "@cityfuse/test-utils/fixtures"
import { describe, expect, it } from "vitest"
import { buildGeometryIndex, GeometryIndex } from "../src/geometry-index"

const house = (id: string, x: number, y: number, width = 10) =>
	houseToBuilding(id, flatHouse([x, y], { width, depth: width }))

describe("GeometryIndex", () => {
	it("refuses to build without buildings", () => {
		const index = new GeometryIndex(silentProgress)
		expect(catchError(() => index.build())).toMatchObject({ kind: "IndexEmpty" })
	})

	it("refuses queries before it is built", () => {
		const index = new GeometryIndex(silentProgress)
		index.add(house("a", 0, 0))
		expect(catchError(() => index.query([0, 0], 10))).toMatchObject({
			kind: "NotBuilt",
		})
	})

	it("orders results by distance to the footprint", () => {
		const index = buildGeometryIndex(
			[house("b", 20, 0), house("a", 0, 0), house("c", 0, -18), house("far", 40, 0)],
			silentProgress,
		)
		expect(index.query([0, 0], 25)).toEqual(["a", "c", "b"])

		const [a, c, b] = index.nearby([0, 0], 25)
		expect(a).toEqual({ id: "a", contains: true, distance: 0, area: 100 })
		expect(c?.contains).toBe(false)
		expect(c?.distance).toBeCloseTo(13)
		expect(b?.distance).toBeCloseTo(15)
	})

	it("includes buildings exactly at the radius", () => {
		const index = buildGeometryIndex([house("edge", 30, 0)], silentProgress)
		expect(index.query([0, 0], 25)).toEqual(["edge"])
		expect(index.query([0, 0], 24.9)).toEqual([])
	})

	it("breaks distance ties by id", () => {
		const index = buildGeometryIndex(
			[house("z", 10, 0), house("m", -10, 0)],
			silentProgress,
		)
		expect(index.query([0, 0], 10)).toEqual(["m", "z"])
	})

	it("keeps one entry per id, preferring the more complete solid", () => {
		const full = house("a", 0, 0)
		const partial = houseToBuilding("a", {
			...flatHouse([0, 0]),
			surfaces: flatHouse([0, 0]).surfaces.slice(0, 2),
		})

		const index = new GeometryIndex(silentProgress)
		index.add(partial)
		index.add(full)
		index.add(full)
		index.build()

		expect(index.size).toBe(1)
		expect(index.query([0, 0], 5)).toEqual(["a"])
		expect(index.get("a")?.solids[0]?.surfaces).toHaveLength(6)
		expect(index.conflictingDuplicates).toBe(1)
		expect(index.identicalDuplicates).toBe(1)

		const reversed = new GeometryIndex(silentProgress)
		reversed.add(full)
		reversed.add(partial)
		expect(reversed.get("a")?.solids[0]?.surfaces).toHaveLength(6)
	})

	it("derives a footprint from the convex hull without ground surfaces", () => {
		const walls = flatHouse([0, 0])
		const building = houseToBuilding("roofed", {
			...walls,
			surfaces: walls.surfaces.filter((s) => s.type !== "GroundSurface"),
		})
		const index = buildGeometryIndex([building], silentProgress)
		expect(index.footprint("roofed")?.area).toBeCloseTo(100)
		expect(index.query([4, 4], 1)).toEqual(["roofed"])
	})

	it("reports a shared reference system only when all buildings agree", () => {
		const same = buildGeometryIndex([house("a", 0, 0), house("b", 50, 0)], silentProgress)
		expect(same.epsg).toBe(25832)

		const mixed = buildGeometryIndex(
			[house("a", 0, 0), houseToBuilding("b", flatHouse([50, 0]), { epsg: 25833 })],
			silentProgress,
		)
		expect(mixed.epsg).toBeUndefined()
	})

	it("cannot be extended after building", () => {
		const index = buildGeometryIndex([house("a", 0, 0)], silentProgress)
		expect(() => index.add(house("b", 50, 0))).toThrow("already built")
	})
})
