import { catchError } from "@cityfuse/test-utils/errors"
import { flatHouse, houseDocument, houseToBuilding } from "@cityfuse/test-utils/fixtures"
import { describe, expect, it } from "vitest"
import {
	decodeVertices,
	documentExtent2D,
	parseCityJson,
	roleFromNormal,
} from "../src/parse"
import type { CityJsonDocument } from "../src/types"

const house = flatHouse([100, 200])

describe("parseCityJson", () => {
	it("reads LOD2 multi-surface buildings with semantics", () => {
		const doc = houseDocument([{ id: "b1", house, attributes: { roofType: "1000" } }])
		const parsed = parseCityJson(doc, { tile: "t.json" })

		expect(parsed.epsg).toBe(25832)
		expect(parsed.extent).toEqual([95, 195, 0, 105, 205, 6])
		expect(parsed.skipped).toEqual([])
		expect(parsed.buildings).toEqual([
			houseToBuilding("b1", house, { tile: "t.json", attributes: { roofType: "1000" } }),
		])
		expect(parsed.buildings[0]?.solids[0]?.surfaces.map((s) => s.role)).toEqual([
			"ground",
			"roof",
			"wall",
			"wall",
			"wall",
			"wall",
		])
	})

	it("reads solids the same way", () => {
		const doc = houseDocument([{ id: "b1", house }], { geometryType: "Solid" })
		expect(parseCityJson(doc).buildings).toEqual([houseToBuilding("b1", house)])
	})

	it("applies the vertex transform", () => {
		const doc = houseDocument([{ id: "b1", house: flatHouse([100.25, 200.5]) }], {
			compress: true,
		})
		expect(doc.vertices[0]).toEqual([0, 0, 0])
		const [building] = parseCityJson(doc).buildings
		const roof = building?.solids[0]?.surfaces[1]?.exterior ?? []
		expect(roof[2]?.[0]).toBeCloseTo(105.25, 6)
		expect(roof[2]?.[1]).toBeCloseTo(205.5, 6)
		expect(roof[2]?.[2]).toBeCloseTo(6, 6)
	})

	it("keeps only scalar attributes", () => {
		const doc = houseDocument([
			{ id: "b1", house, attributes: { measuredHeight: 6, address: { city: "X" }, flag: true } },
		])
		expect(parseCityJson(doc).buildings[0]?.attributes).toEqual({
			measuredHeight: 6,
			flag: true,
		})
	})

	it("folds building parts into their parent", () => {
		const doc = houseDocument([{ id: "part", house }])
		const part = doc.CityObjects["part"]
		if (!part) throw Error("missing part")
		doc.CityObjects["part"] = { ...part, type: "BuildingPart", parents: ["main"] }
		doc.CityObjects["main"] = { type: "Building", children: ["part"], attributes: {} }
		doc.CityObjects["empty"] = { type: "Building" }

		const parsed = parseCityJson(doc)
		expect(parsed.buildings.map((b) => b.id)).toEqual(["main"])
		expect(parsed.buildings[0]?.solids[0]?.surfaces).toHaveLength(6)
		expect(parsed.skipped).toEqual(["empty"])
	})

	it("ignores geometries of other levels of detail", () => {
		const doc = houseDocument([{ id: "b1", house }])
		for (const geometry of doc.CityObjects["b1"]?.geometry ?? []) geometry.lod = "1.2"
		expect(parseCityJson(doc)).toMatchObject({ buildings: [], skipped: ["b1"] })
		expect(parseCityJson(doc, { lod: "1" }).buildings).toHaveLength(1)
	})

	it("classifies surfaces without semantics by their normal", () => {
		const doc = houseDocument([{ id: "b1", house }])
		for (const geometry of doc.CityObjects["b1"]?.geometry ?? []) {
			if (geometry.type === "MultiSurface") delete geometry.semantics
		}
		const surfaces = parseCityJson(doc).buildings[0]?.solids[0]?.surfaces ?? []
		expect(surfaces.map((s) => [s.role, s.semantic])).toEqual([
			["ground", null],
			["roof", null],
			["wall", null],
			["wall", null],
			["wall", null],
			["wall", null],
		])
	})
})

describe("roleFromNormal", () => {
	it("maps up, down and sideways facing rings", () => {
		expect(
			roleFromNormal([
				[0, 0, 0],
				[1, 0, 0],
				[1, 1, 0],
			]),
		).toBe("roof")
		expect(
			roleFromNormal([
				[0, 0, 0],
				[1, 1, 0],
				[1, 0, 0],
			]),
		).toBe("ground")
		expect(
			roleFromNormal([
				[0, 0, 0],
				[1, 0, 0],
				[1, 0, 1],
			]),
		).toBe("wall")
	})
})

describe("decodeVertices", () => {
	it("rejects short vertices", () => {
		const doc: CityJsonDocument = { type: "CityJSON", vertices: [[1, 2]], CityObjects: {} }
		expect(catchError(() => decodeVertices(doc))).toMatchObject({
			kind: "InvalidInput",
			message: "Vertex 0 has fewer than 3 values",
		})
	})
})

describe("documentExtent2D", () => {
	it("uses the metadata extent, else the vertices", () => {
		const doc = houseDocument([{ id: "b1", house }])
		expect(documentExtent2D(doc)).toEqual([95, 195, 105, 205])
		delete doc.metadata
		expect(documentExtent2D(doc)).toEqual([95, 195, 105, 205])
		expect(documentExtent2D({ type: "CityJSON", vertices: [], CityObjects: {} })).toBeUndefined()
	})
})
