import { silentProgress } from "@cityfuse/shared/progress"
import { catchError } from "@cityfuse/test-utils/errors"
import type { FeatureCollection } from "geojson"
import { describe, expect, it } from "vitest"
import {
	assertFeatureCollection,
	type InspectionCollection,
	osmObjectsFromGeoJSON,
	recordsToGeoJSON,
	splitByWheelchair,
} from "../src/geojson"
import type { OsmRecord } from "../src/types"

const record = (
	id: number,
	tags: OsmRecord["tags"],
	accessibility: OsmRecord["accessibility"] = {},
): OsmRecord => ({ osm_id: id, osm_type: "node", tags, lat: 49, lon: 8, accessibility })

describe("recordsToGeoJSON", () => {
	it("exports type tags and prefixed accessibility tags", () => {
		const collection = recordsToGeoJSON(
			[
				record(
					1,
					{ amenity: "toilets", name: "WC", ramp: "no", opening_hours: "24/7" },
					{ wheelchair: "yes" },
				),
			],
			silentProgress,
		)
		expect(collection.features).toEqual([
			{
				type: "Feature",
				id: "node/1",
				geometry: { type: "Point", coordinates: [8, 49] },
				properties: {
					osm_id: 1,
					osm_type: "node",
					lat: 49,
					lon: 8,
					amenity: "toilets",
					name: "WC",
					acc_wheelchair: "yes",
					acc_ramp: "no",
				},
			},
		])
	})

	it("prefers the accessibility record over the tags", () => {
		const collection = recordsToGeoJSON(
			[record(2, { wheelchair: "no" }, { wheelchair: "limited" })],
			silentProgress,
		)
		expect(collection.features[0]?.properties.acc_wheelchair).toBe("limited")
	})

	it("refuses to write an empty export", () => {
		expect(catchError(() => recordsToGeoJSON([], silentProgress))).toMatchObject({
			kind: "InvalidInput",
		})
	})
})

describe("splitByWheelchair", () => {
	it("sorts features into yes and no sets", () => {
		const collection: InspectionCollection = recordsToGeoJSON(
			[
				record(1, { wheelchair: "Designated" }),
				record(2, { wheelchair: "no" }),
				record(3, { wheelchair: "unknown" }),
				record(4, { wheelchair: "maybe" }),
				record(5, {}),
			],
			silentProgress,
		)
		const { yes, no } = splitByWheelchair(collection)
		expect(yes.features.map((f) => f.id)).toEqual(["node/1"])
		expect(no.features.map((f) => f.id)).toEqual(["node/2", "node/3"])
	})
})

describe("osmObjectsFromGeoJSON", () => {
	const collection: FeatureCollection = {
		type: "FeatureCollection",
		features: [
			{
				type: "Feature",
				geometry: { type: "Point", coordinates: [8.4, 49] },
				properties: { osm_type: "node", osm_id: "12", amenity: "cafe", level: 1 },
			},
			{
				type: "Feature",
				id: 30,
				geometry: {
					type: "Polygon",
					coordinates: [
						[
							[0, 0],
							[0, 2],
							[2, 2],
							[2, 0],
							[0, 0],
						],
					],
				},
				properties: { building: "yes" },
			},
			{
				type: "Feature",
				geometry: { type: "LineString", coordinates: [[0, 0], [1, 1]] },
				properties: {},
			},
			{
				type: "Feature",
				geometry: { type: "Point", coordinates: [1, 1] },
				properties: null,
			},
		],
	}

	it("reads points and polygons with their identity", () => {
		const objects = osmObjectsFromGeoJSON(collection, silentProgress)
		expect(objects).toEqual([
			{
				id: "node/12",
				type: "node",
				osmId: 12,
				lonLat: [8.4, 49],
				tags: { amenity: "cafe", level: "1" },
			},
			{
				id: "way/30",
				type: "way",
				osmId: 30,
				lonLat: [1, 1],
				tags: { building: "yes" },
				footprint: [
					[0, 0],
					[2, 0],
					[2, 2],
					[0, 2],
					[0, 0],
				],
			},
			{ id: "node/-1", type: "node", osmId: -1, lonLat: [1, 1], tags: {} },
		])
	})

	it("checks the collection shape", () => {
		expect(() => assertFeatureCollection({ type: "Feature" })).toThrow(
			"Expected a GeoJSON FeatureCollection",
		)
		expect(() => assertFeatureCollection(collection)).not.toThrow()
	})
})
