import { catchError } from "@cityfuse/test-utils/errors"
import { describe, expect, it } from "vitest"
import { parseOsmRecords } from "../src/records"

describe("parseOsmRecords", () => {
	it("keeps valid records and counts the rest", () => {
		const { records, skipped } = parseOsmRecords([
			{
				osm_id: 1,
				osm_type: "node",
				lat: 49,
				lon: 8,
				tags: { amenity: "cafe", level: 2, "toilets:wheelchair": true, note: null },
				accessibility: { wheelchair: "yes" },
			},
			{ osm_id: 2, osm_type: "area", lat: 49, lon: 8 },
			{ osm_id: 3, osm_type: "way", lat: "49", lon: 8 },
			"node/4",
		])
		expect(records).toEqual([
			{
				osm_id: 1,
				osm_type: "node",
				lat: 49,
				lon: 8,
				tags: { amenity: "cafe", level: "2", "toilets:wheelchair": "true" },
				accessibility: { wheelchair: "yes" },
			},
		])
		expect(skipped).toBe(3)
	})

	it("reads stored footprints", () => {
		const footprint = [
			[8, 49],
			[8.001, 49],
			[8.001, 49.001],
			[8, 49],
		]
		const { records } = parseOsmRecords([
			{ osm_id: 5, osm_type: "way", lat: 49, lon: 8, footprint },
		])
		expect(records[0]?.footprint).toEqual(footprint)
	})

	it("requires an array", () => {
		expect(catchError(() => parseOsmRecords({ elements: [] }))).toMatchObject({
			kind: "InvalidInput",
			message: "Expected an array of OSM records",
		})
	})
})
