import { assert, describe, expect, it } from "vitest"
import { isFuseError } from "../src/errors"
import { createProjector, epsgName } from "../src/projection"

describe("createProjector", () => {
	it("projects onto the UTM grid", () => {
		const projector = createProjector(25832)
		const [x, y] = projector.forward([9, 0])
		assert.closeTo(x, 500_000, 1e-6)
		assert.closeTo(y, 0, 1e-6)
	})

	it("round-trips geographic positions", () => {
		const projector = createProjector(25832)
		const [lon, lat] = projector.inverse(projector.forward([8.404, 49.014]))
		assert.closeTo(lon, 8.404, 1e-8)
		assert.closeTo(lat, 49.014, 1e-8)
	})

	it("accepts extra definitions", () => {
		const projector = createProjector(31467, {
			"EPSG:31467":
				"+proj=tmerc +lat_0=0 +lon_0=9 +k=1 +x_0=3500000 +y_0=0 +ellps=bessel +units=m +no_defs",
		})
		const [x] = projector.forward([9, 0])
		assert.closeTo(x, 3_500_000, 1e-6)
	})

	it("fails with GeometryMismatch for unknown codes", () => {
		let thrown: unknown
		try {
			createProjector(99998, {})
		} catch (error) {
			thrown = error
		}
		expect(isFuseError(thrown, "GeometryMismatch")).toBe(true)
		expect(epsgName(99998)).toBe("EPSG:99998")
	})
})
