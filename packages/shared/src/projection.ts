/**
 * Conversion of geographic (EPSG:4326) coordinates into the projected
 * reference system of the CityJSON data, backed by proj4.
 *
 * @module
 */

import proj4 from "proj4"
import { FuseError } from "./errors"
import type { LonLat, XY } from "./types"

export const WGS84 = "EPSG:4326"

/**
 * proj4 definitions for reference systems used by official building exports.
 * EPSG:4326 and EPSG:3857 are built into proj4.
 */
export const DEFAULT_PROJECTIONS: Record<string, string> = {
	"EPSG:25832":
		"+proj=utm +zone=32 +ellps=GRS80 +towgs84=0,0,0,0,0,0,0 +units=m +no_defs +type=crs",
	"EPSG:25833":
		"+proj=utm +zone=33 +ellps=GRS80 +towgs84=0,0,0,0,0,0,0 +units=m +no_defs +type=crs",
	"EPSG:32632": "+proj=utm +zone=32 +datum=WGS84 +units=m +no_defs +type=crs",
	"EPSG:32633": "+proj=utm +zone=33 +datum=WGS84 +units=m +no_defs +type=crs",
	"EPSG:2056":
		"+proj=somerc +lat_0=46.9524055555556 +lon_0=7.43958333333333 +k_0=1 +x_0=2600000 +y_0=1200000 +ellps=bessel +towgs84=674.374,15.056,405.346,0,0,0,0 +units=m +no_defs +type=crs",
}

export function epsgName(code: number) {
	return `EPSG:${code}`
}

export interface Projector {
	readonly epsg: number
	forward(lonLat: LonLat): XY
	inverse(xy: XY): LonLat
}

/**
 * Create a projector from EPSG:4326 into `EPSG:<epsg>`.
 *
 * @throws FuseError `GeometryMismatch` when no definition for the code is known.
 */
export function createProjector(
	epsg: number,
	definitions: Record<string, string> = DEFAULT_PROJECTIONS,
): Projector {
	const name = epsgName(epsg)
	const definition = definitions[name]
	if (definition !== undefined) proj4.defs(name, definition)
	const known: unknown = proj4.defs(name)
	if (known === undefined) {
		throw new FuseError(
			"GeometryMismatch",
			`No projection definition for ${name}; add one to the configuration`,
		)
	}
	const converter = proj4(WGS84, name)
	return {
		epsg,
		forward: ([lon, lat]) => {
			const [x, y] = converter.forward([lon, lat])
			if (x === undefined || y === undefined || !Number.isFinite(x + y)) {
				throw new FuseError(
					"GeometryMismatch",
					`Cannot project ${lon},${lat} into ${name}`,
				)
			}
			return [x, y]
		},
		inverse: ([x, y]) => {
			const [lon, lat] = converter.inverse([x, y])
			if (lon === undefined || lat === undefined) {
				throw new FuseError(
					"GeometryMismatch",
					`Cannot unproject ${x},${y} from ${name}`,
				)
			}
			return [lon, lat]
		},
	}
}
