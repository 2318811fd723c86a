const EPSG_PATTERN = /EPSG(?:\/0\/|::?|\/)(\d+)/i

/**
 * Extract the EPSG code from a CityJSON `referenceSystem` value.
 *
 * Accepts the OGC URL form (`https://www.opengis.net/def/crs/EPSG/0/25832`),
 * the URN form of CityJSON 1.0 (`urn:ogc:def:crs:EPSG::25832`) and `EPSG:25832`.
 * For compound systems the horizontal code is returned.
 */
export function parseReferenceSystem(value: unknown): number | undefined {
	if (typeof value === "number" && Number.isInteger(value)) return value
	if (typeof value !== "string") return undefined
	const match = EPSG_PATTERN.exec(value)
	if (!match?.[1]) return undefined
	return Number.parseInt(match[1], 10)
}

/** Canonical OGC URL for an EPSG code. */
export function referenceSystemUrl(epsg: number) {
	return `https://www.opengis.net/def/crs/EPSG/0/${epsg}`
}
