/**
 * Overpass QL for the points of interest of a place: amenities, healthcare,
 * medical shops, care facilities and public transport stops.
 * @module
 */

import categories from "../data/poi-categories.json"

export interface PoiCategories {
	amenity: string[]
	healthcare: string[]
	shop: string[]
	socialFacilityFor: string[]
	transport: Record<string, string[]>
}

export const POI_CATEGORIES: PoiCategories = categories

const ELEMENT_TYPES = ["node", "way", "relation"] as const

/**
 * Build an anchored alternation regex (`^a$` or `^(a|b)$`) for tag values,
 * escaping backslashes and double quotes for use inside an Overpass string.
 */
export function valueRegex(values: string[]): string {
	const escaped = values.map((v) => v.replaceAll("\\", "\\\\").replaceAll('"', '\\"'))
	if (escaped.length === 1) return `^${escaped[0]}$`
	return `^(${escaped.join("|")})$`
}

function perType(filter: string): string[] {
	return ELEMENT_TYPES.map((type) => `  ${type}${filter}(area.searchArea);`)
}

/**
 * Overpass area id for a Nominatim result.
 *
 * @throws Error for nodes, which have no area.
 */
export function overpassAreaId(osmType: string, osmId: number): number {
	if (osmType === "relation") return 3_600_000_000 + osmId
	if (osmType === "way") return 2_400_000_000 + osmId
	throw Error(`No Overpass area for OSM type ${osmType}`)
}

export function areaClause(areaId: number) {
	return `area(${areaId})->.searchArea;`
}

/** Bounding box clause in Overpass (south, west, north, east) order. */
export function bboxClause(south: number, west: number, north: number, east: number) {
	return `(${south},${west},${north},${east})->.searchArea;`
}

/**
 * Assemble the full query. `searchArea` is a clause defining `.searchArea`,
 * from `areaClause` or `bboxClause`.
 */
export function buildOverpassQuery(
	searchArea: string,
	poi: PoiCategories = POI_CATEGORIES,
): string {
	const lines = [
		"[out:json][timeout:180];",
		searchArea,
		"",
		"(",
		...perType(`["amenity"~"${valueRegex(poi.amenity)}"]`),
		...perType(`["healthcare"~"${valueRegex(poi.healthcare)}"]`),
		...perType(`["shop"~"${valueRegex(poi.shop)}"]`),
		...perType(
			`["amenity"="social_facility"]["social_facility:for"~"${valueRegex(poi.socialFacilityFor)}"]`,
		),
	]
	for (const key of Object.keys(poi.transport).sort()) {
		const values = poi.transport[key]
		if (!values || values.length === 0) continue
		lines.push(...perType(`["${key}"~"${valueRegex(values)}"]`))
	}
	lines.push(");", "", "out center meta;")
	return lines.join("\n")
}
