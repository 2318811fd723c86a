/**
 * OSM input types: raw Overpass elements, the compact records the fetch step
 * stores, and the `OsmObject` consumed by matching.
 * @module
 */

import type { LonLat, OsmEntityType, OsmTags } from "@cityfuse/shared/types"

export interface OverpassLatLon {
	lat: number
	lon: number
}

export interface OverpassElement {
	type: OsmEntityType
	id: number
	lat?: number
	lon?: number
	/** Present on ways and relations when queried with `out center`. */
	center?: OverpassLatLon
	/** Present on ways when queried with `out geom`. */
	geometry?: OverpassLatLon[]
	tags?: OsmTags
}

export interface OverpassResponse {
	elements: OverpassElement[]
}

/**
 * Compact POI record written by the fetch step.
 */
export interface OsmRecord {
	osm_id: number
	osm_type: OsmEntityType
	tags: OsmTags
	lat: number
	lon: number
	accessibility: OsmTags
	/** Closed exterior ring, when the element carried its geometry. */
	footprint?: LonLat[]
}

/**
 * An OSM point or polygon object to be linked to a building.
 */
export interface OsmObject {
	/** Stable identifier, `<type>/<id>`, threaded through every output. */
	id: string
	type: OsmEntityType
	osmId: number
	/** Geographic position (EPSG:4326). */
	lonLat: LonLat
	tags: OsmTags
	/** Closed, counterclockwise exterior ring in EPSG:4326. */
	footprint?: LonLat[]
}

/** Build the `<type>/<id>` identifier of an OSM object. */
export function osmObjectId(type: OsmEntityType, id: number) {
	return `${type}/${id}`
}
