import type { MatchResult } from "@cityfuse/core"
import type { OsmObject } from "@cityfuse/osm"
import type { Feature, Point } from "geojson"

export type PointProperties = Record<string, string>

/**
 * GeoJSON Feature of an OSM object at its projected position. The `epsg`
 * member names the reference system of the coordinates.
 */
export type PointFeature = Feature<Point, PointProperties> & { epsg: number }

export function pointFeature(object: OsmObject, result: MatchResult): PointFeature {
	return {
		type: "Feature",
		id: object.id,
		epsg: result.aligned.epsg,
		geometry: { type: "Point", coordinates: [...result.aligned.position] },
		properties: { ...object.tags },
	}
}

export function serializePointFeature(feature: PointFeature) {
	return `${JSON.stringify(feature, null, 2)}\n`
}
