/**
 * @cityfuse/osm - Points of interest from OpenStreetMap.
 *
 * - Fetch POIs of a place from Nominatim + Overpass.
 * - Convert POI records to a compact inspection GeoJSON.
 * - Read `OsmObject`s (points and polygons) for matching.
 *
 * @module @cityfuse/osm
 */

export * from "./fetch"
export * from "./geojson"
export * from "./overpass"
export * from "./records"
export * from "./simplify"
export * from "./types"
