export type LonLat = [lon: number, lat: number]
export type XY = [x: number, y: number]
export type XYZ = [x: number, y: number, z: number]

/**
 * A planar bounding box in the format [minX, minY, maxX, maxY].
 * Used for both projected (meters) and geographic (degrees) extents.
 */
export type Bbox2D = [minX: number, minY: number, maxX: number, maxY: number]

export type Rgba = [r: number, g: number, b: number, a: number]

/**
 * Shared OSM Types
 */

export type OsmEntityType = "node" | "way" | "relation"

/**
 * OSM key/value pairs. Values are always strings, as delivered by Overpass.
 */
export interface OsmTags {
	[key: string]: string
}

/**
 * Which source contributed a merged attribute or geometry element.
 */
export type Provenance = "osm" | "cityjson" | "derived"
