/**
 * CityJSON document types (the subset needed for LOD2 buildings) and the
 * building records produced from them.
 * @module
 */

import type { XYZ } from "@cityfuse/shared/types"

export type RingBoundary = number[]
/** Exterior ring followed by interior rings. */
export type SurfaceBoundary = RingBoundary[]
export type ShellBoundary = SurfaceBoundary[]
/** Exterior shell followed by interior shells. */
export type SolidBoundary = ShellBoundary[]

export interface CityJsonSemanticSurface {
	type: string
	[key: string]: unknown
}

export interface CityJsonSemantics<V> {
	surfaces: CityJsonSemanticSurface[]
	values?: V | null
}

type SurfaceValues = (number | null)[]
type ShellValues = SurfaceValues[]
type SolidValues = ShellValues[]

interface CityJsonGeometryBase {
	lod?: string | number
}

export interface CityJsonSurfaceGeometry extends CityJsonGeometryBase {
	type: "MultiSurface" | "CompositeSurface"
	boundaries: SurfaceBoundary[]
	semantics?: CityJsonSemantics<SurfaceValues>
}

export interface CityJsonSolidGeometry extends CityJsonGeometryBase {
	type: "Solid"
	boundaries: SolidBoundary
	semantics?: CityJsonSemantics<ShellValues>
}

export interface CityJsonMultiSolidGeometry extends CityJsonGeometryBase {
	type: "MultiSolid" | "CompositeSolid"
	boundaries: SolidBoundary[]
	semantics?: CityJsonSemantics<SolidValues>
}

export interface CityJsonOtherGeometry extends CityJsonGeometryBase {
	type: "MultiPoint" | "MultiLineString" | "GeometryInstance"
	boundaries?: unknown
}

export type CityJsonGeometry =
	| CityJsonSurfaceGeometry
	| CityJsonSolidGeometry
	| CityJsonMultiSolidGeometry
	| CityJsonOtherGeometry

export interface CityJsonObject {
	type: string
	attributes?: Record<string, unknown>
	geometry?: CityJsonGeometry[]
	children?: string[]
	parents?: string[]
}

export interface CityJsonTransform {
	scale: XYZ
	translate: XYZ
}

export interface CityJsonMetadata {
	referenceSystem?: string
	/** [minx, miny, minz, maxx, maxy, maxz] */
	geographicalExtent?: number[]
	[key: string]: unknown
}

export interface CityJsonDocument {
	type: "CityJSON"
	version?: string
	transform?: CityJsonTransform
	metadata?: CityJsonMetadata
	vertices: number[][]
	CityObjects: Record<string, CityJsonObject>
	[key: string]: unknown
}

/**
 * Material class of a building surface.
 */
export type SurfaceRole = "roof" | "wall" | "ground"

/**
 * One planar surface of a building. Rings are open (the closing vertex is not
 * repeated), as stored in CityJSON.
 */
export interface BuildingSurface {
	role: SurfaceRole
	/** CityJSON semantic surface type, or null when the source had none. */
	semantic: string | null
	exterior: XYZ[]
	interiors: XYZ[][]
}

export interface BuildingSolid {
	surfaces: BuildingSurface[]
}

export type AttributeValue = string | number | boolean

/**
 * A building read from a CityJSON tile, with real-world vertex coordinates.
 */
export interface CityBuilding {
	id: string
	/** Name of the tile the building was read from. */
	tile?: string
	/** EPSG code of the projected reference system of the vertices. */
	epsg?: number
	attributes: Record<string, AttributeValue>
	solids: BuildingSolid[]
}
