import type {
	AttributeValue,
	BuildingSurface,
	CityBuilding,
	CityJsonDocument,
	SurfaceRole,
} from "@cityfuse/cityjson"
import type {
	LonLat,
	OsmEntityType,
	Provenance,
	XY,
	XYZ,
} from "@cityfuse/shared/types"

/**
 * Anything buildings can be looked up in by id: a `Map`, or a built
 * `GeometryIndex`.
 */
export interface BuildingLookup {
	get(id: string): CityBuilding | undefined
}

/**
 * OSM object moved into the projected reference system of the buildings.
 */
export interface AlignedOsmObject {
	id: string
	epsg: number
	/** Projected position of the OSM object. */
	position: XY
	/** Point used for matching: the footprint centroid when a footprint exists. */
	anchor: XY
	/** Closed, counterclockwise projected footprint. */
	footprint?: XY[]
}

export interface MatchCandidate {
	buildingId: string
	/** The building footprint contains the anchor point. */
	contains: boolean
	/** Planar distance from the anchor to the footprint, 0 when contained. */
	distance: number
	/** Footprint area in square meters. */
	area: number
	/** 1 for containment, decaying linearly to 0 at the search radius. */
	score: number
	/** The building footprint centroid lies inside the OSM footprint. */
	covered: boolean
}

export interface MatchResult {
	osmId: string
	aligned: AlignedOsmObject
	searchRadius: number
	/** Every building within the search radius, best first. */
	candidates: MatchCandidate[]
	/** The candidates the merge uses, best first. Empty when nothing matched. */
	selected: MatchCandidate[]
}

export interface MergedAttribute {
	value: AttributeValue
	origin: Provenance
}

export type MergedSurface = BuildingSurface

export interface MergedSolid {
	buildingId: string
	origin: "cityjson"
	surfaces: MergedSurface[]
}

export type GeometryIssueKind = "degenerate-ring" | "non-planar" | "open-shell"

export interface GeometryIssue {
	kind: GeometryIssueKind
	/** Index into `MergedRecord.solids`. */
	solid: number
	/** Index into the solid's surfaces, absent for shell level issues. */
	surface?: number
	detail: string
}

export interface MatchedBuilding {
	buildingId: string
	tile?: string
	contains: boolean
	distance: number
	score: number
}

/**
 * One OSM object merged with the buildings it was matched to.
 */
export interface MergedRecord {
	formatVersion: 1
	id: string
	osm: {
		type: OsmEntityType
		osmId: number
		lonLat: LonLat
		position: XY
		anchor: XY
		footprint?: XY[]
	}
	epsg: number
	/** Attributes keyed by name, sorted, each with its provenance. */
	attributes: Record<string, MergedAttribute>
	buildings: MatchedBuilding[]
	solids: MergedSolid[]
	issues: GeometryIssue[]
	/** Standalone CityJSON document of the matched buildings. */
	cityjson?: CityJsonDocument
}

export type MergeOutcome =
	| { status: "merged"; record: MergedRecord }
	| { status: "no-match"; osmId: string }

export type Face = [a: number, b: number, c: number]

/** Contiguous range of faces sharing one material. */
export interface MeshGroup {
	material: SurfaceRole
	start: number
	count: number
}

export interface MeshStats {
	surfaces: number
	/** Surfaces whose winding was reversed to face outward. */
	flippedSurfaces: number
	/** Triangles dropped for repeated vertices or zero area. */
	skippedTriangles: number
	/** Surfaces that produced no triangle at all. */
	skippedSurfaces: number
}

/**
 * Triangle mesh of a merged record. Vertices are relative to `origin` in the
 * projected reference system, with z up.
 */
export interface Mesh {
	id: string
	epsg: number
	origin: XYZ
	vertices: XYZ[]
	faces: Face[]
	groups: MeshGroup[]
	stats: MeshStats
}
