/**
 * Link OSM objects to the buildings they describe.
 *
 * Every building within the search radius of the object's representative
 * point becomes a candidate. Candidates containing the point rank above all
 * others; the rest rank by distance to the nearest footprint edge, then by
 * smaller footprint area, then by id.
 *
 * @module
 */

import type { OsmObject } from "@cityfuse/osm"
import { DEFAULT_PROJECTIONS } from "@cityfuse/shared/projection"
import type { XY } from "@cityfuse/shared/types"
import { booleanPointInPolygon } from "@turf/turf"
import { alignOsmObject } from "./alignment"
import type { GeometryIndex, IndexHit } from "./geometry-index"
import type { AlignedOsmObject, MatchCandidate, MatchResult } from "./types"

export interface MatchOptions {
	/** Search radius in meters of the projected reference system. */
	searchRadius: number
	/** proj4 definitions keyed by `EPSG:<code>`. */
	projections: Record<string, string>
}

export const DEFAULT_MATCH_OPTIONS: MatchOptions = {
	searchRadius: 25,
	projections: DEFAULT_PROJECTIONS,
}

/**
 * Confidence of a candidate: 1 when it contains the point, otherwise
 * decaying from 0.5 at the footprint edge to 0 at the search radius.
 */
export function candidateScore(hit: IndexHit, radius: number) {
	if (hit.contains) return 1
	if (radius <= 0) return 0
	return Math.max(0, 0.5 * (1 - hit.distance / radius))
}

export function compareCandidates(a: MatchCandidate, b: MatchCandidate) {
	if (a.contains !== b.contains) return a.contains ? -1 : 1
	return (
		a.distance - b.distance ||
		a.area - b.area ||
		(a.buildingId < b.buildingId ? -1 : a.buildingId > b.buildingId ? 1 : 0)
	)
}

function coversPoint(footprint: XY[] | undefined, xy: XY | undefined) {
	if (footprint === undefined || xy === undefined) return false
	return booleanPointInPolygon(xy, { type: "Polygon", coordinates: [footprint] })
}

/**
 * Pick the candidates the merge uses. A point object takes the best
 * candidate. An object with a footprint takes every building containing its
 * anchor or centred inside its footprint, so buildings split across several
 * records are merged together.
 */
export function selectCandidates(
	aligned: AlignedOsmObject,
	ranked: MatchCandidate[],
): MatchCandidate[] {
	const [best] = ranked
	if (best === undefined) return []
	if (aligned.footprint === undefined) return [best]
	const selected = ranked.filter((c) => c.contains || c.covered)
	return selected.length > 0 ? selected : [best]
}

/**
 * Match one OSM object against a built index.
 *
 * @throws FuseError `NotBuilt` for an unbuilt index, `GeometryMismatch` when
 * the object cannot be moved into the reference system of the buildings.
 */
export function match(
	object: OsmObject,
	index: GeometryIndex,
	options: Partial<MatchOptions> = {},
): MatchResult {
	const { searchRadius, projections } = { ...DEFAULT_MATCH_OPTIONS, ...options }
	index.assertBuilt()
	const aligned = alignOsmObject(object, index.epsg, projections)
	const candidates = index
		.nearby(aligned.anchor, searchRadius)
		.map(
			(hit): MatchCandidate => ({
				buildingId: hit.id,
				contains: hit.contains,
				distance: hit.distance,
				area: hit.area,
				score: candidateScore(hit, searchRadius),
				covered: coversPoint(aligned.footprint, index.footprint(hit.id)?.centroid),
			}),
		)
		.sort(compareCandidates)

	return {
		osmId: object.id,
		aligned,
		searchRadius,
		candidates,
		selected: selectCandidates(aligned, candidates),
	}
}
