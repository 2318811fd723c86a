/**
 * Move OSM objects (EPSG:4326) into the projected plane of the buildings.
 *
 * @module
 */

import type { OsmObject } from "@cityfuse/osm"
import { FuseError, isFuseError } from "@cityfuse/shared/errors"
import { closeRing, ringCentroid, ringSignedArea } from "@cityfuse/shared/planar"
import {
	createProjector,
	DEFAULT_PROJECTIONS,
	epsgName,
	type Projector,
} from "@cityfuse/shared/projection"
import type { XY } from "@cityfuse/shared/types"
import type { AlignedOsmObject } from "./types"

const projectors = new Map<string, Projector>()

/**
 * Cached projector into `EPSG:<epsg>`.
 */
export function projectorFor(
	epsg: number,
	definitions: Record<string, string> = DEFAULT_PROJECTIONS,
): Projector {
	const key = `${epsg}|${definitions[epsgName(epsg)] ?? ""}`
	let projector = projectors.get(key)
	if (projector === undefined) {
		projector = createProjector(epsg, definitions)
		projectors.set(key, projector)
	}
	return projector
}

/**
 * Project an OSM object into `EPSG:<epsg>`.
 *
 * @throws FuseError `GeometryMismatch` when the target reference system is
 * unknown or the object cannot be projected into it.
 */
export function alignOsmObject(
	object: OsmObject,
	epsg: number | undefined,
	definitions: Record<string, string> = DEFAULT_PROJECTIONS,
): AlignedOsmObject {
	if (epsg === undefined) {
		throw new FuseError(
			"GeometryMismatch",
			"Buildings have a missing or inconsistent reference system",
			{ objectId: object.id },
		)
	}
	try {
		const projector = projectorFor(epsg, definitions)
		const position = projector.forward(object.lonLat)
		const aligned: AlignedOsmObject = {
			id: object.id,
			epsg,
			position,
			anchor: position,
		}
		if (object.footprint !== undefined && object.footprint.length >= 4) {
			let footprint: XY[] = closeRing(object.footprint.map(projector.forward))
			if (ringSignedArea(footprint) < 0) footprint = footprint.reverse()
			if (Math.abs(ringSignedArea(footprint)) > 0) {
				aligned.footprint = footprint
				aligned.anchor = ringCentroid(footprint)
			}
		}
		return aligned
	} catch (error) {
		if (isFuseError(error) && error.objectId === undefined) {
			throw new FuseError(error.kind, error.message, {
				objectId: object.id,
				cause: error,
			})
		}
		throw error
	}
}
