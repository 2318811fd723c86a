/**
 * Ground footprints of buildings in the projected plane.
 *
 * @module
 */

import type { BuildingSurface, CityBuilding } from "@cityfuse/cityjson"
import { at } from "@cityfuse/shared/assert"
import {
	bboxOf,
	closeRing,
	pointRingDistance,
	ringCentroid,
	ringSignedArea,
} from "@cityfuse/shared/planar"
import type { Bbox2D, XY } from "@cityfuse/shared/types"
import { booleanPointInPolygon, convex, featureCollection, point } from "@turf/turf"
import type { MultiPolygon } from "geojson"

/** Rings smaller than this (m²) do not count as footprint. */
const MIN_RING_AREA = 1e-6

export interface Footprint {
	/** Polygons of closed rings, exterior counterclockwise first. */
	polygons: XY[][][]
	area: number
	bbox: Bbox2D
	centroid: XY
	geometry: MultiPolygon
}

function toXY(position: readonly number[]): XY {
	return [at(position, 0), at(position, 1)]
}

/** Closed copy of a ring wound in the requested direction. */
export function orientRing(ring: XY[], counterclockwise: boolean): XY[] {
	const closed = closeRing(ring)
	const ccw = ringSignedArea(closed) > 0
	return ccw === counterclockwise ? closed : [...closed].reverse()
}

function groundPolygons(surfaces: Iterable<BuildingSurface>): XY[][][] {
	const polygons: XY[][][] = []
	for (const surface of surfaces) {
		if (surface.role !== "ground") continue
		const exterior = surface.exterior.map(toXY)
		if (Math.abs(ringSignedArea(exterior)) < MIN_RING_AREA) continue
		polygons.push([
			orientRing(exterior, true),
			...surface.interiors
				.map((ring) => ring.map(toXY))
				.filter((ring) => Math.abs(ringSignedArea(ring)) >= MIN_RING_AREA)
				.map((ring) => orientRing(ring, false)),
		])
	}
	return polygons
}

function hullPolygon(building: CityBuilding): XY[][] | undefined {
	const points = building.solids.flatMap((solid) =>
		solid.surfaces.flatMap((surface) =>
			surface.exterior.map((vertex) => point(toXY(vertex))),
		),
	)
	if (points.length < 3) return undefined
	const hull = convex(featureCollection(points))
	const ring = hull?.geometry.coordinates[0]
	if (ring === undefined) return undefined
	const exterior = ring.map(toXY)
	if (Math.abs(ringSignedArea(exterior)) < MIN_RING_AREA) return undefined
	return [orientRing(exterior, true)]
}

function toFootprint(polygons: XY[][][]): Footprint {
	let area = 0
	let weight = 0
	let cx = 0
	let cy = 0
	for (const [exterior, ...holes] of polygons) {
		if (exterior === undefined) continue
		const exteriorArea = ringSignedArea(exterior)
		const [x, y] = ringCentroid(exterior)
		cx += x * exteriorArea
		cy += y * exteriorArea
		weight += exteriorArea
		area += exteriorArea
		for (const hole of holes) area -= Math.abs(ringSignedArea(hole))
	}
	return {
		polygons,
		area,
		bbox: bboxOf(polygons.flatMap((rings) => rings.flat())),
		centroid: [cx / weight, cy / weight],
		geometry: { type: "MultiPolygon", coordinates: polygons },
	}
}

/**
 * Footprint formed by the ground surfaces among `surfaces`, if any.
 */
export function groundFootprint(
	surfaces: Iterable<BuildingSurface>,
): Footprint | undefined {
	const polygons = groundPolygons(surfaces)
	return polygons.length > 0 ? toFootprint(polygons) : undefined
}

/**
 * Footprint of a building from its ground surfaces. Buildings without usable
 * ground surfaces fall back to the convex hull of all their vertices.
 */
export function buildingFootprint(building: CityBuilding): Footprint | undefined {
	const ground = groundFootprint(
		building.solids.flatMap((solid) => solid.surfaces),
	)
	if (ground) return ground
	const hull = hullPolygon(building)
	return hull ? toFootprint([hull]) : undefined
}

/** Point in footprint test; points on an edge count as inside. */
export function footprintContains(footprint: Footprint, xy: XY): boolean {
	return booleanPointInPolygon(xy, footprint.geometry)
}

/**
 * Planar distance from a point to a footprint, 0 inside it.
 */
export function footprintDistance(footprint: Footprint, xy: XY): number {
	if (footprintContains(footprint, xy)) return 0
	let min = Number.POSITIVE_INFINITY
	for (const rings of footprint.polygons) {
		for (const ring of rings) min = Math.min(min, pointRingDistance(xy, ring))
	}
	return min
}
