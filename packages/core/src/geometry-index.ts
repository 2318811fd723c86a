/**
 * Spatial index over building footprints.
 *
 * Buildings are added one by one, then `build()` computes footprints and
 * packs their bounding boxes into a Flatbush tree. Queries are answered in
 * the projected plane of the buildings.
 *
 * @module
 */

import type { CityBuilding } from "@cityfuse/cityjson"
import { at } from "@cityfuse/shared/assert"
import { FuseError } from "@cityfuse/shared/errors"
import {
	logProgress,
	type ProgressCallback,
	progressLogger,
} from "@cityfuse/shared/progress"
import type { Bbox2D, XY } from "@cityfuse/shared/types"
import { dequal } from "dequal/lite"
import Flatbush from "flatbush"
import {
	buildingFootprint,
	type Footprint,
	footprintContains,
	footprintDistance,
} from "./footprint"
import type { BuildingLookup } from "./types"

export interface IndexHit {
	id: string
	contains: boolean
	distance: number
	area: number
}

interface IndexEntry {
	building: CityBuilding
	footprint: Footprint
}

function completeness(building: CityBuilding): [surfaces: number, vertices: number] {
	let surfaces = 0
	let vertices = 0
	for (const solid of building.solids) {
		for (const surface of solid.surfaces) {
			surfaces++
			vertices += surface.exterior.length
			for (const ring of surface.interiors) vertices += ring.length
		}
	}
	return [surfaces, vertices]
}

function isMoreComplete(a: CityBuilding, b: CityBuilding) {
	const [surfacesA, verticesA] = completeness(a)
	const [surfacesB, verticesB] = completeness(b)
	if (surfacesA !== surfacesB) return surfacesA > surfacesB
	return verticesA > verticesB
}

export class GeometryIndex implements BuildingLookup {
	private buildings = new Map<string, CityBuilding>()
	private entries: IndexEntry[] = []
	private footprints = new Map<string, Footprint>()
	private spatialIndex: Flatbush | null = null
	private onProgress: ProgressCallback

	/** Buildings that were added more than once with identical geometry. */
	identicalDuplicates = 0
	/** Buildings that were added more than once with differing geometry. */
	conflictingDuplicates = 0
	/** Buildings left out because no footprint could be derived. */
	readonly withoutFootprint: string[] = []

	constructor(onProgress: ProgressCallback = logProgress) {
		this.onProgress = onProgress
	}

	/**
	 * Add a building. A building id seen before keeps the more complete of the
	 * two geometries.
	 */
	add(building: CityBuilding) {
		if (this.spatialIndex) throw Error("GeometryIndex is already built.")
		const existing = this.buildings.get(building.id)
		if (existing === undefined) {
			this.buildings.set(building.id, building)
			return
		}
		if (dequal(existing.solids, building.solids)) {
			this.identicalDuplicates++
			return
		}
		this.conflictingDuplicates++
		progressLogger(this.onProgress).warn(
			`Building ${building.id} appears more than once with different geometry`,
		)
		if (isMoreComplete(building, existing)) this.buildings.set(building.id, building)
	}

	addAll(buildings: Iterable<CityBuilding>) {
		for (const building of buildings) this.add(building)
		return this
	}

	/**
	 * Compute footprints and build the spatial index.
	 *
	 * @throws FuseError `IndexEmpty` when no building has been added.
	 */
	build() {
		if (this.spatialIndex) return this
		if (this.buildings.size === 0) {
			throw new FuseError("IndexEmpty", "Cannot build a geometry index without buildings")
		}
		console.time("GeometryIndex.build")
		for (const building of this.buildings.values()) {
			const footprint = buildingFootprint(building)
			if (footprint === undefined) {
				this.withoutFootprint.push(building.id)
				continue
			}
			this.entries.push({ building, footprint })
			this.footprints.set(building.id, footprint)
		}
		if (this.entries.length === 0) {
			console.timeEnd("GeometryIndex.build")
			throw new FuseError("IndexEmpty", "No building has a usable footprint")
		}
		const index = new Flatbush(this.entries.length)
		for (const { footprint } of this.entries) {
			const [minX, minY, maxX, maxY] = footprint.bbox
			index.add(minX, minY, maxX, maxY)
		}
		index.finish()
		this.spatialIndex = index
		console.timeEnd("GeometryIndex.build")

		const log = progressLogger(this.onProgress)
		log.info(`Indexed ${this.entries.length.toLocaleString()} buildings`)
		if (this.withoutFootprint.length > 0) {
			log.warn(`${this.withoutFootprint.length} buildings have no footprint`)
		}
		return this
	}

	isBuilt() {
		return this.spatialIndex !== null
	}

	get size() {
		return this.buildings.size
	}

	get(id: string) {
		return this.buildings.get(id)
	}

	/** Footprint of an indexed building. */
	footprint(id: string): Footprint | undefined {
		return this.footprints.get(id)
	}

	/**
	 * EPSG code shared by every indexed building, or undefined when any building
	 * lacks one or they disagree.
	 */
	get epsg(): number | undefined {
		const codes = new Set<number | undefined>()
		for (const building of this.buildings.values()) codes.add(building.epsg)
		if (codes.size !== 1) return undefined
		const [code] = codes
		return code
	}

	/** Extent of all indexed footprints. */
	get bbox(): Bbox2D {
		const index = this.requireBuilt()
		return [index.minX, index.minY, index.maxX, index.maxY]
	}

	/**
	 * @throws FuseError `NotBuilt` when `build()` has not run.
	 */
	assertBuilt() {
		this.requireBuilt()
	}

	private requireBuilt(): Flatbush {
		if (this.spatialIndex === null) {
			throw new FuseError("NotBuilt", "GeometryIndex must be built before querying")
		}
		return this.spatialIndex
	}

	/**
	 * Buildings whose footprint lies within `radius` of `xy`, nearest first
	 * with ties broken by id.
	 *
	 * @throws FuseError `NotBuilt` when called before `build()`.
	 */
	nearby(xy: XY, radius: number): IndexHit[] {
		const index = this.requireBuilt()
		const [x, y] = xy
		const hits: IndexHit[] = []
		for (const i of index.search(x - radius, y - radius, x + radius, y + radius)) {
			const { building, footprint } = at(this.entries, i)
			const contains = footprintContains(footprint, xy)
			const distance = contains ? 0 : footprintDistance(footprint, xy)
			if (distance > radius) continue
			hits.push({ id: building.id, contains, distance, area: footprint.area })
		}
		return hits.sort(
			(a, b) => a.distance - b.distance || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0),
		)
	}

	/**
	 * Ids of the buildings within `radius` of `xy`, nearest first.
	 */
	query(xy: XY, radius: number): string[] {
		return this.nearby(xy, radius).map((hit) => hit.id)
	}
}

/**
 * Build an index over a set of buildings.
 */
export function buildGeometryIndex(
	buildings: Iterable<CityBuilding>,
	onProgress: ProgressCallback = logProgress,
) {
	return new GeometryIndex(onProgress).addAll(buildings).build()
}
