import type { Bbox2D, XY } from "@cityfuse/shared/types"
import Flatbush from "flatbush"

export interface TileEntry {
	/** File name of the tile. */
	name: string
	/** Ground-plane extent in the tile's reference system. */
	extent: Bbox2D
	epsg?: number
}

/**
 * Spatial index over the extents of a tiled CityJSON export, used to find
 * which tiles hold the buildings around an OSM location.
 */
export class TileIndex {
	readonly entries: TileEntry[]
	private spatialIndex: Flatbush | null = null

	constructor(entries: TileEntry[]) {
		this.entries = entries
		if (entries.length === 0) return
		this.spatialIndex = new Flatbush(entries.length)
		for (const { extent } of entries) {
			this.spatialIndex.add(extent[0], extent[1], extent[2], extent[3])
		}
		this.spatialIndex.finish()
	}

	get size() {
		return this.entries.length
	}

	/**
	 * Tiles whose extent contains the point, optionally grown by `margin` so
	 * that buildings just across a tile border are found too.
	 */
	tilesCovering([x, y]: XY, margin = 0): TileEntry[] {
		return this.tilesIntersecting([x - margin, y - margin, x + margin, y + margin])
	}

	/**
	 * Tiles whose extent intersects the bounding box, in insertion order.
	 */
	tilesIntersecting(bbox: Bbox2D): TileEntry[] {
		if (!this.spatialIndex) return []
		return this.spatialIndex
			.search(bbox[0], bbox[1], bbox[2], bbox[3])
			.sort((a, b) => a - b)
			.flatMap((i) => {
				const entry = this.entries[i]
				return entry ? [entry] : []
			})
	}
}
