/**
 * Load a tiled CityJSON export from disk.
 *
 * Every tile is read once to learn its extent and kept in memory, so that
 * the buildings of the tiles covering a set of OSM locations can be parsed
 * on demand and single-building documents can be extracted later.
 *
 * @module
 */

import { readdir, readFile } from "node:fs/promises"
import { join } from "node:path"
import { FuseError } from "@cityfuse/shared/errors"
import {
	type ProgressCallback,
	logProgress,
	progressLogger,
} from "@cityfuse/shared/progress"
import type { XY } from "@cityfuse/shared/types"
import { isCityJsonDocument } from "./guards"
import { documentExtent2D, parseCityJson } from "./parse"
import { parseReferenceSystem } from "./reference-system"
import { type TileEntry, TileIndex } from "./tiles"
import type { CityBuilding, CityJsonDocument } from "./types"

export const DEFAULT_TILE_PATTERN = /\.json$/i

export interface TileCatalog {
	index: TileIndex
	documents: Map<string, CityJsonDocument>
	/** Shared EPSG code of all tiles; undefined when missing or inconsistent. */
	epsg?: number
}

export interface LoadedBuildings {
	buildings: CityBuilding[]
	tiles: string[]
}

/**
 * Read and validate one CityJSON file.
 *
 * @throws FuseError `InvalidInput` when the file is not a CityJSON document.
 */
export async function readCityJsonFile(path: string): Promise<CityJsonDocument> {
	const text = await readFile(path, "utf-8")
	let data: unknown
	try {
		data = JSON.parse(text)
	} catch (error) {
		throw new FuseError("InvalidInput", `${path} is not valid JSON`, {
			cause: error,
		})
	}
	if (!isCityJsonDocument(data)) {
		throw new FuseError("InvalidInput", `${path} is not a CityJSON document`)
	}
	return data
}

/**
 * Build a catalog from documents that are already in memory, keyed by tile name.
 */
export function createTileCatalog(
	documents: Map<string, CityJsonDocument>,
	onProgress: ProgressCallback = logProgress,
): TileCatalog {
	const log = progressLogger(onProgress)
	const entries: TileEntry[] = []
	const codes = new Set<number | undefined>()
	for (const [name, doc] of documents) {
		const extent = documentExtent2D(doc)
		if (!extent) {
			log.warn(`Skipping tile ${name}: no extent and no vertices`)
			continue
		}
		const epsg = parseReferenceSystem(doc.metadata?.referenceSystem)
		codes.add(epsg)
		entries.push(epsg === undefined ? { name, extent } : { name, extent, epsg })
	}
	const [only] = codes
	return {
		index: new TileIndex(entries),
		documents,
		epsg: codes.size === 1 ? only : undefined,
	}
}

/**
 * Read all tiles of a directory whose file name matches `pattern`.
 *
 * @throws FuseError `InvalidInput` when no tile is found.
 */
export async function loadTileCatalog(
	dir: string,
	pattern: RegExp = DEFAULT_TILE_PATTERN,
	onProgress: ProgressCallback = logProgress,
): Promise<TileCatalog> {
	const log = progressLogger(onProgress)
	const names = (await readdir(dir)).filter((name) => pattern.test(name)).sort()
	const documents = new Map<string, CityJsonDocument>()
	for (const name of names) {
		documents.set(name, await readCityJsonFile(join(dir, name)))
	}
	if (documents.size === 0) {
		throw new FuseError("InvalidInput", `No CityJSON tiles found in ${dir}`)
	}
	log.info(`Read ${documents.size} CityJSON tiles from ${dir}`)
	return createTileCatalog(documents, onProgress)
}

/**
 * Parse the buildings of every tile covering at least one of the given
 * projected locations. `margin` grows each location so buildings in a
 * neighbouring tile within that distance are included.
 */
export function loadBuildingsForPoints(
	catalog: TileCatalog,
	points: XY[],
	margin = 0,
	onProgress: ProgressCallback = logProgress,
): LoadedBuildings {
	const log = progressLogger(onProgress)
	const tiles = new Set<string>()
	for (const point of points) {
		for (const entry of catalog.index.tilesCovering(point, margin)) {
			tiles.add(entry.name)
		}
	}
	const buildings: CityBuilding[] = []
	const names = [...tiles].sort()
	for (const name of names) {
		const doc = catalog.documents.get(name)
		if (!doc) continue
		const parsed = parseCityJson(doc, { tile: name })
		if (parsed.skipped.length > 0) {
			log.warn(
				`${name}: ${parsed.skipped.length} buildings without LOD2 geometry skipped`,
			)
		}
		buildings.push(...parsed.buildings)
	}
	log.info(`Loaded ${buildings.length} buildings from ${names.length} tiles`)
	return { buildings, tiles: names }
}
