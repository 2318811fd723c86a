/**
 * Read the inputs of a merge run from disk.
 *
 * @module
 */

import { readFile } from "node:fs/promises"
import { loadBuildingsForPoints, loadTileCatalog } from "@cityfuse/cityjson"
import {
	type OsmObject,
	assertFeatureCollection,
	osmObjectsFromGeoJSON,
	parseOsmRecords,
	toOsmObject,
} from "@cityfuse/osm"
import { FuseError, isFuseError } from "@cityfuse/shared/errors"
import {
	type ProgressCallback,
	logProgress,
	progressLogger,
} from "@cityfuse/shared/progress"
import { createProjector } from "@cityfuse/shared/projection"
import type { XY } from "@cityfuse/shared/types"
import type { FuseConfig } from "./config"
import type { BatchInput } from "./run"

/**
 * OSM objects from either the record array written by `fetch` or a GeoJSON
 * FeatureCollection.
 *
 * @throws FuseError `InvalidInput` for anything else.
 */
export function osmObjectsFromJson(
	value: unknown,
	onProgress: ProgressCallback = logProgress,
): OsmObject[] {
	if (Array.isArray(value)) {
		const { records, skipped } = parseOsmRecords(value)
		if (skipped > 0) {
			progressLogger(onProgress).warn(`Skipped ${skipped} records without id or position`)
		}
		return records.map(toOsmObject)
	}
	assertFeatureCollection(value)
	return osmObjectsFromGeoJSON(value, onProgress)
}

export async function readJsonFile(path: string): Promise<unknown> {
	let text: string
	try {
		text = await readFile(path, "utf-8")
	} catch (error) {
		throw new FuseError("InvalidInput", `Cannot read ${path}`, { cause: error })
	}
	try {
		return JSON.parse(text)
	} catch (error) {
		throw new FuseError("InvalidInput", `${path} is not valid JSON`, { cause: error })
	}
}

export async function readOsmObjects(
	path: string,
	onProgress: ProgressCallback = logProgress,
): Promise<OsmObject[]> {
	return osmObjectsFromJson(await readJsonFile(path), onProgress)
}

/**
 * Read the OSM objects and the buildings of every tile near one of them.
 *
 * @throws FuseError `InvalidInput` when the tiles do not share one reference
 * system.
 */
export async function loadBatchInput(
	osmPath: string,
	cityJsonDir: string,
	config: FuseConfig,
	onProgress: ProgressCallback = logProgress,
): Promise<BatchInput> {
	const log = progressLogger(onProgress)
	const objects = await readOsmObjects(osmPath, onProgress)
	log.info(`Read ${objects.length} OSM objects from ${osmPath}`)

	const catalog = await loadTileCatalog(
		cityJsonDir,
		new RegExp(config.input.tilePattern, "i"),
		onProgress,
	)
	if (catalog.epsg === undefined) {
		throw new FuseError(
			"InvalidInput",
			`CityJSON tiles in ${cityJsonDir} do not share one reference system`,
		)
	}
	const projector = createProjector(catalog.epsg, config.match.projections)
	const points: XY[] = []
	for (const object of objects) {
		try {
			points.push(projector.forward(object.lonLat))
		} catch (error) {
			// Reported per object once matching projects it again.
			if (!isFuseError(error, "GeometryMismatch")) throw error
		}
	}
	const { buildings } = loadBuildingsForPoints(
		catalog,
		points,
		config.input.tileMargin,
		onProgress,
	)
	return { objects, buildings, documents: catalog.documents }
}
