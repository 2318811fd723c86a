/**
 * The stages of the command line tool as functions over file paths.
 *
 * @module
 */

import { basename, dirname, extname, join } from "node:path"
import {
	type FetchPlaceOptions,
	fetchPlaceObjects,
	parseOsmRecords,
	recordsToGeoJSON,
	splitByWheelchair,
} from "@cityfuse/osm"
import { writeFileAtomic } from "@cityfuse/shared/atomic-write"
import { type FuseErrorKind, isFuseError } from "@cityfuse/shared/errors"
import {
	type ProgressCallback,
	logProgress,
	progressLogger,
} from "@cityfuse/shared/progress"
import type { FuseConfig } from "./config"
import { loadBatchInput, readJsonFile } from "./inputs"
import { type MeshFileResult, meshRecordFile } from "./mesh-file"
import { OBJECT_ERROR_KINDS, type RunSummary, runBatch } from "./run"
import { FileSystemSink } from "./sink"

function jsonText(value: unknown) {
	return `${JSON.stringify(value, null, 2)}\n`
}

/** `out/pois.geojson` with `_acc_yes` → `out/pois_acc_yes.geojson` */
export function subsetPath(path: string, suffix: string) {
	const extension = extname(path)
	return join(dirname(path), `${basename(path, extension)}${suffix}${extension}`)
}

/**
 * Fetch the points of interest of a place and store them as a record array.
 */
export async function fetchCommand(
	place: string,
	output: string,
	options: FetchPlaceOptions = {},
	onProgress: ProgressCallback = logProgress,
) {
	const result = await fetchPlaceObjects(place, options, onProgress)
	await writeFileAtomic(output, jsonText(result.records))
	progressLogger(onProgress).info(`Wrote ${result.records.length} records to ${output}`)
	return result
}

export interface ConvertResult {
	features: number
	/** Files written, the full export first. */
	written: string[]
}

/**
 * Convert a record array into inspection GeoJSON, plus `_acc_yes` and
 * `_acc_no` subsets by wheelchair access when they are not empty.
 */
export async function convertCommand(
	input: string,
	output: string,
	onProgress: ProgressCallback = logProgress,
): Promise<ConvertResult> {
	const log = progressLogger(onProgress)
	const { records, skipped } = parseOsmRecords(await readJsonFile(input))
	if (skipped > 0) log.warn(`Skipped ${skipped} records without id or position`)
	const collection = recordsToGeoJSON(records, onProgress)
	await writeFileAtomic(output, jsonText(collection))
	const written = [output]

	const subsets = splitByWheelchair(collection)
	for (const [suffix, subset] of [
		["_acc_yes", subsets.yes],
		["_acc_no", subsets.no],
	] as const) {
		if (subset.features.length === 0) {
			log.info(`No ${suffix} features to write`)
			continue
		}
		const path = subsetPath(output, suffix)
		await writeFileAtomic(path, jsonText(subset))
		log.info(`Wrote ${subset.features.length} features to ${path}`)
		written.push(path)
	}
	return { features: collection.features.length, written }
}

/**
 * Merge the OSM objects of a file with the CityJSON tiles of a directory and
 * write the outputs into `config.output.dir`.
 */
export async function mergeCommand(
	osmPath: string,
	cityJsonDir: string,
	config: FuseConfig,
	onProgress: ProgressCallback = logProgress,
): Promise<RunSummary> {
	const input = await loadBatchInput(osmPath, cityJsonDir, config, onProgress)
	return runBatch(input, new FileSystemSink(config.output.dir), config, onProgress)
}

export interface MeshFileFailure {
	path: string
	kind: FuseErrorKind
	message: string
}

export interface MeshCommandResult {
	/** In input order. */
	meshed: MeshFileResult[]
	/** In input order. */
	failures: MeshFileFailure[]
}

/**
 * Mesh each merged-record file next to itself. A file that fails with an
 * object-level error is recorded and the remaining files are still meshed.
 */
export async function meshCommand(
	paths: string[],
	config: FuseConfig,
	onProgress: ProgressCallback = logProgress,
): Promise<MeshCommandResult> {
	const log = progressLogger(onProgress)
	const result: MeshCommandResult = { meshed: [], failures: [] }
	for (const path of paths) {
		try {
			const meshed = await meshRecordFile(path, undefined, config.mesh)
			log.info(
				`${meshed.destination}: ${meshed.mesh.vertices.length} vertices, ${meshed.mesh.faces.length} triangles`,
			)
			result.meshed.push(meshed)
		} catch (error) {
			if (!isFuseError(error) || !OBJECT_ERROR_KINDS.has(error.kind)) throw error
			log.warn(`${path}: ${error.kind}: ${error.message}`)
			result.failures.push({ path, kind: error.kind, message: error.message })
		}
	}
	return result
}

/** Printable report of a mesh run. */
export function formatMeshResult({ meshed, failures }: MeshCommandResult) {
	const lines = [`Meshed:    ${meshed.length}`, `Failed:    ${failures.length}`]
	for (const failure of failures) {
		lines.push(`  ${failure.path} [${failure.kind}] ${failure.message}`)
	}
	return lines.join("\n")
}
