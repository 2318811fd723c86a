/**
 * Batch driver: match, merge, mesh and export every OSM object of a run.
 *
 * A failure that concerns a single object is recorded in the summary and the
 * run carries on with the next object. Failures of the geometry index, and
 * anything that is not a `FuseError`, end the run.
 *
 * @module
 */

import {
	type GeometryIndex,
	type MergedRecord,
	buildGeometryIndex,
	buildMesh,
	encodeMesh,
	match,
	merge,
	serializeMergedRecord,
} from "@cityfuse/core"
import {
	type CityBuilding,
	type CityJsonDocument,
	extractBuildingsDocument,
} from "@cityfuse/cityjson"
import type { OsmObject } from "@cityfuse/osm"
import { type FuseErrorKind, isFuseError } from "@cityfuse/shared/errors"
import {
	type ProgressCallback,
	logProgress,
	progressLogger,
} from "@cityfuse/shared/progress"
import { type FuseConfig, DEFAULT_CONFIG } from "./config"
import { meshFileName, pointFileName, recordFileName } from "./naming"
import { pointFeature, serializePointFeature } from "./points"
import type { OutputSink } from "./sink"

export interface BatchInput {
	objects: OsmObject[]
	buildings: CityBuilding[]
	/** Source documents keyed by tile name, for embedding CityJSON in records. */
	documents?: Map<string, CityJsonDocument>
}

export type BatchStage = "match" | "merge" | "mesh" | "write"

export interface ObjectFailure {
	id: string
	kind: FuseErrorKind
	stage: BatchStage
	message: string
}

export interface RunSummary {
	total: number
	/** Objects with at least one selected building. */
	matched: number
	unmatched: number
	/** Merged-record files written. */
	merged: number
	/** Mesh files written. */
	meshed: number
	failed: number
	failuresByKind: Partial<Record<FuseErrorKind, number>>
	/** In input order. */
	failures: ObjectFailure[]
	/** In input order. */
	unmatchedIds: string[]
	/** Locations returned by the sink, in input order. */
	outputs: string[]
}

/** Error kinds that belong to one object and do not stop the run. */
export const OBJECT_ERROR_KINDS: ReadonlySet<FuseErrorKind> = new Set<FuseErrorKind>([
	"GeometryMismatch",
	"DegenerateSolid",
	"WriteError",
	"InvalidInput",
])

interface ObjectOutcome {
	id: string
	matched: boolean
	merged: boolean
	meshed: boolean
	failure?: ObjectFailure
	outputs: string[]
}

function embeddedDocument(
	record: MergedRecord,
	documents: Map<string, CityJsonDocument>,
): CityJsonDocument | undefined {
	const [best] = record.buildings
	if (best?.tile === undefined) return undefined
	const doc = documents.get(best.tile)
	if (doc === undefined) return undefined
	const ids = record.buildings
		.filter((building) => building.tile === best.tile)
		.map((building) => building.buildingId)
	return extractBuildingsDocument(doc, ids)
}

async function processObject(
	object: OsmObject,
	index: GeometryIndex,
	input: BatchInput,
	config: FuseConfig,
	sink: OutputSink,
): Promise<ObjectOutcome> {
	const outcome: ObjectOutcome = {
		id: object.id,
		matched: false,
		merged: false,
		meshed: false,
		outputs: [],
	}
	let stage: BatchStage = "match"
	try {
		const result = match(object, index, config.match)
		if (config.output.writePointFiles) {
			stage = "write"
			outcome.outputs.push(
				await sink.write(
					pointFileName(object.id),
					serializePointFeature(pointFeature(object, result)),
					object.id,
				),
			)
		}

		stage = "merge"
		const merged = merge(object, result, index, config.merge)
		if (merged.status === "no-match") return outcome
		outcome.matched = true
		const { record } = merged
		if (config.output.embedCityJson && input.documents) {
			const cityjson = embeddedDocument(record, input.documents)
			if (cityjson) record.cityjson = cityjson
		}
		stage = "write"
		outcome.outputs.push(
			await sink.write(recordFileName(object.id), serializeMergedRecord(record), object.id),
		)
		outcome.merged = true

		stage = "mesh"
		const bytes = await encodeMesh(buildMesh(record, config.mesh))
		stage = "write"
		outcome.outputs.push(await sink.write(meshFileName(object.id), bytes, object.id))
		outcome.meshed = true
		return outcome
	} catch (error) {
		if (!isFuseError(error) || !OBJECT_ERROR_KINDS.has(error.kind)) throw error
		outcome.failure = {
			id: object.id,
			kind: error.kind,
			stage,
			message: error.message,
		}
		return outcome
	}
}

/**
 * Run `task` over `items` with at most `concurrency` tasks in flight.
 * Results keep the order of `items`. The first rejection rejects the whole
 * run and no further items are started.
 */
export async function mapConcurrent<T, R>(
	items: T[],
	concurrency: number,
	task: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
	const results: R[] = []
	let next = 0
	let failed = false
	const runner = async () => {
		while (!failed && next < items.length) {
			const i = next++
			const item = items[i]
			if (item === undefined) continue
			try {
				results[i] = await task(item, i)
			} catch (error) {
				failed = true
				throw error
			}
		}
	}
	const runners = Array.from({ length: Math.min(concurrency, items.length) }, runner)
	await Promise.all(runners)
	return results
}

function summarize(outcomes: ObjectOutcome[]): RunSummary {
	const summary: RunSummary = {
		total: outcomes.length,
		matched: 0,
		unmatched: 0,
		merged: 0,
		meshed: 0,
		failed: 0,
		failuresByKind: {},
		failures: [],
		unmatchedIds: [],
		outputs: [],
	}
	for (const outcome of outcomes) {
		summary.outputs.push(...outcome.outputs)
		if (outcome.matched) summary.matched++
		if (outcome.merged) summary.merged++
		if (outcome.meshed) summary.meshed++
		if (outcome.failure) {
			const { kind } = outcome.failure
			summary.failed++
			summary.failures.push(outcome.failure)
			summary.failuresByKind[kind] = (summary.failuresByKind[kind] ?? 0) + 1
		} else if (!outcome.matched) {
			summary.unmatched++
			summary.unmatchedIds.push(outcome.id)
		}
	}
	return summary
}

/**
 * Process every object of `input` and write its outputs to `sink`.
 *
 * @throws FuseError `IndexEmpty` when there are no usable buildings.
 */
export async function runBatch(
	input: BatchInput,
	sink: OutputSink,
	config: FuseConfig = DEFAULT_CONFIG,
	onProgress: ProgressCallback = logProgress,
): Promise<RunSummary> {
	const log = progressLogger(onProgress)
	const index = buildGeometryIndex(input.buildings, onProgress)
	log.info(`Indexed ${index.size} buildings`)

	let done = 0
	const outcomes = await mapConcurrent(
		input.objects,
		config.run.concurrency,
		async (object) => {
			const outcome = await processObject(object, index, input, config, sink)
			done++
			if (outcome.failure) {
				log.warn(`${object.id}: ${outcome.failure.kind}: ${outcome.failure.message}`)
			}
			if (done % 100 === 0) log.info(`Processed ${done} of ${input.objects.length} objects`)
			return outcome
		},
	)

	const summary = summarize(outcomes)
	log.info(
		`Run finished: ${summary.matched} matched, ${summary.unmatched} unmatched, ${summary.failed} failed`,
	)
	return summary
}
