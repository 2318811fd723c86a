/**
 * Run configuration. Every section has defaults; callers and config files
 * override individual values.
 *
 * @module
 */

import { readFile } from "node:fs/promises"
import { DEFAULT_TILE_PATTERN } from "@cityfuse/cityjson"
import {
	DEFAULT_MATCH_OPTIONS,
	DEFAULT_MESH_OPTIONS,
	DEFAULT_VALIDATION_OPTIONS,
	type MatchOptions,
	type MergeOptions,
	type MeshOptions,
} from "@cityfuse/core"
import { FuseError } from "@cityfuse/shared/errors"
import { isRecord } from "@cityfuse/shared/guards"

export interface InputConfig {
	/** Regular expression source selecting tile files in the CityJSON directory. */
	tilePattern: string
	/** Distance (m) around each OSM object within which tiles are loaded. */
	tileMargin: number
}

export interface OutputConfig {
	dir: string
	/** Embed a standalone CityJSON document of the matched buildings in each record. */
	embedCityJson: boolean
	/** Write a GeoJSON point file per object next to its record. */
	writePointFiles: boolean
}

export interface RunConfig {
	/** Objects processed at the same time. */
	concurrency: number
}

export interface FuseConfig {
	match: MatchOptions
	merge: MergeOptions
	mesh: MeshOptions
	input: InputConfig
	output: OutputConfig
	run: RunConfig
}

export type FuseConfigOverrides = {
	[K in keyof FuseConfig]?: Partial<FuseConfig[K]>
}

export const DEFAULT_CONFIG: FuseConfig = {
	match: DEFAULT_MATCH_OPTIONS,
	merge: DEFAULT_VALIDATION_OPTIONS,
	mesh: DEFAULT_MESH_OPTIONS,
	input: { tilePattern: DEFAULT_TILE_PATTERN.source, tileMargin: 50 },
	output: { dir: "output", embedCityJson: true, writePointFiles: true },
	run: { concurrency: 1 },
}

/**
 * Apply overrides section by section on top of the defaults. Later overrides
 * win.
 */
export function resolveConfig(...overrides: FuseConfigOverrides[]): FuseConfig {
	const config: FuseConfig = {
		match: { ...DEFAULT_CONFIG.match },
		merge: { ...DEFAULT_CONFIG.merge },
		mesh: { ...DEFAULT_CONFIG.mesh },
		input: { ...DEFAULT_CONFIG.input },
		output: { ...DEFAULT_CONFIG.output },
		run: { ...DEFAULT_CONFIG.run },
	}
	for (const o of overrides) {
		config.match = { ...config.match, ...o.match }
		config.merge = { ...config.merge, ...o.merge }
		config.mesh = { ...config.mesh, ...o.mesh }
		config.input = { ...config.input, ...o.input }
		config.output = { ...config.output, ...o.output }
		config.run = { ...config.run, ...o.run }
	}
	if (!(config.match.searchRadius >= 0)) {
		throw new FuseError("InvalidInput", "match.searchRadius must not be negative")
	}
	if (!Number.isInteger(config.run.concurrency) || config.run.concurrency < 1) {
		throw new FuseError("InvalidInput", "run.concurrency must be a positive integer")
	}
	return config
}

type FieldType = "number" | "string" | "boolean" | "strings"

const FIELDS: { [K in keyof FuseConfig]: Record<string, FieldType> } = {
	match: { searchRadius: "number", projections: "strings" },
	merge: { planarityTolerance: "number", vertexTolerance: "number" },
	mesh: { vertexTolerance: "number", areaTolerance: "number" },
	input: { tilePattern: "string", tileMargin: "number" },
	output: { dir: "string", embedCityJson: "boolean", writePointFiles: "boolean" },
	run: { concurrency: "number" },
}

function isSection(key: string): key is keyof FuseConfig {
	return Object.hasOwn(FIELDS, key)
}

function checkField(path: string, type: FieldType, value: unknown) {
	const valid =
		type === "strings"
			? isRecord(value) && Object.values(value).every((v) => typeof v === "string")
			: typeof value === type && (type !== "number" || Number.isFinite(value))
	if (!valid) {
		throw new FuseError(
			"InvalidInput",
			`${path} must be ${type === "strings" ? "a map of strings" : `a ${type}`}`,
		)
	}
}

function isOverrides(value: Record<string, unknown>): value is FuseConfigOverrides {
	return Object.entries(value).every(([key, section]) => {
		if (!isSection(key) || !isRecord(section)) return false
		const fields = FIELDS[key]
		return Object.keys(section).every((field) => Object.hasOwn(fields, field))
	})
}

/**
 * Check a parsed configuration object.
 *
 * @throws FuseError `InvalidInput` naming the first offending key.
 */
export function parseConfig(value: unknown, source = "configuration"): FuseConfigOverrides {
	if (!isRecord(value)) {
		throw new FuseError("InvalidInput", `${source} must be a JSON object`)
	}
	for (const [key, section] of Object.entries(value)) {
		if (!isSection(key)) {
			throw new FuseError("InvalidInput", `${source}: unknown section "${key}"`)
		}
		if (!isRecord(section)) {
			throw new FuseError("InvalidInput", `${source}: "${key}" must be an object`)
		}
		const fields = FIELDS[key]
		for (const [field, fieldValue] of Object.entries(section)) {
			const type = fields[field]
			if (type === undefined) {
				throw new FuseError("InvalidInput", `${source}: unknown key "${key}.${field}"`)
			}
			checkField(`${source}: ${key}.${field}`, type, fieldValue)
		}
	}
	if (!isOverrides(value)) {
		throw new FuseError("InvalidInput", `${source} is not a configuration`)
	}
	return value
}

/**
 * Read configuration overrides from a JSON file.
 */
export async function loadConfigFile(path: string): Promise<FuseConfigOverrides> {
	let value: unknown
	try {
		value = JSON.parse(await readFile(path, "utf-8"))
	} catch (error) {
		throw new FuseError("InvalidInput", `Cannot read configuration ${path}`, {
			cause: error,
		})
	}
	return parseConfig(value, path)
}
