/**
 * Argument handling of the `cityfuse` command.
 *
 * @module
 */

import { parseArgs } from "node:util"
import { FuseError } from "@cityfuse/shared/errors"
import { type ProgressCallback, logProgress } from "@cityfuse/shared/progress"
import {
	convertCommand,
	fetchCommand,
	formatMeshResult,
	mergeCommand,
	meshCommand,
} from "./commands"
import { type FuseConfigOverrides, loadConfigFile, resolveConfig } from "./config"
import { formatRunSummary } from "./summary"

export const USAGE = `Usage:
  cityfuse fetch <place> <output.json>
  cityfuse convert <records.json> <output.geojson>
  cityfuse merge <osm.json|osm.geojson> <cityjson-dir> [options]
  cityfuse mesh <record_bld.json>...

Options:
  --config <file>        JSON configuration file
  --out <dir>            output directory of merge
  --radius <m>           search radius in meters
  --concurrency <n>      objects processed at the same time
  --no-embed             do not embed CityJSON in merged records
  --no-points            do not write point files
  -h, --help             show this help`

function numberFlag(name: string, value: string | undefined): number | undefined {
	if (value === undefined) return undefined
	const n = Number(value)
	if (!Number.isFinite(n)) {
		throw new FuseError("InvalidInput", `--${name} expects a number, got "${value}"`)
	}
	return n
}

function expectPositionals(command: string, positionals: string[], count: number) {
	if (positionals.length !== count) {
		throw new FuseError("InvalidInput", `${command} expects ${count} arguments\n\n${USAGE}`)
	}
}

/**
 * Run the command line tool.
 *
 * @returns the process exit code.
 */
export async function runCli(
	args: string[],
	onProgress: ProgressCallback = logProgress,
	print: (text: string) => void = console.log,
): Promise<number> {
	const { values, positionals } = parseArgs({
		args,
		allowPositionals: true,
		options: {
			config: { type: "string" },
			out: { type: "string" },
			radius: { type: "string" },
			concurrency: { type: "string" },
			"no-embed": { type: "boolean", default: false },
			"no-points": { type: "boolean", default: false },
			help: { type: "boolean", short: "h", default: false },
		},
	})
	const [command, ...rest] = positionals
	if (values.help || command === undefined) {
		print(USAGE)
		return values.help ? 0 : 1
	}

	const fileOverrides = values.config ? await loadConfigFile(values.config) : {}
	const flagOverrides: FuseConfigOverrides = {}
	const radius = numberFlag("radius", values.radius)
	if (radius !== undefined) flagOverrides.match = { searchRadius: radius }
	const concurrency = numberFlag("concurrency", values.concurrency)
	if (concurrency !== undefined) flagOverrides.run = { concurrency }
	const output: FuseConfigOverrides["output"] = {}
	if (values.out !== undefined) output.dir = values.out
	if (values["no-embed"]) output.embedCityJson = false
	if (values["no-points"]) output.writePointFiles = false
	flagOverrides.output = output
	const config = resolveConfig(fileOverrides, flagOverrides)

	switch (command) {
		case "fetch": {
			expectPositionals(command, rest, 2)
			const [place = "", destination = ""] = rest
			await fetchCommand(place, destination, {}, onProgress)
			return 0
		}
		case "convert": {
			expectPositionals(command, rest, 2)
			const [input = "", destination = ""] = rest
			await convertCommand(input, destination, onProgress)
			return 0
		}
		case "merge": {
			expectPositionals(command, rest, 2)
			const [osmPath = "", cityJsonDir = ""] = rest
			const summary = await mergeCommand(osmPath, cityJsonDir, config, onProgress)
			print(formatRunSummary(summary))
			return 0
		}
		case "mesh": {
			if (rest.length === 0) {
				throw new FuseError("InvalidInput", `mesh expects at least one file\n\n${USAGE}`)
			}
			print(formatMeshResult(await meshCommand(rest, config, onProgress)))
			return 0
		}
		default:
			throw new FuseError("InvalidInput", `Unknown command "${command}"\n\n${USAGE}`)
	}
}
