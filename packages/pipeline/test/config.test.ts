import { mkdtemp, rm, writeFile } from "node:fs/promises"
import { tmpdir } from "node:os"
import { join } from "node:path"
import { catchError } from "@cityfuse/test-utils/errors"
import { afterEach, beforeEach, describe, expect, it } from "vitest"
import { DEFAULT_CONFIG, loadConfigFile, parseConfig, resolveConfig } from "../src/config"

describe("resolveConfig", () => {
	it("starts from the defaults", () => {
		const config = resolveConfig()
		expect(config).toEqual(DEFAULT_CONFIG)
		expect(config.match.searchRadius).toBe(25)
		expect(config.mesh.vertexTolerance).toBe(0.001)
		expect(config.input.tilePattern).toBe("\\.json$")
		expect(config.run.concurrency).toBe(1)
	})

	it("applies overrides per key, later ones winning", () => {
		const config = resolveConfig(
			{ match: { searchRadius: 40 }, output: { dir: "a" } },
			{ output: { dir: "b" } },
		)
		expect(config.match).toEqual({ ...DEFAULT_CONFIG.match, searchRadius: 40 })
		expect(config.output).toEqual({ ...DEFAULT_CONFIG.output, dir: "b" })
	})

	it("does not modify the defaults", () => {
		resolveConfig({ run: { concurrency: 8 } })
		expect(DEFAULT_CONFIG.run.concurrency).toBe(1)
	})

	it("rejects invalid values", () => {
		expect(catchError(() => resolveConfig({ run: { concurrency: 0 } }))).toMatchObject({
			kind: "InvalidInput",
			message: "run.concurrency must be a positive integer",
		})
		expect(catchError(() => resolveConfig({ match: { searchRadius: -1 } }))).toMatchObject({
			kind: "InvalidInput",
		})
	})
})

describe("parseConfig", () => {
	it("accepts partial sections", () => {
		const value = { mesh: { areaTolerance: 0.01 }, output: { embedCityJson: false } }
		expect(parseConfig(value)).toEqual(value)
	})

	it("accepts projection definitions", () => {
		const value = { match: { projections: { "EPSG:31467": "+proj=tmerc" } } }
		expect(parseConfig(value)).toEqual(value)
	})

	it("names the offending key", () => {
		expect(catchError(() => parseConfig({ matching: {} }, "c.json"))).toMatchObject({
			message: 'c.json: unknown section "matching"',
		})
		expect(catchError(() => parseConfig({ match: { radius: 3 } }, "c.json"))).toMatchObject({
			message: 'c.json: unknown key "match.radius"',
		})
		expect(
			catchError(() => parseConfig({ match: { searchRadius: "far" } }, "c.json")),
		).toMatchObject({ message: "c.json: match.searchRadius must be a number" })
		expect(catchError(() => parseConfig([], "c.json"))).toMatchObject({
			message: "c.json must be a JSON object",
		})
	})
})

describe("loadConfigFile", () => {
	let dir: string

	beforeEach(async () => {
		dir = await mkdtemp(join(tmpdir(), "cityfuse-config-"))
	})

	afterEach(async () => {
		await rm(dir, { recursive: true, force: true })
	})

	it("reads overrides from JSON", async () => {
		const path = join(dir, "config.json")
		await writeFile(path, JSON.stringify({ run: { concurrency: 4 } }))
		expect(await loadConfigFile(path)).toEqual({ run: { concurrency: 4 } })
	})

	it("reports unreadable files as invalid input", async () => {
		const path = join(dir, "broken.json")
		await writeFile(path, "{ run:")
		await expect(loadConfigFile(path)).rejects.toMatchObject({
			kind: "InvalidInput",
			message: `Cannot read configuration ${path}`,
		})
	})
})
