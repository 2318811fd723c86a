import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises"
import { tmpdir } from "node:os"
import { join } from "node:path"
import { buildGeometryIndex, match, merge, serializeMergedRecord } from "@cityfuse/core"
import { silentProgress } from "@cityfuse/shared/progress"
import {
	gableHouse,
	houseToBuilding,
	KARLSRUHE,
	osmPoint,
	utm32,
} from "@cityfuse/test-utils/fixtures"
import { afterEach, beforeEach, describe, expect, it } from "vitest"
import { meshPathFor, meshRecordFile } from "../src/mesh-file"

function mergedRecordText() {
	const index = buildGeometryIndex(
		[houseToBuilding("b1", gableHouse(utm32(KARLSRUHE)))],
		silentProgress,
	)
	const object = osmPoint(1, KARLSRUHE)
	const outcome = merge(object, match(object, index), index)
	if (outcome.status !== "merged") throw Error("Expected a merged record")
	return serializeMergedRecord(outcome.record)
}

describe("meshPathFor", () => {
	it("places the mesh next to the record", () => {
		expect(meshPathFor("out/node_1_bld.json")).toBe("out/node_1.glb")
		expect(meshPathFor("out/record.JSON")).toBe("out/record.glb")
		expect(meshPathFor("record")).toBe("record.glb")
	})
})

describe("meshRecordFile", () => {
	let dir: string

	beforeEach(async () => {
		dir = await mkdtemp(join(tmpdir(), "cityfuse-mesh-"))
	})

	afterEach(async () => {
		await rm(dir, { recursive: true, force: true })
	})

	it("rebuilds the mesh of a merged-record file", async () => {
		const path = join(dir, "node_1_bld.json")
		await writeFile(path, mergedRecordText())

		const result = await meshRecordFile(path)
		expect(result.destination).toBe(join(dir, "node_1.glb"))
		expect(result.mesh.id).toBe("node/1")
		expect(result.mesh.vertices).toHaveLength(10)
		expect(result.mesh.faces).toHaveLength(16)
		const bytes = await readFile(result.destination)
		expect(bytes.byteLength).toBe(result.bytes)
	})

	it("rejects files that are not merged records", async () => {
		const path = join(dir, "other.json")
		await writeFile(path, JSON.stringify({ type: "FeatureCollection", features: [] }))
		await expect(meshRecordFile(path)).rejects.toMatchObject({
			kind: "InvalidInput",
			message: `${path} is not a merged building record`,
		})
	})

	it("rejects missing files", async () => {
		const path = join(dir, "missing_bld.json")
		await expect(meshRecordFile(path)).rejects.toMatchObject({
			kind: "InvalidInput",
			message: `Cannot read ${path}`,
		})
	})
})
