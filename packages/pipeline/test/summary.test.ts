import { describe, expect, it } from "vitest"
import type { RunSummary } from "../src/run"
import { formatRunSummary } from "../src/summary"

const base: RunSummary = {
	total: 3,
	matched: 2,
	unmatched: 1,
	merged: 2,
	meshed: 1,
	failed: 0,
	failuresByKind: {},
	failures: [],
	unmatchedIds: ["node/3"],
	outputs: [],
}

describe("formatRunSummary", () => {
	it("lists the counts", () => {
		expect(formatRunSummary(base)).toBe(
			[
				"Objects:   3",
				"Matched:   2",
				"Unmatched: 1",
				"Merged:    2",
				"Meshed:    1",
				"Failed:    0",
			].join("\n"),
		)
	})

	it("adds failure kinds and one line per failure", () => {
		const text = formatRunSummary({
			...base,
			failed: 2,
			failuresByKind: { WriteError: 1, DegenerateSolid: 1 },
			failures: [
				{ id: "node/1", kind: "WriteError", stage: "write", message: "disk full" },
				{ id: "way/2", kind: "DegenerateSolid", stage: "mesh", message: "no faces" },
			],
		})
		expect(text.split("\n").slice(6)).toEqual([
			"  DegenerateSolid: 1",
			"  WriteError: 1",
			"Failures:",
			"  node/1 [WriteError during write] disk full",
			"  way/2 [DegenerateSolid during mesh] no faces",
		])
	})
})
