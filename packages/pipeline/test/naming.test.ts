import { describe, expect, it } from "vitest"
import { fileStem, meshFileName, pointFileName, recordFileName } from "../src/naming"

describe("output naming", () => {
	it("derives every file name from the object id", () => {
		expect(fileStem("node/1")).toBe("node_1")
		expect(pointFileName("way/42")).toBe("way_42.json")
		expect(recordFileName("way/42")).toBe("way_42_bld.json")
		expect(meshFileName("relation/7")).toBe("relation_7.glb")
	})

	it("replaces characters that are unsafe in file names", () => {
		expect(fileStem("node/-3")).toBe("node_-3")
		expect(fileStem("a b:c")).toBe("a_b_c")
	})
})
