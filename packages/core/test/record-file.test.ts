import { catchError } from "@cityfuse/test-utils/errors"
import { flatHouse, houseToBuilding } from "@cityfuse/test-utils/fixtures"
import { describe, expect, it } from "vitest"
import { isMergedRecord, parseMergedRecord, serializeMergedRecord } from "../src/record-file"
import { recordOf } from "./helpers"

const record = recordOf([houseToBuilding("b", flatHouse([0, 0]))])

describe("merged record files", () => {
	it("reads back what it writes", () => {
		const text = serializeMergedRecord(record)
		expect(text.endsWith("}\n")).toBe(true)
		expect(parseMergedRecord(text)).toEqual(record)
	})

	it("rejects text that is not JSON", () => {
		expect(catchError(() => parseMergedRecord("{", "bad.json"))).toMatchObject({
			kind: "InvalidInput",
			message: "bad.json is not valid JSON",
		})
	})

	it("rejects records with malformed geometry", () => {
		const broken = {
			...record,
			solids: [
				{
					buildingId: "b",
					origin: "cityjson",
					surfaces: [{ role: "wall", semantic: null, exterior: [[0, 0]], interiors: [] }],
				},
			],
		}
		expect(isMergedRecord(broken)).toBe(false)
		expect(catchError(() => parseMergedRecord(JSON.stringify(broken)))).toMatchObject({
			kind: "InvalidInput",
		})
	})

	it("rejects unknown format versions", () => {
		expect(isMergedRecord({ ...record, formatVersion: 2 })).toBe(false)
	})
})
