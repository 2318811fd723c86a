import { describe, expect, it, vi } from "vitest"
import {
	logProgress,
	type ProgressEvent,
	progressEvent,
	progressEventMessage,
	progressLogger,
} from "../src/progress"

describe("progress", () => {
	it("wraps messages in events", () => {
		const event = progressEvent("Indexed 3 buildings")
		expect(event.type).toBe("progress")
		expect(event.detail.level).toBe("info")
		expect(progressEventMessage(event)).toBe("Indexed 3 buildings")
	})

	it("routes warnings to console.warn", () => {
		const warn = vi.spyOn(console, "warn").mockImplementation(() => {})
		const log = vi.spyOn(console, "log").mockImplementation(() => {})
		logProgress(progressEvent("skipped", "warn"))
		logProgress(progressEvent("done"))
		expect(warn).toHaveBeenCalledWith("skipped")
		expect(log).toHaveBeenCalledWith("done")
		vi.restoreAllMocks()
	})

	it("binds a callback into info and warn helpers", () => {
		const events: ProgressEvent[] = []
		const logger = progressLogger((event) => events.push(event))
		logger.info("one")
		logger.warn("two")
		expect(events.map((e) => [e.detail.level, e.detail.msg])).toEqual([
			["info", "one"],
			["warn", "two"],
		])
	})
})
