/**
 * Progress and log event helpers for long-running operations.
 *
 * Batch stages report what they are doing through a callback that receives
 * `ProgressEvent`s. Callers decide where the messages go; the default,
 * `logProgress`, writes them to the console.
 *
 * @module
 */

export type ProgressLevel = "info" | "warn"

/**
 * Progress payload containing a message, a level and a timestamp.
 */
export type Progress = {
	msg: string
	level: ProgressLevel
	timestamp: number
}

/** CustomEvent carrying progress details. */
export interface ProgressEvent extends CustomEvent<Progress> {}

export type ProgressCallback = (progress: ProgressEvent) => void

/**
 * Create a Progress payload with current timestamp.
 */
export function progress(msg: string, level: ProgressLevel = "info"): Progress {
	return {
		msg,
		level,
		timestamp: Date.now(),
	}
}

/**
 * Create a ProgressEvent with the given message.
 */
export function progressEvent(
	msg: string,
	level: ProgressLevel = "info",
): ProgressEvent {
	return new CustomEvent("progress", { detail: progress(msg, level) })
}

/**
 * Extract the message string from a progress event.
 */
export function progressEventMessage(event: ProgressEvent): string {
	return event.detail.msg
}

/**
 * Log a progress event's message to the console. Warnings go to stderr.
 */
export function logProgress(event: ProgressEvent) {
	if (event.detail.level === "warn") {
		console.warn(progressEventMessage(event))
	} else {
		console.log(progressEventMessage(event))
	}
}

/** Progress callback that drops every event. */
export function silentProgress(_event: ProgressEvent) {}

/**
 * Bind a progress callback into `info` / `warn` helpers.
 */
export function progressLogger(onProgress: ProgressCallback) {
	return {
		info: (msg: string) => onProgress(progressEvent(msg)),
		warn: (msg: string) => onProgress(progressEvent(msg, "warn")),
	}
}
