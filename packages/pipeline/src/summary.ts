import type { RunSummary } from "./run"

/**
 * Printable report of a run. Failures are listed one per line after the
 * counts.
 */
export function formatRunSummary(summary: RunSummary): string {
	const lines = [
		`Objects:   ${summary.total}`,
		`Matched:   ${summary.matched}`,
		`Unmatched: ${summary.unmatched}`,
		`Merged:    ${summary.merged}`,
		`Meshed:    ${summary.meshed}`,
		`Failed:    ${summary.failed}`,
	]
	const kinds = Object.entries(summary.failuresByKind).sort(([a], [b]) =>
		a.localeCompare(b),
	)
	for (const [kind, count] of kinds) lines.push(`  ${kind}: ${count}`)
	if (summary.failures.length > 0) {
		lines.push("Failures:")
		for (const failure of summary.failures) {
			lines.push(`  ${failure.id} [${failure.kind} during ${failure.stage}] ${failure.message}`)
		}
	}
	return lines.join("\n")
}
