import { isRecord } from "@cityfuse/shared/guards"
import type { CityJsonDocument } from "./types"

/**
 * Structural check for a CityJSON document: the `type` marker, a vertex list
 * and a `CityObjects` map. Object and geometry contents are checked while
 * parsing.
 */
export function isCityJsonDocument(value: unknown): value is CityJsonDocument {
	if (!isRecord(value)) return false
	if (value["type"] !== "CityJSON") return false
	const vertices = value["vertices"]
	if (!Array.isArray(vertices)) return false
	if (!vertices.every((v) => Array.isArray(v) && v.length === 3)) return false
	return isRecord(value["CityObjects"])
}
