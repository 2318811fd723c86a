/**
 * @cityfuse/cityjson - Read building solids from tiled CityJSON exports.
 *
 * @example
 * ```ts
 * import { loadTileCatalog, loadBuildingsForPoints } from "@cityfuse/cityjson"
 *
 * const catalog = await loadTileCatalog("./CityJSON", /^gebaeude_lod2_.*\.json$/)
 * const { buildings } = loadBuildingsForPoints(catalog, [[456100, 5428300]], 25)
 * ```
 *
 * @module @cityfuse/cityjson
 */

export * from "./extract"
export * from "./guards"
export * from "./loader"
export * from "./parse"
export * from "./reference-system"
export * from "./tiles"
export * from "./types"
