/**
 * @cityfuse/core - Link OSM objects to LOD2 buildings, fuse them into merged
 * records and turn those into glTF meshes.
 *
 * @example
 * ```ts
 * import { buildGeometryIndex, match, merge, buildMesh, exportMesh } from "@cityfuse/core"
 *
 * const index = buildGeometryIndex(buildings)
 * const result = match(object, index, { searchRadius: 25 })
 * const outcome = merge(object, result, index)
 * if (outcome.status === "merged") {
 *   await exportMesh(buildMesh(outcome.record), "node_1.glb")
 * }
 * ```
 *
 * @module
 */

export * from "./alignment"
export * from "./exporter"
export * from "./footprint"
export * from "./geometry-index"
export * from "./matcher"
export * from "./materials"
export * from "./merger"
export * from "./mesh-builder"
export * from "./record-file"
export * from "./triangulate"
export * from "./types"
export * from "./validate"
