/**
 * Batch driver, configuration and output handling for fusing OSM objects
 * with CityJSON buildings.
 *
 * @module
 */

export * from "./commands"
export * from "./config"
export * from "./inputs"
export * from "./main"
export * from "./mesh-file"
export * from "./naming"
export * from "./points"
export * from "./run"
export * from "./sink"
export * from "./summary"
