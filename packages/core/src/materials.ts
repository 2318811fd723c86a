import type { SurfaceRole } from "@cityfuse/cityjson"
import type { Rgba } from "@cityfuse/shared/types"

export interface SurfaceMaterial {
	name: SurfaceRole
	/** Linear RGBA base color. */
	baseColor: Rgba
	roughness: number
}

/** Mesh face groups and scene primitives are emitted in this order. */
export const MATERIAL_ORDER: readonly SurfaceRole[] = ["roof", "wall", "ground"]

export const MATERIALS: Record<SurfaceRole, SurfaceMaterial> = {
	roof: { name: "roof", baseColor: [0.55, 0.2, 0.15, 1], roughness: 0.8 },
	wall: { name: "wall", baseColor: [0.85, 0.82, 0.76, 1], roughness: 0.9 },
	ground: { name: "ground", baseColor: [0.35, 0.35, 0.35, 1], roughness: 1 },
}
