/**
 * Write meshes as self-contained glTF 2.0 binaries (.glb).
 *
 * glTF is y-up, so projected coordinates (x east, y north, z up) are written
 * as (x, z, -y). The local origin and reference system travel in the node
 * extras, letting a consumer place the model back in the world.
 *
 * @module
 */

import { writeFileAtomic } from "@cityfuse/shared/atomic-write"
import { Document, NodeIO } from "@gltf-transform/core"
import { MATERIALS } from "./materials"
import type { Mesh } from "./types"

export interface SceneExtras {
	/** Local origin in the projected reference system, z up. */
	origin: [number, number, number]
	epsg: number
	upAxis: "y"
}

/**
 * Convert a mesh into a glTF document with one primitive per material group.
 */
/**
 * Unsigned short indices when every index fits below 0xffff, which glTF
 * reserves for primitive restart.
 */
export function indexArrayFor(indices: number[], vertexCount: number) {
	return vertexCount >= 0xffff ? new Uint32Array(indices) : new Uint16Array(indices)
}

export function meshToDocument(mesh: Mesh): Document {
	const doc = new Document()
	doc.getRoot().getAsset().generator = "cityfuse"
	const buffer = doc.createBuffer()

	const positions = new Float32Array(mesh.vertices.length * 3)
	mesh.vertices.forEach(([x, y, z], i) => {
		positions.set([x, z, -y], i * 3)
	})
	const position = doc
		.createAccessor("position")
		.setType("VEC3")
		.setArray(positions)
		.setBuffer(buffer)

	const gltfMesh = doc.createMesh(mesh.id)
	for (const group of mesh.groups) {
		const faces = mesh.faces.slice(group.start, group.start + group.count)
		const indexArray = indexArrayFor(faces.flat(), mesh.vertices.length)
		const indices = doc
			.createAccessor(`${group.material}-indices`)
			.setType("SCALAR")
			.setArray(indexArray)
			.setBuffer(buffer)
		const surfaceMaterial = MATERIALS[group.material]
		const material = doc
			.createMaterial(surfaceMaterial.name)
			.setBaseColorFactor(surfaceMaterial.baseColor)
			.setMetallicFactor(0)
			.setRoughnessFactor(surfaceMaterial.roughness)
		gltfMesh.addPrimitive(
			doc
				.createPrimitive()
				.setAttribute("POSITION", position)
				.setIndices(indices)
				.setMaterial(material),
		)
	}

	const extras: SceneExtras = { origin: mesh.origin, epsg: mesh.epsg, upAxis: "y" }
	const node = doc.createNode(mesh.id).setMesh(gltfMesh).setExtras({ ...extras })
	const scene = doc.createScene(mesh.id).addChild(node)
	doc.getRoot().setDefaultScene(scene)
	return doc
}

/**
 * Encode a mesh as GLB bytes.
 */
export function encodeMesh(mesh: Mesh): Promise<Uint8Array> {
	return new NodeIO().writeBinary(meshToDocument(mesh))
}

/**
 * Write a mesh to `destination` as GLB. The file appears complete or not at
 * all.
 *
 * @throws FuseError `WriteError` when the file cannot be written.
 */
export async function exportMesh(mesh: Mesh, destination: string) {
	const bytes = await encodeMesh(mesh)
	await writeFileAtomic(destination, bytes, mesh.id)
	return bytes.byteLength
}
