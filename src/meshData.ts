import * as THREE from 'three';

export type Vec3 = readonly [number, number, number];
export type Vec2 = readonly [number, number];

export interface MeshData {
	readonly name: string;
	readonly materialName: string;
	readonly vertices: readonly Vec3[];
	readonly normals: readonly Vec3[];
	readonly texCoords: readonly Vec2[];
	readonly indices: readonly number[]; // triples, one triangle each
}

export function triangleCount(mesh: MeshData): number {
	return mesh.indices.length / 3;
}

export class MeshBuilder {
	public readonly name: string;
	public readonly materialName: string;
	private readonly vertices: Vec3[] = [];
	private readonly normals: Vec3[] = [];
	private readonly texCoords: Vec2[] = [];
	private readonly indices: number[] = [];
	private built = false;

	constructor(name: string, materialName: string) {
		this.name = name;
		this.materialName = materialName;
	}

	public get vertexCount(): number { return this.vertices.length; }
	public get triangleCount(): number { return this.indices.length / 3; }

	// Appends position, normal and uv together; returns the new vertex index
	public addVertex(position: THREE.Vector3, normal: THREE.Vector3, uv: THREE.Vector2): number {
		this.assertOpen();
		this.vertices.push([position.x, position.y, position.z]);
		this.normals.push([normal.x, normal.y, normal.z]);
		this.texCoords.push([uv.x, uv.y]);
		return this.vertices.length - 1;
	}

	public addTriangle(a: number, b: number, c: number) {
		this.assertOpen();
		const n = this.vertices.length;
		for (const i of [a, b, c]) {
			if (!Number.isInteger(i) || i < 0 || i >= n) {
				throw new RangeError(`triangle index ${i} out of range for ${n} vertices in ${this.name}`);
			}
		}
		this.indices.push(a, b, c);
	}

	public build(): MeshData {
		this.assertOpen();
		this.built = true;
		return Object.freeze({
			name: this.name,
			materialName: this.materialName,
			vertices: Object.freeze(this.vertices),
			normals: Object.freeze(this.normals),
			texCoords: Object.freeze(this.texCoords),
			indices: Object.freeze(this.indices)
		});
	}

	private assertOpen() {
		if (this.built) throw new Error(`mesh ${this.name} is already built`);
	}
}
