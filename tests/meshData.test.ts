import * as THREE from 'three';
import { describe, expect, it } from 'vitest';
import { MeshBuilder, triangleCount } from '../src/meshData';

const up = new THREE.Vector3(0, 0, 1);

function quad(): MeshBuilder {
	const builder = new MeshBuilder('quad', 'Asphalt');
	builder.addVertex(new THREE.Vector3(0, 0, 0), up, new THREE.Vector2(0, 0));
	builder.addVertex(new THREE.Vector3(0, -1, 0), up, new THREE.Vector2(0, 1));
	builder.addVertex(new THREE.Vector3(1, 0, 0), up, new THREE.Vector2(0.1, 0));
	builder.addVertex(new THREE.Vector3(1, -1, 0), up, new THREE.Vector2(0.1, 1));
	return builder;
}

describe('MeshBuilder', () => {
	it('returns consecutive vertex indices', () => {
		const builder = new MeshBuilder('m', 'Asphalt');
		expect(builder.addVertex(new THREE.Vector3(), up, new THREE.Vector2())).toBe(0);
		expect(builder.addVertex(new THREE.Vector3(), up, new THREE.Vector2())).toBe(1);
		expect(builder.vertexCount).toBe(2);
	});

	it('keeps positions, normals and uvs aligned', () => {
		const builder = quad();
		builder.addTriangle(0, 1, 3);
		builder.addTriangle(0, 3, 2);
		const mesh = builder.build();
		expect(mesh.vertices).toEqual([[0, 0, 0], [0, -1, 0], [1, 0, 0], [1, -1, 0]]);
		expect(mesh.normals).toEqual([[0, 0, 1], [0, 0, 1], [0, 0, 1], [0, 0, 1]]);
		expect(mesh.texCoords).toEqual([[0, 0], [0, 1], [0.1, 0], [0.1, 1]]);
		expect(mesh.indices).toEqual([0, 1, 3, 0, 3, 2]);
		expect(triangleCount(mesh)).toBe(2);
		expect(mesh.name).toBe('quad');
		expect(mesh.materialName).toBe('Asphalt');
	});

	it('rejects indices that do not name a vertex', () => {
		const builder = quad();
		expect(() => builder.addTriangle(0, 1, 4)).toThrow(RangeError);
		expect(() => builder.addTriangle(-1, 1, 2)).toThrow(RangeError);
		expect(() => builder.addTriangle(0, 1.5, 2)).toThrow(RangeError);
		expect(builder.triangleCount).toBe(0);
	});

	it('freezes the built mesh and closes the builder', () => {
		const builder = quad();
		builder.addTriangle(0, 1, 3);
		const mesh = builder.build();
		expect(Object.isFrozen(mesh)).toBe(true);
		expect(Object.isFrozen(mesh.vertices)).toBe(true);
		expect(Object.isFrozen(mesh.indices)).toBe(true);
		expect(() => builder.addVertex(new THREE.Vector3(), up, new THREE.Vector2())).toThrow('mesh quad is already built');
		expect(() => builder.build()).toThrow(Error);
	});
});
