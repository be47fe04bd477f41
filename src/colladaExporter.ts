import { mkdir, writeFile } from 'fs/promises';
import path from 'path';
import { XMLBuilder } from 'fast-xml-parser';
import { Material, MaterialLibrary, RGBA, Texture } from './materials';
import { MeshData, triangleCount } from './meshData';

const COLLADA_NS = 'http://www.collada.org/2005/11/COLLADASchema';

type XmlValue = string | number | XmlObject | XmlObject[];
interface XmlObject {
	[key: string]: XmlValue;
}

export interface ColladaExportOptions {
	texturesDir?: string; // textured effects are written only when this is set
	sceneName?: string;
	created?: Date;
}

function imageId(texture: Texture): string {
	return texture.filePath.replace(/[.\s]/g, '_');
}

function floats(values: readonly number[]): string {
	return values.map(v => (Object.is(v, -0) ? 0 : v)).join(' ');
}

function color(sid: string, c: RGBA): XmlObject {
	return { '@_sid': sid, '#text': floats(c) };
}

function source(meshName: string, kind: string, data: readonly number[], stride: number, params: string[]): XmlObject {
	const arrayId = `${meshName}-${kind}-array`;
	return {
		'@_id': `${meshName}-${kind}`,
		float_array: { '@_id': arrayId, '@_count': data.length, '#text': floats(data) },
		technique_common: {
			accessor: {
				'@_source': `#${arrayId}`,
				'@_count': data.length / stride,
				'@_stride': stride,
				param: params.map(name => ({ '@_name': name, '@_type': 'float' }))
			}
		}
	};
}

function geometry(mesh: MeshData): XmlObject {
	const name = mesh.name;
	return {
		'@_id': `geometry_${name}`,
		'@_name': name,
		mesh: {
			source: [
				source(name, 'positions', mesh.vertices.flat(), 3, ['X', 'Y', 'Z']),
				source(name, 'normals', mesh.normals.flat(), 3, ['X', 'Y', 'Z']),
				source(name, 'texcoords', mesh.texCoords.flat(), 2, ['S', 'T'])
			],
			vertices: {
				'@_id': `vertices_${name}`,
				input: { '@_semantic': 'POSITION', '@_source': `#${name}-positions` }
			},
			// one index per vertex shared by all inputs, in generator order
			triangles: {
				'@_material': mesh.materialName,
				'@_count': triangleCount(mesh),
				input: [
					{ '@_semantic': 'VERTEX', '@_source': `#vertices_${name}`, '@_offset': 0 },
					{ '@_semantic': 'NORMAL', '@_source': `#${name}-normals`, '@_offset': 0 },
					{ '@_semantic': 'TEXCOORD', '@_source': `#${name}-texcoords`, '@_offset': 0, '@_set': 0 }
				],
				p: mesh.indices.join(' ')
			}
		}
	};
}

function effect(material: Material, library: MaterialLibrary, textured: boolean): XmlObject {
	const texture = textured && material.diffuseTexture ? library.getTexture(material.diffuseTexture) : undefined;
	const profile: XmlObject = {};
	let diffuse: XmlObject = { color: color('diffuse', material.diffuse) };
	if (texture) {
		const id = imageId(texture);
		profile.newparam = [
			{ '@_sid': `${id}-surface`, surface: { '@_type': '2D', init_from: id } },
			{ '@_sid': `${id}-sampler`, sampler2D: { source: `${id}-surface` } }
		];
		diffuse = { texture: { '@_texture': `${id}-sampler`, '@_texcoord': 'UVMap' } };
	}
	profile.technique = {
		'@_sid': 'common',
		lambert: {
			emission: { color: color('emission', material.emission) },
			diffuse,
			index_of_refraction: { float: { '@_sid': 'ior', '#text': '1.5' } }
		}
	};
	return { '@_id': `${material.name}-effect`, profile_COMMON: profile };
}

function node(mesh: MeshData, library: MaterialLibrary): XmlObject {
	const target = library.resolve(mesh.materialName);
	return {
		'@_id': `node_${mesh.name}`,
		'@_name': mesh.name,
		'@_type': 'NODE',
		instance_geometry: {
			'@_url': `#geometry_${mesh.name}`,
			bind_material: {
				technique_common: {
					instance_material: {
						'@_symbol': mesh.materialName,
						'@_target': `#${target}-material`,
						bind_vertex_input: { '@_semantic': 'UVMap', '@_input_semantic': 'TEXCOORD', '@_input_set': 0 }
					}
				}
			}
		}
	};
}

/**
 * COLLADA 1.4.1 document for the given meshes. Every mesh becomes one geometry and one
 * scene node; the triangle list is the mesh index list unchanged.
 */
export function exportCollada(
	meshes: ReadonlyMap<string, MeshData>,
	library: MaterialLibrary,
	options: ColladaExportOptions = {}
): string {
	const textured = options.texturesDir !== undefined;
	const timestamp = (options.created ?? new Date()).toISOString();
	const list = [...meshes.values()];
	const materials = library.materials();
	const images = textured ? library.textures() : [];

	const collada: XmlObject = {
		'@_xmlns': COLLADA_NS,
		'@_version': '1.4.1',
		asset: {
			contributor: { authoring_tool: 'xodr2dae' },
			created: timestamp,
			modified: timestamp,
			unit: { '@_name': 'meter', '@_meter': 1 },
			up_axis: 'Z_UP'
		}
	};
	if (images.length > 0) {
		collada.library_images = {
			image: images.map(t => ({ '@_id': imageId(t), '@_name': imageId(t), init_from: t.filePath }))
		};
	}
	const doc: XmlObject = {
		COLLADA: {
			...collada,
			library_effects: { effect: materials.map(m => effect(m, library, textured)) },
			library_materials: {
				material: materials.map(m => ({
					'@_id': `${m.name}-material`,
					'@_name': m.name,
					instance_effect: { '@_url': `#${m.name}-effect` }
				}))
			},
			library_geometries: { geometry: list.map(geometry) },
			library_visual_scenes: {
				visual_scene: {
					'@_id': 'Scene',
					'@_name': options.sceneName ?? 'RoadScene',
					node: list.map(m => node(m, library))
				}
			},
			scene: { instance_visual_scene: { '@_url': '#Scene' } }
		}
	};

	const builder = new XMLBuilder({
		ignoreAttributes: false,
		attributeNamePrefix: '@_',
		textNodeName: '#text',
		format: true,
		indentBy: '  ',
		suppressEmptyNode: true
	});
	return `<?xml version="1.0" encoding="utf-8"?>\n${builder.build(doc)}`;
}

export async function writeCollada(
	outputPath: string,
	meshes: ReadonlyMap<string, MeshData>,
	library: MaterialLibrary,
	options: ColladaExportOptions = {}
): Promise<void> {
	await mkdir(path.dirname(path.resolve(outputPath)), { recursive: true });
	await writeFile(outputPath, exportCollada(meshes, library, options), 'utf8');
}
