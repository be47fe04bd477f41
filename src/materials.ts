import { access } from 'fs/promises';
import path from 'path';
import { TEXTURE_FILES, roadPalette } from './theme';

export type RGBA = readonly [number, number, number, number];

export interface Texture {
	name: string;
	filePath: string; // relative to the textures directory
}

export interface Material {
	name: string;
	diffuse: RGBA;
	emission: RGBA;
	diffuseTexture?: string; // texture name
}

export const ASPHALT = 'Asphalt';
export const SHOULDER = 'Shoulder';

export function markingMaterialName(color: string): string {
	const key = color === 'standard' ? 'white' : color;
	return `LaneMarking${key.charAt(0).toUpperCase()}${key.slice(1)}`;
}

// Palette entries are sRGB hex; COLLADA colours are written as 0..1 floats
function rgba(hex: number): RGBA {
	return [((hex >> 16) & 0xff) / 255, ((hex >> 8) & 0xff) / 255, (hex & 0xff) / 255, 1];
}

export class MaterialLibrary {
	private readonly materialMap = new Map<string, Material>();
	private readonly textureMap = new Map<string, Texture>();

	public addMaterial(material: Material) {
		this.materialMap.set(material.name, material);
	}

	public getMaterial(name: string): Material | undefined {
		return this.materialMap.get(name);
	}

	public hasMaterial(name: string): boolean {
		return this.materialMap.has(name);
	}

	public addTexture(texture: Texture) {
		this.textureMap.set(texture.name, texture);
	}

	public getTexture(name: string): Texture | undefined {
		return this.textureMap.get(name);
	}

	public materials(): Material[] {
		return [...this.materialMap.values()];
	}

	public textures(): Texture[] {
		return [...this.textureMap.values()];
	}

	public resolve(name: string, fallback = ASPHALT): string {
		return this.materialMap.has(name) ? name : fallback;
	}

	public setDiffuseTexture(materialName: string, textureName: string) {
		const material = this.materialMap.get(materialName);
		if (!material) return;
		this.materialMap.set(materialName, { ...material, diffuseTexture: textureName });
	}

	// Shallow copy; entries are replaced on change, never mutated
	public clone(): MaterialLibrary {
		const copy = new MaterialLibrary();
		for (const material of this.materialMap.values()) copy.addMaterial(material);
		for (const texture of this.textureMap.values()) copy.addTexture(texture);
		return copy;
	}
}

export function createDefaultMaterials(): MaterialLibrary {
	const library = new MaterialLibrary();
	const black: RGBA = [0, 0, 0, 1];
	const entries: [string, number][] = [
		[ASPHALT, roadPalette.asphalt],
		[SHOULDER, roadPalette.shoulder],
		[markingMaterialName('white'), roadPalette.markingWhite],
		[markingMaterialName('yellow'), roadPalette.markingYellow],
		[markingMaterialName('blue'), roadPalette.markingBlue],
		[markingMaterialName('green'), roadPalette.markingGreen],
		[markingMaterialName('red'), roadPalette.markingRed],
		[markingMaterialName('orange'), roadPalette.markingOrange]
	];
	for (const [name, hex] of entries) {
		library.addMaterial({ name, diffuse: rgba(hex), emission: black });
	}
	return library;
}

async function exists(file: string): Promise<boolean> {
	try {
		await access(file);
		return true;
	} catch {
		return false;
	}
}

// Registers the known texture files found in texturesDir; returns the names added
export async function attachTextures(library: MaterialLibrary, texturesDir: string): Promise<string[]> {
	const added: string[] = [];
	if (await exists(path.join(texturesDir, TEXTURE_FILES.asphalt))) {
		library.addTexture({ name: 'AsphaltTexture', filePath: TEXTURE_FILES.asphalt });
		library.setDiffuseTexture(ASPHALT, 'AsphaltTexture');
		library.setDiffuseTexture(SHOULDER, 'AsphaltTexture');
		added.push('AsphaltTexture');
	}
	if (await exists(path.join(texturesDir, TEXTURE_FILES.laneMarking))) {
		library.addTexture({ name: 'LaneMarkingTexture', filePath: TEXTURE_FILES.laneMarking });
		for (const material of library.materials()) {
			if (material.name.startsWith('LaneMarking')) library.setDiffuseTexture(material.name, 'LaneMarkingTexture');
		}
		added.push('LaneMarkingTexture');
	}
	return added;
}
