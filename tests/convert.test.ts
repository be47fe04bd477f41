import { mkdir, mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { convertXodrFile, convertXodrText } from '../src/convert';
import { ASPHALT, createDefaultMaterials } from '../src/materials';
import { SIMPLE_XODR } from './fixtures';

const SPIRAL_ONLY = `<OpenDRIVE>
  <road id="9" length="50">
    <planView><geometry s="0" x="0" y="0" hdg="0" length="50"><spiral curvStart="0" curvEnd="0.02"/></geometry></planView>
    <lanes><laneSection s="0"><right><lane id="-1" type="driving"><width sOffset="0" a="3"/></lane></right></laneSection></lanes>
  </road>
</OpenDRIVE>`;

beforeEach(() => {
	vi.spyOn(console, 'info').mockImplementation(() => undefined);
	vi.spyOn(console, 'warn').mockImplementation(() => undefined);
	vi.spyOn(console, 'error').mockImplementation(() => undefined);
});

afterEach(() => {
	vi.restoreAllMocks();
});

describe('convertXodrText', () => {
	it('meshes lanes and marks and exports a document', () => {
		const result = convertXodrText(SIMPLE_XODR, { stepSize: 10 });
		expect(result.success).toBe(true);
		expect(result.diagnostics).toEqual([]);
		expect([...result.meshes.keys()]).toEqual([
			'road_1_section_0_lane_1',
			'road_1_section_0_lane_-1',
			'road_1_section_0_lane_-1_mark',
			'road_1_section_0_lane_0_mark'
		]);
		expect(result.document).toContain('<visual_scene id="Scene" name="Test Network">');
		expect(result.document).toContain('<geometry id="geometry_road_1_section_0_lane_0_mark" name="road_1_section_0_lane_0_mark">');
	});

	it('reports malformed input as a parse error', () => {
		const result = convertXodrText('<OpenDRIVE><road>', { stepSize: 1 });
		expect(result.success).toBe(false);
		expect(result.meshes.size).toBe(0);
		expect(result.document).toBeUndefined();
		expect(result.diagnostics).toHaveLength(1);
		expect(result.diagnostics[0]).toMatchObject({ level: 'error', code: 'parse-error' });
	});

	it('fails without meshes and keeps every diagnostic', () => {
		const result = convertXodrText(SPIRAL_ONLY, { stepSize: 1 });
		expect(result.success).toBe(false);
		expect(result.document).toBeUndefined();
		expect(result.diagnostics.map(d => [d.level, d.code])).toEqual([
			['warn', 'unsupported-geometry'],
			['error', 'geometry-lookup'],
			['error', 'empty-mesh']
		]);
	});

	it('reports an invalid step size as a conversion error', () => {
		const result = convertXodrText(SIMPLE_XODR, { stepSize: 0 });
		expect(result.success).toBe(false);
		expect(result.diagnostics[0]).toMatchObject({ level: 'error', code: 'conversion-error' });
	});
});

describe('convertXodrFile', () => {
	let dir = '';

	beforeEach(async () => {
		dir = await mkdtemp(path.join(os.tmpdir(), 'road-convert-'));
	});

	afterEach(async () => {
		await rm(dir, { recursive: true, force: true });
	});

	it('writes the document next to missing parent directories', async () => {
		const inputPath = path.join(dir, 'simple.xodr');
		const outputPath = path.join(dir, 'out', 'nested', 'simple.dae');
		await writeFile(inputPath, SIMPLE_XODR, 'utf8');

		const result = await convertXodrFile({ inputPath, outputPath, stepSize: 5 });
		expect(result.success).toBe(true);
		const written = await readFile(outputPath, 'utf8');
		expect(written.startsWith('<?xml version="1.0" encoding="utf-8"?>\n<COLLADA')).toBe(true);
		expect(written).toContain('<instance_visual_scene url="#Scene"/>');
	});

	it('references textures found in the textures directory', async () => {
		const inputPath = path.join(dir, 'simple.xodr');
		const outputPath = path.join(dir, 'simple.dae');
		const texturesDir = path.join(dir, 'textures');
		await writeFile(inputPath, SIMPLE_XODR, 'utf8');
		await mkdir(texturesDir);
		await writeFile(path.join(texturesDir, 'Asphalt1_Diff.png'), 'placeholder');

		const result = await convertXodrFile({ inputPath, outputPath, texturesDir, stepSize: 5 });
		expect(result.success).toBe(true);
		const written = await readFile(outputPath, 'utf8');
		expect(written).toContain('<init_from>Asphalt1_Diff.png</init_from>');
	});

	it('attaches textures to a copy of the given library', async () => {
		const inputPath = path.join(dir, 'simple.xodr');
		const outputPath = path.join(dir, 'simple.dae');
		const texturesDir = path.join(dir, 'textures');
		await writeFile(inputPath, SIMPLE_XODR, 'utf8');
		await mkdir(texturesDir);
		await writeFile(path.join(texturesDir, 'Asphalt1_Diff.png'), 'placeholder');
		const materials = createDefaultMaterials();

		const result = await convertXodrFile({ inputPath, outputPath, texturesDir, materials, stepSize: 5 });
		expect(result.success).toBe(true);
		expect(await readFile(outputPath, 'utf8')).toContain('<init_from>Asphalt1_Diff.png</init_from>');
		expect(materials.getMaterial(ASPHALT)?.diffuseTexture).toBeUndefined();
		expect(materials.textures()).toEqual([]);
	});

	it('reports a missing input file as an io error', async () => {
		const result = await convertXodrFile({
			inputPath: path.join(dir, 'absent.xodr'),
			outputPath: path.join(dir, 'absent.dae'),
			stepSize: 1
		});
		expect(result.success).toBe(false);
		expect(result.diagnostics).toHaveLength(1);
		expect(result.diagnostics[0]).toMatchObject({ level: 'error', code: 'io-error' });
	});
});
