import { ColladaExportOptions, exportCollada, writeCollada } from './colladaExporter';
import { Diagnostic, ParseError, errorMessage } from './errors';
import { logger } from './logger';
import { MaterialLibrary, attachTextures, createDefaultMaterials } from './materials';
import { MeshData } from './meshData';
import { MeshGenerator, MeshGeneratorOptions } from './roadway';
import { XodrParseResult, parseXodr, readXodrFile } from './xodrParser';

export interface ConversionOptions extends MeshGeneratorOptions {
	materials?: MaterialLibrary;
	export?: ColladaExportOptions;
}

export interface ConversionResult {
	success: boolean;
	diagnostics: Diagnostic[];
	meshes: Map<string, MeshData>;
	document?: string;
}

export interface FileConversionOptions extends Omit<ConversionOptions, 'export'> {
	inputPath: string;
	outputPath: string;
	texturesDir?: string;
}

function failure(diagnostics: Diagnostic[], code: Diagnostic['code'], error: unknown): ConversionResult {
	const message = errorMessage(error);
	logger.error('Conversion failed', { code, message });
	return { success: false, diagnostics: [...diagnostics, { level: 'error', code, message }], meshes: new Map() };
}

function generate(parsed: XodrParseResult, options: ConversionOptions, materials: MaterialLibrary): ConversionResult {
	const generator = new MeshGenerator(materials, options);
	const { meshes, diagnostics } = generator.generate(parsed.network);
	return {
		success: meshes.size > 0,
		diagnostics: [...parsed.warnings, ...diagnostics],
		meshes
	};
}

/**
 * Parses, meshes and exports in memory. Never throws: parse errors and an empty result
 * come back as `success: false` with diagnostics.
 */
export function convertXodrText(text: string, options: ConversionOptions): ConversionResult {
	const materials = options.materials ?? createDefaultMaterials();
	let parsed: XodrParseResult;
	try {
		parsed = parseXodr(text);
	} catch (error) {
		return failure([], error instanceof ParseError ? 'parse-error' : 'conversion-error', error);
	}
	try {
		const result = generate(parsed, options, materials);
		if (!result.success) return result;
		const document = exportCollada(result.meshes, materials, { sceneName: parsed.network.header?.name || undefined, ...options.export });
		return { ...result, document };
	} catch (error) {
		return failure(parsed.warnings, 'conversion-error', error);
	}
}

/**
 * File-to-file conversion. Textures found in `texturesDir` are attached to a copy of
 * `options.materials`; the caller's library is left as it was.
 */
export async function convertXodrFile(options: FileConversionOptions): Promise<ConversionResult> {
	const materials = options.materials ? options.materials.clone() : createDefaultMaterials();
	logger.info('Converting', { input: options.inputPath, output: options.outputPath, stepSize: options.stepSize });

	const diagnostics: Diagnostic[] = [];
	if (options.texturesDir) {
		try {
			const added = await attachTextures(materials, options.texturesDir);
			logger.debug('Textures attached', { textures: added });
		} catch (error) {
			diagnostics.push({ level: 'warn', code: 'io-error', message: `textures: ${errorMessage(error)}` });
		}
	}

	let parsed: XodrParseResult;
	try {
		parsed = await readXodrFile(options.inputPath);
	} catch (error) {
		return failure(diagnostics, error instanceof ParseError ? 'parse-error' : 'io-error', error);
	}

	let result: ConversionResult;
	try {
		result = generate(parsed, options, materials);
	} catch (error) {
		return failure([...diagnostics, ...parsed.warnings], 'conversion-error', error);
	}
	result = { ...result, diagnostics: [...diagnostics, ...result.diagnostics] };
	if (!result.success) return result;

	try {
		await writeCollada(options.outputPath, result.meshes, materials, {
			texturesDir: options.texturesDir,
			sceneName: parsed.network.header?.name || undefined
		});
	} catch (error) {
		return failure(result.diagnostics, 'io-error', error);
	}
	logger.info('Conversion complete', { meshes: result.meshes.size, output: options.outputPath });
	return result;
}
