#!/usr/bin/env node
import { existsSync } from 'fs';
import { convertXodrFile } from './convert';
import { env } from './env';
import { logger, setVerbose } from './logger';

export interface CliOptions {
	input: string;
	output: string;
	texturesDir?: string;
	stepSize: number;
	verbose: boolean;
}

export type CliParseResult =
	| { kind: 'run'; options: CliOptions }
	| { kind: 'help' }
	| { kind: 'error'; message: string };

export const USAGE = [
	'Usage: xodr2dae <input.xodr> <output.dae> [options]',
	'',
	'Options:',
	'  -t, --textures <dir>  directory holding Asphalt1_Diff.png / LaneMarking1_Diff.png',
	'  -s, --step <metres>   sampling step along each road (default from DEFAULT_STEP_SIZE or 1.0)',
	'  -v, --verbose         debug logging',
	'  -h, --help            show this message'
].join('\n');

export function parseArgs(args: readonly string[], defaultStepSize = env.defaultStepSize): CliParseResult {
	const positional: string[] = [];
	let texturesDir: string | undefined;
	let stepSize = defaultStepSize;
	let verbose = false;

	for (let i = 0; i < args.length; i += 1) {
		const arg = args[i];
		const value = args[i + 1];
		switch (arg) {
			case '-h':
			case '--help':
				return { kind: 'help' };
			case '-v':
			case '--verbose':
				verbose = true;
				break;
			case '-t':
			case '--textures':
				if (value === undefined || value.startsWith('-')) return { kind: 'error', message: `Missing value for ${arg}` };
				texturesDir = value;
				i += 1;
				break;
			case '-s':
			case '--step': {
				if (value === undefined) return { kind: 'error', message: `Missing value for ${arg}` };
				const parsed = Number(value);
				if (!Number.isFinite(parsed) || parsed <= 0) {
					return { kind: 'error', message: `Step size must be a number > 0, got '${value}'` };
				}
				stepSize = parsed;
				i += 1;
				break;
			}
			default:
				if (arg.startsWith('-')) return { kind: 'error', message: `Unknown option ${arg}` };
				positional.push(arg);
		}
	}

	if (positional.length !== 2) {
		return { kind: 'error', message: 'Expected an input .xodr path and an output .dae path' };
	}
	const [input, output] = positional;
	return { kind: 'run', options: { input, output, texturesDir, stepSize, verbose } };
}

export async function run(args: readonly string[]): Promise<number> {
	const parsed = parseArgs(args);
	if (parsed.kind === 'help') {
		// eslint-disable-next-line no-console
		console.log(USAGE);
		return 0;
	}
	if (parsed.kind === 'error') {
		logger.error(parsed.message);
		// eslint-disable-next-line no-console
		console.error(USAGE);
		return 1;
	}

	const { options } = parsed;
	setVerbose(options.verbose);
	if (!existsSync(options.input)) {
		logger.error('Input file does not exist', { input: options.input });
		return 1;
	}

	const result = await convertXodrFile({
		inputPath: options.input,
		outputPath: options.output,
		texturesDir: options.texturesDir,
		stepSize: options.stepSize,
		textureTileLength: env.textureTileLength,
		dashLength: env.dashLength,
		gapLength: env.gapLength
	});
	for (const d of result.diagnostics) {
		const meta = d.roadId !== undefined ? { code: d.code, roadId: d.roadId } : { code: d.code };
		logger[d.level](d.message, meta);
	}
	return result.success ? 0 : 1;
}

if (require.main === module) {
	run(process.argv.slice(2))
		.then(code => {
			process.exitCode = code;
		})
		.catch((error: unknown) => {
			logger.error('Conversion crashed', { error: error instanceof Error ? error.message : String(error) });
			process.exitCode = 1;
		});
}
