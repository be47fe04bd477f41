import dotenv from 'dotenv';

dotenv.config();

const DEFAULT_STEP_SIZE = 1.0;
const DEFAULT_TEXTURE_TILE_LENGTH = 10;
const DEFAULT_DASH_LENGTH = 3;
const DEFAULT_GAP_LENGTH = 3;

const positive = (value: string | undefined, fallback: number) => {
	if (!value) return fallback;
	const parsed = Number.parseFloat(value.trim());
	return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
};

export const env = {
	logLevel: process.env.LOG_LEVEL?.trim().toLowerCase() ?? 'info',
	defaultStepSize: positive(process.env.DEFAULT_STEP_SIZE, DEFAULT_STEP_SIZE),
	textureTileLength: positive(process.env.TEXTURE_TILE_LENGTH, DEFAULT_TEXTURE_TILE_LENGTH),
	dashLength: positive(process.env.DASH_LENGTH, DEFAULT_DASH_LENGTH),
	gapLength: positive(process.env.GAP_LENGTH, DEFAULT_GAP_LENGTH),
};
