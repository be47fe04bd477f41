import * as THREE from 'three';
import { normalAt, positionAt } from './alignment';
import { LaneBoundary, computeCrossSection } from './crossSection';
import { Diagnostic, EmptyMeshError, GeometryLookupError } from './errors';
import { logger } from './logger';
import { ASPHALT, MaterialLibrary, SHOULDER, markingMaterialName } from './materials';
import { MeshBuilder, MeshData } from './meshData';
import { Lane, LaneSection, Road, RoadMark, RoadNetwork } from './roadNetwork';

const SAMPLE_EPS = 1e-9;
const SPAN_EPS = 1e-6;

const UP = new THREE.Vector3(0, 0, 1);

// Lane types that get a surface mesh; every lane still takes part in offset accumulation
const SURFACE_LANE_TYPES = new Set([
	'driving',
	'entry',
	'exit',
	'onRamp',
	'offRamp',
	'connectingRamp',
	'bidirectional',
	'parking',
	'shoulder',
	'stop'
]);

const SHOULDER_LANE_TYPES = new Set(['shoulder', 'stop']);

export interface MeshGeneratorOptions {
	stepSize: number;
	textureTileLength?: number; // metres per texture repeat along lane surfaces
	markTileLength?: number;
	dashLength?: number;
	gapLength?: number;
	markElevation?: number;     // lift of lane marks above the surface
}

export interface MeshGenerationResult {
	meshes: Map<string, MeshData>;
	diagnostics: Diagnostic[];
}

interface Station {
	s: number;
	point: THREE.Vector2;
	normal: THREE.Vector2;
	z: number;
	superelevation: number;
}

interface StripRow {
	left: THREE.Vector3;
	right: THREE.Vector3;
	u: number;
	vLeft: number;
	vRight: number;
}

interface MarkLine {
	offset: number; // line centre relative to the lane boundary
	broken: boolean;
}

/**
 * Regular samples i*stepSize for i = 0..floor(length/stepSize), plus a closing sample
 * at exactly `length` when the grid falls short of it.
 */
export function sampleOffsets(length: number, stepSize: number): number[] {
	const count = Math.floor(length / stepSize + SAMPLE_EPS);
	const out: number[] = [];
	for (let i = 0; i <= count; i++) out.push(Math.min(i * stepSize, length));
	if (length - out[out.length - 1] > SAMPLE_EPS) out.push(length);
	return out;
}

// [a, regular samples strictly inside (a, b), b]
export function samplesWithin(samples: readonly number[], a: number, b: number): number[] {
	const inner = samples.filter(s => s > a + SPAN_EPS && s < b - SPAN_EPS);
	return [a, ...inner, b];
}

// Dash spans of a broken line; the phase is keyed to road s so it runs on across sections
export function dashIntervals(start: number, end: number, dashLength: number, gapLength: number): [number, number][] {
	const period = dashLength + gapLength;
	const out: [number, number][] = [];
	for (let k = Math.floor(start / period); k * period < end - SPAN_EPS; k++) {
		const a = Math.max(start, k * period);
		const b = Math.min(end, k * period + dashLength);
		if (b - a > SPAN_EPS) out.push([a, b]);
	}
	return out;
}

function markLines(mark: RoadMark): MarkLine[] {
	const w = mark.width;
	switch (mark.type) {
		case 'none': return [];
		case 'solid': return [{ offset: 0, broken: false }];
		case 'broken': return [{ offset: 0, broken: true }];
		case 'solid solid': return [{ offset: w, broken: false }, { offset: -w, broken: false }];
		case 'solid broken': return [{ offset: w, broken: false }, { offset: -w, broken: true }];
		case 'broken solid': return [{ offset: w, broken: true }, { offset: -w, broken: false }];
		case 'broken broken': return [{ offset: w, broken: true }, { offset: -w, broken: true }];
	}
}

function stationAt(road: Road, s: number): Station {
	const geometry = road.getGeometryAt(s);
	const local = road.getLocalOffset(geometry, s);
	const { point } = positionAt(geometry, local);
	return {
		s,
		point,
		normal: normalAt(geometry, local),
		z: road.getElevationAt(s),
		superelevation: road.getSuperelevationAt(s)
	};
}

// Superelevation only shifts z; the normal stays up
function offsetPoint(st: Station, offset: number, lift = 0): THREE.Vector3 {
	return new THREE.Vector3(
		st.point.x + st.normal.x * offset,
		st.point.y + st.normal.y * offset,
		st.z + offset * st.superelevation + lift
	);
}

/**
 * Pushes left then right vertex per row and two triangles per quad:
 * (L_i, R_i, R_i+1) and (L_i, R_i+1, L_i+1), counter-clockwise seen from +Z
 * because L lies on the left of the reference direction.
 */
function appendStrip(builder: MeshBuilder, rows: readonly StripRow[]) {
	if (rows.length < 2) return;
	const base = builder.vertexCount;
	for (const row of rows) {
		builder.addVertex(row.left, UP, new THREE.Vector2(row.u, row.vLeft));
		builder.addVertex(row.right, UP, new THREE.Vector2(row.u, row.vRight));
	}
	for (let i = 0; i < rows.length - 1; i++) {
		const l0 = base + 2 * i;
		const r0 = l0 + 1;
		const l1 = l0 + 2;
		const r1 = l0 + 3;
		builder.addTriangle(l0, r0, r1);
		builder.addTriangle(l0, r1, l1);
	}
}

/**
 * Splits rows into strips at quads that have no width at either end. A quad with width
 * at only one end stays in, collapsed to a triangle, so an opening or closing lane
 * still meets its neighbour.
 */
function runs<T>(rows: readonly T[], widths: readonly number[]): T[][] {
	const out: T[][] = [];
	let start = -1;
	for (let i = 0; i < rows.length - 1; i++) {
		if (widths[i] > 0 || widths[i + 1] > 0) {
			if (start < 0) start = i;
		} else if (start >= 0) {
			out.push(rows.slice(start, i + 1));
			start = -1;
		}
	}
	if (start >= 0) out.push(rows.slice(start));
	return out;
}

function boundaryOffset(section: LaneSection, lane: Lane, ds: number): number {
	if (lane.isCenter) return 0;
	const boundary = computeCrossSection(section, ds).find(b => b.lane === lane);
	return boundary ? boundary.outer : 0;
}

export class MeshGenerator {
	private readonly materials: MaterialLibrary;
	private readonly stepSize: number;
	private readonly textureTileLength: number;
	private readonly markTileLength: number;
	private readonly dashLength: number;
	private readonly gapLength: number;
	private readonly markElevation: number;

	constructor(materials: MaterialLibrary, options: MeshGeneratorOptions) {
		if (!Number.isFinite(options.stepSize) || options.stepSize <= 0) {
			throw new RangeError(`stepSize must be a positive number, got ${options.stepSize}`);
		}
		this.materials = materials;
		this.stepSize = options.stepSize;
		this.textureTileLength = options.textureTileLength ?? 10;
		this.markTileLength = options.markTileLength ?? 2;
		this.dashLength = options.dashLength ?? 3;
		this.gapLength = options.gapLength ?? 3;
		this.markElevation = options.markElevation ?? 0.01;
		if (!(this.dashLength > 0) || !(this.gapLength >= 0)) {
			throw new RangeError(`invalid dash pattern ${this.dashLength}/${this.gapLength}`);
		}
	}

	public generate(network: RoadNetwork): MeshGenerationResult {
		const meshes = new Map<string, MeshData>();
		const diagnostics: Diagnostic[] = [];
		for (const road of network.roads) {
			let roadMeshes: Map<string, MeshData>;
			try {
				roadMeshes = this.generateRoad(road);
			} catch (error) {
				if (error instanceof GeometryLookupError) {
					logger.warn('Skipping road with broken geometry coverage', { roadId: road.id, s: error.s });
					diagnostics.push({ level: 'error', code: 'geometry-lookup', message: error.message, roadId: road.id });
					continue;
				}
				if (error instanceof EmptyMeshError) {
					logger.warn(error.message, { roadId: road.id });
					diagnostics.push({ level: 'warn', code: 'empty-mesh', message: error.message, roadId: road.id });
					continue;
				}
				throw error;
			}
			for (const [name, mesh] of roadMeshes) {
				const unique = uniqueName(meshes, name);
				meshes.set(unique, unique === name ? mesh : Object.freeze({ ...mesh, name: unique }));
			}
		}
		if (meshes.size === 0) {
			const empty = new EmptyMeshError('road network produced no meshes');
			logger.error(empty.message);
			diagnostics.push({ level: 'error', code: 'empty-mesh', message: empty.message });
		}
		return { meshes, diagnostics };
	}

	// Throws GeometryLookupError for broken coverage and EmptyMeshError for no triangles
	public generateRoad(road: Road): Map<string, MeshData> {
		const samples = sampleOffsets(road.length, this.stepSize);
		const out = new Map<string, MeshData>();
		for (let index = 0; index < road.laneSections.length; index++) {
			this.generateSection(road, index, samples, out);
		}
		if (out.size === 0) {
			throw new EmptyMeshError(`road ${road.id} produced no triangles`, road.id);
		}
		logger.debug('Generated road meshes', { roadId: road.id, samples: samples.length, meshes: out.size });
		return out;
	}

	private generateSection(road: Road, index: number, samples: readonly number[], out: Map<string, MeshData>) {
		const section = road.laneSections[index];
		const sStart = section.s;
		const sEnd = road.getLaneSectionEnd(index);
		if (sEnd - sStart <= SPAN_EPS) return;

		const stations = samplesWithin(samples, sStart, sEnd).map(s => stationAt(road, s));
		const profiles = stations.map(st => computeCrossSection(section, st.s - sStart));
		const lanes = [...section.left, ...section.right];

		lanes.forEach((lane, k) => {
			const bounds = profiles.map(p => p[k]);
			if (bounds.every(b => b.width <= 0)) {
				logger.debug('Lane has zero width over its section', { roadId: road.id, section: index, laneId: lane.id });
				return;
			}
			const name = `road_${road.id}_section_${index}_lane_${lane.id}`;
			if (SURFACE_LANE_TYPES.has(lane.type)) {
				const surface = this.laneSurface(name, lane, stations, bounds);
				if (surface) out.set(name, surface);
			}
			if (lane.roadMark) {
				const mark = this.laneMark(`${name}_mark`, road, section, sEnd, lane, lane.roadMark, samples);
				if (mark) out.set(`${name}_mark`, mark);
			}
		});

		const center = section.center;
		if (center?.roadMark) {
			const name = `road_${road.id}_section_${index}_lane_${center.id}_mark`;
			const mark = this.laneMark(name, road, section, sEnd, center, center.roadMark, samples);
			if (mark) out.set(name, mark);
		}
	}

	private laneSurface(name: string, lane: Lane, stations: readonly Station[], bounds: readonly LaneBoundary[]): MeshData | undefined {
		const material = this.materials.resolve(SHOULDER_LANE_TYPES.has(lane.type) ? SHOULDER : ASPHALT);
		const builder = new MeshBuilder(name, material);
		const rows = stations.map((st, i): StripRow => {
			const b = bounds[i];
			const inner = offsetPoint(st, b.inner);
			const outer = offsetPoint(st, b.outer);
			const u = st.s / this.textureTileLength;
			return lane.isLeft
				? { left: outer, right: inner, u, vLeft: 1, vRight: 0 }
				: { left: inner, right: outer, u, vLeft: 0, vRight: 1 };
		});
		for (const run of runs(rows, bounds.map(b => b.width))) appendStrip(builder, run);
		return builder.triangleCount > 0 ? builder.build() : undefined;
	}

	private laneMark(
		name: string,
		road: Road,
		section: LaneSection,
		sEnd: number,
		lane: Lane,
		mark: RoadMark,
		samples: readonly number[]
	): MeshData | undefined {
		const start = section.s + mark.sOffset;
		if (sEnd - start <= SPAN_EPS || mark.width <= 0) return undefined;
		const builder = new MeshBuilder(name, this.materials.resolve(markingMaterialName(mark.color)));
		const half = mark.width / 2;

		for (const line of markLines(mark)) {
			const spans: (readonly [number, number])[] = line.broken
				? dashIntervals(start, sEnd, this.dashLength, this.gapLength)
				: [[start, sEnd]];
			for (const [a, b] of spans) {
				const rows = samplesWithin(samples, a, b).map((s): StripRow => {
					const st = stationAt(road, s);
					const c = boundaryOffset(section, lane, s - section.s) + line.offset;
					return {
						left: offsetPoint(st, c + half, this.markElevation),
						right: offsetPoint(st, c - half, this.markElevation),
						u: s / this.markTileLength,
						vLeft: 1,
						vRight: 0
					};
				});
				appendStrip(builder, rows);
			}
		}
		return builder.triangleCount > 0 ? builder.build() : undefined;
	}
}

function uniqueName(meshes: ReadonlyMap<string, MeshData>, name: string): string {
	if (!meshes.has(name)) return name;
	let k = 2;
	while (meshes.has(`${name}_${k}`)) k++;
	logger.warn('Mesh name collision, renaming', { name, renamed: `${name}_${k}` });
	return `${name}_${k}`;
}
