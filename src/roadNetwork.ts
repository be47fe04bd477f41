import * as THREE from 'three';
import { Geometry, geometryEnd } from './alignment';
import { GeometryLookupError } from './errors';
import { ProfileRecord, evalCubic, evalProfile, findLastAtOrBefore, sortProfile } from './profile';

const COVERAGE_TOLERANCE = 1e-6;

export type RoadMarkColor = 'standard' | 'white' | 'yellow' | 'blue' | 'green' | 'red' | 'orange';

export type RoadMarkType =
	| 'none'
	| 'solid'
	| 'broken'
	| 'solid solid'
	| 'solid broken'
	| 'broken solid'
	| 'broken broken';

export interface RoadMark {
	sOffset: number;
	width: number;
	color: RoadMarkColor;
	type: RoadMarkType;
}

export interface WidthRecord {
	sOffset: number;
	a: number;
	b: number;
	c: number;
	d: number;
}

export interface LaneInit {
	id: number;
	type: string;
	sectionIndex: number;
	widths?: readonly WidthRecord[];
	roadMark?: RoadMark;
}

export class Lane {
	public readonly id: number;
	public readonly type: string;
	// Non-owning back-reference: slot in the owning road's laneSections
	public readonly sectionIndex: number;
	public readonly widths: readonly WidthRecord[];
	public readonly roadMark?: RoadMark;

	constructor(init: LaneInit) {
		this.id = init.id;
		this.type = init.type;
		this.sectionIndex = init.sectionIndex;
		this.widths = [...(init.widths ?? [])].sort((a, b) => a.sOffset - b.sOffset);
		this.roadMark = init.roadMark;
	}

	public get isLeft(): boolean { return this.id > 0; }
	public get isRight(): boolean { return this.id < 0; }
	public get isCenter(): boolean { return this.id === 0; }

	// ds is measured from the start of the owning lane section
	public getWidthAt(ds: number): number {
		if (this.widths.length === 0) return 0;
		const i = Math.max(0, findLastAtOrBefore(this.widths, w => w.sOffset, ds));
		const w = this.widths[i];
		return Math.max(0, evalCubic(w.a, w.b, w.c, w.d, ds - w.sOffset));
	}
}

export interface LaneSection {
	s: number;
	left: readonly Lane[];   // ascending id
	right: readonly Lane[];  // descending id
	center?: Lane;
}

export function createLaneSection(s: number, lanes: readonly Lane[]): LaneSection {
	const left = lanes.filter(l => l.isLeft).sort((a, b) => a.id - b.id);
	const right = lanes.filter(l => l.isRight).sort((a, b) => b.id - a.id);
	const center = lanes.find(l => l.isCenter);
	return center ? { s, left, right, center } : { s, left, right };
}

export interface RoadInit {
	id: string;
	name?: string;
	length: number;
	junction?: string;
	geometries: readonly Geometry[];
	laneSections: readonly LaneSection[];
	elevations?: readonly ProfileRecord[];
	superelevations?: readonly ProfileRecord[];
}

export class Road {
	public readonly id: string;
	public readonly name: string;
	public readonly length: number;
	public readonly junction: string;
	public readonly geometries: readonly Geometry[];
	public readonly laneSections: readonly LaneSection[];
	public readonly elevations: readonly ProfileRecord[];
	public readonly superelevations: readonly ProfileRecord[];

	constructor(init: RoadInit) {
		this.id = init.id;
		this.name = init.name ?? '';
		this.length = init.length;
		this.junction = init.junction ?? '-1';
		this.geometries = [...init.geometries].sort((a, b) => a.s0 - b.s0);
		this.laneSections = [...init.laneSections].sort((a, b) => a.s - b.s);
		this.elevations = sortProfile(init.elevations ?? []);
		this.superelevations = sortProfile(init.superelevations ?? []);
	}

	public getGeometryAt(s: number): Geometry {
		if (!Number.isFinite(s) || s < -COVERAGE_TOLERANCE || s > this.length + COVERAGE_TOLERANCE) {
			throw new GeometryLookupError(this.id, s, `outside road length ${this.length}`);
		}
		const i = findLastAtOrBefore(this.geometries, g => g.s0, s + COVERAGE_TOLERANCE);
		if (i < 0) {
			throw new GeometryLookupError(this.id, s, 'no geometry segment starts at or before this offset');
		}
		const geometry = this.geometries[i];
		if (s > geometryEnd(geometry) + COVERAGE_TOLERANCE) {
			const isLast = i === this.geometries.length - 1;
			throw new GeometryLookupError(this.id, s, isLast
				? `last segment ends at ${geometryEnd(geometry)} before road end`
				: `gap after segment at s0=${geometry.s0}`);
		}
		if (i > 0 && geometryEnd(this.geometries[i - 1]) > s + COVERAGE_TOLERANCE) {
			throw new GeometryLookupError(this.id, s, `segments at s0=${this.geometries[i - 1].s0} and s0=${geometry.s0} overlap`);
		}
		return geometry;
	}

	// Offset into the geometry returned by getGeometryAt, clamped to the segment
	public getLocalOffset(geometry: Geometry, s: number): number {
		return THREE.MathUtils.clamp(s - geometry.s0, 0, geometry.length);
	}

	public getElevationAt(s: number): number {
		return evalProfile(this.elevations, s);
	}

	public getSuperelevationAt(s: number): number {
		return evalProfile(this.superelevations, s);
	}

	public getLaneSectionIndexAt(s: number): number {
		const i = findLastAtOrBefore(this.laneSections, ls => ls.s, s + COVERAGE_TOLERANCE);
		if (i < 0) {
			throw new GeometryLookupError(this.id, s, 'no lane section is active');
		}
		return i;
	}

	public getLaneSectionAt(s: number): LaneSection {
		return this.laneSections[this.getLaneSectionIndexAt(s)];
	}

	// Active interval of a section is [s, next.s) or to road end
	public getLaneSectionEnd(index: number): number {
		const next = this.laneSections[index + 1];
		return next ? Math.min(next.s, this.length) : this.length;
	}

	public getLaneSection(lane: Lane): LaneSection {
		const section = this.laneSections[lane.sectionIndex];
		if (!section) {
			throw new GeometryLookupError(this.id, Number.NaN, `lane ${lane.id} refers to missing section ${lane.sectionIndex}`);
		}
		return section;
	}
}

export interface RoadNetworkHeader {
	name: string;
	revMajor: number;
	revMinor: number;
	vendor: string;
}

export class RoadNetwork {
	public readonly header?: RoadNetworkHeader;
	public readonly roads: readonly Road[];

	constructor(roads: readonly Road[], header?: RoadNetworkHeader) {
		this.roads = roads;
		this.header = header;
	}

	public getRoadById(id: string): Road | undefined {
		return this.roads.find(r => r.id === id);
	}
}
