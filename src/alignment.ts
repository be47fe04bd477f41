import * as THREE from 'three';
import { DomainError } from './errors';

const LOCAL_S_TOLERANCE = 1e-9;

interface GeometryBase {
	s0: number;     // start offset along the road
	x0: number;
	y0: number;
	hdg0: number;   // start heading (rad)
	length: number;
}

export interface LineGeometry extends GeometryBase {
	kind: 'line';
}

export interface ArcGeometry extends GeometryBase {
	kind: 'arc';
	curvature: number; // signed, > 0 turns left
}

export type Geometry = LineGeometry | ArcGeometry;

export interface CurvePose {
	point: THREE.Vector2;
	heading: number;
}

export function geometryEnd(geometry: Geometry): number {
	return geometry.s0 + geometry.length;
}

function checkLocalS(geometry: Geometry, localS: number) {
	if (!Number.isFinite(localS) || localS < -LOCAL_S_TOLERANCE || localS > geometry.length + LOCAL_S_TOLERANCE) {
		throw new DomainError(`local offset ${localS} outside [0, ${geometry.length}] of ${geometry.kind} at s0=${geometry.s0}`);
	}
}

function linePose(g: LineGeometry, ds: number): CurvePose {
	return {
		point: new THREE.Vector2(g.x0 + ds * Math.cos(g.hdg0), g.y0 + ds * Math.sin(g.hdg0)),
		heading: g.hdg0
	};
}

function arcPose(g: ArcGeometry, ds: number): CurvePose {
	if (g.curvature === 0) {
		throw new DomainError(`arc at s0=${g.s0} has zero curvature; it must be modelled as a line`);
	}
	const r = 1 / g.curvature;
	// Centre on the left normal of the start heading (right for negative curvature)
	const center = new THREE.Vector2(g.x0 - r * Math.sin(g.hdg0), g.y0 + r * Math.cos(g.hdg0));
	const point = new THREE.Vector2(g.x0, g.y0).rotateAround(center, ds * g.curvature);
	return { point, heading: g.hdg0 + ds * g.curvature };
}

export function positionAt(geometry: Geometry, localS: number): CurvePose {
	checkLocalS(geometry, localS);
	const ds = THREE.MathUtils.clamp(localS, 0, geometry.length);
	switch (geometry.kind) {
		case 'line': return linePose(geometry, ds);
		case 'arc': return arcPose(geometry, ds);
	}
}

export function headingAt(geometry: Geometry, localS: number): number {
	return positionAt(geometry, localS).heading;
}

// Unit vector 90° left of the heading
export function normalAt(geometry: Geometry, localS: number): THREE.Vector2 {
	const heading = headingAt(geometry, localS);
	return new THREE.Vector2(-Math.sin(heading), Math.cos(heading));
}
