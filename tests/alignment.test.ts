import { describe, expect, it } from 'vitest';
import { ArcGeometry, LineGeometry, geometryEnd, headingAt, normalAt, positionAt } from '../src/alignment';
import { DomainError } from '../src/errors';

const straight: LineGeometry = { kind: 'line', s0: 0, x0: 1, y0: 2, hdg0: 0, length: 10 };
const leftTurn: ArcGeometry = { kind: 'arc', s0: 0, x0: 0, y0: 0, hdg0: 0, length: 20, curvature: 0.1 };

describe('line geometry', () => {
	it('starts exactly at its origin and heading', () => {
		const tilted: LineGeometry = { ...straight, hdg0: 0.7 };
		const pose = positionAt(tilted, 0);
		expect(pose.point.x).toBe(1);
		expect(pose.point.y).toBe(2);
		expect(pose.heading).toBe(0.7);
	});

	it('advances along the heading', () => {
		const pose = positionAt(straight, 4);
		expect(pose.point.x).toBe(5);
		expect(pose.point.y).toBe(2);

		const north = positionAt({ ...straight, hdg0: Math.PI / 2 }, 4);
		expect(north.point.x).toBeCloseTo(1, 12);
		expect(north.point.y).toBeCloseTo(6, 12);
	});

	it('points the normal to the left of the heading', () => {
		const n = normalAt(straight, 3);
		expect(n.x).toBeCloseTo(0, 12);
		expect(n.y).toBe(1);
	});

	it('reports its end offset', () => {
		expect(geometryEnd({ ...straight, s0: 25 })).toBe(35);
	});
});

describe('arc geometry', () => {
	it('turns a quarter circle around a centre on the left', () => {
		const quarter = (Math.PI / 2) / 0.1;
		const pose = positionAt(leftTurn, quarter);
		expect(pose.point.x).toBeCloseTo(10, 9);
		expect(pose.point.y).toBeCloseTo(10, 9);
		expect(pose.heading).toBeCloseTo(Math.PI / 2, 12);
	});

	it('turns right for negative curvature', () => {
		const rightTurn: ArcGeometry = { ...leftTurn, curvature: -0.1 };
		const pose = positionAt(rightTurn, (Math.PI / 2) / 0.1);
		expect(pose.point.x).toBeCloseTo(10, 9);
		expect(pose.point.y).toBeCloseTo(-10, 9);
		expect(pose.heading).toBeCloseTo(-Math.PI / 2, 12);
	});

	it('ends with heading hdg0 + k * length', () => {
		const arc: ArcGeometry = { ...leftTurn, hdg0: 0.3, curvature: -0.02, length: 40 };
		expect(headingAt(arc, 40)).toBeCloseTo(0.3 - 0.8, 12);
	});

	it('keeps every point on the circle', () => {
		for (const s of [0, 3, 7.5, 12, 20]) {
			const { point } = positionAt(leftTurn, s);
			expect(Math.hypot(point.x - 0, point.y - 10)).toBeCloseTo(10, 9);
		}
	});
});

describe('domain checks', () => {
	it('rejects offsets outside the segment', () => {
		expect(() => positionAt(straight, -0.1)).toThrow(DomainError);
		expect(() => positionAt(straight, 10.1)).toThrow(DomainError);
		expect(() => positionAt(straight, Number.NaN)).toThrow(DomainError);
	});

	it('clamps offsets within tolerance of the ends', () => {
		expect(positionAt(straight, 10 + 1e-10).point.x).toBe(11);
	});

	it('rejects an arc without curvature', () => {
		expect(() => positionAt({ ...leftTurn, curvature: 0 }, 1)).toThrow(DomainError);
	});
});
