import { Lane, LaneSection } from './roadNetwork';

// Signed lateral offsets along the left normal: left lanes > 0, right lanes < 0
export interface LaneBoundary {
	lane: Lane;
	inner: number;
	outer: number;
	width: number;
}

function accumulate(lanes: readonly Lane[], ds: number, sign: 1 | -1, out: LaneBoundary[]) {
	let running = 0;
	for (const lane of lanes) {
		const width = lane.getWidthAt(ds);
		const inner = running;
		running += sign * width;
		out.push({ lane, inner, outer: running, width });
	}
}

/**
 * Lane boundaries at one station of a lane section. Each side starts at the reference
 * line and keeps a running total, so a lane's outer edge is its neighbour's inner edge.
 */
export function computeCrossSection(section: LaneSection, ds: number): LaneBoundary[] {
	const out: LaneBoundary[] = [];
	accumulate(section.left, ds, 1, out);
	accumulate(section.right, ds, -1, out);
	return out;
}
