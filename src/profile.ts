import * as THREE from 'three';

// Cubic record as found in elevation / superelevation / width entries
export interface ProfileRecord {
	s: number;
	a: number;
	b: number;
	c: number;
	d: number;
}

export function evalCubic(a: number, b: number, c: number, d: number, ds: number): number {
	return a + b * ds + c * ds * ds + d * ds * ds * ds;
}

// Index of the last item whose key is <= s, or -1 when s precedes every item.
export function findLastAtOrBefore<T>(items: readonly T[], key: (item: T) => number, s: number): number {
	let lo = 0;
	let hi = items.length - 1;
	let found = -1;
	while (lo <= hi) {
		const mid = (lo + hi) >> 1;
		if (key(items[mid]) <= s) {
			found = mid;
			lo = mid + 1;
		} else {
			hi = mid - 1;
		}
	}
	return found;
}

/**
 * Piecewise-linear profile through the `a` value of each record. Beyond the last record
 * its linear term carries on (`a + b * ds`); before the first record the profile is flat.
 * 0 when there are no records.
 */
export function evalProfile(records: readonly ProfileRecord[], s: number): number {
	if (records.length === 0) return 0;
	const i = findLastAtOrBefore(records, r => r.s, s);
	if (i < 0) return records[0].a;
	if (i >= records.length - 1) {
		const last = records[records.length - 1];
		return last.a + last.b * (s - last.s);
	}
	const a = records[i];
	const b = records[i + 1];
	const t = (s - a.s) / Math.max(1e-9, b.s - a.s);
	return THREE.MathUtils.lerp(a.a, b.a, t);
}

export function sortProfile(records: readonly ProfileRecord[]): ProfileRecord[] {
	return [...records].sort((a, b) => a.s - b.s);
}
