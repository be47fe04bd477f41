import { readFile } from 'fs/promises';
import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { Geometry } from './alignment';
import { Diagnostic, ParseError } from './errors';
import { logger } from './logger';
import { ProfileRecord } from './profile';
import {
	Lane,
	LaneSection,
	Road,
	RoadMark,
	RoadMarkColor,
	RoadMarkType,
	RoadNetwork,
	RoadNetworkHeader,
	WidthRecord,
	createLaneSection
} from './roadNetwork';

type XmlNode = { [key: string]: unknown };

export interface XodrParseResult {
	network: RoadNetwork;
	warnings: Diagnostic[];
}

const DEFAULT_MARK_WIDTH = 0.12;

const MARK_TYPES: readonly RoadMarkType[] = ['none', 'solid', 'broken', 'solid solid', 'solid broken', 'broken solid', 'broken broken'];
const MARK_COLORS: readonly RoadMarkColor[] = ['standard', 'white', 'yellow', 'blue', 'green', 'red', 'orange'];

function isNode(value: unknown): value is XmlNode {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// Empty elements such as <line/> come back as '' and are treated as attribute-less nodes
function children(node: XmlNode, tag: string): XmlNode[] {
	const raw = node[tag];
	if (raw === undefined) return [];
	const list: unknown[] = Array.isArray(raw) ? raw : [raw];
	return list.map(v => (isNode(v) ? v : {}));
}

function child(node: XmlNode, tag: string): XmlNode | undefined {
	return children(node, tag)[0];
}

function attr(node: XmlNode, name: string): string | undefined {
	const v = node[`@_${name}`];
	if (typeof v === 'string') return v;
	if (typeof v === 'number') return String(v);
	return undefined;
}

function num(node: XmlNode, name: string, where: string, fallback?: number): number {
	const raw = attr(node, name);
	if (raw === undefined || raw.trim() === '') {
		if (fallback !== undefined) return fallback;
		throw new ParseError(`${where}: missing attribute '${name}'`);
	}
	const value = Number(raw);
	if (!Number.isFinite(value)) {
		throw new ParseError(`${where}: attribute '${name}' is not a number: '${raw}'`);
	}
	return value;
}

function int(node: XmlNode, name: string, where: string): number {
	const value = num(node, name, where);
	if (!Number.isInteger(value)) {
		throw new ParseError(`${where}: attribute '${name}' must be an integer, got ${value}`);
	}
	return value;
}

function cubic(node: XmlNode, where: string) {
	return {
		a: num(node, 'a', where, 0),
		b: num(node, 'b', where, 0),
		c: num(node, 'c', where, 0),
		d: num(node, 'd', where, 0)
	};
}

class XodrReader {
	public readonly warnings: Diagnostic[] = [];

	public readNetwork(root: XmlNode): RoadNetwork {
		const headerNode = child(root, 'header');
		const header: RoadNetworkHeader | undefined = headerNode
			? {
				name: attr(headerNode, 'name') ?? '',
				revMajor: num(headerNode, 'revMajor', 'header', 1),
				revMinor: num(headerNode, 'revMinor', 'header', 4),
				vendor: attr(headerNode, 'vendor') ?? ''
			}
			: undefined;

		const roads: Road[] = [];
		const seen = new Set<string>();
		for (const node of children(root, 'road')) {
			const road = this.readRoad(node);
			if (seen.has(road.id)) throw new ParseError(`duplicate road id '${road.id}'`);
			seen.add(road.id);
			roads.push(road);
		}
		return new RoadNetwork(roads, header);
	}

	private readRoad(node: XmlNode): Road {
		const id = attr(node, 'id');
		if (id === undefined || id.trim() === '') throw new ParseError('road: missing attribute \'id\'');
		const where = `road ${id}`;
		const length = num(node, 'length', where);
		if (length < 0) throw new ParseError(`${where}: negative length ${length}`);

		const planView = child(node, 'planView');
		const geometries = planView ? this.readGeometries(planView, id) : [];
		const elevations = this.readProfile(child(node, 'elevationProfile'), 'elevation', where);
		const superelevations = this.readProfile(child(node, 'lateralProfile'), 'superelevation', where);
		const lanes = child(node, 'lanes');
		const laneSections = lanes ? this.readLaneSections(lanes, id) : [];

		return new Road({
			id,
			name: attr(node, 'name') ?? '',
			length,
			junction: attr(node, 'junction') ?? '-1',
			geometries,
			laneSections,
			elevations,
			superelevations
		});
	}

	private readGeometries(planView: XmlNode, roadId: string): Geometry[] {
		const out: Geometry[] = [];
		for (const g of children(planView, 'geometry')) {
			const where = `road ${roadId} geometry`;
			const base = {
				s0: num(g, 's', where),
				x0: num(g, 'x', where),
				y0: num(g, 'y', where),
				hdg0: num(g, 'hdg', where),
				length: num(g, 'length', where)
			};
			const arc = child(g, 'arc');
			if (child(g, 'line')) {
				out.push({ kind: 'line', ...base });
			} else if (arc) {
				const curvature = num(arc, 'curvature', `${where} arc`);
				out.push(curvature === 0 ? { kind: 'line', ...base } : { kind: 'arc', ...base, curvature });
			} else {
				const kind = Object.keys(g).find(k => !k.startsWith('@_')) ?? 'unknown';
				const message = `road ${roadId}: unsupported ${kind} geometry at s=${base.s0} left out`;
				logger.warn(message);
				this.warnings.push({ level: 'warn', code: 'unsupported-geometry', message, roadId });
			}
		}
		return out;
	}

	private readProfile(container: XmlNode | undefined, tag: string, where: string): ProfileRecord[] {
		if (!container) return [];
		return children(container, tag).map(r => ({ s: num(r, 's', `${where} ${tag}`), ...cubic(r, `${where} ${tag}`) }));
	}

	private readLaneSections(lanes: XmlNode, roadId: string): LaneSection[] {
		const nodes = children(lanes, 'laneSection')
			.map(n => ({ node: n, s: num(n, 's', `road ${roadId} laneSection`) }))
			.sort((a, b) => a.s - b.s);
		return nodes.map(({ node, s }, index) => {
			const where = `road ${roadId} laneSection ${index}`;
			const all: Lane[] = [
				...this.readLaneGroup(node, 'left', index, where),
				...this.readLaneGroup(node, 'center', index, where),
				...this.readLaneGroup(node, 'right', index, where)
			];
			const ids = new Set<number>();
			for (const lane of all) {
				if (ids.has(lane.id)) throw new ParseError(`${where}: duplicate lane id ${lane.id}`);
				ids.add(lane.id);
			}
			return createLaneSection(s, all);
		});
	}

	private readLaneGroup(section: XmlNode, group: 'left' | 'center' | 'right', sectionIndex: number, where: string): Lane[] {
		const groupNode = child(section, group);
		if (!groupNode) return [];
		return children(groupNode, 'lane').map(node => {
			const id = int(node, 'id', `${where} ${group} lane`);
			const wrongSide = (group === 'left' && id <= 0) || (group === 'right' && id >= 0) || (group === 'center' && id !== 0);
			if (wrongSide) throw new ParseError(`${where}: lane id ${id} does not belong to the ${group} group`);
			const laneWhere = `${where} lane ${id}`;
			const widths: WidthRecord[] = children(node, 'width').map(w => ({
				sOffset: num(w, 'sOffset', `${laneWhere} width`, 0),
				...cubic(w, `${laneWhere} width`)
			}));
			return new Lane({
				id,
				type: attr(node, 'type') ?? 'none',
				sectionIndex,
				widths,
				roadMark: this.readRoadMark(node, laneWhere)
			});
		});
	}

	private readRoadMark(lane: XmlNode, where: string): RoadMark | undefined {
		const marks = children(lane, 'roadMark')
			.map(m => ({ node: m, sOffset: num(m, 'sOffset', `${where} roadMark`, 0) }))
			.sort((a, b) => a.sOffset - b.sOffset);
		const first = marks[0];
		if (!first) return undefined;
		const rawType = (attr(first.node, 'type') ?? 'none').trim().toLowerCase().replace(/\s+/g, ' ');
		const type = MARK_TYPES.find(t => t === rawType);
		if (!type) {
			const message = `${where}: road mark type '${rawType}' is not rendered`;
			logger.warn(message);
			this.warnings.push({ level: 'warn', code: 'unsupported-road-mark', message });
			return undefined;
		}
		if (type === 'none') return undefined;
		const rawColor = (attr(first.node, 'color') ?? 'standard').trim().toLowerCase();
		return {
			sOffset: first.sOffset,
			width: num(first.node, 'width', `${where} roadMark`, DEFAULT_MARK_WIDTH),
			color: MARK_COLORS.find(c => c === rawColor) ?? 'standard',
			type
		};
	}
}

export function parseXodr(text: string): XodrParseResult {
	const valid = XMLValidator.validate(text);
	if (valid !== true) {
		throw new ParseError(`malformed XML at line ${valid.err.line}: ${valid.err.msg}`);
	}
	const parser = new XMLParser({
		ignoreAttributes: false,
		attributeNamePrefix: '@_',
		parseAttributeValue: false,
		parseTagValue: false
	});
	const doc: unknown = parser.parse(text);
	const root = isNode(doc) ? doc['OpenDRIVE'] : undefined;
	if (!isNode(root)) throw new ParseError('document has no OpenDRIVE root element');

	const reader = new XodrReader();
	const network = reader.readNetwork(root);
	return { network, warnings: reader.warnings };
}

export async function readXodrFile(filePath: string): Promise<XodrParseResult> {
	const text = await readFile(filePath, 'utf8');
	return parseXodr(text);
}
