import { Geometry } from '../src/alignment';
import { ProfileRecord } from '../src/profile';
import { Lane, LaneSection, Road, RoadMark, WidthRecord, createLaneSection } from '../src/roadNetwork';

export function line(s0: number, length: number, x0 = s0, y0 = 0, hdg0 = 0): Geometry {
	return { kind: 'line', s0, x0, y0, hdg0, length };
}

export function constantWidth(a: number): WidthRecord[] {
	return [{ sOffset: 0, a, b: 0, c: 0, d: 0 }];
}

export function lane(id: number, width: number, options: { type?: string; sectionIndex?: number; roadMark?: RoadMark } = {}): Lane {
	return new Lane({
		id,
		type: options.type ?? (id === 0 ? 'none' : 'driving'),
		sectionIndex: options.sectionIndex ?? 0,
		widths: id === 0 ? [] : constantWidth(width),
		roadMark: options.roadMark
	});
}

// Three lanes each side: 3.5, 3.5, 3.0
export function sixLaneSection(): LaneSection {
	return createLaneSection(0, [
		lane(1, 3.5), lane(2, 3.5), lane(3, 3.0),
		lane(0, 0),
		lane(-1, 3.5), lane(-2, 3.5), lane(-3, 3.0)
	]);
}

export function straightRoad(
	length: number,
	sections: readonly LaneSection[],
	extra: { id?: string; elevations?: ProfileRecord[]; superelevations?: ProfileRecord[]; geometries?: Geometry[] } = {}
): Road {
	return new Road({
		id: extra.id ?? '1',
		length,
		geometries: extra.geometries ?? [line(0, length)],
		laneSections: sections,
		elevations: extra.elevations,
		superelevations: extra.superelevations
	});
}

export const SIMPLE_XODR = `<?xml version="1.0" encoding="UTF-8"?>
<OpenDRIVE>
  <header revMajor="1" revMinor="6" name="Test Network" vendor="placeholder"/>
  <road name="Main" length="100" id="1" junction="-1">
    <planView>
      <geometry s="0" x="0" y="0" hdg="0" length="100">
        <line/>
      </geometry>
    </planView>
    <elevationProfile>
      <elevation s="0" a="0" b="0" c="0" d="0"/>
      <elevation s="100" a="5" b="0" c="0" d="0"/>
    </elevationProfile>
    <lanes>
      <laneSection s="0">
        <left>
          <lane id="1" type="driving" level="false">
            <width sOffset="0" a="3.5" b="0" c="0" d="0"/>
          </lane>
        </left>
        <center>
          <lane id="0" type="none" level="false">
            <roadMark sOffset="0" type="solid" color="yellow"/>
          </lane>
        </center>
        <right>
          <lane id="-1" type="driving" level="false">
            <width sOffset="0" a="3.5" b="0" c="0" d="0"/>
            <roadMark sOffset="0" type="broken" width="0.15"/>
          </lane>
        </right>
      </laneSection>
    </lanes>
  </road>
</OpenDRIVE>
`;
