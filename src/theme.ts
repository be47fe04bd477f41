// Default material palette for exported road scenes
export const roadPalette = {
	asphalt: 0x4d4d4d,
	shoulder: 0x666666,
	markingWhite: 0xffffff,
	markingYellow: 0xffff00,
	markingBlue: 0x1e64ff,
	markingGreen: 0x1eb450,
	markingRed: 0xe61e1e,
	markingOrange: 0xff8c00
};

export const TEXTURE_FILES = {
	asphalt: 'Asphalt1_Diff.png',
	laneMarking: 'LaneMarking1_Diff.png'
};
