export const KNOWN_LINES: Readonly<Record<string, string>> = {
	BNSF: "BNSF",
	HC: "Heritage Corridor",
	"MD-N": "Milwaukee District North",
	"MD-W": "Milwaukee District West",
	ME: "Metra Electric",
	NCS: "North Central Service",
	RI: "Rock Island",
	SWS: "SouthWest Service",
	"UP-N": "Union Pacific North",
	"UP-NW": "Union Pacific Northwest",
	"UP-W": "Union Pacific West",
};

export function knownLineName(lineId: string): string | undefined {
	return Object.hasOwn(KNOWN_LINES, lineId) ? KNOWN_LINES[lineId] : undefined;
}
