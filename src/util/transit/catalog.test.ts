import { readFileSync } from "node:fs";
import path from "node:path";
import { describe, expect, it } from "vitest";
import {
	ScheduleCatalog,
	loadScheduleCatalog,
	resolveDisplayNames,
	stopsMissingFromLine,
} from "./catalog";
import { testConfig } from "./__fixtures__/feeds";

const fixture = path.join(__dirname, "__fixtures__", "schedule.zip");

describe("loadScheduleCatalog", () => {
	it("reads routes, stops and stop times from a GTFS zip", async () => {
		const catalog = await loadScheduleCatalog(fixture);

		expect(catalog.lineName("UP-W")).toBe("Union Pacific West Line");
		expect(catalog.lineName("BNSF")).toBe("BNSF");
		expect(catalog.lineName("ME")).toBeUndefined();
		expect(catalog.stopName("OAKPARK")).toBe("Oak Park");
		expect(catalog.stopName("NOWHERE")).toBeUndefined();
		expect(catalog.stopsForLine("UP-W")).toEqual(["OAKPARK", "OTC", "ELMHURST"]);
		expect(catalog.stopsForLine("BNSF")).toEqual(["AURORA", "CUS"]);
	});

	it("accepts the zip as a buffer", async () => {
		const catalog = await loadScheduleCatalog(readFileSync(fixture));
		expect(catalog.stopName("OTC")).toBe("Ogilvie Transportation Center");
	});

	it("rejects something that is not a zip", async () => {
		await expect(loadScheduleCatalog(Buffer.from("not a zip"))).rejects.toThrow();
	});
});

describe("ScheduleCatalog", () => {
	it("ignores rows that miss required columns", () => {
		const catalog = new ScheduleCatalog({
			"stops.txt": "stop_id,stop_name\n,Nameless\nOTC,Ogilvie\n",
		});
		expect(catalog.stopName("OTC")).toBe("Ogilvie");
		expect(catalog.stopName("")).toBeUndefined();
	});

	it("hands out copies of the stops per line", async () => {
		const catalog = await loadScheduleCatalog(fixture);
		const stops = catalog.stopsForLine("UP-W");
		stops.length = 0;
		stops.push("NOWHERE");

		expect(catalog.stopsForLine("UP-W")).toEqual(["OAKPARK", "OTC", "ELMHURST"]);
	});
});

describe("resolveDisplayNames", () => {
	it("prefers configured names", () => {
		const names = resolveDisplayNames(
			testConfig({
				lineName: "My Line",
				startStationName: "Home",
				endStationName: "Work",
			}),
		);
		expect(names).toEqual({
			lineName: "My Line",
			startStationName: "Home",
			endStationName: "Work",
		});
	});

	it("falls back to the schedule, the known lines and finally the ids", async () => {
		const catalog = await loadScheduleCatalog(fixture);

		expect(resolveDisplayNames(testConfig(), catalog)).toEqual({
			lineName: "Union Pacific West Line",
			startStationName: "Oak Park",
			endStationName: "Ogilvie Transportation Center",
		});
		expect(resolveDisplayNames(testConfig())).toEqual({
			lineName: "Union Pacific West",
			startStationName: "OAKPARK",
			endStationName: "OTC",
		});
		expect(resolveDisplayNames(testConfig({ lineId: "X-1" }))).toMatchObject({
			lineName: "X-1",
		});
	});
});

describe("stopsMissingFromLine", () => {
	it("lists configured stops the line does not serve", async () => {
		const catalog = await loadScheduleCatalog(fixture);

		expect(stopsMissingFromLine(testConfig(), catalog)).toEqual([]);
		expect(
			stopsMissingFromLine(testConfig({ endStation: "CUS" }), catalog),
		).toEqual(["CUS"]);
	});
});
