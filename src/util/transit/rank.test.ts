import { describe, expect, it } from "vitest";
import { rankArrivals } from "./rank";
import type { MatchedArrival } from "./state";
import { T } from "./__fixtures__/feeds";

function arrival(tripId: string, minutes: number): MatchedArrival {
	const startTime = T.add({ minutes });
	return {
		tripId,
		startTime,
		endTime: startTime.add({ minutes: 15 }),
		timeDiffSeconds: minutes * 60,
		date: startTime.toPlainDate(),
	};
}

const tripIds = (arrivals: MatchedArrival[]) =>
	arrivals.map((item) => item.tripId);

describe("rankArrivals", () => {
	it("sorts by time until departure and keeps the first three", () => {
		const ranked = rankArrivals([
			arrival("d", 90),
			arrival("a", 5),
			arrival("c", 60),
			arrival("b", 30),
		]);
		expect(tripIds(ranked.trains)).toEqual(["a", "b", "c"]);
		expect(ranked.count).toBe(4);
	});

	it("drops trains that left more than five minutes ago", () => {
		const ranked = rankArrivals([
			arrival("gone", -6),
			arrival("edge", -5),
			arrival("just-left", -4),
			arrival("next", 20),
		]);
		expect(tripIds(ranked.trains)).toEqual(["just-left", "next"]);
		expect(ranked.count).toBe(2);
	});

	it("falls back to the earliest train when every train has left", () => {
		const ranked = rankArrivals([
			arrival("later", -20),
			arrival("earliest", -45),
			arrival("middle", -30),
		]);
		expect(tripIds(ranked.trains)).toEqual(["earliest"]);
		expect(ranked.count).toBe(0);
	});

	it("returns nothing for no arrivals", () => {
		expect(rankArrivals([])).toEqual({ trains: [], count: 0 });
	});

	it("does not reorder its input", () => {
		const input = [arrival("b", 30), arrival("a", 5)];
		rankArrivals(input);
		expect(tripIds(input)).toEqual(["b", "a"]);
	});
});
