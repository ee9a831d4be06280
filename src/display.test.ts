import { describe, expect, it } from "vitest";
import {
	NO_TRAINS,
	UNAVAILABLE,
	type SnapshotSource,
	summaryState,
	trainAttributes,
	trainState,
} from "./display";
import type { ArrivalResult, MatchedArrival } from "./util/transit/state";
import { T } from "./util/transit/__fixtures__/feeds";

function train(tripId: string, minutes: number, rideMinutes = 15): MatchedArrival {
	const startTime = T.add({ minutes });
	return {
		tripId,
		startTime,
		endTime: startTime.add({ minutes: rideMinutes }),
		timeDiffSeconds: minutes * 60,
		date: startTime.toPlainDate(),
	};
}

function source(trains: MatchedArrival[], count = trains.length): SnapshotSource {
	const snapshot: ArrivalResult = {
		trains,
		count,
		lastUpdate: T,
		lineName: "Union Pacific West",
		startStationName: "Oak Park",
		endStationName: "Ogilvie",
	};
	return { snapshot, lastUpdateSuccess: true };
}

const today = T.toPlainDate();

describe("trainState", () => {
	it("formats departure and arrival clock times", () => {
		const state = source([train("UPW_31", 10), train("UPW_33", 40, 17)]);
		expect(trainState(state, 1, today)).toBe("08:10 → 08:25");
		expect(trainState(state, 2, today)).toBe("08:40 → 08:57");
		expect(trainState(state, 3, today)).toBe(NO_TRAINS);
	});

	it("marks trains that do not run today", () => {
		const state = source([train("UPW_1", 23 * 60)]);
		expect(trainState(state, 1, today)).toBe("07:00 → 07:15 (Tomorrow)");
	});

	it("is unavailable for error snapshots and before the first poll", () => {
		expect(
			trainState({ snapshot: { error: "HTTP 500" }, lastUpdateSuccess: false }, 1, today),
		).toBe(UNAVAILABLE);
		expect(trainState({ snapshot: undefined, lastUpdateSuccess: false }, 1, today)).toBe(
			UNAVAILABLE,
		);
	});

	it("says so when nothing runs", () => {
		expect(trainState(source([]), 1, today)).toBe("No trains scheduled");
	});
});

describe("summaryState", () => {
	it("counts upcoming trains", () => {
		expect(summaryState(source([train("UPW_31", 10)], 4))).toBe("4 upcoming trains");
		expect(summaryState({ snapshot: { error: "timeout" }, lastUpdateSuccess: false })).toBe(
			UNAVAILABLE,
		);
	});
});

describe("trainAttributes", () => {
	it("describes the train in a slot", () => {
		expect(trainAttributes(source([train("UPW_31", 10)]), 1)).toEqual({
			last_update: "2026-10-19T08:00:00-05:00",
			train_number: 1,
			departure_time: "08:10",
			arrival_time: "08:25",
			departure_station: "Oak Park",
			arrival_station: "Ogilvie",
			departure_full: "2026-10-19T08:10:00-05:00",
			arrival_full: "2026-10-19T08:25:00-05:00",
			trip_id: "UPW_31",
		});
	});

	it("only carries the update time for an empty slot", () => {
		expect(trainAttributes(source([]), 2)).toEqual({
			last_update: "2026-10-19T08:00:00-05:00",
			train_number: 2,
		});
	});

	it("is empty while unavailable", () => {
		expect(trainAttributes({ snapshot: { error: "x" }, lastUpdateSuccess: false }, 1)).toEqual(
			{},
		);
	});
});
