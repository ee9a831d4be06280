import type { Temporal } from "temporal-polyfill";
import type { MatchedArrival, TripRecord } from "./state";

export interface StopPair {
	lineId: string;
	startStation: string;
	endStation: string;
}

export interface MatchedTimes {
	startTime: Temporal.ZonedDateTime;
	endTime: Temporal.ZonedDateTime;
}

/**
 * Finds the arrival times of a trip at both configured stops. Trips on other
 * lines, and trips that only serve one of the two stops, yield `undefined`.
 */
export function matchStops(
	trip: TripRecord,
	stops: StopPair,
): MatchedTimes | undefined {
	if (trip.routeId !== stops.lineId) return undefined;

	let startTime: Temporal.ZonedDateTime | undefined;
	let endTime: Temporal.ZonedDateTime | undefined;

	for (const update of trip.stopTimeUpdates) {
		if (!update.arrival) continue;

		if (update.stopId === stops.startStation) {
			startTime = update.arrival;
		} else if (update.stopId === stops.endStation) {
			endTime = update.arrival;
		}
	}

	if (!startTime || !endTime) return undefined;
	return { startTime, endTime };
}

export function toMatchedArrival(
	times: MatchedTimes,
	tripId: string,
	now: Temporal.ZonedDateTime,
): MatchedArrival {
	return {
		...times,
		tripId,
		timeDiffSeconds:
			(times.startTime.epochMilliseconds - now.epochMilliseconds) / 1000,
		date: times.startTime.toPlainDate(),
	};
}

export function matchArrivals(
	trips: Iterable<TripRecord>,
	stops: StopPair,
	now: Temporal.ZonedDateTime,
): MatchedArrival[] {
	const matched: MatchedArrival[] = [];
	for (const trip of trips) {
		const times = matchStops(trip, stops);
		if (!times) continue;
		console.debug("Matched trip", { tripId: trip.tripId, routeId: trip.routeId });
		matched.push(toMatchedArrival(times, trip.tripId, now));
	}
	return matched;
}
