import type { Temporal } from "temporal-polyfill";
import {
	type ArrivalSnapshot,
	type MatchedArrival,
	isErrorSnapshot,
} from "./util/transit/state";

export const UNAVAILABLE = "Unavailable";
export const NO_TRAINS = "No trains scheduled";

export interface SnapshotSource {
	snapshot: ArrivalSnapshot | undefined;
	lastUpdateSuccess: boolean;
}

export function isAvailable(source: SnapshotSource): boolean {
	return (
		source.lastUpdateSuccess &&
		source.snapshot !== undefined &&
		!isErrorSnapshot(source.snapshot)
	);
}

export function formatClock(time: Temporal.ZonedDateTime): string {
	return time.toPlainTime().toString({ smallestUnit: "minute" });
}

function trainAt(source: SnapshotSource, trainNumber: number) {
	const { snapshot } = source;
	if (!snapshot || isErrorSnapshot(snapshot)) return undefined;
	return snapshot.trains[trainNumber - 1];
}

/** `HH:MM → HH:MM`, with ` (Tomorrow)` when the train does not run today. */
export function formatTrain(
	train: MatchedArrival,
	today: Temporal.PlainDate,
): string {
	const qualifier = train.date.equals(today) ? "" : " (Tomorrow)";
	return `${formatClock(train.startTime)} → ${formatClock(train.endTime)}${qualifier}`;
}

/** State text of the 1-based train slot. */
export function trainState(
	source: SnapshotSource,
	trainNumber: number,
	today: Temporal.PlainDate,
): string {
	if (!isAvailable(source)) return UNAVAILABLE;
	const train = trainAt(source, trainNumber);
	return train ? formatTrain(train, today) : NO_TRAINS;
}

export function summaryState(source: SnapshotSource): string {
	const { snapshot } = source;
	if (!isAvailable(source) || !snapshot || isErrorSnapshot(snapshot)) {
		return UNAVAILABLE;
	}
	return `${snapshot.count} upcoming trains`;
}

export function trainAttributes(
	source: SnapshotSource,
	trainNumber: number,
): Record<string, string | number> {
	const { snapshot } = source;
	if (!isAvailable(source) || !snapshot || isErrorSnapshot(snapshot)) return {};

	const attributes: Record<string, string | number> = {
		last_update: snapshot.lastUpdate.toString({ timeZoneName: "never" }),
		train_number: trainNumber,
	};

	const train = snapshot.trains[trainNumber - 1];
	if (train) {
		Object.assign(attributes, {
			departure_time: formatClock(train.startTime),
			arrival_time: formatClock(train.endTime),
			departure_station: snapshot.startStationName,
			arrival_station: snapshot.endStationName,
			departure_full: train.startTime.toString({ timeZoneName: "never" }),
			arrival_full: train.endTime.toString({ timeZoneName: "never" }),
			trip_id: train.tripId,
		});
	}
	return attributes;
}
