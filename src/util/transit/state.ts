import type { Temporal } from "temporal-polyfill";

export interface StopTimeUpdate {
	stopId: string;
	/** Absent when the feed carries no (or a zero) arrival time for this stop. */
	arrival?: Temporal.ZonedDateTime;
}

export interface TripRecord {
	tripId: string;
	routeId: string;
	stopTimeUpdates: readonly StopTimeUpdate[];
}

export interface MatchedArrival {
	startTime: Temporal.ZonedDateTime;
	endTime: Temporal.ZonedDateTime;
	tripId: string;
	/** Seconds from now until the train reaches the start stop; negative once departed. */
	timeDiffSeconds: number;
	date: Temporal.PlainDate;
}

export interface ArrivalResult {
	trains: readonly MatchedArrival[];
	count: number;
	lastUpdate: Temporal.ZonedDateTime;
	lineName: string;
	startStationName: string;
	endStationName: string;
}

export interface ArrivalError {
	error: string;
}

export type ArrivalSnapshot = ArrivalResult | ArrivalError;

export function isErrorSnapshot(
	snapshot: ArrivalSnapshot,
): snapshot is ArrivalError {
	return "error" in snapshot;
}

export type FeedKind = "json" | "protobuf";

export type FeedPayload =
	| { kind: "json"; bytes: Uint8Array }
	| { kind: "protobuf"; bytes: Uint8Array };

export type SkipReason =
	| { reason: "no-trip-update" }
	| { reason: "invalid-entry"; detail: string };

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export type PollState =
	| "idle"
	| "fetching"
	| "decoding"
	| "ranking"
	| "published";
