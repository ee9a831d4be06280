import { transit_realtime } from "gtfs-realtime-bindings";
import { Temporal } from "temporal-polyfill";
import { type Mock, vi } from "vitest";
import type { ArrivalsConfig } from "../../../config";

export const TZ = "America/Chicago";

/** Monday 08:00 in Chicago (13:00 UTC). */
export const T = Temporal.ZonedDateTime.from(
	"2026-10-19T08:00:00-05:00[America/Chicago]",
);

export interface FeedTrip {
	tripId?: string;
	routeId: string;
	/** Stop id and minutes after `T`, or `null` for a stop without arrival time. */
	stops: Array<[string, number | null]>;
}

export function epochAt(minutes: number): number {
	return T.add({ minutes }).epochMilliseconds / 1000;
}

export function protobufFeed(trips: FeedTrip[]): Uint8Array {
	const message = transit_realtime.FeedMessage.create({
		header: { gtfsRealtimeVersion: "2.0", timestamp: epochAt(0) },
		entity: [
			...trips.map((trip, index) => ({
				id: `entity-${index}`,
				tripUpdate: {
					trip: { routeId: trip.routeId, tripId: trip.tripId },
					stopTimeUpdate: trip.stops.map(([stopId, minutes]) => ({
						stopId,
						arrival: { time: minutes === null ? 0 : epochAt(minutes) },
					})),
				},
			})),
			{ id: "vehicle-only", vehicle: { vehicle: { id: "bus-7" } } },
		],
	});
	return transit_realtime.FeedMessage.encode(message).finish();
}

export function jsonFeed(trips: FeedTrip[]): Uint8Array {
	const body = trips.map((trip, index) => ({
		id: `entity-${index}`,
		trip_update: {
			trip: { route_id: trip.routeId, trip_id: trip.tripId },
			stop_time_update: trip.stops.map(([stop_id, minutes]) => ({
				stop_id,
				arrival:
					minutes === null
						? null
						: { time: { low: T.add({ minutes }).toInstant().toString(), high: 0 } },
			})),
		},
	}));
	return new TextEncoder().encode(JSON.stringify(body));
}

export function respond(
	bytes: Uint8Array | string,
	contentType: string,
	status = 200,
): Response {
	const body = typeof bytes === "string" ? bytes : Buffer.from(bytes);
	return new Response(body, { status, headers: { "content-type": contentType } });
}

export function stubFetch(
	handler: () => Response | Promise<Response>,
): Mock<typeof fetch> {
	return vi.fn<typeof fetch>(async () => handler());
}

export function testConfig(overrides: Partial<ArrivalsConfig> = {}): ArrivalsConfig {
	return {
		feedUrl: "https://feed.example.com/tripupdates",
		auth: { kind: "token", apiToken: "test-token" },
		lineId: "UP-W",
		startStation: "OAKPARK",
		endStation: "OTC",
		pollIntervalSeconds: 30,
		requestTimeoutSeconds: 15,
		timeZone: TZ,
		...overrides,
	};
}
