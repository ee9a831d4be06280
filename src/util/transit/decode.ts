import { transit_realtime } from "gtfs-realtime-bindings";
import { Temporal } from "temporal-polyfill";
import { z } from "zod";
import { DecodeError, errorMessage } from "./errors";
import type {
	FeedKind,
	FeedPayload,
	Result,
	SkipReason,
	StopTimeUpdate,
	TripRecord,
} from "./state";

const UNKNOWN_TRIP_ID = "unknown";

const OFFSET_SUFFIX = /[T ]\d{2}:\d{2}.*[+-]\d{2}(:?\d{2})?$/;
const EPOCH_DIGITS = /^\d+(\.\d+)?$/;

/**
 * Picks the decoding path from the response content type. The JSON variant of
 * the feed always announces itself; anything else is treated as protobuf.
 */
export function feedKindFor(contentType: string | null): FeedKind {
	return contentType?.toLowerCase().includes("json") ? "json" : "protobuf";
}

function fromEpochSeconds(
	seconds: number,
	timeZone: string,
): Temporal.ZonedDateTime | undefined {
	if (!Number.isFinite(seconds) || seconds <= 0) return undefined;
	return Temporal.Instant.fromEpochMilliseconds(
		Math.round(seconds * 1000),
	).toZonedDateTimeISO(timeZone);
}

/**
 * Reads an arrival timestamp as found in the JSON feed. Strings are ISO-8601
 * (a trailing `Z` or `z` is rewritten to `+00:00`; no offset means agency-local wall
 * time) or plain epoch seconds. Zero and absent values mean "no arrival".
 */
export function parseArrivalTime(
	raw: string | number | null | undefined,
	timeZone: string,
): Result<Temporal.ZonedDateTime | undefined, string> {
	if (raw === null || raw === undefined || raw === "") {
		return { ok: true, value: undefined };
	}
	if (typeof raw === "number") {
		return { ok: true, value: fromEpochSeconds(raw, timeZone) };
	}

	const text = raw.trim();
	if (EPOCH_DIGITS.test(text)) {
		return { ok: true, value: fromEpochSeconds(Number(text), timeZone) };
	}

	const normalized = text.replace(/z$/i, "+00:00");
	try {
		const value = OFFSET_SUFFIX.test(normalized)
			? Temporal.Instant.from(normalized).toZonedDateTimeISO(timeZone)
			: Temporal.PlainDateTime.from(normalized).toZonedDateTime(timeZone);
		return { ok: true, value };
	} catch (error) {
		return { ok: false, error: `bad timestamp ${raw}: ${errorMessage(error)}` };
	}
}

// JSON feed

const jsonFeedSchema = z.array(z.unknown());

const jsonTripSchema = z.object({
	trip_update: z.object({
		trip: z.object({
			route_id: z.string(),
			trip_id: z.string().nullish(),
		}),
		stop_time_update: z.array(z.unknown()).nullish(),
	}),
});

const jsonStopSchema = z.object({
	stop_id: z.string(),
	arrival: z
		.object({
			time: z
				.object({
					low: z.union([z.string(), z.number()]).nullish(),
				})
				.nullish(),
		})
		.nullish(),
});

function decodeJsonStop(
	entry: unknown,
	timeZone: string,
): StopTimeUpdate | undefined {
	const parsed = jsonStopSchema.safeParse(entry);
	if (!parsed.success) {
		console.debug("Skipping stop entry", { issues: parsed.error.issues.length });
		return undefined;
	}

	const stopId = parsed.data.stop_id;
	const arrival = parseArrivalTime(parsed.data.arrival?.time?.low, timeZone);
	if (!arrival.ok) {
		console.debug("Dropping arrival time", { stopId, detail: arrival.error });
		return { stopId };
	}
	return arrival.value ? { stopId, arrival: arrival.value } : { stopId };
}

export function decodeJsonEntity(
	entry: unknown,
	timeZone: string,
): Result<TripRecord, SkipReason> {
	if (
		typeof entry !== "object" ||
		entry === null ||
		!("trip_update" in entry) ||
		entry.trip_update == null
	) {
		return { ok: false, error: { reason: "no-trip-update" } };
	}

	const parsed = jsonTripSchema.safeParse(entry);
	if (!parsed.success) {
		return {
			ok: false,
			error: { reason: "invalid-entry", detail: parsed.error.message },
		};
	}

	const { trip, stop_time_update } = parsed.data.trip_update;
	const stopTimeUpdates: StopTimeUpdate[] = [];
	for (const stop of stop_time_update ?? []) {
		const update = decodeJsonStop(stop, timeZone);
		if (update) stopTimeUpdates.push(update);
	}

	return {
		ok: true,
		value: {
			tripId: trip.trip_id || UNKNOWN_TRIP_ID,
			routeId: trip.route_id,
			stopTimeUpdates,
		},
	};
}

function parseJsonEnvelope(bytes: Uint8Array): unknown[] {
	let body: unknown;
	try {
		body = JSON.parse(new TextDecoder().decode(bytes));
	} catch (error) {
		throw new DecodeError(`Invalid JSON feed: ${errorMessage(error)}`, {
			cause: error,
		});
	}

	const parsed = jsonFeedSchema.safeParse(body);
	if (!parsed.success) {
		throw new DecodeError("Invalid JSON feed: expected a top-level array");
	}
	return parsed.data;
}

// Protobuf feed

type EpochValue = number | { toNumber(): number } | null | undefined;

function epochSeconds(value: EpochValue): number {
	if (value === null || value === undefined) return 0;
	return typeof value === "number" ? value : value.toNumber();
}

export function decodeProtobufEntity(
	entity: transit_realtime.IFeedEntity,
	timeZone: string,
): Result<TripRecord, SkipReason> {
	const tripUpdate = entity.tripUpdate;
	if (!tripUpdate) {
		return { ok: false, error: { reason: "no-trip-update" } };
	}

	const routeId = tripUpdate.trip.routeId;
	if (!routeId) {
		return {
			ok: false,
			error: { reason: "invalid-entry", detail: `entity ${entity.id} has no route_id` },
		};
	}

	const stopTimeUpdates: StopTimeUpdate[] = [];
	for (const stu of tripUpdate.stopTimeUpdate ?? []) {
		if (!stu.stopId) continue;
		const arrival = fromEpochSeconds(epochSeconds(stu.arrival?.time), timeZone);
		stopTimeUpdates.push(
			arrival ? { stopId: stu.stopId, arrival } : { stopId: stu.stopId },
		);
	}

	return {
		ok: true,
		value: {
			tripId: tripUpdate.trip.tripId || UNKNOWN_TRIP_ID,
			routeId,
			stopTimeUpdates,
		},
	};
}

function parseProtobufEnvelope(
	bytes: Uint8Array,
): transit_realtime.IFeedEntity[] {
	try {
		return transit_realtime.FeedMessage.decode(bytes).entity;
	} catch (error) {
		throw new DecodeError(`Invalid GTFS-Realtime feed: ${errorMessage(error)}`, {
			cause: error,
		});
	}
}

function* keepDecoded<T>(
	entries: readonly T[],
	decodeEntry: (entry: T) => Result<TripRecord, SkipReason>,
): Generator<TripRecord, void, undefined> {
	let skipped = 0;
	for (const entry of entries) {
		const result = decodeEntry(entry);
		if (result.ok) {
			yield result.value;
		} else {
			skipped++;
			if (result.error.reason === "invalid-entry") {
				console.debug("Skipping feed entry", { detail: result.error.detail });
			}
		}
	}
	console.debug("Decoded feed", { entries: entries.length, skipped });
}

/**
 * Decodes one feed payload into trip records.
 *
 * The envelope is parsed eagerly, so a corrupt body throws {@link DecodeError}
 * from this call. Individual entries are decoded lazily while iterating and
 * bad ones are left out.
 */
export function decodeFeed(
	payload: FeedPayload,
	timeZone: string,
): Iterable<TripRecord> {
	switch (payload.kind) {
		case "json": {
			const entries = parseJsonEnvelope(payload.bytes);
			return keepDecoded(entries, (entry) => decodeJsonEntity(entry, timeZone));
		}
		case "protobuf": {
			const entities = parseProtobufEnvelope(payload.bytes);
			return keepDecoded(entities, (entity) =>
				decodeProtobufEntity(entity, timeZone),
			);
		}
	}
}
