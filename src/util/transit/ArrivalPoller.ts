import { Temporal } from "temporal-polyfill";
import type { ArrivalsConfig } from "../../config";
import { decodeFeed } from "./decode";
import { errorMessage } from "./errors";
import { type Fetcher, fetchFeed } from "./index";
import { matchArrivals } from "./match";
import { rankArrivals } from "./rank";
import {
	type ArrivalResult,
	type ArrivalSnapshot,
	type FeedPayload,
	type PollState,
	isErrorSnapshot,
} from "./state";

export interface DisplayNames {
	lineName: string;
	startStationName: string;
	endStationName: string;
}

export interface PollerContext {
	config: ArrivalsConfig;
	names: DisplayNames;
	fetcher?: Fetcher;
	/** Current time in the agency time zone; injectable for tests. */
	clock?: () => Temporal.ZonedDateTime;
}

export type SnapshotListener = (
	snapshot: ArrivalSnapshot,
	poller: ArrivalPoller,
) => void;

/**
 * Runs the decode, match and rank steps over one payload. Given the same bytes
 * and the same `now` the result is always equal.
 *
 * @throws {DecodeError} when the payload envelope is corrupt
 */
export function buildSnapshot(
	payload: FeedPayload,
	context: Pick<PollerContext, "config" | "names">,
	now: Temporal.ZonedDateTime,
	onStage?: (state: PollState) => void,
): ArrivalResult {
	const { config, names } = context;

	onStage?.("decoding");
	const trips = decodeFeed(payload, config.timeZone);

	onStage?.("ranking");
	const matched = matchArrivals(trips, config, now);
	const { trains, count } = rankArrivals(matched);
	console.debug("Ranked arrivals", { matched: matched.length, count });

	return {
		trains,
		count,
		lastUpdate: now,
		...names,
	};
}

/**
 * Polls the trip updates feed on a fixed interval and keeps the latest
 * arrivals snapshot. Cycles never overlap: the next tick is scheduled only
 * once the previous one has published.
 */
export class ArrivalPoller {
	private readonly listeners = new Set<SnapshotListener>();
	private readonly fetcher: Fetcher;
	private readonly clock: () => Temporal.ZonedDateTime;
	private timer: ReturnType<typeof setTimeout> | undefined;
	private running = false;
	private current: ArrivalSnapshot | undefined;
	private stage: PollState = "idle";
	private inFlight: Promise<ArrivalSnapshot> | undefined;

	constructor(private readonly context: PollerContext) {
		this.fetcher = context.fetcher ?? fetch;
		this.clock =
			context.clock ??
			(() => Temporal.Now.zonedDateTimeISO(context.config.timeZone));
	}

	get snapshot(): ArrivalSnapshot | undefined {
		return this.current;
	}

	get state(): PollState {
		return this.stage;
	}

	/** True once a snapshot has been published and the latest one is not an error. */
	get lastUpdateSuccess(): boolean {
		return this.current !== undefined && !isErrorSnapshot(this.current);
	}

	get isRunning(): boolean {
		return this.running;
	}

	subscribe(listener: SnapshotListener): () => void {
		this.listeners.add(listener);
		return () => {
			this.listeners.delete(listener);
		};
	}

	/**
	 * Runs one fetch-decode-rank cycle and publishes its snapshot. Failures are
	 * published as `{ error }` snapshots; this never rejects. A call made while
	 * a cycle is in flight joins that cycle instead of starting another.
	 */
	poll(): Promise<ArrivalSnapshot> {
		if (!this.inFlight) {
			this.inFlight = this.runCycle().finally(() => {
				this.inFlight = undefined;
			});
		}
		return this.inFlight;
	}

	private async runCycle(): Promise<ArrivalSnapshot> {
		this.stage = "fetching";
		let snapshot: ArrivalSnapshot;
		try {
			const payload = await fetchFeed(this.context.config, this.fetcher);
			snapshot = buildSnapshot(payload, this.context, this.clock(), (stage) => {
				this.stage = stage;
			});
		} catch (error) {
			console.error("Error fetching or decoding feed", {
				message: errorMessage(error),
			});
			snapshot = { error: errorMessage(error) };
		}

		this.publish(snapshot);
		this.stage = "idle";
		return snapshot;
	}

	/** Polls once right away, then keeps polling every configured interval. */
	async start(): Promise<ArrivalSnapshot> {
		if (this.running) return this.current ?? this.poll();
		this.running = true;
		const first = await this.poll();
		if (this.running) this.scheduleNext();
		return first;
	}

	stop(): void {
		this.running = false;
		if (this.timer !== undefined) {
			clearTimeout(this.timer);
			this.timer = undefined;
		}
	}

	private scheduleNext(): void {
		// A restart during an in-flight tick reaches here twice.
		if (this.timer !== undefined) return;
		this.timer = setTimeout(() => {
			this.timer = undefined;
			this.tick().catch((error: unknown) => {
				console.error("Poll tick failed", { message: errorMessage(error) });
			});
		}, this.context.config.pollIntervalSeconds * 1000);
	}

	private async tick(): Promise<void> {
		await this.poll();
		if (this.running) this.scheduleNext();
	}

	private publish(snapshot: ArrivalSnapshot): void {
		if (!isErrorSnapshot(snapshot)) Object.freeze(snapshot.trains);
		this.current = Object.freeze(snapshot);
		this.stage = "published";
		for (const listener of this.listeners) {
			try {
				listener(snapshot, this);
			} catch (error) {
				console.error("Snapshot listener failed", {
					message: errorMessage(error),
				});
			}
		}
	}
}
