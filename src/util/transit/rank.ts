import type { MatchedArrival } from "./state";

export const MAX_TRAINS = 3;

/** Trains that left the start stop up to this long ago are still shown. */
export const DEPARTED_GRACE_SECONDS = 300;

export interface RankedArrivals {
	trains: MatchedArrival[];
	/** Size of the relevant list before capping; 0 when only the fallback train is shown. */
	count: number;
}

export function rankArrivals(
	arrivals: readonly MatchedArrival[],
	limit = MAX_TRAINS,
): RankedArrivals {
	const sorted = [...arrivals].sort(
		(a, b) => a.timeDiffSeconds - b.timeDiffSeconds,
	);
	const upcoming = sorted.filter(
		(arrival) => arrival.timeDiffSeconds > -DEPARTED_GRACE_SECONDS,
	);

	// Everything has left: keep the earliest train rather than show nothing.
	const shown = upcoming.length === 0 ? sorted.slice(0, 1) : upcoming;

	return {
		trains: shown.slice(0, limit),
		count: upcoming.length,
	};
}
