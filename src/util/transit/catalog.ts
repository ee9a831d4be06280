import path from "node:path";
import { parse } from "csv-parse/sync";
import yauzl, { type Entry, type ZipFile } from "yauzl";
import { z } from "zod";
import type { ArrivalsConfig } from "../../config";
import type { DisplayNames } from "./ArrivalPoller";
import { knownLineName } from "./lines";

const routeRowSchema = z.object({
	route_id: z.string().min(1),
	route_short_name: z.string().optional(),
	route_long_name: z.string().optional(),
});

const stopRowSchema = z.object({
	stop_id: z.string().min(1),
	stop_name: z.string(),
	parent_station: z.string().optional(),
});

const tripRowSchema = z.object({
	route_id: z.string().min(1),
	trip_id: z.string().min(1),
});

const stopTimeRowSchema = z.object({
	trip_id: z.string().min(1),
	stop_id: z.string().min(1),
	stop_sequence: z.coerce.number().int(),
});

type RouteRow = z.infer<typeof routeRowSchema>;
type StopRow = z.infer<typeof stopRowSchema>;

const GTFS_FILES = ["routes.txt", "stops.txt", "trips.txt", "stop_times.txt"];

export class ScheduleCatalog {
	private readonly routes = new Map<string, RouteRow>();
	private readonly stops = new Map<string, StopRow>();
	private readonly stopsByRoute = new Map<string, string[]>();

	constructor(files: Record<string, string>) {
		for (const row of parseRows(files["routes.txt"], routeRowSchema)) {
			this.routes.set(row.route_id, row);
		}
		for (const row of parseRows(files["stops.txt"], stopRowSchema)) {
			this.stops.set(row.stop_id, row);
		}

		const routeByTrip = new Map<string, string>();
		for (const row of parseRows(files["trips.txt"], tripRowSchema)) {
			routeByTrip.set(row.trip_id, row.route_id);
		}

		const stopTimes = parseRows(files["stop_times.txt"], stopTimeRowSchema).sort(
			(a, b) => a.stop_sequence - b.stop_sequence,
		);
		const seen = new Map<string, Set<string>>();
		for (const row of stopTimes) {
			const routeId = routeByTrip.get(row.trip_id);
			if (!routeId) continue;

			let stops = seen.get(routeId);
			if (!stops) {
				stops = new Set();
				seen.set(routeId, stops);
			}
			stops.add(row.stop_id);
		}
		for (const [routeId, stops] of seen) {
			this.stopsByRoute.set(routeId, [...stops]);
		}
	}

	lineName(routeId: string): string | undefined {
		const route = this.routes.get(routeId);
		return route?.route_long_name || route?.route_short_name || undefined;
	}

	stopName(stopId: string): string | undefined {
		return this.stops.get(stopId)?.stop_name || undefined;
	}

	/** Stop ids served by any trip of the route, in stop sequence order. */
	stopsForLine(routeId: string): string[] {
		return [...(this.stopsByRoute.get(routeId) ?? [])];
	}
}

function parseRows<T>(
	text: string | undefined,
	schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): T[] {
	if (!text) return [];

	const records: unknown = parse(text, {
		columns: true,
		skip_empty_lines: true,
		trim: true,
		bom: true,
	});
	const rows = z.array(z.unknown()).parse(records);

	const parsed: T[] = [];
	for (const row of rows) {
		const result = schema.safeParse(row);
		if (result.success) parsed.push(result.data);
	}
	return parsed;
}

function openZip(source: string | Buffer): Promise<ZipFile> {
	return new Promise((resolve, reject) => {
		const callback = (error: Error | null, zipfile?: ZipFile) => {
			if (error || !zipfile) reject(error ?? new Error("Unable to open zip"));
			else resolve(zipfile);
		};
		if (typeof source === "string") {
			yauzl.open(source, { lazyEntries: true }, callback);
		} else {
			yauzl.fromBuffer(source, { lazyEntries: true }, callback);
		}
	});
}

function readEntry(zipfile: ZipFile, entry: Entry): Promise<string> {
	return new Promise((resolve, reject) => {
		zipfile.openReadStream(entry, (error, stream) => {
			if (error || !stream) {
				reject(error ?? new Error(`Unable to read ${entry.fileName}`));
				return;
			}
			const chunks: Buffer[] = [];
			stream.on("data", (chunk: Buffer) => chunks.push(chunk));
			stream.on("error", reject);
			stream.on("end", () => resolve(Buffer.concat(chunks).toString("utf8")));
		});
	});
}

async function extractGtfsFiles(
	source: string | Buffer,
): Promise<Record<string, string>> {
	const zipfile = await openZip(source);
	const files: Record<string, string> = {};

	return new Promise((resolve, reject) => {
		zipfile.on("entry", (entry: Entry) => {
			const name = path.posix.basename(entry.fileName);
			if (!GTFS_FILES.includes(name)) {
				zipfile.readEntry();
				return;
			}
			readEntry(zipfile, entry).then(
				(text) => {
					files[name] = text;
					zipfile.readEntry();
				},
				(error: unknown) => {
					zipfile.close();
					reject(error);
				},
			);
		});
		zipfile.on("error", reject);
		zipfile.on("end", () => resolve(files));
		zipfile.readEntry();
	});
}

/** Loads the parts of a static GTFS schedule (zip path or buffer) used for naming. */
export async function loadScheduleCatalog(
	source: string | Buffer,
): Promise<ScheduleCatalog> {
	const files = await extractGtfsFiles(source);
	console.log("Loaded schedule", { files: Object.keys(files).sort() });
	return new ScheduleCatalog(files);
}

export function resolveDisplayNames(
	config: Pick<
		ArrivalsConfig,
		| "lineId"
		| "lineName"
		| "startStation"
		| "endStation"
		| "startStationName"
		| "endStationName"
	>,
	catalog?: ScheduleCatalog,
): DisplayNames {
	return {
		lineName:
			config.lineName ??
			catalog?.lineName(config.lineId) ??
			knownLineName(config.lineId) ??
			config.lineId,
		startStationName:
			config.startStationName ??
			catalog?.stopName(config.startStation) ??
			config.startStation,
		endStationName:
			config.endStationName ??
			catalog?.stopName(config.endStation) ??
			config.endStation,
	};
}

/** Configured stops that no scheduled trip of the line serves. */
export function stopsMissingFromLine(
	config: Pick<ArrivalsConfig, "lineId" | "startStation" | "endStation">,
	catalog: ScheduleCatalog,
): string[] {
	const served = new Set(catalog.stopsForLine(config.lineId));
	return [config.startStation, config.endStation].filter(
		(stopId) => !served.has(stopId),
	);
}
