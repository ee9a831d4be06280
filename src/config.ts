import { Temporal } from "temporal-polyfill";
import { z } from "zod";
import { ConfigError } from "./util/transit/errors";

export const DEFAULT_POLL_INTERVAL_SECONDS = 30;
export const DEFAULT_REQUEST_TIMEOUT_SECONDS = 15;
export const DEFAULT_TIMEZONE = "America/Chicago";

export const FEED_URLS = {
	basic: "https://gtfsapi.metrarail.com/gtfs/tripUpdates",
	token: "https://gtfspublic.metrarr.com/gtfs/public/tripupdates",
} as const;

export type FeedAuth =
	| { kind: "basic"; username: string; password: string }
	| { kind: "token"; apiToken: string };

export interface ArrivalsConfig {
	feedUrl: string;
	auth: FeedAuth;
	lineId: string;
	lineName?: string;
	startStation: string;
	endStation: string;
	startStationName?: string;
	endStationName?: string;
	pollIntervalSeconds: number;
	requestTimeoutSeconds: number;
	timeZone: string;
	scheduleZip?: string;
}

const optionalText = z
	.string()
	.trim()
	.transform((value) => (value === "" ? undefined : value))
	.optional();

const requiredText = z.string().trim().min(1);

const timeZoneSchema = z
	.string()
	.trim()
	.refine(
		(zone) => {
			try {
				Temporal.Now.zonedDateTimeISO(zone);
				return true;
			} catch {
				return false;
			}
		},
		{ message: "must be an IANA time zone" },
	);

const envSchema = z
	.object({
		FEED_URL: optionalText.pipe(z.string().url().optional()),
		FEED_API_TOKEN: optionalText,
		FEED_USERNAME: optionalText,
		FEED_PASSWORD: optionalText,
		LINE_ID: requiredText,
		LINE_NAME: optionalText,
		START_STATION: requiredText,
		END_STATION: requiredText,
		START_STATION_NAME: optionalText,
		END_STATION_NAME: optionalText,
		POLL_INTERVAL_SECONDS: z.coerce
			.number()
			.int()
			.positive()
			.default(DEFAULT_POLL_INTERVAL_SECONDS),
		REQUEST_TIMEOUT_SECONDS: z.coerce
			.number()
			.int()
			.min(1)
			.max(60)
			.default(DEFAULT_REQUEST_TIMEOUT_SECONDS),
		TIMEZONE: timeZoneSchema.default(DEFAULT_TIMEZONE),
		SCHEDULE_ZIP: optionalText,
	})
	.superRefine((env, ctx) => {
		const hasToken = env.FEED_API_TOKEN !== undefined;
		const hasBasic =
			env.FEED_USERNAME !== undefined || env.FEED_PASSWORD !== undefined;
		if (hasToken === hasBasic) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				message:
					"set either FEED_API_TOKEN or FEED_USERNAME and FEED_PASSWORD",
				path: ["FEED_API_TOKEN"],
			});
		} else if (hasBasic && (!env.FEED_USERNAME || !env.FEED_PASSWORD)) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				message: "FEED_USERNAME and FEED_PASSWORD must be set together",
				path: [env.FEED_USERNAME ? "FEED_PASSWORD" : "FEED_USERNAME"],
			});
		}
	});

function formatIssues(error: z.ZodError): string {
	return error.issues
		.map((issue) => `${issue.path.join(".") || "env"}: ${issue.message}`)
		.join("; ");
}

/**
 * Reads the poller configuration from environment variables.
 * @throws {ConfigError} when a variable is missing or invalid
 */
export function loadConfig(
	env: Record<string, string | undefined> = process.env,
): ArrivalsConfig {
	const parsed = envSchema.safeParse(env);
	if (!parsed.success) {
		throw new ConfigError(`Invalid configuration: ${formatIssues(parsed.error)}`);
	}

	const vars = parsed.data;
	const auth: FeedAuth = vars.FEED_API_TOKEN
		? { kind: "token", apiToken: vars.FEED_API_TOKEN }
		: {
				kind: "basic",
				username: vars.FEED_USERNAME ?? "",
				password: vars.FEED_PASSWORD ?? "",
			};

	return {
		feedUrl: vars.FEED_URL ?? FEED_URLS[auth.kind],
		auth,
		lineId: vars.LINE_ID,
		lineName: vars.LINE_NAME,
		startStation: vars.START_STATION,
		endStation: vars.END_STATION,
		startStationName: vars.START_STATION_NAME,
		endStationName: vars.END_STATION_NAME,
		pollIntervalSeconds: vars.POLL_INTERVAL_SECONDS,
		requestTimeoutSeconds: vars.REQUEST_TIMEOUT_SECONDS,
		timeZone: vars.TIMEZONE,
		scheduleZip: vars.SCHEDULE_ZIP,
	};
}
