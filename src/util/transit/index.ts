import { z } from "zod";
import type { ArrivalsConfig, FeedAuth } from "../../config";
import { feedKindFor } from "./decode";
import { TransportError, errorMessage } from "./errors";
import type { FeedPayload } from "./state";

export type Fetcher = typeof fetch;

export async function trace<T>(
	label: string,
	inner: () => Promise<T>,
): Promise<T> {
	const start = performance.now();
	try {
		const result = await inner();
		const duration = performance.now() - start;
		console.log(`${label} - ${duration}ms`);
		return result;
	} catch (error) {
		const duration = performance.now() - start;
		console.error(`${label} - ERR ${error} - ${duration}ms`);
		throw error;
	}
}

type FeedRequestConfig = Pick<
	ArrivalsConfig,
	"feedUrl" | "auth" | "requestTimeoutSeconds"
>;

function buildRequest(
	feedUrl: string,
	auth: FeedAuth,
): { url: string; headers: Record<string, string> } {
	const url = new URL(feedUrl);
	const headers: Record<string, string> = {
		accept: "application/json, application/x-protobuf, */*",
	};

	switch (auth.kind) {
		case "basic": {
			const credentials = Buffer.from(
				`${auth.username}:${auth.password}`,
			).toString("base64");
			headers.authorization = `Basic ${credentials}`;
			break;
		}
		case "token":
			url.searchParams.set("api_token", auth.apiToken);
			break;
	}

	return { url: url.toString(), headers };
}

// AbortSignal.timeout() rejects with a DOMException named TimeoutError.
function isTimeout(error: unknown): boolean {
	return (
		typeof error === "object" &&
		error !== null &&
		"name" in error &&
		error.name === "TimeoutError"
	);
}

async function request(
	config: FeedRequestConfig,
	fetcher: Fetcher,
	label: string,
): Promise<Response> {
	const { url, headers } = buildRequest(config.feedUrl, config.auth);
	try {
		return await trace(label, () =>
			fetcher(url, {
				headers,
				signal: AbortSignal.timeout(config.requestTimeoutSeconds * 1000),
			}),
		);
	} catch (error) {
		if (isTimeout(error)) {
			throw new TransportError(
				`Request timed out after ${config.requestTimeoutSeconds}s`,
				undefined,
				{ cause: error },
			);
		}
		throw new TransportError(errorMessage(error), undefined, { cause: error });
	}
}

/**
 * Downloads the current trip updates. The response content type decides
 * whether the body is decoded as JSON or as a GTFS-Realtime message.
 *
 * @throws {TransportError} on network failure, timeout or a non-2xx status
 */
export async function fetchFeed(
	config: FeedRequestConfig,
	fetcher: Fetcher = fetch,
): Promise<FeedPayload> {
	const res = await request(config, fetcher, "fetchFeed");
	if (!res.ok) {
		throw new TransportError(`HTTP ${res.status}`, res.status);
	}

	let bytes: Uint8Array;
	try {
		bytes = new Uint8Array(await res.arrayBuffer());
	} catch (error) {
		throw new TransportError(`Failed to read feed body: ${errorMessage(error)}`, res.status, {
			cause: error,
		});
	}

	const kind = feedKindFor(res.headers.get("content-type"));
	console.debug("Fetched feed", { kind, bytes: bytes.byteLength });
	return { kind, bytes };
}

const probeBodySchema = z.union([z.array(z.unknown()), z.record(z.unknown())]);

/**
 * One-shot check of the configured credentials against the feed. A 401 or
 * any other failure status means invalid; a JSON body must be an array or
 * object, while a binary body is accepted as is.
 */
export async function validateCredentials(
	config: FeedRequestConfig,
	fetcher: Fetcher = fetch,
): Promise<boolean> {
	let res: Response;
	try {
		res = await request(config, fetcher, "validateCredentials");
	} catch (error) {
		console.error("Credential check failed", { message: errorMessage(error) });
		return false;
	}

	if (res.status === 401) {
		console.error("Credential check rejected", { status: res.status });
		return false;
	}
	if (!res.ok) {
		console.error("Credential check response error", { status: res.status });
		return false;
	}

	if (feedKindFor(res.headers.get("content-type")) === "protobuf") {
		return true;
	}

	try {
		return probeBodySchema.safeParse(await res.json()).success;
	} catch (error) {
		console.error("Credential check parse failed", {
			message: errorMessage(error),
		});
		return false;
	}
}
