export class FeedError extends Error {
	constructor(message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = new.target.name;
	}
}

/** Timeout, connection failure or a non-2xx response. */
export class TransportError extends FeedError {
	readonly status?: number;

	constructor(message: string, status?: number, options?: ErrorOptions) {
		super(message, options);
		this.status = status;
	}
}

/** The feed envelope (JSON body or protobuf message) could not be parsed. */
export class DecodeError extends FeedError {}

export class ConfigError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "ConfigError";
	}
}

export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}
