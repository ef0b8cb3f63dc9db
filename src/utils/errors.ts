import axios from "axios";

/**
 * Failure classes the loop reacts to. `transient` and `malformed` are retried
 * and then skipped, `auth` is only fatal at startup, `rejected` leaves the
 * trade lifecycle where it was, `notify` is dropped after logging.
 */
export type ErrorKind =
	| "transient"
	| "malformed"
	| "auth"
	| "rejected"
	| "notify"
	| "unexpected";

export class EngineError extends Error {
	readonly kind: ErrorKind;
	readonly code?: number | string;

	constructor(
		kind: ErrorKind,
		message: string,
		options: { cause?: unknown; code?: number | string } = {},
	) {
		super(message, { cause: options.cause });
		this.name = "EngineError";
		this.kind = kind;
		this.code = options.code;
	}
}

export type Result<T> =
	| { ok: true; value: T }
	| { ok: false; error: EngineError };

export function ok<T>(value: T): Result<T> {
	return { ok: true, value };
}

export function fail<T>(error: EngineError): Result<T> {
	return { ok: false, error };
}

export function isRetryable(kind: ErrorKind): boolean {
	return kind === "transient" || kind === "malformed";
}

const NETWORK_CODES = new Set([
	"ECONNRESET",
	"ECONNREFUSED",
	"ECONNABORTED",
	"ETIMEDOUT",
	"ENOTFOUND",
	"EAI_AGAIN",
	"EPIPE",
	"ERR_NETWORK",
]);

// Binance error codes: signature/key problems vs throttling and disconnects.
const BINANCE_AUTH_CODES = new Set([-1022, -2014, -2015]);
const BINANCE_TRANSIENT_CODES = new Set([-1000, -1001, -1003, -1007, -1021]);

function field(value: unknown, key: string): unknown {
	if (typeof value !== "object" || value === null) return undefined;
	return Reflect.get(value, key);
}

function snippet(body: unknown): string {
	const text = typeof body === "string" ? body : JSON.stringify(body);
	const flat = (text ?? "").replace(/\s+/g, " ").trim();
	return flat.length > 160 ? `${flat.slice(0, 160)}…` : flat;
}

function messageOf(err: unknown): string {
	const message = field(err, "message");
	if (typeof message === "string" && message) return message;

	const requestUrl = field(err, "requestUrl");
	const body = field(err, "body");
	if (typeof requestUrl === "string" || body !== undefined) {
		const where = typeof requestUrl === "string" ? ` ${requestUrl}` : "";
		const reply = body === undefined ? "no body" : snippet(body);
		return `Exchange request failed${where}: ${reply}`;
	}
	return String(err);
}

/** The binance client rethrows HTTP failures as plain objects carrying the reply body. */
function isExchangeReply(err: unknown): boolean {
	return field(err, "body") !== undefined || typeof field(err, "requestUrl") === "string";
}

function classifyHttpStatus(status: number): ErrorKind {
	if (status === 401 || status === 403) return "auth";
	if (status === 408 || status === 429 || status >= 500) return "transient";
	return "rejected";
}

export function classifyError(err: unknown): EngineError {
	if (err instanceof EngineError) return err;

	if (axios.isAxiosError(err)) {
		const status = err.response?.status;
		const kind = status === undefined ? "transient" : classifyHttpStatus(status);
		return new EngineError(kind, err.message, { cause: err, code: status });
	}

	const code = field(err, "code");

	if (typeof code === "number") {
		if (BINANCE_AUTH_CODES.has(code)) {
			return new EngineError("auth", messageOf(err), { cause: err, code });
		}
		if (BINANCE_TRANSIENT_CODES.has(code)) {
			return new EngineError("transient", messageOf(err), { cause: err, code });
		}
		if (code < 0) {
			return new EngineError("rejected", messageOf(err), { cause: err, code });
		}
	}

	// no negative API code: a gateway or HTML error page rather than an API answer
	if (typeof code !== "string" && isExchangeReply(err)) {
		return new EngineError("transient", messageOf(err), { cause: err });
	}

	if (typeof code === "string" && NETWORK_CODES.has(code)) {
		return new EngineError("transient", messageOf(err), { cause: err, code });
	}

	if (field(err, "name") === "TimeoutError") {
		return new EngineError("transient", messageOf(err), { cause: err });
	}

	return new EngineError("unexpected", messageOf(err), { cause: err });
}
