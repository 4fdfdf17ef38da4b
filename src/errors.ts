/**
 * Symbol for custom Node.js inspect formatting.
 * Ensures errors display nicely in console.log, REPL, and debuggers.
 */
const customInspect = Symbol.for("nodejs.util.inspect.custom");

/**
 * Formats error details for display.
 */
function formatDetails(details: unknown, indent = "  "): string {
	if (details === undefined || details === null) return "";
	try {
		const json = JSON.stringify(details, null, 2);
		// Indent each line for nested display
		return json.split("\n").join(`\n${indent}`);
	} catch {
		return String(details);
	}
}

/**
 * Base error type for all SDK-raised errors.
 *
 * When available, {@link StatuspageError.requestId} is the `X-Request-Id` the
 * SDK sent, so a failure can be matched to a telemetry line.
 */
export class StatuspageError extends Error {
	override name = "StatuspageError";
	requestId?: string;

	constructor(message: string, opts?: { requestId?: string; cause?: unknown }) {
		super(message);
		this.requestId = opts?.requestId;
		this.cause = opts?.cause;
	}

	override toString(): string {
		const lines = [`${this.name}: ${this.message}`];
		if (this.requestId) lines.push(`  Request ID: ${this.requestId}`);
		return lines.join("\n");
	}

	[customInspect](): string {
		return this.toString();
	}
}

/**
 * Thrown when client options are missing or invalid (no API key, malformed
 * base URL, users API without an organization id, ...).
 */
export class ConfigurationError extends StatuspageError {
	override name = "ConfigurationError";
	issues: string[];

	constructor(message: string, issues: string[] = []) {
		super(message);
		this.issues = issues;
	}

	override toString(): string {
		const lines = [`${this.name}: ${this.message}`];
		for (const issue of this.issues) lines.push(`  - ${issue}`);
		return lines.join("\n");
	}
}

/**
 * Thrown when no HTTP response could be obtained at all: connection refused,
 * DNS failure, TLS failure or the per-call timeout firing.
 */
export class TransportError extends StatuspageError {
	override name = "TransportError";
	method: string;
	url: string;

	constructor(
		message: string,
		opts: { method: string; url: string; requestId?: string; cause?: unknown },
	) {
		super(message, { requestId: opts.requestId, cause: opts.cause });
		this.method = opts.method;
		this.url = opts.url;
	}

	override toString(): string {
		const lines = [`${this.name}: ${this.message}`];
		lines.push(`  Request: ${this.method} ${this.url}`);
		if (this.requestId) lines.push(`  Request ID: ${this.requestId}`);
		return lines.join("\n");
	}
}

/**
 * Thrown when a successful response carries a body that is not valid JSON, or
 * JSON of a shape the called operation cannot return.
 */
export class ParseError extends StatuspageError {
	override name = "ParseError";
	status: number;
	body: string;

	constructor(
		message: string,
		opts: { status: number; body: string; requestId?: string; cause?: unknown },
	) {
		super(message, { requestId: opts.requestId, cause: opts.cause });
		this.status = opts.status;
		this.body = opts.body;
	}

	override toString(): string {
		const lines = [`${this.name}: ${this.message}`];
		lines.push(`  Status: ${this.status}`);
		if (this.body) lines.push(`  Body: ${this.body}`);
		if (this.requestId) lines.push(`  Request ID: ${this.requestId}`);
		return lines.join("\n");
	}
}

/**
 * Thrown by {@link ResponseObject} accessors when a key is absent.
 */
export class KeyNotFoundError extends StatuspageError {
	override name = "KeyNotFoundError";
	key: string;

	constructor(key: string) {
		super(`Key "${key}" not found`);
		this.key = key;
	}
}

/**
 * Thrown by typed accessors when a value exists but is of another kind.
 */
export class TypeMismatchError extends StatuspageError {
	override name = "TypeMismatchError";
	expected: string;
	actual: string;

	constructor(what: string, expected: string, actual: string) {
		super(`Expected ${what} to be ${expected}, got ${actual}`);
		this.expected = expected;
		this.actual = actual;
	}
}

export type ApiErrorOptions = {
	status: number;
	body: string;
	details?: unknown;
	requestId?: string;
};

/**
 * Error returned when the API responds with a non-2xx status.
 *
 * Never thrown directly: every status maps to exactly one subclass.
 */
export abstract class ApiError extends StatuspageError {
	override name = "ApiError";
	status: number;
	/** Raw response body, as received. */
	body: string;
	/** Parsed response body, when it was JSON. */
	details?: unknown;

	constructor(message: string, opts: ApiErrorOptions) {
		super(message, { requestId: opts.requestId });
		this.status = opts.status;
		this.body = opts.body;
		this.details = opts.details;
	}

	override toString(): string {
		const lines = [`${this.name}: ${this.message}`];
		lines.push(`  Status: ${this.status}`);
		if (this.requestId) lines.push(`  Request ID: ${this.requestId}`);
		if (this.details !== undefined && this.details !== null) {
			lines.push(`  Details: ${formatDetails(this.details)}`);
		}
		return lines.join("\n");
	}
}

/**
 * HTTP 400: the request was malformed (unknown parameter, bad envelope, ...).
 */
export class BadRequestError extends ApiError {
	override name = "BadRequestError";
}

/**
 * HTTP 401 or 403: the API key is missing, invalid, or lacks access to the page.
 */
export class UnauthorizedError extends ApiError {
	override name = "UnauthorizedError";
}

/**
 * HTTP 404.
 */
export class NotFoundError extends ApiError {
	override name = "NotFoundError";
}

/**
 * HTTP 422: the server rejected the submitted fields.
 *
 * @example
 * ```typescript
 * try {
 *   await statuspage.incidents.create({ name: "" });
 * } catch (err) {
 *   if (err instanceof ValidationError) {
 *     console.log(err.errors.name); // ["can't be blank"]
 *   }
 * }
 * ```
 */
export class ValidationError extends ApiError {
	override name = "ValidationError";
	/** Field-level messages, keyed by field name. Empty when the body had none. */
	errors: Record<string, string[]>;

	constructor(
		message: string,
		opts: ApiErrorOptions & { errors?: Record<string, string[]> },
	) {
		super(message, opts);
		this.errors = opts.errors ?? {};
	}

	override toString(): string {
		const lines = [`${this.name}: ${this.message}`];
		lines.push(`  Status: ${this.status}`);
		for (const [field, messages] of Object.entries(this.errors)) {
			lines.push(`  ${field}: ${messages.join(", ")}`);
		}
		if (this.requestId) lines.push(`  Request ID: ${this.requestId}`);
		return lines.join("\n");
	}
}

/**
 * HTTP 429.
 *
 * If provided by the server, {@link RateLimitedError.retryAfterMs} indicates
 * when it is safe to reissue the call. The SDK never retries on its own.
 */
export class RateLimitedError extends ApiError {
	override name = "RateLimitedError";
	retryAfterMs?: number;

	constructor(message: string, opts: ApiErrorOptions & { retryAfterMs?: number }) {
		super(message, opts);
		this.retryAfterMs = opts.retryAfterMs;
	}

	override toString(): string {
		const lines = [`${this.name}: ${this.message}`];
		lines.push(`  Status: ${this.status}`);
		if (this.retryAfterMs !== undefined) {
			lines.push(`  Retry After: ${this.retryAfterMs}ms`);
		}
		if (this.requestId) lines.push(`  Request ID: ${this.requestId}`);
		return lines.join("\n");
	}
}

/**
 * HTTP 500-599.
 */
export class ServerError extends ApiError {
	override name = "ServerError";
}

/**
 * Any other non-2xx status (1xx, 3xx, or a 4xx without a dedicated class).
 */
export class UnexpectedStatusError extends ApiError {
	override name = "UnexpectedStatusError";
}
