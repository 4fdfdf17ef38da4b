import { TransportError } from "$/errors";
import type { JsonValue, Query } from "$/types";
import { makeTimeoutError, randomId } from "$/utils";

/** REST API version prefix placed between the base URL and every path. */
export const API_VERSION = "/v1";

export type Telemetry = {
	onRequest?: (ctx: {
		method: string;
		url: string;
		requestId: string;
	}) => void;
	onResponse?: (ctx: {
		method: string;
		status: number;
		url: string;
		requestId: string;
		durationMs: number;
	}) => void;
	onError?: (ctx: {
		method: string;
		url: string;
		requestId: string;
		error: unknown;
	}) => void;
};

export type TransportOptions = {
	apiKey: string;
	baseUrl: string;
	timeoutMs: number;
	defaultHeaders?: Record<string, string>;
	fetch?: typeof fetch;
	telemetry?: Telemetry;
	userAgent?: string;
};

export type HttpMethod = "GET" | "POST" | "PATCH" | "PUT" | "DELETE";

/**
 * Everything needed to issue one call. Built per call and discarded after it.
 */
export type RequestDescriptor = {
	method: HttpMethod;
	/** Path below the version prefix, e.g. `/pages/abc123/incidents`. */
	path: string;
	query?: Query;
	headers?: Record<string, string | undefined>;
	/** Serialized with `JSON.stringify` as-is; envelopes are added by callers. */
	body?: JsonValue;
	requestId?: string;
	/** Overrides the client-wide timeout for this call only. */
	timeoutMs?: number;
};

export type RawResponse = {
	status: number;
	/** Undecoded body text; empty for 204 and other bodiless responses. */
	body: string;
	headers: Headers;
	requestId: string;
};

export function buildUrl(
	baseUrl: string,
	path: string,
	query?: Query,
): string {
	const u = new URL(
		`${API_VERSION}${path}`.replace(/^\//, ""),
		baseUrl.endsWith("/") ? baseUrl : `${baseUrl}/`,
	);
	if (query) {
		for (const [k, v] of Object.entries(query)) {
			if (v === undefined) continue;
			if (Array.isArray(v)) {
				for (const item of v) u.searchParams.append(`${k}[]`, item);
				continue;
			}
			u.searchParams.set(k, String(v));
		}
	}
	return u.toString();
}

/**
 * Runs a telemetry hook. A failing hook is reported on the console and never
 * changes the outcome of the call it observes.
 */
function observe(hook: () => void): void {
	try {
		hook();
	} catch (err) {
		console.warn("[statuspage] telemetry hook failed:", err);
	}
}

/**
 * Thin wrapper over `fetch` that knows how to authenticate against the
 * statuspage.io API.
 *
 * It performs exactly one network call per {@link Transport.request} and never
 * looks at the status code; classification happens in `checkResponse`.
 */
export class Transport {
	private readonly fetchImpl: typeof fetch;

	constructor(private readonly opts: TransportOptions) {
		this.fetchImpl = opts.fetch ?? fetch;
	}

	async request(req: RequestDescriptor): Promise<RawResponse> {
		const url = buildUrl(this.opts.baseUrl, req.path, req.query);

		const requestId = req.requestId ?? randomId("req");
		const headers: Record<string, string> = {
			Accept: "application/json",
			Authorization: `OAuth ${this.opts.apiKey}`,
			"X-Request-Id": requestId,
			...(this.opts.userAgent ? { "User-Agent": this.opts.userAgent } : {}),
			...(this.opts.defaultHeaders ?? {}),
		};

		if (req.headers) {
			for (const [k, v] of Object.entries(req.headers)) {
				if (v !== undefined) headers[k] = v;
			}
		}

		let body: string | undefined;
		if (req.body !== undefined) {
			headers["Content-Type"] = "application/json";
			body = JSON.stringify(req.body);
		}

		const { telemetry } = this.opts;
		observe(() => telemetry?.onRequest?.({ method: req.method, url, requestId }));

		const timeoutMs = req.timeoutMs ?? this.opts.timeoutMs;
		const controller = new AbortController();
		const timeout = setTimeout(
			() => controller.abort(makeTimeoutError(timeoutMs)),
			timeoutMs,
		);
		const startedAt = Date.now();

		let res: Response;
		let text: string;
		try {
			res = await this.fetchImpl(url, {
				method: req.method,
				headers,
				body,
				signal: controller.signal,
			});
			// The body read is covered by the same timeout as the headers.
			text = await res.text();
		} catch (err) {
			observe(() =>
				telemetry?.onError?.({ method: req.method, url, requestId, error: err }),
			);
			const reason = controller.signal.aborted
				? `Request timed out after ${timeoutMs}ms`
				: `Request failed: ${err instanceof Error ? err.message : String(err)}`;
			throw new TransportError(reason, {
				method: req.method,
				url,
				requestId,
				cause: err,
			});
		} finally {
			clearTimeout(timeout);
		}

		const { status } = res;
		observe(() =>
			telemetry?.onResponse?.({
				method: req.method,
				status,
				url,
				requestId,
				durationMs: Date.now() - startedAt,
			}),
		);

		return { status, body: text, headers: res.headers, requestId };
	}
}
