import { z } from "zod";
import {
	type ApiError,
	type ApiErrorOptions,
	BadRequestError,
	NotFoundError,
	ParseError,
	RateLimitedError,
	ServerError,
	UnauthorizedError,
	UnexpectedStatusError,
	ValidationError,
} from "$/errors";
import type { RawResponse } from "$/resources/transport";
import type { JsonValue } from "$/types";
import { getHeader, isObject } from "$/utils";

/**
 * Shapes the API uses for field-level validation detail. Both
 * `{ errors: { name: ["can't be blank"] } }` and the single-message
 * `{ errors: { name: "can't be blank" } }` occur in practice.
 */
const fieldErrorsSchema = z.record(
	z.string(),
	z.union([z.array(z.string()), z.string().transform((s) => [s])]),
);

function parseJson(text: string): { ok: true; value: JsonValue } | { ok: false; error: unknown } {
	try {
		return { ok: true, value: JSON.parse(text) as JsonValue };
	} catch (error) {
		return { ok: false, error };
	}
}

function messageOf(status: number, text: string, parsed: unknown): string {
	if (isObject(parsed)) {
		if (typeof parsed.message === "string" && parsed.message) {
			return parsed.message;
		}
		const error = parsed.error;
		if (typeof error === "string" && error) return error;
		if (Array.isArray(error) && error.length > 0) {
			return error.map((e) => String(e)).join("; ");
		}
	}
	if (typeof parsed === "string" && parsed) return parsed;
	const trimmed = text.trim();
	if (trimmed && parsed === undefined) return trimmed;
	return `Request failed with status ${status}`;
}

function retryAfterMs(headers: Headers): number | undefined {
	const ra = getHeader(headers, "retry-after");
	if (!ra) return undefined;
	const sec = Number(ra);
	if (Number.isFinite(sec) && sec >= 0) return sec * 1000;
	return undefined;
}

/**
 * Maps a non-2xx response onto exactly one {@link ApiError} subclass.
 */
export function classifyError(res: RawResponse): ApiError {
	const { status, body, requestId } = res;

	let parsed: unknown;
	if (body.trim()) {
		const result = parseJson(body);
		if (result.ok) parsed = result.value;
	}

	const message = messageOf(status, body, parsed);
	const opts: ApiErrorOptions = { status, body, details: parsed, requestId };

	if (status === 400) return new BadRequestError(message, opts);
	if (status === 401 || status === 403) return new UnauthorizedError(message, opts);
	if (status === 404) return new NotFoundError(message, opts);
	if (status === 422) {
		const fieldErrors = isObject(parsed)
			? fieldErrorsSchema.safeParse(parsed.errors)
			: undefined;
		return new ValidationError(message, {
			...opts,
			errors: fieldErrors?.success ? fieldErrors.data : undefined,
		});
	}
	if (status === 429) {
		return new RateLimitedError(message, {
			...opts,
			retryAfterMs: retryAfterMs(res.headers),
		});
	}
	if (status >= 500 && status <= 599) return new ServerError(message, opts);
	return new UnexpectedStatusError(message, opts);
}

/**
 * Returns the decoded JSON body of a 2xx response, or throws.
 *
 * An empty 2xx body (204 No Content, or a bodiless 200) decodes to `null`.
 *
 * @throws {ApiError} subclass matching the status, for any status outside 200-299
 * @throws {ParseError} when a 2xx body is not valid JSON
 */
export function checkResponse(res: RawResponse): JsonValue {
	if (res.status < 200 || res.status > 299) throw classifyError(res);

	if (!res.body.trim()) return null;

	const result = parseJson(res.body);
	if (!result.ok) {
		throw new ParseError("Response body is not valid JSON", {
			status: res.status,
			body: res.body,
			requestId: res.requestId,
			cause: result.error,
		});
	}
	return result.value;
}
