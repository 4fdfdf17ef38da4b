import { init } from "@paralleldrive/cuid2";

const createId = init({
	length: 32,
});

export function assertNever(x: never): never {
	throw new Error(`Unexpected object: ${String(x)}`);
}

export function isObject(x: unknown): x is Record<string, unknown> {
	return typeof x === "object" && x !== null && !Array.isArray(x);
}

/**
 * `.` and `..` are resolved away by URL parsing even when percent-encoded,
 * so they can never address an item.
 */
export function isDotSegment(segment: string): boolean {
	return /^(?:\.|%2e){1,2}$/i.test(segment);
}

export function getHeader(headers: Headers, name: string): string | undefined {
	const v = headers.get(name);
	return v === null ? undefined : v;
}

export function makeTimeoutError(timeoutMs: number): Error {
	const e = new Error(`The operation timed out after ${timeoutMs}ms`);
	e.name = "TimeoutError";
	return e;
}

export function randomId(prefix = "req"): string {
	return `${prefix}_${createId()}`;
}
