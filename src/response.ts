import { KeyNotFoundError, TypeMismatchError } from "$/errors";
import type { JsonValue } from "$/types";
import { assertNever } from "$/utils";

/**
 * A mapped JSON value: objects become {@link ResponseObject}s, arrays become
 * read-only arrays of mapped values, scalars stay as they are.
 */
export type ResponseValue =
	| ResponseObject
	| readonly ResponseValue[]
	| string
	| number
	| boolean
	| null;

export type ResponseKind =
	| "object"
	| "array"
	| "string"
	| "number"
	| "boolean"
	| "null";

/**
 * Returns the tag of a mapped value.
 */
export function kindOf(value: ResponseValue): ResponseKind {
	if (value === null) return "null";
	if (value instanceof ResponseObject) return "object";
	if (isResponseArray(value)) return "array";
	switch (typeof value) {
		case "string":
			return "string";
		case "number":
			return "number";
		case "boolean":
			return "boolean";
		default:
			return assertNever(value);
	}
}

// `Array.isArray` does not narrow readonly arrays out of a union.
export function isResponseArray(
	value: ResponseValue,
): value is readonly ResponseValue[] {
	return Array.isArray(value);
}

/**
 * In-memory view of a JSON object returned by the API.
 *
 * Fields are reachable two ways:
 * - attribute-style through {@link ResponseObject.fields}: `incident.fields.name`
 * - checked key lookup: `incident.get("name")`, or a typed accessor such as
 *   `incident.string("name")`, which throws {@link KeyNotFoundError} instead of
 *   handing back `undefined` for a missing key
 *
 * @example
 * ```typescript
 * const [incident] = await statuspage.incidents.list();
 * incident.string("name"); // "API outage"
 * incident.fields.status; // "investigating"
 * ```
 */
export class ResponseObject {
	readonly fields: Readonly<Record<string, ResponseValue>>;

	constructor(fields: Record<string, ResponseValue>) {
		this.fields = Object.freeze({ ...fields });
	}

	get size(): number {
		return Object.keys(this.fields).length;
	}

	keys(): string[] {
		return Object.keys(this.fields);
	}

	has(key: string): boolean {
		return Object.hasOwn(this.fields, key);
	}

	/**
	 * @throws {KeyNotFoundError} if the key is absent
	 */
	get(key: string): ResponseValue {
		const value = this.find(key);
		if (value === undefined) throw new KeyNotFoundError(key);
		return value;
	}

	/**
	 * Like {@link ResponseObject.get}, but returns `undefined` for a missing key.
	 */
	find(key: string): ResponseValue | undefined {
		return this.has(key) ? this.fields[key] : undefined;
	}

	string(key: string): string {
		const value = this.get(key);
		if (typeof value !== "string") throw this.mismatch(key, "string", value);
		return value;
	}

	/**
	 * Returns `null` when the field is present but null, which the API uses
	 * for unset optional strings (`description`, `group_id`, ...).
	 */
	optionalString(key: string): string | null {
		const value = this.get(key);
		if (value !== null && typeof value !== "string") {
			throw this.mismatch(key, "string or null", value);
		}
		return value;
	}

	number(key: string): number {
		const value = this.get(key);
		if (typeof value !== "number") throw this.mismatch(key, "number", value);
		return value;
	}

	boolean(key: string): boolean {
		const value = this.get(key);
		if (typeof value !== "boolean") throw this.mismatch(key, "boolean", value);
		return value;
	}

	object(key: string): ResponseObject {
		const value = this.get(key);
		if (!(value instanceof ResponseObject)) {
			throw this.mismatch(key, "object", value);
		}
		return value;
	}

	array(key: string): readonly ResponseValue[] {
		const value = this.get(key);
		if (!isResponseArray(value)) throw this.mismatch(key, "array", value);
		return value;
	}

	/**
	 * Converts back to plain JSON, so `JSON.stringify(obj)` gives the original shape.
	 */
	toJSON(): { [k: string]: JsonValue } {
		return Object.fromEntries(
			Object.entries(this.fields).map(([k, v]): [string, JsonValue] => [k, toJson(v)]),
		);
	}

	private mismatch(
		key: string,
		expected: string,
		value: ResponseValue,
	): TypeMismatchError {
		return new TypeMismatchError(`"${key}"`, expected, kindOf(value));
	}
}

function toJson(value: ResponseValue): JsonValue {
	if (value instanceof ResponseObject) return value.toJSON();
	if (isResponseArray(value)) return value.map(toJson);
	return value;
}

/**
 * Maps decoded JSON into {@link ResponseValue}s, recursively.
 *
 * Total over JSON values; never throws.
 */
export function toObject(json: { [k: string]: JsonValue }): ResponseObject;
export function toObject(json: JsonValue[]): readonly ResponseValue[];
export function toObject(json: JsonValue): ResponseValue;
export function toObject(json: JsonValue): ResponseValue {
	if (json === null) return null;
	if (Array.isArray(json)) return Object.freeze(json.map((v) => toObject(v)));
	if (typeof json === "object") {
		// fromEntries defines keys, so a "__proto__" field stays a plain field.
		return new ResponseObject(
			Object.fromEntries(
				Object.entries(json).map(([k, v]): [string, ResponseValue] => [k, toObject(v)]),
			),
		);
	}
	return json;
}

/**
 * Narrows a mapped value to a {@link ResponseObject}.
 *
 * @throws {TypeMismatchError}
 */
export function asObject(value: ResponseValue, what = "value"): ResponseObject {
	if (value instanceof ResponseObject) return value;
	throw new TypeMismatchError(what, "object", kindOf(value));
}

/**
 * Narrows a mapped value to an array.
 *
 * @throws {TypeMismatchError}
 */
export function asArray(
	value: ResponseValue,
	what = "value",
): readonly ResponseValue[] {
	if (isResponseArray(value)) return value;
	throw new TypeMismatchError(what, "array", kindOf(value));
}
