/**
 * statuspage.io Node SDK
 *
 * This module is the public entrypoint for the package. It re-exports:
 * - {@link Statuspage} (the main client)
 * - Error types from {@link "$/errors"}
 * - {@link ResponseObject} and the helpers for mapped responses
 * - Public TypeScript types from {@link "$/types"}
 */
export * from "$/errors";
export type { CallOptions } from "$/resources/operations";
export type { HttpMethod, Telemetry } from "$/resources/transport";
export {
	asArray,
	asObject,
	kindOf,
	ResponseObject,
	type ResponseKind,
	type ResponseValue,
	toObject,
} from "$/response";
export {
	type RawRequestOptions,
	Statuspage,
	type StatuspageClientOptions,
} from "$/Statuspage";
export { consoleTelemetry, type TelemetryLogger } from "$/telemetry";
export type * from "$/types";

import { ApiError, StatuspageError, ValidationError } from "$/errors";

/**
 * Type guard for catching SDK errors.
 */
export function isStatuspageError(err: unknown): err is StatuspageError {
	return err instanceof StatuspageError;
}

/**
 * Type guard for errors carrying an HTTP status.
 *
 * @example
 * ```typescript
 * try {
 *   await statuspage.incidents.get(id);
 * } catch (err) {
 *   if (isApiError(err) && err.status >= 500) {
 *     // reissue later
 *   }
 * }
 * ```
 */
export function isApiError(err: unknown): err is ApiError {
	return err instanceof ApiError;
}

/**
 * Type guard for 422 responses.
 *
 * @example
 * ```typescript
 * try {
 *   await statuspage.components.create({ name: "" });
 * } catch (err) {
 *   if (isValidationError(err)) {
 *     for (const [field, messages] of Object.entries(err.errors)) {
 *       console.log(`${field}: ${messages.join(", ")}`);
 *     }
 *   }
 * }
 * ```
 */
export function isValidationError(err: unknown): err is ValidationError {
	return err instanceof ValidationError;
}
