import type { Telemetry } from "$/resources/transport";

export type TelemetryLogger = Pick<Console, "debug" | "error">;

/**
 * Telemetry hooks that log one line per request, response and failure.
 *
 * Nothing is logged unless these hooks are passed to the client.
 *
 * @example
 * ```typescript
 * const statuspage = new Statuspage({
 *   apiKey,
 *   pageId,
 *   telemetry: consoleTelemetry(),
 * });
 * ```
 */
export function consoleTelemetry(logger: TelemetryLogger = console): Telemetry {
	return {
		onRequest: ({ method, url, requestId }) => {
			logger.debug(`[statuspage] ${requestId} -> ${method} ${url}`);
		},
		onResponse: ({ method, url, status, requestId, durationMs }) => {
			logger.debug(
				`[statuspage] ${requestId} <- ${status} ${method} ${url} (${durationMs}ms)`,
			);
		},
		onError: ({ method, url, requestId, error }) => {
			const reason = error instanceof Error ? error.message : String(error);
			logger.error(`[statuspage] ${requestId} !! ${method} ${url}: ${reason}`);
		},
	};
}
