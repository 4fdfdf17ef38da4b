import { StatuspageModel } from "$/model";
import { ComponentGroupsResource } from "$/resources/componentGroups";
import { ComponentsResource } from "$/resources/components";
import { IncidentsResource } from "$/resources/incidents";
import { IncidentUpdatesResource } from "$/resources/incidentUpdates";
import { MetricsResource } from "$/resources/metrics";
import { type CallOptions, execute } from "$/resources/operations";
import { PagesResource } from "$/resources/pages";
import { SubscribersResource } from "$/resources/subscribers";
import {
	type HttpMethod,
	type Telemetry,
	Transport,
} from "$/resources/transport";
import { UsersResource } from "$/resources/users";
import type { ResponseValue } from "$/response";
import type { JsonValue, Query } from "$/types";

/**
 * Options for constructing a {@link Statuspage} client.
 */
export type StatuspageClientOptions = {
	/**
	 * API key used for authenticating requests, sent as `Authorization: OAuth <key>`.
	 */
	apiKey: string;

	/**
	 * Id of the status page every page-scoped call targets.
	 */
	pageId: string;

	/**
	 * Base URL for the statuspage.io API, without the `/v1` prefix.
	 *
	 * @defaultValue "https://api.statuspage.io"
	 */
	baseUrl?: string;

	/**
	 * Per-call timeout, in milliseconds. Individual calls can override it.
	 *
	 * @defaultValue 30000
	 */
	timeoutMs?: number;

	/**
	 * Organization id, needed only for {@link Statuspage.users}.
	 */
	organizationId?: string;

	/**
	 * Headers that will be sent with every request.
	 */
	defaultHeaders?: Record<string, string>;

	/**
	 * Custom fetch implementation (useful for proxies, instrumentation, or tests).
	 */
	fetch?: typeof fetch;

	/**
	 * Overrides the User-Agent header.
	 */
	userAgent?: string;

	/**
	 * Telemetry hooks called on request/response/error.
	 * See `consoleTelemetry` for a ready-made logger.
	 */
	telemetry?: Telemetry;
};

export type RawRequestOptions = CallOptions & {
	query?: Query;
	/** Sent as-is; no envelope is added. */
	body?: JsonValue;
};

/**
 * Main SDK client.
 *
 * Exposes resource namespaces ({@link Statuspage.incidents},
 * {@link Statuspage.components}, etc.) bound to one page, and configures a
 * shared HTTP transport. Immutable once built; use {@link withOptions} to
 * derive a client for another page or key.
 *
 * @example
 * ```typescript
 * const statuspage = new Statuspage({ apiKey, pageId: "abc123" });
 * const open = await statuspage.incidents.listUnresolved();
 * ```
 */
export class Statuspage {
	public readonly pageId: string;
	public readonly baseUrl: string;

	public readonly pages: PagesResource;
	public readonly components: ComponentsResource;
	public readonly componentGroups: ComponentGroupsResource;
	public readonly incidents: IncidentsResource;
	public readonly incidentUpdates: IncidentUpdatesResource;
	public readonly subscribers: SubscribersResource;
	public readonly metrics: MetricsResource;
	public readonly users: UsersResource;

	private readonly transport: Transport;
	private readonly opts: StatuspageClientOptions;

	/**
	 * @throws {ConfigurationError} when an option is missing or invalid
	 */
	constructor(options: StatuspageClientOptions) {
		const config = StatuspageModel.parseClientOptions({
			apiKey: options.apiKey,
			pageId: options.pageId,
			baseUrl: options.baseUrl,
			timeoutMs: options.timeoutMs,
			organizationId: options.organizationId,
			defaultHeaders: options.defaultHeaders,
			userAgent: options.userAgent,
		});

		this.opts = { ...options, ...config };
		this.pageId = config.pageId;
		this.baseUrl = config.baseUrl;

		this.transport = new Transport({
			apiKey: config.apiKey,
			baseUrl: config.baseUrl,
			timeoutMs: config.timeoutMs,
			defaultHeaders: config.defaultHeaders,
			userAgent: config.userAgent,
			fetch: options.fetch,
			telemetry: options.telemetry,
		});

		this.pages = new PagesResource(this.transport, config.pageId);
		this.components = new ComponentsResource(this.transport, config.pageId);
		this.componentGroups = new ComponentGroupsResource(
			this.transport,
			config.pageId,
		);
		this.incidents = new IncidentsResource(this.transport, config.pageId);
		this.incidentUpdates = new IncidentUpdatesResource(
			this.transport,
			config.pageId,
		);
		this.subscribers = new SubscribersResource(this.transport, config.pageId);
		this.metrics = new MetricsResource(this.transport, config.pageId);
		this.users = new UsersResource(this.transport, config.organizationId);
	}

	/**
	 * Calls an arbitrary endpoint through the same pipeline as the resource
	 * clients, for operations they do not cover.
	 *
	 * @param path - Path below `/v1`, e.g. `/pages/abc123/page_access_users`.
	 * @returns The mapped body; `null` for an empty response.
	 *
	 * @example
	 * ```typescript
	 * await statuspage.request("PUT", `/pages/${statuspage.pageId}/components/${id}`, {
	 *   body: { component: { status: "operational" } },
	 * });
	 * ```
	 */
	async request(
		method: HttpMethod,
		path: string,
		options?: RawRequestOptions,
	): Promise<ResponseValue> {
		const res = await execute(this.transport, {
			method,
			path: path.startsWith("/") ? path : `/${path}`,
			query: options?.query,
			body: options?.body,
			headers: options?.headers,
			requestId: options?.requestId,
			timeoutMs: options?.timeoutMs,
		});
		return res.value;
	}

	withOptions(overrides: Partial<StatuspageClientOptions>): Statuspage {
		return new Statuspage({
			...this.opts,
			...overrides,
			apiKey: overrides.apiKey ?? this.opts.apiKey,
			pageId: overrides.pageId ?? this.opts.pageId,
		});
	}
}
