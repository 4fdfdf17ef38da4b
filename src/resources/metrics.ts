import {
	assertId,
	type CallOptions,
	joinPath,
	ResourceOperations,
} from "$/resources/operations";
import type { Transport } from "$/resources/transport";
import type { ResponseObject } from "$/response";
import type {
	MetricDataPoint,
	MetricFields,
	PaginationFilters,
} from "$/types";

/**
 * Metrics API resource.
 *
 * Responsibilities:
 * - List, get, update and delete metrics (`/v1/pages/:pageId/metrics`)
 * - Create a metric under a metrics provider
 *   (`POST /v1/pages/:pageId/metrics_providers/:providerId/metrics`)
 * - Submit and reset data points (`/v1/pages/:pageId/metrics/:metricId/data`)
 */
export class MetricsResource {
	private readonly ops: ResourceOperations<MetricFields, PaginationFilters>;

	constructor(
		transport: Transport,
		private readonly pageId: string,
	) {
		this.ops = new ResourceOperations<MetricFields, PaginationFilters>(transport, {
			resource: "metrics",
			envelope: "metric",
			parent: ["pages", pageId],
		});
	}

	async list(
		filters?: PaginationFilters,
		opts?: CallOptions,
	): Promise<ResponseObject[]> {
		return this.ops.list(filters, opts);
	}

	async get(metricId: string, opts?: CallOptions): Promise<ResponseObject> {
		return this.ops.get(metricId, opts);
	}

	/**
	 * Metrics always belong to a provider; use the id of a "Self" provider for
	 * metrics fed through {@link addData}.
	 */
	async create(
		providerId: string,
		fields: MetricFields,
		opts?: CallOptions,
	): Promise<ResponseObject> {
		assertId(providerId, "providerId");
		return this.ops.write(
			"POST",
			joinPath("pages", this.pageId, "metrics_providers", providerId, "metrics"),
			fields,
			opts,
		);
	}

	async update(
		metricId: string,
		fields: MetricFields,
		opts?: CallOptions,
	): Promise<ResponseObject> {
		return this.ops.update(metricId, fields, opts);
	}

	async delete(metricId: string, opts?: CallOptions): Promise<void> {
		return this.ops.delete(metricId, opts);
	}

	/**
	 * @example
	 * ```typescript
	 * await statuspage.metrics.addData(metricId, {
	 *   timestamp: Math.floor(Date.now() / 1000),
	 *   value: 42.5,
	 * });
	 * ```
	 */
	async addData(
		metricId: string,
		point: MetricDataPoint,
		opts?: CallOptions,
	): Promise<ResponseObject> {
		return this.ops.write(
			"POST",
			`${this.ops.itemPath(metricId)}/data`,
			point,
			opts,
			"data",
		);
	}

	/**
	 * Removes every data point of the metric.
	 */
	async deleteData(metricId: string, opts?: CallOptions): Promise<void> {
		return this.ops.deleteAt(`${this.ops.itemPath(metricId)}/data`, opts);
	}
}
