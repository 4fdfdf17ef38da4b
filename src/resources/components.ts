import {
	type CallOptions,
	ResourceOperations,
} from "$/resources/operations";
import type { Transport } from "$/resources/transport";
import type { ResponseObject } from "$/response";
import type { ComponentFields, ListAllOptions, PaginationFilters } from "$/types";

/**
 * Components API resource (`/v1/pages/:pageId/components`).
 *
 * @example
 * ```typescript
 * const api = await statuspage.components.create({
 *   name: "API",
 *   status: "operational",
 * });
 * await statuspage.components.update(api.string("id"), {
 *   status: "partial_outage",
 * });
 * ```
 */
export class ComponentsResource {
	private readonly ops: ResourceOperations<ComponentFields, PaginationFilters>;

	constructor(transport: Transport, pageId: string) {
		this.ops = new ResourceOperations<ComponentFields, PaginationFilters>(transport, {
			resource: "components",
			envelope: "component",
			parent: ["pages", pageId],
		});
	}

	async list(
		filters?: PaginationFilters,
		opts?: CallOptions,
	): Promise<ResponseObject[]> {
		return this.ops.list(filters, opts);
	}

	listAll(opts?: ListAllOptions & CallOptions): AsyncIterable<ResponseObject> {
		return this.ops.listAll(undefined, opts);
	}

	async get(componentId: string, opts?: CallOptions): Promise<ResponseObject> {
		return this.ops.get(componentId, opts);
	}

	async create(
		fields: ComponentFields,
		opts?: CallOptions,
	): Promise<ResponseObject> {
		return this.ops.create(fields, opts);
	}

	async update(
		componentId: string,
		fields: ComponentFields,
		opts?: CallOptions,
	): Promise<ResponseObject> {
		return this.ops.update(componentId, fields, opts);
	}

	async delete(componentId: string, opts?: CallOptions): Promise<void> {
		return this.ops.delete(componentId, opts);
	}
}
