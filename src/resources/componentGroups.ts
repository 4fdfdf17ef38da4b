import {
	type CallOptions,
	ResourceOperations,
} from "$/resources/operations";
import type { Transport } from "$/resources/transport";
import type { ResponseObject } from "$/response";
import type { ComponentGroupFields, PaginationFilters } from "$/types";

/**
 * Component groups API resource (`/v1/pages/:pageId/component-groups`).
 *
 * `components` lists the ids of the components in the group; a group must
 * hold at least one.
 */
export class ComponentGroupsResource {
	private readonly ops: ResourceOperations<
		ComponentGroupFields,
		PaginationFilters
	>;

	constructor(transport: Transport, pageId: string) {
		this.ops = new ResourceOperations<
			ComponentGroupFields,
			PaginationFilters
		>(transport, {
			resource: "component-groups",
			envelope: "component_group",
			parent: ["pages", pageId],
		});
	}

	async list(
		filters?: PaginationFilters,
		opts?: CallOptions,
	): Promise<ResponseObject[]> {
		return this.ops.list(filters, opts);
	}

	async get(groupId: string, opts?: CallOptions): Promise<ResponseObject> {
		return this.ops.get(groupId, opts);
	}

	async create(
		fields: ComponentGroupFields,
		opts?: CallOptions,
	): Promise<ResponseObject> {
		return this.ops.create(fields, opts);
	}

	async update(
		groupId: string,
		fields: ComponentGroupFields,
		opts?: CallOptions,
	): Promise<ResponseObject> {
		return this.ops.update(groupId, fields, opts);
	}

	async delete(groupId: string, opts?: CallOptions): Promise<void> {
		return this.ops.delete(groupId, opts);
	}
}
