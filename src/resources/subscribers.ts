import {
	type CallOptions,
	ResourceOperations,
} from "$/resources/operations";
import type { Transport } from "$/resources/transport";
import type { ResponseObject } from "$/response";
import type {
	ListAllOptions,
	SubscriberFields,
	SubscriberListFilters,
} from "$/types";

/**
 * Subscribers API resource (`/v1/pages/:pageId/subscribers`).
 *
 * {@link delete} unsubscribes; the subscriber record stays visible with
 * `state=all`.
 */
export class SubscribersResource {
	private readonly ops: ResourceOperations<
		SubscriberFields,
		SubscriberListFilters
	>;

	constructor(transport: Transport, pageId: string) {
		this.ops = new ResourceOperations<
			SubscriberFields,
			SubscriberListFilters
		>(transport, {
			resource: "subscribers",
			envelope: "subscriber",
			parent: ["pages", pageId],
		});
	}

	async list(
		filters?: SubscriberListFilters,
		opts?: CallOptions,
	): Promise<ResponseObject[]> {
		return this.ops.list(filters, opts);
	}

	listAll(
		filters?: Omit<SubscriberListFilters, "page" | "per_page">,
		opts?: ListAllOptions & CallOptions,
	): AsyncIterable<ResponseObject> {
		return this.ops.listAll(filters, opts);
	}

	async get(subscriberId: string, opts?: CallOptions): Promise<ResponseObject> {
		return this.ops.get(subscriberId, opts);
	}

	async create(
		fields: SubscriberFields,
		opts?: CallOptions,
	): Promise<ResponseObject> {
		return this.ops.create(fields, opts);
	}

	async update(
		subscriberId: string,
		fields: SubscriberFields,
		opts?: CallOptions,
	): Promise<ResponseObject> {
		return this.ops.update(subscriberId, fields, opts);
	}

	async delete(subscriberId: string, opts?: CallOptions): Promise<void> {
		return this.ops.delete(subscriberId, opts);
	}
}
