import {
	type CallOptions,
	ResourceOperations,
} from "$/resources/operations";
import type { Transport } from "$/resources/transport";
import type { ResponseObject } from "$/response";
import type { PageFields } from "$/types";

/**
 * Pages API resource.
 *
 * A "page" is the status page the client is bound to, not a pagination unit.
 *
 * - List every page the API key can reach (`GET /v1/pages`)
 * - Get the bound page (`GET /v1/pages/:pageId`)
 * - Update the bound page (`PATCH /v1/pages/:pageId`)
 */
export class PagesResource {
	private readonly ops: ResourceOperations<PageFields>;

	constructor(
		transport: Transport,
		private readonly pageId: string,
	) {
		this.ops = new ResourceOperations<PageFields>(transport, {
			resource: "pages",
			envelope: "page",
			parent: [],
		});
	}

	async list(opts?: CallOptions): Promise<ResponseObject[]> {
		return this.ops.list(undefined, opts);
	}

	/**
	 * Get the page this client is bound to, or another page by id.
	 */
	async get(pageId = this.pageId, opts?: CallOptions): Promise<ResponseObject> {
		return this.ops.get(pageId, opts);
	}

	/**
	 * @example
	 * ```typescript
	 * await statuspage.pages.update({ time_zone: "Etc/UTC" });
	 * ```
	 */
	async update(fields: PageFields, opts?: CallOptions): Promise<ResponseObject> {
		return this.ops.update(this.pageId, fields, opts);
	}
}
