import { ParseError, StatuspageError } from "$/errors";
import { checkResponse } from "$/resources/classifier";
import type { RequestDescriptor, Transport } from "$/resources/transport";
import {
	isResponseArray,
	ResponseObject,
	type ResponseValue,
	toObject,
} from "$/response";
import type { Fields, JsonValue, ListAllOptions, Query } from "$/types";
import { isDotSegment } from "$/utils";

/** Largest `per_page` the API honours. */
export const MAX_PER_PAGE = 100;

/**
 * Per-call options accepted by every resource method.
 */
export type CallOptions = {
	requestId?: string;
	timeoutMs?: number;
	headers?: Record<string, string | undefined>;
};

export type ResourceDefinition = {
	/** Collection segment, e.g. `incidents` or `component-groups`. */
	resource: string;
	/** Key that wraps write payloads, e.g. `incident`. */
	envelope: string;
	/** Segments leading to the collection, e.g. `["pages", pageId]`. */
	parent: readonly string[];
};

export function assertId(id: string, what = "id"): void {
	if (!id || typeof id !== "string") {
		throw new StatuspageError(`${what} must be a non-empty string`);
	}
	if (isDotSegment(id)) {
		throw new StatuspageError(`${what} must not be "." or ".."`);
	}
}

export function joinPath(...segments: readonly string[]): string {
	return `/${segments.map((s) => encodeURIComponent(s)).join("/")}`;
}

/**
 * Issues one call through the fixed pipeline: transport, then classifier,
 * then mapper.
 */
export async function execute(
	transport: Transport,
	req: RequestDescriptor,
): Promise<{ value: ResponseValue; status: number; body: string; requestId: string }> {
	const res = await transport.request(req);
	const json = checkResponse(res);
	return {
		value: toObject(json),
		status: res.status,
		body: res.body,
		requestId: res.requestId,
	};
}

function callDescriptor(opts: CallOptions | undefined): Partial<RequestDescriptor> {
	return {
		requestId: opts?.requestId,
		timeoutMs: opts?.timeoutMs,
		headers: opts?.headers,
	};
}

/**
 * Generic CRUD over one statuspage.io collection.
 *
 * The named resource classes are thin wrappers around this; none of them
 * talk to the transport directly.
 */
export class ResourceOperations<
	TFields extends Fields = Fields,
	TFilters extends Query = Query,
> {
	constructor(
		private readonly transport: Transport,
		readonly definition: ResourceDefinition,
	) {}

	get collectionPath(): string {
		return joinPath(...this.definition.parent, this.definition.resource);
	}

	itemPath(id: string): string {
		assertId(id);
		return joinPath(...this.definition.parent, this.definition.resource, id);
	}

	/**
	 * Fetches a single page of the collection. The API decides the page size
	 * unless `per_page` is passed; see {@link ResourceOperations.listAll} to
	 * walk every page.
	 */
	async list(filters?: TFilters, opts?: CallOptions): Promise<ResponseObject[]> {
		return this.listAt(this.collectionPath, filters, opts);
	}

	/**
	 * Lists an arbitrary path below the collection, e.g. `incidents/unresolved`.
	 */
	async listAt(
		path: string,
		query?: Query,
		opts?: CallOptions,
	): Promise<ResponseObject[]> {
		const res = await execute(this.transport, {
			...callDescriptor(opts),
			method: "GET",
			path,
			query,
		});
		return expectList(res);
	}

	/**
	 * Async iterator over every item, requesting `page=1,2,...` until the
	 * server returns a page shorter than `perPage` (at most
	 * {@link MAX_PER_PAGE}). Any `page`/`per_page` in `filters` is overridden.
	 */
	async *listAll(
		filters?: TFilters,
		opts?: ListAllOptions & CallOptions,
	): AsyncIterable<ResponseObject> {
		const perPage = opts?.perPage ?? MAX_PER_PAGE;
		if (!Number.isInteger(perPage) || perPage < 1 || perPage > MAX_PER_PAGE) {
			throw new StatuspageError(
				`perPage must be an integer between 1 and ${MAX_PER_PAGE}`,
			);
		}

		for (let page = 1; ; page++) {
			const items = await this.listAt(
				this.collectionPath,
				{ ...filters, page, per_page: perPage },
				opts,
			);
			for (const item of items) yield item;
			if (items.length < perPage) return;
		}
	}

	async get(id: string, opts?: CallOptions): Promise<ResponseObject> {
		const res = await execute(this.transport, {
			...callDescriptor(opts),
			method: "GET",
			path: this.itemPath(id),
		});
		return expectObject(res);
	}

	async create(fields: TFields, opts?: CallOptions): Promise<ResponseObject> {
		return this.write("POST", this.collectionPath, fields, opts);
	}

	async update(
		id: string,
		fields: TFields,
		opts?: CallOptions,
	): Promise<ResponseObject> {
		return this.write("PATCH", this.itemPath(id), fields, opts);
	}

	/**
	 * Resolves once the server acknowledged the deletion; any body it sends
	 * back is discarded.
	 */
	async delete(id: string, opts?: CallOptions): Promise<void> {
		return this.deleteAt(this.itemPath(id), opts);
	}

	async deleteAt(path: string, opts?: CallOptions): Promise<void> {
		await execute(this.transport, {
			...callDescriptor(opts),
			method: "DELETE",
			path,
		});
	}

	/**
	 * Sends `{ [envelope]: fields }` to `path` and maps the returned object.
	 */
	async write(
		method: "POST" | "PATCH",
		path: string,
		fields: Fields,
		opts?: CallOptions,
		envelope = this.definition.envelope,
	): Promise<ResponseObject> {
		const res = await execute(this.transport, {
			...callDescriptor(opts),
			method,
			path,
			body: wrapEnvelope(envelope, fields),
		});
		return expectObject(res);
	}
}

export function wrapEnvelope(envelope: string, fields: Fields): JsonValue {
	const body: { [k: string]: JsonValue } = {};
	for (const [k, v] of Object.entries(fields)) {
		if (v !== undefined) body[k] = v;
	}
	return { [envelope]: body };
}

type Executed = Awaited<ReturnType<typeof execute>>;

export function expectObject(res: Executed): ResponseObject {
	if (res.value instanceof ResponseObject) return res.value;
	throw new ParseError("Expected a JSON object in the response body", {
		status: res.status,
		body: res.body,
		requestId: res.requestId,
	});
}

export function expectList(res: Executed): ResponseObject[] {
	const { value } = res;
	if (isResponseArray(value)) {
		const items: ResponseObject[] = [];
		for (const item of value) {
			if (!(item instanceof ResponseObject)) break;
			items.push(item);
		}
		if (items.length === value.length) return items;
	}
	throw new ParseError("Expected a JSON array of objects in the response body", {
		status: res.status,
		body: res.body,
		requestId: res.requestId,
	});
}
