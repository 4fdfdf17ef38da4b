import {
	type CallOptions,
	ResourceOperations,
} from "$/resources/operations";
import type { Transport } from "$/resources/transport";
import type { ResponseObject } from "$/response";
import type {
	IncidentFields,
	IncidentListFilters,
	ListAllOptions,
	PaginationFilters,
} from "$/types";

/**
 * Incidents API resource.
 *
 * Responsibilities:
 * - List incidents, optionally searched with `q` (`GET /v1/pages/:pageId/incidents`)
 * - List by state: unresolved, scheduled, upcoming, active maintenance
 * - Get, create, update and delete single incidents
 *
 * Posting a new update to an incident is done through {@link update} with a
 * `body` and, usually, a new `status`; the API records it as an incident
 * update. Existing updates are edited through `incidentUpdates`.
 */
export class IncidentsResource {
	private readonly ops: ResourceOperations<IncidentFields, IncidentListFilters>;

	constructor(transport: Transport, pageId: string) {
		this.ops = new ResourceOperations<IncidentFields, IncidentListFilters>(transport, {
			resource: "incidents",
			envelope: "incident",
			parent: ["pages", pageId],
		});
	}

	/**
	 * @example
	 * ```typescript
	 * const incidents = await statuspage.incidents.list({ q: "database" });
	 * for (const incident of incidents) console.log(incident.string("name"));
	 * ```
	 */
	async list(
		filters?: IncidentListFilters,
		opts?: CallOptions,
	): Promise<ResponseObject[]> {
		return this.ops.list(filters, opts);
	}

	listAll(
		filters?: Pick<IncidentListFilters, "q">,
		opts?: ListAllOptions & CallOptions,
	): AsyncIterable<ResponseObject> {
		return this.ops.listAll(filters, opts);
	}

	async listUnresolved(
		filters?: PaginationFilters,
		opts?: CallOptions,
	): Promise<ResponseObject[]> {
		return this.listState("unresolved", filters, opts);
	}

	async listScheduled(
		filters?: PaginationFilters,
		opts?: CallOptions,
	): Promise<ResponseObject[]> {
		return this.listState("scheduled", filters, opts);
	}

	async listUpcoming(
		filters?: PaginationFilters,
		opts?: CallOptions,
	): Promise<ResponseObject[]> {
		return this.listState("upcoming", filters, opts);
	}

	async listActiveMaintenance(
		filters?: PaginationFilters,
		opts?: CallOptions,
	): Promise<ResponseObject[]> {
		return this.listState("active_maintenance", filters, opts);
	}

	async get(incidentId: string, opts?: CallOptions): Promise<ResponseObject> {
		return this.ops.get(incidentId, opts);
	}

	/**
	 * @example
	 * ```typescript
	 * await statuspage.incidents.create({
	 *   name: "Elevated API errors",
	 *   status: "investigating",
	 *   component_ids: [apiComponentId],
	 *   components: { [apiComponentId]: "partial_outage" },
	 * });
	 * ```
	 */
	async create(
		fields: IncidentFields,
		opts?: CallOptions,
	): Promise<ResponseObject> {
		return this.ops.create(fields, opts);
	}

	async update(
		incidentId: string,
		fields: IncidentFields,
		opts?: CallOptions,
	): Promise<ResponseObject> {
		return this.ops.update(incidentId, fields, opts);
	}

	async delete(incidentId: string, opts?: CallOptions): Promise<void> {
		return this.ops.delete(incidentId, opts);
	}

	private async listState(
		state: "unresolved" | "scheduled" | "upcoming" | "active_maintenance",
		filters: PaginationFilters | undefined,
		opts: CallOptions | undefined,
	): Promise<ResponseObject[]> {
		return this.ops.listAt(`${this.ops.collectionPath}/${state}`, filters, opts);
	}
}
