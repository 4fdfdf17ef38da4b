import {
	assertId,
	type CallOptions,
	ResourceOperations,
} from "$/resources/operations";
import type { Transport } from "$/resources/transport";
import type { ResponseObject } from "$/response";
import type { IncidentUpdateFields } from "$/types";

/**
 * Incident updates API resource
 * (`/v1/pages/:pageId/incidents/:incidentId/incident_updates`).
 *
 * Updates are created by updating the incident itself; this resource reads
 * and edits the ones already posted.
 */
export class IncidentUpdatesResource {
	constructor(
		private readonly transport: Transport,
		private readonly pageId: string,
	) {}

	async list(incidentId: string, opts?: CallOptions): Promise<ResponseObject[]> {
		return this.ops(incidentId).list(undefined, opts);
	}

	async get(
		incidentId: string,
		updateId: string,
		opts?: CallOptions,
	): Promise<ResponseObject> {
		return this.ops(incidentId).get(updateId, opts);
	}

	/**
	 * @example
	 * ```typescript
	 * await statuspage.incidentUpdates.update(incidentId, updateId, {
	 *   body: "Corrected wording of the first update.",
	 * });
	 * ```
	 */
	async update(
		incidentId: string,
		updateId: string,
		fields: IncidentUpdateFields,
		opts?: CallOptions,
	): Promise<ResponseObject> {
		return this.ops(incidentId).update(updateId, fields, opts);
	}

	private ops(incidentId: string): ResourceOperations<IncidentUpdateFields> {
		assertId(incidentId, "incidentId");
		return new ResourceOperations<IncidentUpdateFields>(this.transport, {
			resource: "incident_updates",
			envelope: "incident_update",
			parent: ["pages", this.pageId, "incidents", incidentId],
		});
	}
}
