import { ConfigurationError } from "$/errors";
import {
	type CallOptions,
	ResourceOperations,
} from "$/resources/operations";
import type { Transport } from "$/resources/transport";
import type { ResponseObject } from "$/response";
import type { PaginationFilters, UserFields } from "$/types";

/**
 * Users API resource (`/v1/organizations/:organizationId/users`).
 *
 * Users belong to the organization, not to a page, so the client must be
 * constructed with an `organizationId` for these calls.
 */
export class UsersResource {
	private readonly ops?: ResourceOperations<UserFields, PaginationFilters>;

	constructor(transport: Transport, organizationId?: string) {
		if (organizationId) {
			this.ops = new ResourceOperations<UserFields, PaginationFilters>(transport, {
				resource: "users",
				envelope: "user",
				parent: ["organizations", organizationId],
			});
		}
	}

	async list(
		filters?: PaginationFilters,
		opts?: CallOptions,
	): Promise<ResponseObject[]> {
		return this.requireOps().list(filters, opts);
	}

	async get(userId: string, opts?: CallOptions): Promise<ResponseObject> {
		return this.requireOps().get(userId, opts);
	}

	async create(fields: UserFields, opts?: CallOptions): Promise<ResponseObject> {
		return this.requireOps().create(fields, opts);
	}

	async delete(userId: string, opts?: CallOptions): Promise<void> {
		return this.requireOps().delete(userId, opts);
	}

	private requireOps(): ResourceOperations<UserFields, PaginationFilters> {
		if (!this.ops) {
			throw new ConfigurationError(
				"organizationId is required for the users API",
				["organizationId: required"],
			);
		}
		return this.ops;
	}
}
