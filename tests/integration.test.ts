import { beforeEach, describe, expect, test, vi } from "vitest";
import {
	asObject,
	ConfigurationError,
	isApiError,
	isValidationError,
	NotFoundError,
	ParseError,
	RateLimitedError,
	ServerError,
	Statuspage,
	StatuspageError,
	UnauthorizedError,
	ValidationError,
} from "../src/index";
import { TestApiServer } from "./testServer";

const api = new TestApiServer();

function makeClient(overrides?: {
	apiKey?: string;
	organizationId?: string;
}): Statuspage {
	return new Statuspage({
		apiKey: overrides?.apiKey ?? api.apiKey,
		pageId: "abc123",
		baseUrl: api.baseUrl,
		organizationId: overrides?.organizationId,
		fetch: api.fetch,
	});
}

async function rejectionOf(promise: Promise<unknown>): Promise<unknown> {
	try {
		await promise;
	} catch (err) {
		return err;
	}
	throw new Error("expected a rejection");
}

describe("SDK integration", () => {
	beforeEach(() => api.reset());

	test("incidents.list issues GET /v1/pages/:pageId/incidents and maps the body", async () => {
		api.enqueue({ status: 200, json: [{ id: "1", name: "API outage" }] });

		const incidents = await makeClient().incidents.list();

		const req = api.lastRequest;
		expect(req?.method).toBe("GET");
		expect(req?.path).toBe("/v1/pages/abc123/incidents");
		expect(req?.query.toString()).toBe("");
		expect(incidents).toHaveLength(1);
		expect(incidents[0]?.fields.name).toBe("API outage");
		expect(incidents[0]?.string("name")).toBe("API outage");
	});

	test("incidents.create wraps fields in the incident envelope and surfaces 422 detail", async () => {
		api.enqueue({
			status: 422,
			json: {
				message: "Validation failed",
				errors: { name: ["can't be blank"] },
			},
		});

		const err = await rejectionOf(
			makeClient().incidents.create({ name: "Down", status: "investigating" }),
		);

		const req = api.lastRequest;
		expect(req?.method).toBe("POST");
		expect(req?.path).toBe("/v1/pages/abc123/incidents");
		expect(req?.json).toEqual({
			incident: { name: "Down", status: "investigating" },
		});

		expect(err).toBeInstanceOf(ValidationError);
		expect(isValidationError(err)).toBe(true);
		const e = err as ValidationError;
		expect(e.status).toBe(422);
		expect(e.message).toBe("Validation failed");
		expect(e.errors.name).toEqual(["can't be blank"]);
	});

	test("401 raises UnauthorizedError for every resource and verb", async () => {
		const client = makeClient({ apiKey: "wrong-key", organizationId: "org_1" });

		const calls: Array<() => Promise<unknown>> = [
			() => client.pages.get(),
			() => client.pages.update({ name: "x" }),
			() => client.components.list(),
			() => client.components.create({ name: "API" }),
			() => client.componentGroups.update("grp_1", { name: "Core" }),
			() => client.incidents.get("inc_1"),
			() => client.incidents.listUnresolved(),
			() => client.incidentUpdates.list("inc_1"),
			() => client.subscribers.delete("sub_1"),
			() => client.metrics.addData("met_1", { timestamp: 1_700_000_000, value: 1 }),
			() => client.users.list(),
		];

		for (const call of calls) {
			const err = await rejectionOf(call());
			expect(err).toBeInstanceOf(UnauthorizedError);
			expect((err as UnauthorizedError).status).toBe(401);
			expect((err as UnauthorizedError).message).toBe("Could not authenticate");
		}
		expect(api.requests).toHaveLength(calls.length);
	});

	test("components CRUD round-trip", async () => {
		const client = makeClient();

		const created = await client.components.create({
			name: "API",
			status: "operational",
			description: undefined,
		});
		expect(api.lastRequest?.json).toEqual({
			component: { name: "API", status: "operational" },
		});
		const id = created.string("id");
		expect(id).toBe("com_1");

		const fetched = await client.components.get(id);
		expect(api.lastRequest?.path).toBe("/v1/pages/abc123/components/com_1");
		expect(fetched.toJSON()).toEqual({ id, name: "API", status: "operational" });

		const updated = await client.components.update(id, {
			status: "major_outage",
		});
		expect(api.lastRequest?.method).toBe("PATCH");
		expect(api.lastRequest?.json).toEqual({
			component: { status: "major_outage" },
		});
		expect(updated.string("status")).toBe("major_outage");
		expect(updated.string("name")).toBe("API");

		expect(await client.components.list()).toHaveLength(1);

		await expect(client.components.delete(id)).resolves.toBeUndefined();
		expect(api.lastRequest?.method).toBe("DELETE");

		const err = await rejectionOf(client.components.get(id));
		expect(err).toBeInstanceOf(NotFoundError);
		expect((err as NotFoundError).message).toBe("Not found");
	});

	test("component groups use the component_group envelope", async () => {
		const group = await makeClient().componentGroups.create({
			name: "Core",
			components: ["com_1", "com_2"],
		});

		expect(api.lastRequest?.path).toBe("/v1/pages/abc123/component-groups");
		expect(api.lastRequest?.json).toEqual({
			component_group: { name: "Core", components: ["com_1", "com_2"] },
		});
		expect(group.array("components")).toEqual(["com_1", "com_2"]);
	});

	test("server-side validation maps to ValidationError", async () => {
		const err = await rejectionOf(
			makeClient().components.create({ status: "operational" }),
		);

		expect(err).toBeInstanceOf(ValidationError);
		expect((err as ValidationError).errors).toEqual({ name: ["can't be blank"] });
	});

	test("incident state listings hit their own paths", async () => {
		const collection = "/v1/pages/abc123/incidents";
		api.seed(collection, { id: "inc_a", name: "DB slow", status: "investigating" });
		api.seed(collection, { id: "inc_b", name: "CDN", status: "resolved" });
		api.seed(collection, {
			id: "inc_c",
			name: "Upgrade",
			status: "scheduled",
			scheduled_for: "2030-01-01T00:00:00Z",
		});
		const client = makeClient();

		const unresolved = await client.incidents.listUnresolved();
		expect(api.lastRequest?.path).toBe("/v1/pages/abc123/incidents/unresolved");
		expect(unresolved.map((i) => i.string("id"))).toEqual(["inc_a"]);

		const scheduled = await client.incidents.listScheduled();
		expect(api.lastRequest?.path).toBe("/v1/pages/abc123/incidents/scheduled");
		expect(scheduled.map((i) => i.string("id"))).toEqual(["inc_c"]);

		const upcoming = await client.incidents.listUpcoming({ per_page: 10 });
		expect(api.lastRequest?.path).toBe("/v1/pages/abc123/incidents/upcoming");
		expect(api.lastRequest?.query.get("per_page")).toBe("10");
		expect(upcoming).toHaveLength(1);

		expect(await client.incidents.listActiveMaintenance()).toEqual([]);
		expect(api.lastRequest?.path).toBe(
			"/v1/pages/abc123/incidents/active_maintenance",
		);
	});

	test("incident list filters become query parameters", async () => {
		api.enqueue({ status: 200, json: [] });

		await makeClient().incidents.list({ q: "database", limit: 5 });

		expect(api.lastRequest?.query.get("q")).toBe("database");
		expect(api.lastRequest?.query.get("limit")).toBe("5");
	});

	test("incident updates nest under their incident", async () => {
		api.seed("/v1/pages/abc123/incidents/inc_1/incident_updates", {
			id: "upd_1",
			body: "Investigating",
			status: "investigating",
		});
		const client = makeClient();

		const updates = await client.incidentUpdates.list("inc_1");
		expect(api.lastRequest?.path).toBe(
			"/v1/pages/abc123/incidents/inc_1/incident_updates",
		);
		expect(updates).toHaveLength(1);

		const edited = await client.incidentUpdates.update("inc_1", "upd_1", {
			body: "Investigating elevated errors",
		});
		expect(api.lastRequest?.method).toBe("PATCH");
		expect(api.lastRequest?.path).toBe(
			"/v1/pages/abc123/incidents/inc_1/incident_updates/upd_1",
		);
		expect(api.lastRequest?.json).toEqual({
			incident_update: { body: "Investigating elevated errors" },
		});
		expect(edited.string("body")).toBe("Investigating elevated errors");
		expect(edited.string("status")).toBe("investigating");

		const one = await client.incidentUpdates.get("inc_1", "upd_1");
		expect(one.string("id")).toBe("upd_1");
	});

	test("subscribers create and unsubscribe", async () => {
		const client = makeClient();

		const sub = await client.subscribers.create({ email: "ops@example.com" });
		expect(api.lastRequest?.json).toEqual({
			subscriber: { email: "ops@example.com" },
		});

		await client.subscribers.list({ state: "all", type: "email" });
		expect(api.lastRequest?.query.get("state")).toBe("all");
		expect(api.lastRequest?.query.get("type")).toBe("email");

		await client.subscribers.delete(sub.string("id"));
		expect(api.lastRequest?.method).toBe("DELETE");
		expect(api.lastRequest?.path).toBe(
			`/v1/pages/abc123/subscribers/${sub.string("id")}`,
		);
	});

	test("metrics are created under a provider and fed data points", async () => {
		const client = makeClient();

		await client.metrics.create("prov_1", { name: "Latency", suffix: "ms" });
		expect(api.lastRequest?.path).toBe(
			"/v1/pages/abc123/metrics_providers/prov_1/metrics",
		);
		expect(api.lastRequest?.json).toEqual({
			metric: { name: "Latency", suffix: "ms" },
		});

		const point = await client.metrics.addData("met_1", {
			timestamp: 1_700_000_000,
			value: 42.5,
		});
		expect(api.lastRequest?.path).toBe("/v1/pages/abc123/metrics/met_1/data");
		expect(api.lastRequest?.json).toEqual({
			data: { timestamp: 1_700_000_000, value: 42.5 },
		});
		expect(point.number("value")).toBe(42.5);

		await expect(client.metrics.deleteData("met_1")).resolves.toBeUndefined();
		expect(api.lastRequest?.method).toBe("DELETE");
		expect(api.lastRequest?.path).toBe("/v1/pages/abc123/metrics/met_1/data");
	});

	test("pages are addressed by the bound page id", async () => {
		api.seed("/v1/pages", { id: "abc123", name: "Acme" });
		const client = makeClient();

		const page = await client.pages.get();
		expect(api.lastRequest?.path).toBe("/v1/pages/abc123");
		expect(page.string("name")).toBe("Acme");

		const updated = await client.pages.update({ name: "Acme Status" });
		expect(api.lastRequest?.json).toEqual({ page: { name: "Acme Status" } });
		expect(updated.string("name")).toBe("Acme Status");

		expect(await client.pages.list()).toHaveLength(1);
		expect(api.lastRequest?.path).toBe("/v1/pages");
	});

	test("users live under the organization", async () => {
		const client = makeClient({ organizationId: "org_1" });

		await client.users.create({ email: "oncall@example.com" });

		expect(api.lastRequest?.path).toBe("/v1/organizations/org_1/users");
		expect(api.lastRequest?.json).toEqual({
			user: { email: "oncall@example.com" },
		});
	});

	test("users without an organization id fail before any request", async () => {
		const err = await rejectionOf(makeClient().users.list());

		expect(err).toBeInstanceOf(ConfigurationError);
		expect(api.requests).toHaveLength(0);
	});

	test("listAll walks pages until a short one", async () => {
		for (let i = 1; i <= 5; i++) {
			api.seed("/v1/pages/abc123/components", { id: `cmp_${i}`, name: `C${i}` });
		}

		const ids: string[] = [];
		for await (const component of makeClient().components.listAll({ perPage: 2 })) {
			ids.push(component.string("id"));
		}

		expect(ids).toEqual(["cmp_1", "cmp_2", "cmp_3", "cmp_4", "cmp_5"]);
		expect(api.requests.map((r) => r.query.get("page"))).toEqual(["1", "2", "3"]);
		expect(api.requests.every((r) => r.query.get("per_page") === "2")).toBe(true);
	});

	test("list fetches a single page by default", async () => {
		for (let i = 1; i <= 3; i++) {
			api.seed("/v1/pages/abc123/components", { id: `cmp_${i}`, name: `C${i}` });
		}

		const first = await makeClient().components.list({ page: 1, per_page: 2 });

		expect(first).toHaveLength(2);
		expect(api.requests).toHaveLength(1);
	});

	test("5xx and 429 surface without retries", async () => {
		const client = makeClient();

		api.enqueue({ status: 503, json: { error: "Service unavailable" } });
		const server = await rejectionOf(client.incidents.list());
		expect(server).toBeInstanceOf(ServerError);
		expect(isApiError(server)).toBe(true);

		api.enqueue({
			status: 429,
			json: { error: "Rate limit exceeded" },
			headers: { "retry-after": "3" },
		});
		const limited = await rejectionOf(client.incidents.list());
		expect(limited).toBeInstanceOf(RateLimitedError);
		expect((limited as RateLimitedError).retryAfterMs).toBe(3000);

		expect(api.requests).toHaveLength(2);
	});

	test("an unexpected response shape raises ParseError", async () => {
		api.enqueue({ status: 200, json: { id: "not-a-list" } });
		const listErr = await rejectionOf(makeClient().incidents.list());
		expect(listErr).toBeInstanceOf(ParseError);

		api.enqueue({ status: 200, json: [{ id: "1" }] });
		const getErr = await rejectionOf(makeClient().incidents.get("1"));
		expect(getErr).toBeInstanceOf(ParseError);
		expect((getErr as ParseError).body).toBe('[{"id":"1"}]');
	});

	test("ids are path-encoded and must not be empty", async () => {
		const client = makeClient();

		const err = await rejectionOf(client.components.get("a/b"));
		expect(err).toBeInstanceOf(NotFoundError);
		expect(api.lastRequest?.path).toBe("/v1/pages/abc123/components/a%2Fb");

		const empty = await rejectionOf(client.incidentUpdates.get("", "upd_1"));
		expect(empty).toBeInstanceOf(StatuspageError);
		expect((empty as StatuspageError).message).toBe(
			"incidentId must be a non-empty string",
		);
		expect(api.requests).toHaveLength(1);
	});

	test("dot segments are refused as ids before any request", async () => {
		api.seed("/v1/pages/abc123/subscribers", { id: "sub_1", email: "a@example.test" });
		const client = makeClient();

		for (const id of [".", "..", "%2e", "%2E%2e"]) {
			const err = await rejectionOf(client.subscribers.delete(id));
			expect(err).toBeInstanceOf(StatuspageError);
			expect((err as StatuspageError).message).toBe('id must not be "." or ".."');
		}
		const nested = await rejectionOf(client.incidentUpdates.list(".."));
		expect((nested as StatuspageError).message).toBe(
			'incidentId must not be "." or ".."',
		);
		expect(api.requests).toHaveLength(0);

		expect(await client.subscribers.list()).toHaveLength(1);
	});

	test("listAll asks for 100 items per page by default and refuses more", async () => {
		api.seed("/v1/pages/abc123/components", { id: "cmp_1", name: "API" });
		const client = makeClient();

		const ids: string[] = [];
		for await (const component of client.components.listAll()) {
			ids.push(component.string("id"));
		}
		expect(ids).toEqual(["cmp_1"]);
		expect(api.lastRequest?.query.get("per_page")).toBe("100");

		const err = await rejectionOf(
			client.components.listAll({ perPage: 250 })[Symbol.asyncIterator]().next(),
		);
		expect(err).toBeInstanceOf(StatuspageError);
		expect((err as StatuspageError).message).toBe(
			"perPage must be an integer between 1 and 100",
		);
		expect(api.requests).toHaveLength(1);
	});

	test("request sends any method with the body as given", async () => {
		api.enqueue({ status: 200, json: { id: "cmp_1", status: "operational" } });
		const client = makeClient();

		const value = await client.request("PUT", "/pages/abc123/components/cmp_1", {
			query: { notify: true },
			body: { component: { status: "operational" } },
		});

		const req = api.lastRequest;
		expect(req?.method).toBe("PUT");
		expect(req?.path).toBe("/v1/pages/abc123/components/cmp_1");
		expect(req?.query.get("notify")).toBe("true");
		expect(req?.body).toBe('{"component":{"status":"operational"}}');
		expect(asObject(value).string("status")).toBe("operational");
	});

	test("request classifies failures and maps empty bodies to null", async () => {
		const client = makeClient();

		api.enqueue({ status: 204 });
		expect(await client.request("DELETE", "pages/abc123/components/cmp_1")).toBeNull();
		expect(api.lastRequest?.path).toBe("/v1/pages/abc123/components/cmp_1");

		api.enqueue({ status: 404, json: { error: "Not found" } });
		const err = await rejectionOf(client.request("GET", "/pages/abc123/widgets"));
		expect(err).toBeInstanceOf(NotFoundError);
		expect((err as NotFoundError).message).toBe("Not found");
	});

	test("a throwing telemetry hook leaves a created incident intact", async () => {
		const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
		const client = new Statuspage({
			apiKey: api.apiKey,
			pageId: "abc123",
			baseUrl: api.baseUrl,
			fetch: api.fetch,
			telemetry: {
				onRequest: () => {
					throw new Error("log sink down");
				},
				onResponse: () => {
					throw new Error("log sink down");
				},
			},
		});

		const incident = await client.incidents.create({ name: "DB failover" });

		expect(incident.string("id")).toBe("inc_1");
		expect(api.requests).toHaveLength(1);
		expect(warn).toHaveBeenCalledTimes(2);
		warn.mockRestore();
	});

	test("withOptions derives a client for another page", async () => {
		api.enqueue({ status: 200, json: [] });

		const other = makeClient().withOptions({ pageId: "xyz789" });
		await other.incidents.list();

		expect(other.pageId).toBe("xyz789");
		expect(api.lastRequest?.path).toBe("/v1/pages/xyz789/incidents");
		expect(api.lastRequest?.headers.get("authorization")).toBe(
			"OAuth test-api-key",
		);
	});
});

describe("client options", () => {
	test("defaults the base URL", () => {
		const client = new Statuspage({ apiKey: "test-api-key", pageId: "abc123" });

		expect(client.baseUrl).toBe("https://api.statuspage.io");
	});

	test("rejects invalid options with every issue listed", () => {
		let thrown: unknown;
		try {
			new Statuspage({
				apiKey: " ",
				pageId: "abc123",
				baseUrl: "ftp://statuspage.test",
				timeoutMs: -1,
			});
		} catch (err) {
			thrown = err;
		}

		expect(thrown).toBeInstanceOf(ConfigurationError);
		const e = thrown as ConfigurationError;
		expect(e.message).toBe("Invalid client options");
		expect(e.issues).toHaveLength(3);
		expect(e.issues).toContain("apiKey: apiKey is required");
		expect(e.issues.some((i) => i.startsWith("baseUrl: "))).toBe(true);
		expect(e.issues.some((i) => i.startsWith("timeoutMs: "))).toBe(true);
	});

	test("rejects dot segments as page or organization ids", () => {
		let thrown: unknown;
		try {
			new Statuspage({ apiKey: "test-api-key", pageId: "..", organizationId: "." });
		} catch (err) {
			thrown = err;
		}

		expect(thrown).toBeInstanceOf(ConfigurationError);
		expect((thrown as ConfigurationError).issues).toEqual([
			'pageId: pageId must not be "." or ".."',
			'organizationId: organizationId must not be "." or ".."',
		]);
	});
});
