import { z } from "zod";
import { ConfigurationError } from "$/errors";
import { isDotSegment } from "$/utils";

export namespace StatuspageModel {
	export const DEFAULT_BASE_URL = "https://api.statuspage.io";
	export const DEFAULT_TIMEOUT_MS = 30_000;

	const pathSegment = (name: string) =>
		z
			.string()
			.trim()
			.min(1, `${name} is required`)
			.refine((s) => !isDotSegment(s), `${name} must not be "." or ".."`);

	export const clientOptionsSchema = z.object({
		apiKey: z.string().trim().min(1, "apiKey is required"),
		pageId: pathSegment("pageId"),
		baseUrl: z
			.url({ protocol: /^https?$/ })
			.default(DEFAULT_BASE_URL)
			.describe("Root of the API, without the /v1 version prefix"),
		timeoutMs: z
			.number()
			.int()
			.positive()
			.default(DEFAULT_TIMEOUT_MS)
			.describe("Deadline for a single call, in milliseconds"),
		organizationId: pathSegment("organizationId")
			.optional()
			.describe("Required by the users API only"),
		defaultHeaders: z.record(z.string(), z.string()).optional(),
		userAgent: z.string().min(1).optional(),
	});
	export type ClientOptionsInput = z.input<typeof clientOptionsSchema>;
	export type ClientOptions = z.output<typeof clientOptionsSchema>;

	/**
	 * Validates client options and fills in defaults.
	 * @throws {ConfigurationError} listing every invalid field
	 */
	export function parseClientOptions(input: ClientOptionsInput): ClientOptions {
		const result = clientOptionsSchema.safeParse(input);
		if (!result.success) {
			const issues = result.error.issues.map(
				(issue) => `${issue.path.map(String).join(".")}: ${issue.message}`,
			);
			throw new ConfigurationError("Invalid client options", issues);
		}
		return result.data;
	}
}
