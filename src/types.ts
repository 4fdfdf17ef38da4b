/**
 * JSON-serializable value.
 *
 * Used for request payloads and for the raw bodies the API returns before they
 * are mapped into {@link ResponseObject}s.
 */
export type JsonValue =
	| string
	| number
	| boolean
	| null
	| { [k: string]: JsonValue }
	| JsonValue[];

/**
 * Fields sent inside a write envelope. `undefined` entries are dropped by
 * `JSON.stringify`, so optional fields can be passed through as-is.
 */
export type Fields = { [k: string]: JsonValue | undefined };

/**
 * Query string values. Arrays are sent as repeated `key[]=value` pairs.
 */
export type QueryValue = string | number | boolean | string[] | undefined;

export type Query = Record<string, QueryValue>;

export type ComponentStatus =
	| "operational"
	| "under_maintenance"
	| "degraded_performance"
	| "partial_outage"
	| "major_outage"
	| "";

export type IncidentStatus =
	| "investigating"
	| "identified"
	| "monitoring"
	| "resolved"
	| "scheduled"
	| "in_progress"
	| "verifying"
	| "completed";

export type IncidentImpact = "none" | "maintenance" | "minor" | "major" | "critical";

export type PageFields = {
	name?: string;
	domain?: string;
	subdomain?: string;
	url?: string;
	branding?: string;
	css_body_background_color?: string;
	hidden_from_search?: boolean;
	allow_page_subscribers?: boolean;
	allow_incident_subscribers?: boolean;
	allow_email_subscribers?: boolean;
	allow_sms_subscribers?: boolean;
	allow_rss_atom_feeds?: boolean;
	allow_webhook_subscribers?: boolean;
	notifications_from_email?: string;
	time_zone?: string;
	notifications_email_footer?: string;
};

export type ComponentFields = {
	name?: string;
	description?: string;
	status?: ComponentStatus;
	group_id?: string | null;
	only_show_if_degraded?: boolean;
	showcase?: boolean;
	start_date?: string;
};

export type ComponentGroupFields = {
	name?: string;
	description?: string;
	components?: string[];
};

export type IncidentFields = {
	name?: string;
	status?: IncidentStatus;
	impact_override?: IncidentImpact;
	body?: string;
	component_ids?: string[];
	components?: { [componentId: string]: ComponentStatus };
	deliver_notifications?: boolean;
	auto_transition_deliver_notifications_at_end?: boolean;
	auto_transition_deliver_notifications_at_start?: boolean;
	auto_transition_to_maintenance_state?: boolean;
	auto_transition_to_operational_state?: boolean;
	auto_tweet_at_beginning?: boolean;
	auto_tweet_on_completion?: boolean;
	auto_tweet_on_creation?: boolean;
	auto_tweet_one_hour_before?: boolean;
	backfill_date?: string;
	backfilled?: boolean;
	scheduled_for?: string;
	scheduled_until?: string;
	scheduled_remind_prior?: boolean;
	scheduled_auto_in_progress?: boolean;
	scheduled_auto_completed?: boolean;
	metadata?: { [k: string]: JsonValue };
};

export type IncidentUpdateFields = {
	body?: string;
	display_at?: string;
	deliver_notifications?: boolean;
	wants_twitter_update?: boolean;
	tweet_id?: string;
	custom_tweet?: string;
};

export type SubscriberFields = {
	email?: string;
	endpoint?: string;
	phone_country?: string;
	phone_number?: string;
	skip_confirmation_notification?: boolean;
	page_access_user?: string;
	component_ids?: string[];
};

export type MetricFields = {
	name?: string;
	metric_identifier?: string;
	transform?: "average" | "count" | "max" | "min" | "sum";
	suffix?: string;
	y_axis_min?: number;
	y_axis_max?: number;
	y_axis_hidden?: boolean;
	display?: boolean;
	decimal_places?: number;
	tooltip_description?: string;
};

export type MetricDataPoint = {
	/** Unix timestamp, in seconds. */
	timestamp: number;
	value: number;
};

export type UserFields = {
	email?: string;
	password?: string;
	first_name?: string;
	last_name?: string;
};

export type IncidentListFilters = {
	/** Free-text search over incident names and updates. */
	q?: string;
	limit?: number;
	page?: number;
	per_page?: number;
};

export type SubscriberListFilters = {
	q?: string;
	type?: "email" | "sms" | "webhook" | "integration_partner" | "slack" | "teams";
	state?: "active" | "unconfirmed" | "quarantined" | "all";
	sort_field?: "primary" | "created_at" | "quarantined_at" | "relevance";
	sort_direction?: "asc" | "desc";
	page?: number;
	per_page?: number;
};

export type PaginationFilters = {
	page?: number;
	per_page?: number;
};

export type ListAllOptions = {
	/**
	 * Page size requested from the server, between 1 and 100.
	 *
	 * @defaultValue 100
	 */
	perPage?: number;
};
