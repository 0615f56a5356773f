/**
 * ServiceNow API Response Types
 *
 * These types represent the actual structure of responses from the ServiceNow Table API.
 */

/**
 * A table record as returned by the Table API. Field values are strings,
 * or `{ value, display_value, link }` objects when display values are requested.
 */
export type ServiceNowRecord = Record<string, unknown>;

