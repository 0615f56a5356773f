/**
 * ServiceNow configuration keys, their environment variables and defaults.
 * Ranges and formats are enforced by `ServiceNowSettingsSchema`.
 */

export type ConfigValueType = "string" | "number" | "string[]";

export interface ConfigDefinition {
  envVar: string;
  type: ConfigValueType;
  default?: string | number | readonly string[];
  description: string;
}

export const DEFAULT_ALLOWED_TABLES = [
  "incident",
  "change_request",
  "problem",
  "sc_task",
  "sc_req_item",
  "cmdb_ci",
] as const;

export const CONFIG_DEFINITIONS = {
  instanceUrl: {
    envVar: "SERVICENOW_INSTANCE_URL",
    type: "string",
    description: "ServiceNow instance URL (e.g. https://dev12345.service-now.com)",
  },
  authMode: {
    envVar: "SERVICENOW_AUTH_MODE",
    type: "string",
    default: "basic",
    description: "basic (username + password) or bearer (API token or per-user access token)",
  },
  username: {
    envVar: "SERVICENOW_USERNAME",
    type: "string",
    description: "ServiceNow username for basic authentication",
  },
  authId: {
    envVar: "SERVICENOW_AUTH_ID",
    type: "string",
    description: "Authorization id used to look up per-user access tokens in bearer mode",
  },
  passwordSecretId: {
    envVar: "SERVICENOW_PASSWORD_SECRET_ID",
    type: "string",
    default: "servicenow-password",
    description: "Secret store identifier of the ServiceNow password or API token",
  },
  allowedTables: {
    envVar: "SERVICENOW_ALLOWED_TABLES",
    type: "string[]",
    default: DEFAULT_ALLOWED_TABLES,
    description: "Tables the agent may operate on (comma-separated or JSON array)",
  },
  apiTimeoutSeconds: {
    envVar: "SERVICENOW_API_TIMEOUT",
    type: "number",
    default: 30,
    description: "Per-request timeout in seconds (5-120)",
  },
  maxRecords: {
    envVar: "SERVICENOW_MAX_RECORDS",
    type: "number",
    default: 100,
    description: "Maximum records returned by a read (1-1000)",
  },
  maxRetries: {
    envVar: "SERVICENOW_MAX_RETRIES",
    type: "number",
    default: 3,
    description: "Retry attempts for transient failures (0-10)",
  },
  retryDelaySeconds: {
    envVar: "SERVICENOW_RETRY_DELAY",
    type: "number",
    default: 1,
    description: "Initial backoff delay in seconds (0.1-30)",
  },
  retryJitterMs: {
    envVar: "SERVICENOW_RETRY_JITTER_MS",
    type: "number",
    default: 0,
    description: "Upper bound of random jitter added to each backoff wait (0-5000)",
  },
  maxConnections: {
    envVar: "SERVICENOW_MAX_CONNECTIONS",
    type: "number",
    default: 10,
    description: "Maximum concurrent requests per client (1-100)",
  },
} as const satisfies Record<string, ConfigDefinition>;

export type ConfigKey = keyof typeof CONFIG_DEFINITIONS;

export const CONFIG_KEYS = Object.keys(CONFIG_DEFINITIONS) as ConfigKey[];
