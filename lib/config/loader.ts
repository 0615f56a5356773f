import { CONFIG_DEFINITIONS, CONFIG_KEYS, type ConfigDefinition } from "./registry";
import { ServiceNowSettingsSchema, type ServiceNowSettingsInput } from "./schema";
import { ServiceNowConfigError } from "../infrastructure/servicenow/errors";
import { createDefaultCredentialResolver } from "../infrastructure/servicenow/auth/credential-resolver";
import type { SecretStoreFactory } from "../infrastructure/servicenow/auth/secret-store";
import type { SecretValue } from "../infrastructure/servicenow/auth/secret-value";
import type { ServiceNowAuthMode } from "../infrastructure/servicenow/auth/auth-provider";

export type ConfigOverrides = Partial<ServiceNowSettingsInput>;

export interface ServiceNowSettings {
  readonly instanceUrl: string;
  readonly authMode: ServiceNowAuthMode;
  readonly username?: string;
  readonly authId?: string;
  readonly passwordSecretId: string;
  readonly allowedTables: readonly string[];
  readonly timeoutMs: number;
  readonly maxRecords: number;
  readonly maxRetries: number;
  readonly retryDelayMs: number;
  readonly retryJitterMs: number;
  readonly maxConnections: number;
  /** Password (basic) or API token (bearer without a token context) */
  readonly credential?: SecretValue;
}

const ENV_VAR_BY_KEY: Record<string, string> = Object.fromEntries(
  CONFIG_KEYS.map((key) => [key, CONFIG_DEFINITIONS[key].envVar]),
);

/**
 * Build settings from explicit overrides, then environment variables, then
 * defaults. The result is frozen. The credential is not resolved here; see
 * {@link loadServiceNowSettings}.
 */
export function parseServiceNowSettings(
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
): ServiceNowSettings {
  const raw: Record<string, unknown> = {};
  for (const key of CONFIG_KEYS) {
    const definition: ConfigDefinition = CONFIG_DEFINITIONS[key];
    const explicit = overrides[key];
    raw[key] = explicit !== undefined ? explicit : parseValue(definition, env[definition.envVar]);
  }

  const result = ServiceNowSettingsSchema.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => {
        const key = String(issue.path[0] ?? "config");
        return `${ENV_VAR_BY_KEY[key] ?? key}: ${issue.message}`;
      })
      .join("; ");
    throw new ServiceNowConfigError(`Invalid ServiceNow configuration: ${details}`);
  }

  const parsed = result.data;
  return Object.freeze({
    instanceUrl: parsed.instanceUrl,
    authMode: parsed.authMode,
    username: parsed.username,
    authId: parsed.authId,
    passwordSecretId: parsed.passwordSecretId,
    allowedTables: Object.freeze([...parsed.allowedTables]),
    timeoutMs: Math.round(parsed.apiTimeoutSeconds * 1000),
    maxRecords: parsed.maxRecords,
    maxRetries: parsed.maxRetries,
    retryDelayMs: Math.round(parsed.retryDelaySeconds * 1000),
    retryJitterMs: parsed.retryJitterMs,
    maxConnections: parsed.maxConnections,
  });
}

export interface LoadSettingsOptions {
  overrides?: ConfigOverrides;
  /** Explicit password or API token; takes precedence over the secret store */
  password?: string;
  secretStore?: SecretStoreFactory;
  env?: NodeJS.ProcessEnv;
}

/**
 * Parse settings and resolve the credential (explicit → secret store →
 * SERVICENOW_PASSWORD). Bearer mode with an `authId` uses per-user tokens
 * and needs no stored credential. Fails with ServiceNowConfigError when a
 * required value is missing.
 */
export async function loadServiceNowSettings(options: LoadSettingsOptions = {}): Promise<ServiceNowSettings> {
  const env = options.env ?? process.env;
  const settings = parseServiceNowSettings(options.overrides, env);

  const usesTokenContext = settings.authMode === "bearer" && settings.authId !== undefined;
  let credential: SecretValue | undefined;

  if (!usesTokenContext) {
    const resolver = createDefaultCredentialResolver({
      explicit: options.password,
      secretStore: options.secretStore,
      secretId: settings.passwordSecretId,
      env,
    });
    ({ secret: credential } = await resolver.resolve());
  }

  console.log("[Config] ServiceNow settings loaded", {
    instanceUrl: settings.instanceUrl,
    authMode: settings.authMode,
    allowedTables: settings.allowedTables,
    timeoutMs: settings.timeoutMs,
    maxRecords: settings.maxRecords,
    maxRetries: settings.maxRetries,
  });

  return Object.freeze({ ...settings, credential });
}

function parseValue(definition: ConfigDefinition, raw: string | undefined): unknown {
  if (raw === undefined || raw.trim() === "") {
    return cloneDefault(definition);
  }

  switch (definition.type) {
    case "number": {
      const parsed = Number(raw);
      if (Number.isFinite(parsed)) {
        return parsed;
      }
      console.warn(`[Config] Invalid number for ${definition.envVar}: ${raw}. Falling back to default.`);
      return cloneDefault(definition);
    }
    case "string[]": {
      const trimmed = raw.trim();

      if (trimmed.startsWith("[") && trimmed.endsWith("]")) {
        try {
          const parsed: unknown = JSON.parse(trimmed);
          if (Array.isArray(parsed) && parsed.every((item) => typeof item === "string")) {
            return parsed.map((item: string) => item.trim()).filter((item) => item.length > 0);
          }
        } catch (error) {
          console.warn(
            `[Config] Failed to parse JSON array for ${definition.envVar}: ${error}. Falling back to comma parsing.`,
          );
        }
      }

      const items = trimmed
        .split(",")
        .map((item) => item.trim())
        .filter((item) => item.length > 0);

      return items.length > 0 ? items : cloneDefault(definition);
    }
    case "string":
    default:
      return raw;
  }
}

function cloneDefault(definition: ConfigDefinition): unknown {
  const fallback = definition.default;
  if (Array.isArray(fallback)) {
    return [...fallback];
  }
  return fallback;
}
