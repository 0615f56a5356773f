/**
 * CRUD Client Factory
 *
 * Creates ServiceNowCrudClient instances from loaded settings
 */

import type { ServiceNowSettings } from "../../config/loader";
import {
  BasicAuthProvider,
  BearerTokenAuthProvider,
  StaticTokenAuthProvider,
  type AuthProvider,
  type TokenContext,
} from "./auth/auth-provider";
import { ServiceNowCrudClient } from "./client/crud-client";
import { ServiceNowHttpClient, type FetchFn } from "./client/http-client";
import { RetryPolicy, type SleepFn } from "./client/retry-policy";
import { ServiceNowConfigError } from "./errors";

export interface CrudClientFactoryOptions {
  settings: ServiceNowSettings;
  /** Required in bearer mode when `authId` is configured */
  tokenContext?: TokenContext;
  fetch?: FetchFn;
  sleep?: SleepFn;
}

export function createAuthProvider(settings: ServiceNowSettings, tokenContext?: TokenContext): AuthProvider {
  if (settings.authMode === "basic") {
    if (!settings.username || !settings.credential) {
      throw new ServiceNowConfigError("Basic authentication requires a username and password");
    }
    return new BasicAuthProvider(settings.username, settings.credential);
  }

  if (settings.authId) {
    if (!tokenContext) {
      throw new ServiceNowConfigError(
        `Bearer authentication with authorization "${settings.authId}" requires a token context`,
      );
    }
    return new BearerTokenAuthProvider(tokenContext, settings.authId);
  }

  if (!settings.credential) {
    throw new ServiceNowConfigError("Bearer authentication requires an API token or an authorization id");
  }
  return new StaticTokenAuthProvider(settings.credential);
}

export function createCrudClient(options: CrudClientFactoryOptions): ServiceNowCrudClient {
  const { settings } = options;

  const httpClient = new ServiceNowHttpClient({
    instanceUrl: settings.instanceUrl,
    auth: createAuthProvider(settings, options.tokenContext),
    timeoutMs: settings.timeoutMs,
    maxConnections: settings.maxConnections,
    fetch: options.fetch,
  });

  const retryPolicy = new RetryPolicy({
    maxRetries: settings.maxRetries,
    initialDelayMs: settings.retryDelayMs,
    jitterMs: settings.retryJitterMs,
    sleep: options.sleep,
  });

  console.log(`[ServiceNow CRUD] Client initialized for ${settings.instanceUrl}`, {
    authMode: settings.authMode,
    timeoutMs: settings.timeoutMs,
  });

  return new ServiceNowCrudClient(httpClient, {
    allowedTables: settings.allowedTables,
    maxRecords: settings.maxRecords,
    retryPolicy,
  });
}

/**
 * Create a client, hand it to `fn`, and close its connection pool however
 * `fn` exits (return, throw, or cancellation).
 */
export async function withCrudClient<T>(
  options: CrudClientFactoryOptions,
  fn: (client: ServiceNowCrudClient) => Promise<T>,
): Promise<T> {
  const client = createCrudClient(options);
  try {
    return await fn(client);
  } finally {
    await client.close();
  }
}
