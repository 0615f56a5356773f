/**
 * ServiceNow HTTP Client
 *
 * Low-level HTTP transport for the ServiceNow REST API with:
 * - Authentication (Basic and Bearer token) through an AuthProvider
 * - A per-attempt timeout
 * - A bounded pool of concurrent requests owned by this instance
 * - Mapping of HTTP statuses and transport failures to ServiceNow errors
 *
 * A single call is a single attempt; retries are the caller's concern.
 */

import type { AuthProvider } from "../auth/auth-provider";
import {
  ServiceNowConfigError,
  ServiceNowConnectionError,
  ServiceNowError,
  ServiceNowClientError,
  ServiceNowTimeoutError,
  parseServiceNowError,
} from "../errors";

export type HttpMethod = "GET" | "POST" | "PATCH" | "DELETE";

export type FetchFn = (input: string, init: RequestInit) => Promise<Response>;

export interface ServiceNowHttpClientConfig {
  instanceUrl: string;
  auth: AuthProvider;
  timeoutMs?: number;
  maxConnections?: number;
  fetch?: FetchFn;
}

export interface HttpRequest {
  method: HttpMethod;
  path: string;
  /** Operation name used in error messages ("create", "read", ...) */
  operation: string;
  params?: Record<string, string | number | undefined>;
  body?: unknown;
  expectedStatus: readonly number[];
  signal?: AbortSignal;
}

export interface HttpResponse {
  status: number;
  body: unknown;
}

const CONNECTION_ERROR_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ENOTFOUND",
  "EAI_AGAIN",
  "EHOSTUNREACH",
  "ENETUNREACH",
  "EPIPE",
  "UND_ERR_SOCKET",
  "UND_ERR_CONNECT_TIMEOUT",
]);

function errorCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

export function isConnectionFailure(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }
  const code = errorCode(error) ?? errorCode(error.cause);
  if (code && CONNECTION_ERROR_CODES.has(code)) {
    return true;
  }
  return error instanceof TypeError && /fetch failed|failed to fetch/i.test(error.message);
}

interface Waiter {
  resolve: () => void;
  reject: (error: Error) => void;
}

/**
 * ServiceNow HTTP Client
 * Handles low-level HTTP operations with auth, timeouts and error mapping
 */
export class ServiceNowHttpClient {
  private readonly instanceUrl: string;
  private readonly auth: AuthProvider;
  private readonly timeoutMs: number;
  private readonly maxConnections: number;
  private readonly fetchImpl: FetchFn;

  private activeRequests = 0;
  private readonly waiters: Waiter[] = [];
  private readonly inFlight = new Set<AbortController>();
  private closed = false;

  constructor(config: ServiceNowHttpClientConfig) {
    if (!config.instanceUrl) {
      throw new ServiceNowConfigError("ServiceNow instance URL is required");
    }

    this.instanceUrl = config.instanceUrl.replace(/\/$/, "");
    this.auth = config.auth;
    this.timeoutMs = config.timeoutMs ?? 30000;
    this.maxConnections = Math.max(1, config.maxConnections ?? 10);
    this.fetchImpl = config.fetch ?? ((input, init) => fetch(input, init));
  }

  /**
   * Execute a single HTTP attempt
   */
  async request(request: HttpRequest): Promise<HttpResponse> {
    await this.acquireSlot(request.signal);
    try {
      request.signal?.throwIfAborted();
      return await this.executeRequest(request);
    } finally {
      this.releaseSlot();
    }
  }

  private async executeRequest(request: HttpRequest): Promise<HttpResponse> {
    const queryString = request.params ? this.buildQueryString(request.params) : "";
    const url = `${this.instanceUrl}${request.path}${queryString ? `?${queryString}` : ""}`;

    const headers: Record<string, string> = {
      Accept: "application/json",
      "Content-Type": "application/json",
      Authorization: await this.auth.getAuthorizationHeader(),
    };

    // One controller per attempt: fired by the timer, by the caller's signal, or by close().
    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);
    const onCallerAbort = () => controller.abort(request.signal?.reason);
    request.signal?.addEventListener("abort", onCallerAbort, { once: true });
    this.inFlight.add(controller);

    try {
      const response = await this.fetchImpl(url, {
        method: request.method,
        headers,
        body: request.body === undefined ? undefined : JSON.stringify(request.body),
        signal: controller.signal,
      });

      const text = await response.text();

      if (!request.expectedStatus.includes(response.status)) {
        throw parseServiceNowError(response, url, request.operation, text);
      }

      return { status: response.status, body: this.parseBody(text, response.status, url) };
    } catch (error) {
      if (error instanceof ServiceNowError) {
        throw error;
      }

      if (request.signal?.aborted) {
        throw request.signal.reason;
      }

      const cause = error instanceof Error ? error : undefined;

      if (timedOut) {
        throw new ServiceNowTimeoutError(`Request timed out after ${this.timeoutMs}ms`, url, cause);
      }

      if (this.closed) {
        throw new ServiceNowConnectionError("ServiceNow client was closed", url, cause);
      }

      if (isConnectionFailure(error)) {
        throw new ServiceNowConnectionError(
          `Connection to ServiceNow failed: ${cause?.message ?? String(error)}`,
          url,
          cause,
        );
      }

      throw new ServiceNowError(
        `Request failed: ${error instanceof Error ? error.message : String(error)}`,
        undefined,
        url,
        cause,
      );
    } finally {
      clearTimeout(timeoutId);
      request.signal?.removeEventListener("abort", onCallerAbort);
      this.inFlight.delete(controller);
    }
  }

  private parseBody(text: string, status: number, url: string): unknown {
    if (text.trim() === "") {
      return undefined;
    }
    try {
      return JSON.parse(text);
    } catch {
      throw new ServiceNowClientError(
        `ServiceNow returned a non-JSON response (HTTP ${status})`,
        status,
        text.slice(0, 500),
        url,
      );
    }
  }

  private async acquireSlot(signal?: AbortSignal): Promise<void> {
    if (this.closed) {
      throw new ServiceNowConnectionError("ServiceNow client was closed");
    }
    signal?.throwIfAborted();
    if (this.activeRequests < this.maxConnections) {
      this.activeRequests++;
      return;
    }
    await new Promise<void>((resolve, reject) => {
      const onAbort = () => {
        const index = this.waiters.indexOf(waiter);
        if (index !== -1) {
          this.waiters.splice(index, 1);
        }
        reject(signal?.reason);
      };
      const waiter: Waiter = {
        resolve: () => {
          signal?.removeEventListener("abort", onAbort);
          resolve();
        },
        reject: (error) => {
          signal?.removeEventListener("abort", onAbort);
          reject(error);
        },
      };
      signal?.addEventListener("abort", onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  private releaseSlot(): void {
    const next = this.waiters.shift();
    if (next) {
      // Slot passes straight to the next waiter.
      next.resolve();
      return;
    }
    this.activeRequests--;
  }

  /**
   * Abort in-flight requests and reject queued ones. Idempotent.
   */
  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;

    const reason = new ServiceNowConnectionError("ServiceNow client was closed");
    for (const controller of this.inFlight) {
      controller.abort(reason);
    }
    for (const waiter of this.waiters.splice(0)) {
      waiter.reject(reason);
    }
  }

  isClosed(): boolean {
    return this.closed;
  }

  /**
   * Build query string from parameters
   */
  private buildQueryString(params: Record<string, string | number | undefined>): string {
    return Object.entries(params)
      .filter(([, value]) => value !== undefined && value !== "")
      .map(([key, value]) => `${encodeURIComponent(key)}=${encodeURIComponent(String(value))}`)
      .join("&");
  }

  /**
   * Get instance URL (useful for building record URLs)
   */
  getInstanceUrl(): string {
    return this.instanceUrl;
  }
}
