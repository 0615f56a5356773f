/**
 * ServiceNow CRUD Client
 *
 * Create/read/update/delete against an allow-listed set of tables, built on
 * ServiceNowHttpClient with RetryPolicy around every request.
 *
 * Each call runs: allow-list check → local validation (sys_id, payload,
 * field names, limit) → request with retry → status mapping → envelope.
 * All outcomes come back as a CrudResponse, with two exceptions that are
 * rethrown: authentication failures and caller cancellation.
 */

import {
  ServiceNowAuthError,
  ServiceNowValidationError,
  classifyServiceNowError,
  isRetryableErrorType,
  type ServiceNowErrorType,
} from "../errors";
import type {
  CrudFailureResponse,
  CrudOperation,
  CrudRequest,
  CrudResponse,
  CrudSuccessResponse,
} from "../types/crud";
import type { ServiceNowRecord } from "../types/api-responses";
import { sanitizeForLogging } from "../../../utils/log-sanitizer";
import type { HttpMethod, ServiceNowHttpClient } from "./http-client";
import { assertValidFieldName, buildQuery, type QueryMapping } from "./query-builder";
import type { RetryPolicy } from "./retry-policy";
import { TableAllowList } from "./table-allow-list";

const TABLE_API_PATH = "/api/now/table";
const TABLE_NAME_PATTERN = /^[a-zA-Z0-9_]+$/;
const SYS_ID_PATTERN = /^[a-f0-9]{32}$/;

export interface ServiceNowCrudClientConfig {
  allowedTables: readonly string[];
  maxRecords: number;
  retryPolicy: RetryPolicy;
}

export interface CallOptions {
  signal?: AbortSignal;
}

export interface WriteOptions extends CallOptions {
  fields?: string[];
}

export interface ReadOptions extends CallOptions {
  query?: QueryMapping;
  fields?: string[];
  limit?: number;
}

export function isValidSysId(sysId: string): boolean {
  return SYS_ID_PATTERN.test(sysId.toLowerCase());
}

function isRecord(value: unknown): value is ServiceNowRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function extractResult(body: unknown): unknown {
  return isRecord(body) ? body.result : undefined;
}

const FAILURE_HINTS: Partial<Record<ServiceNowErrorType, string>> = {
  rate_limit: "ServiceNow is rate limiting requests; try again shortly.",
  timeout: "ServiceNow did not respond in time; try again shortly.",
  connection_error: "ServiceNow could not be reached; try again shortly.",
  validation_error: "The request was rejected before it was sent.",
  table_not_allowed: "The requested table is not available to this agent.",
};

export class ServiceNowCrudClient {
  private readonly allowList: TableAllowList;
  private readonly maxRecords: number;
  private readonly retryPolicy: RetryPolicy;

  constructor(
    private readonly httpClient: ServiceNowHttpClient,
    config: ServiceNowCrudClientConfig,
  ) {
    this.allowList = new TableAllowList(config.allowedTables);
    this.maxRecords = config.maxRecords;
    this.retryPolicy = config.retryPolicy;
  }

  /**
   * Create a record. Expects HTTP 201 and returns the created record.
   */
  async create(table: string, data: ServiceNowRecord, options: WriteOptions = {}): Promise<CrudResponse> {
    return this.run("create", table, options.signal, { data, fields: options.fields }, async () => {
      this.assertPayload("create", data);
      const fields = this.buildFieldList(options.fields);

      const body = await this.send("create", "POST", this.buildPath(table), [201], options.signal, {
        params: { sysparm_fields: fields },
        body: data,
      });

      return this.success("create", table, `Record created successfully in ${table}`, [
        this.toRecord(extractResult(body)),
      ]);
    });
  }

  /**
   * Read records. An empty result set is a success with `data: []`.
   */
  async read(table: string, options: ReadOptions = {}): Promise<CrudResponse> {
    const { query, fields, limit, signal } = options;

    return this.run("read", table, signal, { query, fields, limit }, async () => {
      const sysparmQuery = buildQuery(query);
      const fieldList = this.buildFieldList(fields);
      const effectiveLimit = this.resolveLimit(limit);

      if (sysparmQuery) {
        console.log(`[ServiceNow CRUD] Built query for ${table}`, sanitizeForLogging({ sysparmQuery }));
      }

      const body = await this.send("read", "GET", this.buildPath(table), [200], signal, {
        params: {
          sysparm_query: sysparmQuery,
          sysparm_fields: fieldList,
          sysparm_limit: effectiveLimit,
        },
      });

      const result = extractResult(body);
      const records = Array.isArray(result) ? result.filter(isRecord) : [];

      return this.success("read", table, `Retrieved ${records.length} record(s) from ${table}`, records);
    });
  }

  /**
   * Patch a single record by sys_id. Expects HTTP 200.
   *
   * There is no version check between a preceding read and this update: the
   * record may have changed in between and the last write wins. Callers that
   * need atomic read-modify-write must provide it themselves.
   */
  async update(
    table: string,
    sysId: string,
    data: ServiceNowRecord,
    options: WriteOptions = {},
  ): Promise<CrudResponse> {
    return this.run("update", table, options.signal, { sysId, data, fields: options.fields }, async () => {
      const path = this.buildPath(table, sysId);
      this.assertPayload("update", data);
      const fields = this.buildFieldList(options.fields);

      const body = await this.send("update", "PATCH", path, [200], options.signal, {
        params: { sysparm_fields: fields },
        body: data,
      });

      return this.success("update", table, `Record ${sysId} updated successfully in ${table}`, [
        this.toRecord(extractResult(body)),
      ]);
    });
  }

  /**
   * Delete a single record by sys_id. Expects HTTP 204 (200 is accepted).
   */
  async delete(table: string, sysId: string, options: CallOptions = {}): Promise<CrudResponse> {
    return this.run("delete", table, options.signal, { sysId }, async () => {
      const path = this.buildPath(table, sysId);

      await this.send("delete", "DELETE", path, [204, 200], options.signal);

      return {
        success: true,
        operation: "delete",
        table,
        message: `Record ${sysId} deleted successfully from ${table}`,
        count: 1,
      };
    });
  }

  /**
   * Dispatch a typed request to the matching operation.
   */
  async execute(request: CrudRequest, options: CallOptions = {}): Promise<CrudResponse> {
    const { operation, table } = request;

    if (operation !== "read" && request.query !== undefined) {
      return this.failure(
        operation,
        table,
        new ServiceNowValidationError(
          `'query' is only supported for read operations; resolve the record's sys_id with a read first`,
        ),
      );
    }

    switch (operation) {
      case "create":
        return this.create(table, request.data ?? {}, { fields: request.fields, ...options });

      case "read":
        return this.read(table, {
          query: request.query,
          fields: request.fields,
          limit: request.limit,
          ...options,
        });

      case "update":
        if (!request.sysId) {
          return this.failure(operation, table, new ServiceNowValidationError("'sys_id' is required for update operations"));
        }
        return this.update(table, request.sysId, request.data ?? {}, { fields: request.fields, ...options });

      case "delete":
        if (!request.sysId) {
          return this.failure(operation, table, new ServiceNowValidationError("'sys_id' is required for delete operations"));
        }
        return this.delete(table, request.sysId, options);
    }
  }

  getInstanceUrl(): string {
    return this.httpClient.getInstanceUrl();
  }

  getAllowedTables(): string[] {
    return this.allowList.list();
  }

  /**
   * Release the underlying connection pool
   */
  async close(): Promise<void> {
    await this.httpClient.close();
  }

  private async run(
    operation: CrudOperation,
    table: string,
    signal: AbortSignal | undefined,
    details: Record<string, unknown>,
    body: () => Promise<CrudSuccessResponse>,
  ): Promise<CrudResponse> {
    if (!this.allowList.isAllowed(table)) {
      console.warn(`[ServiceNow CRUD] Table '${table}' is not in allowed tables`);
      return {
        success: false,
        operation,
        table,
        error: `Table '${table}' is not in the allowed tables list`,
        errorType: "table_not_allowed",
        retryable: false,
        message: FAILURE_HINTS.table_not_allowed,
      };
    }

    console.log(
      `[ServiceNow CRUD] ${operation.toUpperCase()} ${table}`,
      sanitizeForLogging(Object.fromEntries(Object.entries(details).filter(([, value]) => value !== undefined))),
    );

    try {
      const response = await body();
      console.log(`[ServiceNow CRUD] ${response.message}`);
      return response;
    } catch (error) {
      if (signal?.aborted) {
        throw signal.reason;
      }

      if (error instanceof ServiceNowAuthError) {
        console.error(`[ServiceNow CRUD] Authentication failed for ${operation} on ${table}`);
        throw error;
      }

      return this.failure(operation, table, error);
    }
  }

  private async send(
    operation: CrudOperation,
    method: HttpMethod,
    path: string,
    expectedStatus: readonly number[],
    signal: AbortSignal | undefined,
    extra: { params?: Record<string, string | number | undefined>; body?: unknown } = {},
  ): Promise<unknown> {
    const response = await this.retryPolicy.execute(
      () =>
        this.httpClient.request({
          method,
          path,
          operation,
          expectedStatus,
          signal,
          params: extra.params,
          body: extra.body,
        }),
      { signal, label: `${method} ${path}` },
    );
    return response.body;
  }

  private failure(operation: CrudOperation, table: string, error: unknown): CrudFailureResponse {
    const errorType = classifyServiceNowError(error);
    const message = error instanceof Error ? error.message : String(error);

    console.error(`[ServiceNow CRUD] ${operation.toUpperCase()} on ${table} failed`, {
      errorType,
      error: sanitizeForLogging(message),
    });

    return {
      success: false,
      operation,
      table,
      error: message,
      errorType,
      retryable: isRetryableErrorType(errorType),
      message: FAILURE_HINTS[errorType],
    };
  }

  private success(
    operation: CrudOperation,
    table: string,
    message: string,
    records: ServiceNowRecord[],
  ): CrudSuccessResponse {
    return { success: true, operation, table, message, data: records, count: records.length };
  }

  private buildPath(table: string, sysId?: string): string {
    if (!TABLE_NAME_PATTERN.test(table)) {
      throw new ServiceNowValidationError(`Invalid table name: ${table}`);
    }

    const base = `${TABLE_API_PATH}/${encodeURIComponent(table)}`;
    if (sysId === undefined) {
      return base;
    }

    if (!isValidSysId(sysId)) {
      throw new ServiceNowValidationError(`Invalid sys_id format: ${sysId}`);
    }
    return `${base}/${encodeURIComponent(sysId)}`;
  }

  private assertPayload(operation: CrudOperation, data: unknown): void {
    if (!isRecord(data) || Object.keys(data).length === 0) {
      throw new ServiceNowValidationError(`'data' is required for ${operation} operations`);
    }
    for (const field of Object.keys(data)) {
      assertValidFieldName(field);
    }
  }

  private buildFieldList(fields: string[] | undefined): string | undefined {
    if (!fields || fields.length === 0) {
      return undefined;
    }
    fields.forEach(assertValidFieldName);
    return fields.join(",");
  }

  private resolveLimit(limit: number | undefined): number {
    if (limit === undefined) {
      return this.maxRecords;
    }
    if (!Number.isInteger(limit) || limit <= 0) {
      throw new ServiceNowValidationError(`Invalid limit: ${limit}. Must be a positive integer`);
    }
    return Math.min(limit, this.maxRecords);
  }

  private toRecord(result: unknown): ServiceNowRecord {
    return isRecord(result) ? result : {};
  }
}
