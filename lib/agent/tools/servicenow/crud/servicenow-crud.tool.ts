/**
 * ServiceNow CRUD Tool
 *
 * Single tool through which the agent creates, reads, updates and deletes
 * records on allow-listed tables. Model-supplied arguments are loosely
 * typed (objects sometimes arrive as JSON strings), so they are parsed and
 * validated here before a typed CrudRequest reaches the client.
 *
 * The tool never throws: every outcome, including authentication failures,
 * comes back as a `success: false` envelope with an `errorType`.
 */

import type { Tool } from "@anthropic-ai/sdk/resources/messages";
import { z } from "zod";
import { createTool, type AgentToolFactoryParams } from "@/agent/tools/shared";
import type { ServiceNowCrudClient } from "@/infrastructure/servicenow/client/crud-client";
import {
  ServiceNowAuthError,
  classifyServiceNowError,
  isRetryableErrorType,
  type ServiceNowErrorType,
} from "@/infrastructure/servicenow/errors";
import {
  isCrudOperation,
  type CrudRequest,
  type CrudResponse,
} from "@/infrastructure/servicenow/types/crud";
import { maskSensitiveText, sanitizeForLogging } from "@/utils/log-sanitizer";

export const SERVICENOW_CRUD_TOOL_NAME = "servicenow_crud";

const QueryValueSchema = z.union([z.string(), z.number(), z.boolean()]);
const QueryMappingSchema = z.record(QueryValueSchema);
const DataSchema = z.record(z.unknown());

const ServiceNowCrudInputSchema = z.object({
  operation: z.string().describe("create, read, update or delete"),
  table: z.string().describe("ServiceNow table, e.g. 'incident'"),
  sys_id: z.string().nullish(),
  data: z.union([DataSchema, z.string()]).nullish(),
  query: z.union([QueryMappingSchema, z.string()]).nullish(),
  fields: z.array(z.string()).nullish(),
  limit: z.number().int().positive().nullish(),
});

export type ServiceNowCrudInput = z.infer<typeof ServiceNowCrudInputSchema>;

/**
 * Failure envelope for requests that never reached the client, where the
 * operation name may not be one of the four CRUD operations.
 */
export interface ServiceNowCrudToolFailure {
  success: false;
  operation: string;
  table: string;
  error: string;
  errorType: ServiceNowErrorType;
  retryable: boolean;
  message?: string;
}

export type ServiceNowCrudToolResult = CrudResponse | ServiceNowCrudToolFailure;

export const SERVICENOW_CRUD_INPUT_JSON_SCHEMA: Tool.InputSchema = {
  type: "object",
  properties: {
    operation: {
      type: "string",
      enum: ["create", "read", "update", "delete"],
      description: "The CRUD operation to perform",
    },
    table: {
      type: "string",
      description: "The ServiceNow table to operate on (e.g. 'incident', 'change_request')",
    },
    sys_id: {
      type: "string",
      description: "32-character sys_id of the record (required for update and delete)",
    },
    data: {
      type: "object",
      description: "Field values for create or update operations",
    },
    query: {
      type: "object",
      description:
        "Filters for read operations. Exact match: {\"state\": \"1\"}. " +
        "Not equal: {\"state\": \"!=6\"}. Comparison: {\"priority\": \">2\", \"opened_at\": \">=2025-06-01\"}. " +
        "Date range: {\"opened_at\": \"BETWEEN2025-06-01@2025-07-31\"}",
    },
    fields: {
      type: "array",
      items: { type: "string" },
      description: "Fields to return in the response",
    },
    limit: {
      type: "integer",
      minimum: 1,
      description: "Maximum number of records to return (read only)",
    },
  },
  required: ["operation", "table"],
};

const AUTH_FAILURE_MESSAGE = "Authentication with ServiceNow failed.";

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readString(input: unknown, key: string): string {
  const value = isPlainObject(input) ? input[key] : undefined;
  return typeof value === "string" ? value : "unknown";
}

/**
 * Decode a JSON-encoded object argument. Anything that is not a string is
 * returned unchanged; a string that does not parse is logged and returned
 * as-is so that validation rejects it.
 */
export function decodeJsonArgument(name: string, value: unknown): unknown {
  if (typeof value !== "string") {
    return value;
  }
  try {
    return JSON.parse(value);
  } catch {
    console.warn(`[servicenow_crud] Failed to parse ${name} as JSON`, {
      value: maskSensitiveText(value.slice(0, 200)),
    });
    return value;
  }
}

function validationFailure(operation: string, table: string, error: string): ServiceNowCrudToolFailure {
  return {
    success: false,
    operation,
    table,
    error,
    errorType: "validation_error",
    retryable: false,
    message: "The request was rejected before it was sent.",
  };
}

type NormalizeResult = { ok: true; request: CrudRequest } | { ok: false; failure: ServiceNowCrudToolFailure };

/**
 * Turn loosely-typed tool arguments into a CrudRequest, or a validation failure.
 */
export function normalizeCrudInput(rawInput: unknown): NormalizeResult {
  const parsed = ServiceNowCrudInputSchema.safeParse(rawInput);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "input"}: ${issue.message}`)
      .join("; ");
    return {
      ok: false,
      failure: validationFailure(readString(rawInput, "operation"), readString(rawInput, "table"), `Invalid arguments: ${details}`),
    };
  }

  const input = parsed.data;
  const operation = input.operation.trim().toLowerCase();
  const table = input.table.trim();

  if (!isCrudOperation(operation)) {
    return { ok: false, failure: validationFailure(input.operation, table, `Invalid operation: ${input.operation}`) };
  }

  const request: CrudRequest = { operation, table };

  if (input.sys_id) {
    request.sysId = input.sys_id.trim();
  }

  if (input.data !== undefined && input.data !== null) {
    const data = DataSchema.safeParse(decodeJsonArgument("data", input.data));
    if (!data.success) {
      return { ok: false, failure: validationFailure(operation, table, "'data' must be an object of field values") };
    }
    request.data = data.data;
  }

  if (input.query !== undefined && input.query !== null) {
    const query = QueryMappingSchema.safeParse(decodeJsonArgument("query", input.query));
    if (!query.success) {
      return {
        ok: false,
        failure: validationFailure(operation, table, "'query' must be an object mapping fields to string, number or boolean values"),
      };
    }
    request.query = query.data;
  }

  if (input.fields && input.fields.length > 0) {
    request.fields = input.fields;
  }

  if (input.limit !== undefined && input.limit !== null) {
    request.limit = input.limit;
  }

  return { ok: true, request };
}

export interface ServiceNowCrudToolParams extends AgentToolFactoryParams {
  client: ServiceNowCrudClient;
}

const STATUS_VERBS: Record<CrudRequest["operation"], string> = {
  create: "creating",
  read: "looking up",
  update: "updating",
  delete: "deleting",
};

export function createServiceNowCrudTool(params: ServiceNowCrudToolParams) {
  const { client, updateStatus } = params;

  return createTool<ServiceNowCrudToolResult>({
    name: SERVICENOW_CRUD_TOOL_NAME,
    description:
      "Perform Create, Read, Update, and Delete operations on ServiceNow records.\n\n" +
      `**Tables:** ${client.getAllowedTables().join(", ")}\n` +
      "**Use when:** Creating records, querying with filters, or changing/deleting a record by sys_id. " +
      "Read the record first to obtain its sys_id before update or delete.",

    inputSchema: SERVICENOW_CRUD_INPUT_JSON_SCHEMA,

    execute: async (rawInput: unknown): Promise<ServiceNowCrudToolResult> => {
      const normalized = normalizeCrudInput(rawInput);
      if (!normalized.ok) {
        console.warn("[servicenow_crud] Rejected tool arguments", sanitizeForLogging(normalized.failure));
        return normalized.failure;
      }

      const { request } = normalized;
      const context = {
        operation: request.operation.toUpperCase(),
        table: request.table,
        sysId: request.sysId,
        instance: client.getInstanceUrl(),
      };

      try {
        updateStatus?.(`is ${STATUS_VERBS[request.operation]} ServiceNow records...`);
        console.log("[servicenow_crud] Starting operation", sanitizeForLogging(context));

        const response = await client.execute(request);

        if (response.success) {
          console.log("[servicenow_crud] Operation completed", { ...context, count: response.count });
        } else {
          console.error("[servicenow_crud] Operation failed", { ...context, errorType: response.errorType });
        }
        return response;
      } catch (error) {
        if (error instanceof ServiceNowAuthError) {
          console.error("[servicenow_crud] Authentication failed", context);
          return {
            success: false,
            operation: request.operation,
            table: request.table,
            error: AUTH_FAILURE_MESSAGE,
            errorType: "auth_error",
            retryable: false,
          };
        }

        const errorType = classifyServiceNowError(error);
        const message = error instanceof Error ? error.message : String(error);
        console.error("[servicenow_crud] Error:", { ...context, errorType, error: maskSensitiveText(message) });

        return {
          success: false,
          operation: request.operation,
          table: request.table,
          error: maskSensitiveText(message),
          errorType,
          retryable: isRetryableErrorType(errorType),
        };
      }
    },
  });
}
