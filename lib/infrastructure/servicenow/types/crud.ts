/**
 * CRUD request/response envelope shared by the client and the agent tool.
 */

import type { ServiceNowErrorType } from "../errors";
import type { QueryMapping } from "../client/query-builder";
import type { ServiceNowRecord } from "./api-responses";

export const CRUD_OPERATIONS = ["create", "read", "update", "delete"] as const;
export type CrudOperation = (typeof CRUD_OPERATIONS)[number];

export function isCrudOperation(value: string): value is CrudOperation {
  return CRUD_OPERATIONS.some((operation) => operation === value);
}

export interface CrudRequest {
  operation: CrudOperation;
  table: string;
  /** Required for update and delete */
  sysId?: string;
  /** Required (non-empty) for create and update */
  data?: ServiceNowRecord;
  /** Read only */
  query?: QueryMapping;
  fields?: string[];
  limit?: number;
}

export interface CrudSuccessResponse {
  success: true;
  operation: CrudOperation;
  table: string;
  message: string;
  /** 0..N for read, exactly one record for create/update, absent for delete */
  data?: ServiceNowRecord[];
  count: number;
}

export interface CrudFailureResponse {
  success: false;
  operation: CrudOperation;
  table: string;
  error: string;
  errorType: ServiceNowErrorType;
  retryable: boolean;
  message?: string;
}

export type CrudResponse = CrudSuccessResponse | CrudFailureResponse;
