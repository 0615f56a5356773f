/**
 * ServiceNow Encoded Query Builder
 *
 * Converts a field → value mapping into a `sysparm_query` string. Values may
 * carry a comparison prefix (`>=2025-06-01`, `!=6`) or a range
 * (`BETWEEN2025-06-01@2025-07-31`); everything else is equality.
 *
 * Every emitted value is escaped so that user text can never introduce a
 * new clause (`^`) or operator (`=`, `>`, `<`, `!`).
 *
 * @example
 * buildQuery({ state: "!=6", priority: 1 });
 * // => "state!=6^priority=1"
 */

import { ServiceNowValidationError } from "../errors";

export type QueryValue = string | number | boolean;
export type QueryMapping = Record<string, QueryValue>;

export const QUERY_SEPARATOR = "^";

const FIELD_NAME_PATTERN = /^[a-zA-Z0-9_.]+$/;
const BETWEEN_TOKEN = "BETWEEN";
const RANGE_SEPARATOR = "@";

// Longest prefix first so ">=" is never read as ">".
const COMPARISON_OPERATORS = [">=", "<=", "!=", ">", "<"] as const;

const RESERVED_CHARACTERS: ReadonlySet<string> = new Set([QUERY_SEPARATOR, "=", ">", "<", "!"]);

export function isValidFieldName(field: string): boolean {
  return FIELD_NAME_PATTERN.test(field);
}

export function assertValidFieldName(field: string): void {
  if (!isValidFieldName(field)) {
    throw new ServiceNowValidationError(`Invalid field name: ${field}`);
  }
}

/**
 * Prefix each reserved character with the separator.
 */
export function escapeQueryValue(value: string): string {
  let escaped = "";
  for (const char of value) {
    escaped += RESERVED_CHARACTERS.has(char) ? `${QUERY_SEPARATOR}${char}` : char;
  }
  return escaped;
}

/**
 * Inverse of {@link escapeQueryValue}.
 */
export function unescapeQueryValue(escaped: string): string {
  let value = "";
  for (let i = 0; i < escaped.length; i++) {
    const char = escaped[i];
    if (char === QUERY_SEPARATOR && i + 1 < escaped.length && RESERVED_CHARACTERS.has(escaped[i + 1])) {
      value += escaped[i + 1];
      i++;
    } else {
      value += char;
    }
  }
  return value;
}

function buildBetweenClause(field: string, value: string): string {
  const parts = value.slice(BETWEEN_TOKEN.length).split(RANGE_SEPARATOR);
  if (parts.length !== 2) {
    throw new ServiceNowValidationError(`Invalid BETWEEN format: ${value}`);
  }

  const [start, end] = parts;
  return `${field}${BETWEEN_TOKEN}${escapeQueryValue(start)}${RANGE_SEPARATOR}${escapeQueryValue(end)}`;
}

function findComparisonOperator(value: string): string | undefined {
  return COMPARISON_OPERATORS.find((operator) => value.startsWith(operator));
}

function buildClause(field: string, value: QueryValue): string {
  if (typeof value !== "string") {
    return `${field}=${escapeQueryValue(String(value))}`;
  }

  // Any case is accepted; the emitted token is always upper case.
  if (value.toUpperCase().startsWith(BETWEEN_TOKEN)) {
    return buildBetweenClause(field, value);
  }

  const operator = findComparisonOperator(value);
  if (operator) {
    return `${field}${operator}${escapeQueryValue(value.slice(operator.length))}`;
  }

  return `${field}=${escapeQueryValue(value)}`;
}

/**
 * Build a sanitized encoded query. Clauses keep the mapping's insertion order.
 */
export function buildQuery(query: QueryMapping | undefined): string {
  if (!query) {
    return "";
  }

  const clauses: string[] = [];
  for (const [field, value] of Object.entries(query)) {
    assertValidFieldName(field);
    clauses.push(buildClause(field, value));
  }

  return clauses.join(QUERY_SEPARATOR);
}
