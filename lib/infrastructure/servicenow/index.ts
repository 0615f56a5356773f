/**
 * ServiceNow Infrastructure Layer - Public API
 *
 * Provides clean, typed interfaces for ServiceNow CRUD operations
 */

export * from "./types";
export * from "./errors";
export * from "./auth";
export * from "./client";
export * from "./factory";
