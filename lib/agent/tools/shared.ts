/**
 * Shared Tool Utilities and Types
 *
 * Common utilities and type definitions used across agent tools.
 */

import { createTool as anthropicCreateTool, type UpdateStatusFn } from "./anthropic-tools";

export type { UpdateStatusFn };

/**
 * Helper to create tools with proper typing
 */
export const createTool = anthropicCreateTool;

/**
 * Parameters shared by every tool factory
 */
export interface AgentToolFactoryParams {
  updateStatus?: UpdateStatusFn;
}
