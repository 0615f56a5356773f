/**
 * Anthropic-Native Tool Helpers
 *
 * Tool definitions in the shape the Anthropic Messages API expects
 * (`name`, `description`, `input_schema`), plus the executor that runs
 * when the model calls the tool.
 */

import type { Tool } from "@anthropic-ai/sdk/resources/messages";

export type UpdateStatusFn = (status: string) => void;

/**
 * Tool definition compatible with Anthropic's tool schema
 */
export interface AnthropicToolDefinition<TOutput = unknown> {
  name: string;
  description: string;
  inputSchema: Tool.InputSchema;
  /** Tool input arrives untyped from the model and is validated by the tool */
  execute: (input: unknown) => Promise<TOutput>;
}

/**
 * Options for creating an Anthropic tool
 */
export interface CreateToolOptions<TOutput> {
  name: string;
  description: string;
  inputSchema: Tool.InputSchema;
  execute: (input: unknown) => Promise<TOutput>;
}

/**
 * Creates an Anthropic-compatible tool definition
 *
 * @example
 * const echoTool = createTool({
 *   name: "echo",
 *   description: "Echo the input back",
 *   inputSchema: { type: "object", properties: { text: { type: "string" } } },
 *   execute: async (input) => input,
 * });
 */
export function createTool<TOutput>(options: CreateToolOptions<TOutput>): AnthropicToolDefinition<TOutput> {
  return {
    name: options.name,
    description: options.description,
    inputSchema: options.inputSchema,
    execute: options.execute,
  };
}

/**
 * Wire format for the `tools` array of a Messages API request
 */
export function toAnthropicToolParam(tool: AnthropicToolDefinition): Tool {
  return {
    name: tool.name,
    description: tool.description,
    input_schema: tool.inputSchema,
  };
}
