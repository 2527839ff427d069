/**
 * McpTool typedef shared by every tool collection.
 */

import type { Tool, ToolAnnotations } from '@modelcontextprotocol/sdk/types.js';

/**
 * Handler function signature for MCP tools. Arguments arrive unvalidated from
 * the client; each handler parses them with its own zod schema.
 */
export type McpToolHandler<TOutput = unknown> = (args: Record<string, unknown>) => Promise<TOutput>;

export interface McpTool<TOutput = unknown> {
  /**
   * Tool name - must be unique across all registered tools
   */
  name: string;

  description: string;

  /**
   * JSON Schema for input validation, generated from the zod request schema
   */
  inputSchema: Tool['inputSchema'];

  handler: McpToolHandler<TOutput>;

  /**
   * Behaviour hints surfaced in tools/list (read-only, idempotent, ...)
   */
  annotations?: ToolAnnotations;
}

/**
 * Tool collection interface for tool management classes
 */
export interface McpToolCollection {
  getTools(): McpTool[];
}

export * from './knowledgeBase.js';
