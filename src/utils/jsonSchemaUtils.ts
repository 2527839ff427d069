import type { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Converts a zod object schema into the `inputSchema` shape tools/list expects:
 * root-relative `$ref`s for recursive parts, no `$schema` marker.
 */
export function toToolInputSchema(schema: z.ZodTypeAny): Tool['inputSchema'] {
  const jsonSchema: unknown = zodToJsonSchema(schema);
  if (!isRecord(jsonSchema) || !isRecord(jsonSchema.properties)) {
    throw new Error('Tool input schemas must be zod objects');
  }

  const required = Array.isArray(jsonSchema.required)
    ? jsonSchema.required.filter((key): key is string => typeof key === 'string')
    : [];

  return {
    type: 'object',
    properties: jsonSchema.properties,
    ...(required.length > 0 ? { required } : {}),
    ...(typeof jsonSchema.description === 'string' ? { description: jsonSchema.description } : {}),
  };
}
