/**
 * MCP Tool Registry
 */

import { z } from 'zod';
import { ask, askSchema } from './ask.js';
import { getMetrics, getMetricsSchema, resetMetrics, resetMetricsSchema } from './metrics.js';
import type { ToolResult } from '../../types/index.js';

// Tool definitions for MCP
export interface ToolDefinition {
  name: string;
  description: string;
  inputSchema: z.ZodTypeAny;
  /** Validates raw arguments against inputSchema, then runs the tool */
  handler: (params: unknown) => Promise<ToolResult>;
}

function defineTool<S extends z.ZodTypeAny>(definition: {
  name: string;
  description: string;
  inputSchema: S;
  run: (params: z.infer<S>) => Promise<ToolResult>;
}): ToolDefinition {
  return {
    name: definition.name,
    description: definition.description,
    inputSchema: definition.inputSchema,
    handler: async (params) => definition.run(definition.inputSchema.parse(params ?? {})),
  };
}

export const tools: ToolDefinition[] = [
  defineTool({
    name: 'ask',
    description: 'Answer a question from the indexed documents. Retrieved passages are filtered for relevance, and the answer is regenerated until a faithfulness judge scores it at or above the threshold. Returns the best answer with its score, attempt count and sources.',
    inputSchema: askSchema,
    run: ask,
  }),
  defineTool({
    name: 'get_metrics',
    description: 'Get aggregate pipeline metrics: success rate, latency, score distribution, attempts and filter rejection rate.',
    inputSchema: getMetricsSchema,
    run: getMetrics,
  }),
  defineTool({
    name: 'reset_metrics',
    description: 'Clear all recorded query metrics for this server process.',
    inputSchema: resetMetricsSchema,
    run: () => resetMetrics(),
  }),
];

/**
 * Get tool by name
 */
export function getTool(name: string): ToolDefinition | undefined {
  return tools.find(t => t.name === name);
}

/**
 * Get all tool names
 */
export function getToolNames(): string[] {
  return tools.map(t => t.name);
}

/**
 * Convert Zod schema to JSON Schema for MCP
 */
export function zodToJsonSchema(schema: z.ZodTypeAny): Record<string, unknown> {
  if (schema instanceof z.ZodObject) {
    const shape: z.ZodRawShape = schema.shape;
    const properties: Record<string, unknown> = {};
    const required: string[] = [];

    for (const [key, value] of Object.entries(shape)) {
      properties[key] = zodTypeToJsonSchema(value);

      if (!isOptionalType(value)) {
        required.push(key);
      }
    }

    return {
      type: 'object',
      properties,
      required: required.length > 0 ? required : undefined,
    };
  }

  return { type: 'object' };
}

function isOptionalType(schema: z.ZodTypeAny): boolean {
  return schema instanceof z.ZodOptional || schema instanceof z.ZodDefault;
}

function withDescription(schema: z.ZodTypeAny, result: Record<string, unknown>): Record<string, unknown> {
  if (schema.description) result.description = schema.description;
  return result;
}

function zodTypeToJsonSchema(schema: z.ZodTypeAny): Record<string, unknown> {
  // Wrapped types keep the outer description
  if (schema instanceof z.ZodOptional) {
    return withDescription(schema, zodTypeToJsonSchema(schema.unwrap()));
  }

  if (schema instanceof z.ZodDefault) {
    return withDescription(schema, zodTypeToJsonSchema(schema.removeDefault()));
  }

  if (schema instanceof z.ZodNullable) {
    return { ...zodTypeToJsonSchema(schema.unwrap()), nullable: true };
  }

  if (schema instanceof z.ZodEffects) {
    return zodTypeToJsonSchema(schema.innerType());
  }

  if (schema instanceof z.ZodString) {
    const result: Record<string, unknown> = { type: 'string' };
    if (schema.minLength !== null) result.minLength = schema.minLength;
    if (schema.maxLength !== null) result.maxLength = schema.maxLength;
    return withDescription(schema, result);
  }

  if (schema instanceof z.ZodNumber) {
    const result: Record<string, unknown> = { type: schema.isInt ? 'integer' : 'number' };
    if (schema.minValue !== null) result.minimum = schema.minValue;
    if (schema.maxValue !== null) result.maximum = schema.maxValue;
    return withDescription(schema, result);
  }

  if (schema instanceof z.ZodBoolean) {
    return withDescription(schema, { type: 'boolean' });
  }

  if (schema instanceof z.ZodEnum) {
    return withDescription(schema, { type: 'string', enum: schema.options });
  }

  if (schema instanceof z.ZodArray) {
    return withDescription(schema, { type: 'array', items: zodTypeToJsonSchema(schema.element) });
  }

  if (schema instanceof z.ZodObject) {
    return withDescription(schema, zodToJsonSchema(schema));
  }

  // Unknown - accept anything
  return {};
}
