import { z } from 'zod';
import type { ToolDefinition } from './types.js';

export interface ParameterInfo {
  name: string;
  type: string;
  required: boolean;
  description?: string;
}

export interface ToolInfo {
  name: string;
  aliases: string[];
  readonly: boolean;
  description: string;
  parameters: ParameterInfo[];
}

function typeLabel(schema: z.ZodTypeAny): string {
  if (schema instanceof z.ZodOptional) return typeLabel(schema.unwrap());
  if (schema instanceof z.ZodDefault) return typeLabel(schema.removeDefault());
  if (schema instanceof z.ZodString) return 'string';
  if (schema instanceof z.ZodNumber) return schema.isInt ? 'integer' : 'number';
  if (schema instanceof z.ZodBoolean) return 'boolean';
  if (schema instanceof z.ZodArray) return `${typeLabel(schema.element)}[]`;
  if (schema instanceof z.ZodUnion) {
    const options: z.ZodTypeAny[] = schema.options;
    return options.map(typeLabel).join(' | ');
  }
  return 'unknown';
}

export function describeParameters(schema: z.AnyZodObject): ParameterInfo[] {
  const shape: z.ZodRawShape = schema.shape;
  return Object.entries(shape).map(([name, field]) => ({
    name,
    type: typeLabel(field),
    required: !field.isOptional(),
    ...(field.description !== undefined ? { description: field.description } : {}),
  }));
}

export function describeTool(definition: ToolDefinition): ToolInfo {
  return {
    name: definition.name,
    aliases: [...(definition.aliases ?? [])],
    readonly: definition.readonly,
    description: definition.description,
    parameters: describeParameters(definition.schema),
  };
}
