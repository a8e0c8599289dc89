import type { z } from 'zod';
import type { CodeuConfig } from '../config/schema.js';
import type { PathBoundary } from '../utils/boundary.js';
import type { ErrorCode } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';

export type DeepReadonly<T> = T extends (infer U)[]
  ? ReadonlyArray<DeepReadonly<U>>
  : T extends object
    ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
    : T;

/** The configuration tools see. Frozen when the context is built. */
export type ToolSettings = DeepReadonly<Pick<CodeuConfig, 'editor' | 'search' | 'tree' | 'commands'>>;

export interface ToolContext {
  boundary: PathBoundary;
  settings: ToolSettings;
  logger: Logger;
}

/** What a handler returns on success. Failures are thrown as CodeuError. */
export interface ToolResult {
  output: string;
  data?: unknown;
  metadata?: Record<string, unknown>;
}

export type ToolOutcome =
  | { success: true; output: string; data?: unknown; metadata?: Record<string, unknown> }
  | { success: false; output: string; error: { code: ErrorCode; message: string } };

export interface ToolDefinition<S extends z.AnyZodObject = z.AnyZodObject> {
  name: string;
  /** Extra names that dispatch to this tool. */
  aliases?: readonly string[];
  description: string;
  readonly: boolean;
  schema: S;
  execute(args: z.infer<S>, ctx: ToolContext): Promise<ToolResult>;
}

export function defineTool<S extends z.AnyZodObject>(definition: ToolDefinition<S>): ToolDefinition<S> {
  return definition;
}
