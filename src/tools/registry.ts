import type { ZodError } from 'zod';
import { CodeuError } from '../utils/errors.js';
import type { ToolContext, ToolDefinition, ToolOutcome } from './types.js';
import { lsTool } from './ls.js';
import { treeTool } from './tree.js';
import { grepTool } from './grep.js';
import { textViewTool } from './text_view.js';
import { strReplaceEditTool } from './str_replace_edit.js';
import { runCommandTool } from './run_command.js';

/** The closed set of tools the agent may call. */
export const TOOL_DEFINITIONS: readonly ToolDefinition[] = [
  lsTool,
  treeTool,
  grepTool,
  textViewTool,
  strReplaceEditTool,
  runCommandTool,
];

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function formatIssues(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(arguments)'}: ${issue.message}`)
    .join('\n');
}

function failure(err: CodeuError): ToolOutcome {
  return {
    success: false,
    output: `Error: ${err.message}`,
    error: { code: err.code, message: err.message },
  };
}

export class ToolRegistry {
  private readonly byName = new Map<string, ToolDefinition>();

  constructor(
    definitions: readonly ToolDefinition[],
    private readonly ctx: ToolContext
  ) {
    for (const tool of definitions) {
      for (const name of [tool.name, ...(tool.aliases ?? [])]) {
        if (this.byName.has(name)) {
          throw new CodeuError(`Duplicate tool name: "${name}"`, 'CONFIG_INVALID');
        }
        this.byName.set(name, tool);
      }
    }
  }

  get(name: string): ToolDefinition | undefined {
    return this.byName.get(name);
  }

  has(name: string): boolean {
    return this.byName.has(name);
  }

  /** Each tool once, in registration order. */
  list(): ToolDefinition[] {
    return [...new Set(this.byName.values())];
  }

  /** Every callable name, aliases included. */
  names(): string[] {
    return [...this.byName.keys()];
  }

  /**
   * Validate `args` against the tool's schema and run it. Never rejects:
   * every problem comes back as a failure outcome.
   */
  async execute(name: string, args: unknown): Promise<ToolOutcome> {
    const log = this.ctx.logger;
    const tool = this.byName.get(name);
    if (tool === undefined) {
      return failure(
        new CodeuError(
          `Tool not found: "${name}". Available tools: ${this.names().join(', ')}`,
          'TOOL_NOT_FOUND'
        )
      );
    }

    const input = args === undefined ? {} : args;
    if (!isPlainObject(input)) {
      return failure(new CodeuError(`Arguments for "${name}" must be a JSON object.`, 'INVALID_ARGUMENTS'));
    }

    const parsed = tool.schema.safeParse(input);
    if (!parsed.success) {
      log.debug(`${name}: rejected arguments`);
      return failure(
        new CodeuError(`Invalid arguments for "${name}":\n${formatIssues(parsed.error)}`, 'INVALID_ARGUMENTS')
      );
    }

    log.debug(`${name} ${JSON.stringify(parsed.data)}`);
    try {
      const result = await tool.execute(parsed.data, this.ctx);
      log.debug(`${name}: ok`);
      return { success: true, ...result };
    } catch (err: unknown) {
      if (CodeuError.isCodeuError(err)) {
        log.debug(`${name}: ${err.code} ${err.message}`);
        return failure(err);
      }
      const reason = err instanceof Error ? err.message : String(err);
      log.error(`Tool "${name}" threw an unexpected error:`, err instanceof Error ? (err.stack ?? reason) : reason);
      return failure(new CodeuError(`Tool "${name}" failed: ${reason}`, 'TOOL_EXEC_ERROR', { cause: err }));
    }
  }
}

export function createToolRegistry(ctx: ToolContext): ToolRegistry {
  return new ToolRegistry(TOOL_DEFINITIONS, ctx);
}
