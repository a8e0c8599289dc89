import type { CodeuConfig, ResolvedConfig } from '../config/schema.js';
import { PathBoundary } from '../utils/boundary.js';
import { logger as processLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';
import type { ToolContext, ToolSettings } from './types.js';

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object') {
    for (const nested of Object.values(value)) deepFreeze(nested);
    Object.freeze(value);
  }
  return value;
}

/** Copy the tool-facing sections of `config` and freeze them. */
export function resolveToolSettings(config: CodeuConfig): ToolSettings {
  return deepFreeze(
    structuredClone({
      editor: config.editor,
      search: config.search,
      tree: config.tree,
      commands: config.commands,
    })
  );
}

export async function createToolContext(
  config: ResolvedConfig,
  logger: Logger = processLogger
): Promise<ToolContext> {
  return {
    boundary: await PathBoundary.open(config.workspaceRoot),
    settings: resolveToolSettings(config),
    logger: logger.child('tools'),
  };
}
