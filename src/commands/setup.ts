import { loadConfig } from '../config/loader.js';
import type { CliOverrides, ResolvedConfig } from '../config/schema.js';
import { createToolContext } from '../tools/context.js';
import { createToolRegistry } from '../tools/registry.js';
import type { ToolRegistry } from '../tools/registry.js';
import { logger } from '../utils/logger.js';

export interface Runtime {
  config: ResolvedConfig;
  registry: ToolRegistry;
}

/** Load config, configure the process logger and build the tool registry. */
export async function setupRuntime(overrides: CliOverrides): Promise<Runtime> {
  const config = await loadConfig(process.cwd(), overrides);
  logger.setLevel(config.logLevel);
  logger.setRedactPatterns(config.redactPatterns);
  logger.debug(`workspace root: ${config.workspaceRoot}`);

  const ctx = await createToolContext(config, logger);
  return { config, registry: createToolRegistry(ctx) };
}
