import { CONFIG_DEFAULTS } from '../config/defaults.js';
import type { CodeuConfig, ConfigLayer } from '../config/schema.js';
import { PathBoundary } from '../utils/boundary.js';
import { Logger } from '../utils/logger.js';
import { resolveToolSettings } from './context.js';
import type { ToolContext } from './types.js';

export type SettingsPatch = Pick<ConfigLayer, 'editor' | 'search' | 'tree' | 'commands'>;

/** Tool context rooted at `root` with default settings, `patch` applied per section. */
export async function createTestContext(root: string, patch: SettingsPatch = {}): Promise<ToolContext> {
  const config: CodeuConfig = {
    ...CONFIG_DEFAULTS,
    editor: { ...CONFIG_DEFAULTS.editor, ...patch.editor },
    search: { ...CONFIG_DEFAULTS.search, ...patch.search },
    tree: { ...CONFIG_DEFAULTS.tree, ...patch.tree },
    commands: { ...CONFIG_DEFAULTS.commands, ...patch.commands },
  };
  return {
    boundary: await PathBoundary.open(root),
    settings: resolveToolSettings(config),
    logger: new Logger('silent'),
  };
}
