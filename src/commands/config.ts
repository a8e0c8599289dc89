import { writeFile, mkdir, access } from 'node:fs/promises';
import { join } from 'node:path';
import { homedir } from 'node:os';
import { loadConfig } from '../config/loader.js';
import { CONFIG_DEFAULTS } from '../config/defaults.js';
import type { CliOverrides } from '../config/schema.js';
import { printError, printJson, printSuccess } from '../ui/renderer.js';
import { CodeuError } from '../utils/errors.js';

export async function runConfigShow(options: CliOverrides = {}): Promise<void> {
  try {
    printJson(await loadConfig(process.cwd(), options));
  } catch (err) {
    printError(CodeuError.fromUnknown(err).message);
    process.exit(1);
  }
}

/** Starter config: the settings people usually change, not the whole tree. */
export function initialConfig(): Record<string, unknown> {
  return {
    logLevel: CONFIG_DEFAULTS.logLevel,
    editor: { onMultipleMatches: CONFIG_DEFAULTS.editor.onMultipleMatches },
    commands: {
      allowlist: CONFIG_DEFAULTS.commands.allowlist,
      defaultTimeoutSeconds: CONFIG_DEFAULTS.commands.defaultTimeoutSeconds,
    },
    model: {
      name: CONFIG_DEFAULTS.model.name,
      apiKeyEnv: CONFIG_DEFAULTS.model.apiKeyEnv,
    },
  };
}

export async function runConfigInit(options: { global?: boolean } = {}): Promise<void> {
  try {
    const configDir = options.global
      ? join(homedir(), '.config', 'codeu')
      : join(process.cwd(), '.codeu');
    const configPath = join(configDir, 'config.json');

    const exists = await access(configPath).then(() => true, () => false);
    if (exists) {
      throw new CodeuError(`Config already exists at: ${configPath}`, 'CONFIG_INVALID');
    }

    await mkdir(configDir, { recursive: true });
    await writeFile(configPath, JSON.stringify(initialConfig(), null, 2) + '\n');
    printSuccess(`Config initialized at: ${configPath}`);
  } catch (err) {
    printError(CodeuError.fromUnknown(err).message);
    process.exit(1);
  }
}
