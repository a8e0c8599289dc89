import { cosmiconfig } from 'cosmiconfig';
import { homedir } from 'node:os';
import { dirname, join, resolve } from 'node:path';
import { existsSync } from 'node:fs';
import { CodeuConfigSchema, ConfigLayerSchema, LogLevelSchema } from './schema.js';
import { CONFIG_DEFAULTS } from './defaults.js';
import type { CodeuConfig, CliOverrides, ConfigLayer, ResolvedConfig } from './schema.js';
import { CodeuError } from '../utils/errors.js';
import { getWorkspaceRoot } from '../utils/workspace.js';

const MODULE_NAME = 'codeu';

export interface LoadConfigOptions {
  /** Home directory holding `.config/codeu/`. Defaults to the OS home. */
  homeDir?: string;
  env?: NodeJS.ProcessEnv;
}

function mergeConfigs(base: CodeuConfig, layer: ConfigLayer): CodeuConfig {
  return {
    ...base,
    ...(layer.workspaceRoot !== undefined ? { workspaceRoot: layer.workspaceRoot } : {}),
    logLevel: layer.logLevel ?? base.logLevel,
    redactPatterns: layer.redactPatterns ?? base.redactPatterns,
    editor: { ...base.editor, ...layer.editor },
    search: { ...base.search, ...layer.search },
    tree: { ...base.tree, ...layer.tree },
    // A layer that names an allow-list replaces it: commands are never inherited piecemeal.
    commands: {
      ...base.commands,
      ...layer.commands,
      allowlist: layer.commands?.allowlist ?? base.commands.allowlist,
    },
    model: { ...base.model, ...layer.model },
  };
}

function parseLayer(raw: unknown, source: string): ConfigLayer {
  const parsed = ConfigLayerSchema.safeParse(raw);
  if (!parsed.success) {
    throw new CodeuError(`Invalid config at ${source}: ${parsed.error.message}`, 'CONFIG_INVALID');
  }
  return parsed.data;
}

/** Relative workspace roots in a file are relative to that file. */
function anchorRoot(layer: ConfigLayer, baseDir: string): ConfigLayer {
  if (layer.workspaceRoot === undefined) return layer;
  return { ...layer, workspaceRoot: resolve(baseDir, layer.workspaceRoot) };
}

async function loadRepoConfig(searchFrom: string): Promise<ConfigLayer> {
  const explorer = cosmiconfig(MODULE_NAME, {
    searchPlaces: [
      `.${MODULE_NAME}rc`,
      `.${MODULE_NAME}rc.json`,
      `.${MODULE_NAME}rc.yaml`,
      `.${MODULE_NAME}rc.yml`,
      `.${MODULE_NAME}/config.json`,
      `${MODULE_NAME}.config.js`,
      `${MODULE_NAME}.config.cjs`,
    ],
    stopDir: searchFrom,
  });

  const result = await explorer.search(searchFrom);
  if (!result) return {};

  const layer = parseLayer(result.config, result.filepath);
  const fileDir = dirname(result.filepath);
  // `.codeu/config.json` describes the directory above it
  const baseDir = fileDir.endsWith(`.${MODULE_NAME}`) ? dirname(fileDir) : fileDir;
  return anchorRoot(layer, baseDir);
}

/**
 * Load config from ~/.config/codeu/config.{json,yaml,yml}.
 */
async function loadUserConfig(home: string): Promise<ConfigLayer> {
  const userConfigDir = join(home, '.config', MODULE_NAME);

  if (!existsSync(userConfigDir)) return {};

  const explorer = cosmiconfig(MODULE_NAME, {
    searchPlaces: ['config.json', 'config.yaml', 'config.yml'],
    stopDir: userConfigDir,
  });

  const result = await explorer.search(userConfigDir);
  if (!result) return {};

  return anchorRoot(parseLayer(result.config, result.filepath), home);
}

function loadEnvConfig(env: NodeJS.ProcessEnv, cwd: string): ConfigLayer {
  const layer: ConfigLayer = {};
  const root = env['CODEU_WORKSPACE_ROOT'];
  if (root) layer.workspaceRoot = resolve(cwd, root);

  const level = env['CODEU_LOG_LEVEL'];
  if (level) {
    const parsed = LogLevelSchema.safeParse(level);
    if (!parsed.success) {
      throw new CodeuError(
        `Invalid CODEU_LOG_LEVEL "${level}": expected one of ${LogLevelSchema.options.join(', ')}`,
        'CONFIG_INVALID'
      );
    }
    layer.logLevel = parsed.data;
  }
  return layer;
}

function cliLayer(overrides: CliOverrides, cwd: string): ConfigLayer {
  const layer: ConfigLayer = {};
  if (overrides.root) layer.workspaceRoot = resolve(cwd, overrides.root);
  if (overrides.verbose) layer.logLevel = 'debug';
  if (overrides.model || overrides.baseUrl) {
    layer.model = {
      ...(overrides.model ? { name: overrides.model } : {}),
      ...(overrides.baseUrl ? { baseUrl: overrides.baseUrl } : {}),
    };
  }
  return layer;
}

export async function loadConfig(
  cwd: string = process.cwd(),
  cliOverrides: CliOverrides = {},
  options: LoadConfigOptions = {}
): Promise<ResolvedConfig> {
  // Merge order (lowest → highest priority):
  //   1. Built-in defaults
  //   2. ~/.config/codeu/config.json
  //   3. .codeurc / .codeu/config.json (repo-level)
  //   4. CODEU_* environment variables
  //   5. CLI flags
  const env = options.env ?? process.env;
  const layers = [
    await loadUserConfig(options.homeDir ?? homedir()),
    await loadRepoConfig(cwd),
    loadEnvConfig(env, cwd),
    cliLayer(cliOverrides, cwd),
  ];

  const merged = layers.reduce(mergeConfigs, CONFIG_DEFAULTS);

  const checked = CodeuConfigSchema.safeParse(merged);
  if (!checked.success) {
    throw new CodeuError(`Invalid merged config: ${checked.error.message}`, 'CONFIG_INVALID');
  }

  const config = checked.data;
  return {
    ...config,
    workspaceRoot: config.workspaceRoot ?? (await getWorkspaceRoot(cwd)),
  };
}
