import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { loadConfig } from './loader.js';
import { CONFIG_DEFAULTS } from './defaults.js';
import { CodeuError } from '../utils/errors.js';

describe('loadConfig', () => {
  let tmpDir: string;
  let homeDir: string;

  beforeEach(() => {
    tmpDir = mkdtempSync(join(tmpdir(), 'codeu-test-'));
    homeDir = mkdtempSync(join(tmpdir(), 'codeu-home-'));
    // marks tmpDir as the project root
    writeFileSync(join(tmpDir, 'package.json'), '{}');
  });

  afterEach(() => {
    rmSync(tmpDir, { recursive: true, force: true });
    rmSync(homeDir, { recursive: true, force: true });
  });

  const load = (overrides = {}, env: NodeJS.ProcessEnv = {}) =>
    loadConfig(tmpDir, overrides, { homeDir, env });

  it('returns defaults when no config files exist', async () => {
    const config = await load();
    expect(config.logLevel).toBe('warn');
    expect(config.editor.onMultipleMatches).toBe('reject');
    expect(config.commands.allowlist).toEqual(CONFIG_DEFAULTS.commands.allowlist);
    expect(config.workspaceRoot).toBe(tmpDir);
  });

  it('merges repo config over defaults key by key', async () => {
    writeFileSync(join(tmpDir, '.codeurc'), JSON.stringify({ search: { maxMatches: 5 } }));

    const config = await load();
    expect(config.search.maxMatches).toBe(5);
    expect(config.search.ignore).toEqual(['.git', 'node_modules']);
  });

  it('reads .codeu/config.json and anchors a relative root at the repo', async () => {
    mkdirSync(join(tmpDir, '.codeu'));
    mkdirSync(join(tmpDir, 'pkg'));
    writeFileSync(join(tmpDir, '.codeu', 'config.json'), JSON.stringify({ workspaceRoot: 'pkg' }));

    const config = await load();
    expect(config.workspaceRoot).toBe(join(tmpDir, 'pkg'));
  });

  it('replaces the allow-list wholesale', async () => {
    writeFileSync(
      join(tmpDir, '.codeurc.json'),
      JSON.stringify({ commands: { allowlist: { echo: { maxArgs: 2 } } } })
    );

    const config = await load();
    expect(Object.keys(config.commands.allowlist)).toEqual(['echo']);
    expect(config.commands.allowlist['echo']).toEqual({
      argPattern: '^[A-Za-z0-9_@%+=:,./-]+$',
      maxArgs: 2,
      pathArgs: false,
    });
    expect(config.commands.defaultTimeoutSeconds).toBe(30);
  });

  it('layers user config below repo config', async () => {
    const userDir = join(homeDir, '.config', 'codeu');
    mkdirSync(userDir, { recursive: true });
    writeFileSync(
      join(userDir, 'config.json'),
      JSON.stringify({ logLevel: 'info', model: { name: 'user-model' } })
    );
    writeFileSync(join(tmpDir, '.codeurc'), JSON.stringify({ model: { name: 'repo-model' } }));

    const config = await load();
    expect(config.logLevel).toBe('info');
    expect(config.model.name).toBe('repo-model');
    expect(config.model.apiKeyEnv).toBe('OPENAI_API_KEY');
  });

  it('applies environment variables above files', async () => {
    writeFileSync(join(tmpDir, '.codeurc'), JSON.stringify({ logLevel: 'error' }));
    mkdirSync(join(tmpDir, 'sub'));

    const config = await load({}, { CODEU_LOG_LEVEL: 'debug', CODEU_WORKSPACE_ROOT: 'sub' });
    expect(config.logLevel).toBe('debug');
    expect(config.workspaceRoot).toBe(join(tmpDir, 'sub'));
  });

  it('applies CLI overrides last', async () => {
    const config = await load(
      { root: 'elsewhere', model: 'cli-model', baseUrl: 'http://localhost:8080/v1', verbose: true },
      { CODEU_LOG_LEVEL: 'error' }
    );
    expect(config.workspaceRoot).toBe(join(tmpDir, 'elsewhere'));
    expect(config.model.name).toBe('cli-model');
    expect(config.model.baseUrl).toBe('http://localhost:8080/v1');
    expect(config.logLevel).toBe('debug');
  });

  it('throws CONFIG_INVALID naming the file for a malformed config', async () => {
    const file = join(tmpDir, '.codeurc');
    writeFileSync(file, JSON.stringify({ tree: { maxDepth: 0 } }));

    const err = await load().catch((e: unknown) => e);
    expect(err).toBeInstanceOf(CodeuError);
    expect(CodeuError.isCodeuError(err) && err.code).toBe('CONFIG_INVALID');
    expect(CodeuError.isCodeuError(err) && err.message.startsWith(`Invalid config at ${file}:`)).toBe(true);
  });

  it('rejects an invalid argPattern', async () => {
    writeFileSync(
      join(tmpDir, '.codeurc'),
      JSON.stringify({ commands: { allowlist: { echo: { argPattern: '([' } } } })
    );

    await expect(load()).rejects.toThrow(/argPattern must be a valid regular expression/);
  });

  it('rejects a default timeout above the ceiling', async () => {
    writeFileSync(
      join(tmpDir, '.codeurc'),
      JSON.stringify({ commands: { defaultTimeoutSeconds: 60, maxTimeoutSeconds: 10 } })
    );

    await expect(load()).rejects.toThrow(/defaultTimeoutSeconds must not exceed maxTimeoutSeconds/);
  });

  it('rejects an unknown CODEU_LOG_LEVEL', async () => {
    await expect(load({}, { CODEU_LOG_LEVEL: 'loud' })).rejects.toThrow(
      'Invalid CODEU_LOG_LEVEL "loud": expected one of silent, error, warn, info, debug'
    );
  });
});
