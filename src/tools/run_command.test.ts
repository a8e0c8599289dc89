import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { spawn } from 'node:child_process';
import { mkdtemp, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { realpathSync, rmSync } from 'node:fs';
import { DEFAULT_ARG_PATTERN } from '../config/schema.js';
import type { CommandSpec } from '../config/schema.js';
import { matchesFlag, pathOperand, runCommandTool, splitArgs, validateCommand } from './run_command.js';
import { createTestContext } from './testing.js';
import type { ToolContext } from './types.js';

vi.mock('node:child_process', async (importOriginal) => {
  const actual = await importOriginal<typeof import('node:child_process')>();
  return { ...actual, spawn: vi.fn(actual.spawn) };
});

const ALLOWLIST: Record<string, CommandSpec> = {
  echo: { argPattern: DEFAULT_ARG_PATTERN, maxArgs: 4, pathArgs: false },
  sleep: { argPattern: '\\d+(\\.\\d+)?', maxArgs: 1, pathArgs: false },
  cat: { argPattern: DEFAULT_ARG_PATTERN, maxArgs: 4, pathArgs: true },
  git: { argPattern: DEFAULT_ARG_PATTERN, subcommands: ['status'], maxArgs: 4, pathArgs: false },
  sh: { argPattern: '-c|exit \\d+', maxArgs: 2, pathArgs: false },
  pwd: { argPattern: DEFAULT_ARG_PATTERN, maxArgs: 0, pathArgs: false },
  'codeu-no-such-binary': { argPattern: DEFAULT_ARG_PATTERN, maxArgs: 0, pathArgs: false },
};

let tmpDir: string;
let ctx: ToolContext;

const run = (args: Record<string, unknown>) => runCommandTool.execute(runCommandTool.schema.parse(args), ctx);

beforeEach(async () => {
  vi.mocked(spawn).mockClear();
  tmpDir = await mkdtemp(join(tmpdir(), 'codeu-cmd-test-'));
  ctx = await createTestContext(tmpDir, { commands: { allowlist: ALLOWLIST, maxTimeoutSeconds: 10 } });
});

afterEach(() => {
  rmSync(tmpDir, { recursive: true, force: true });
});

describe('splitArgs', () => {
  it('splits a string on whitespace and copies arrays', () => {
    expect(splitArgs('  status   --short ')).toEqual(['status', '--short']);
    expect(splitArgs('')).toEqual([]);
    expect(splitArgs(['a b', 'c'])).toEqual(['a b', 'c']);
  });
});

describe('matchesFlag and pathOperand', () => {
  it('matches a flag bare, with =value, or as a short flag with its value attached', () => {
    expect(matchesFlag('--contents', '--contents')).toBe(true);
    expect(matchesFlag('--contents=x', '--contents')).toBe(true);
    expect(matchesFlag('--contents-x', '--contents')).toBe(false);
    expect(matchesFlag('-Ofile', '-O')).toBe(true);
    expect(matchesFlag('-n', '-O')).toBe(false);
  });

  it('finds the file-naming part of an argument', () => {
    expect(pathOperand('src/a.ts')).toBe('src/a.ts');
    expect(pathOperand('--files0-from=/x')).toBe('/x');
    expect(pathOperand('--color=')).toBeUndefined();
    expect(pathOperand('-n')).toBeUndefined();
  });
});

describe('run_command validation', () => {
  it('rejects commands outside the allow-list without spawning', async () => {
    await expect(run({ command: 'rm', args: ['-rf', 'x'] })).rejects.toMatchObject({
      code: 'COMMAND_NOT_ALLOWED',
      message: 'Command "rm" is not allowed. Allowed commands: cat, codeu-no-such-binary, echo, git, pwd, sh, sleep',
    });
    await expect(run({ command: '/bin/echo' })).rejects.toMatchObject({ code: 'COMMAND_NOT_ALLOWED' });
    await expect(run({ command: 'toString' })).rejects.toMatchObject({ code: 'COMMAND_NOT_ALLOWED' });
    expect(spawn).not.toHaveBeenCalled();
  });

  it.each([['hi;'], ['$(whoami)'], ['a|b'], ['*.ts'], ['a\nb'], ['nul\u0000'], ['`id`'], ['"quoted"']])(
    'rejects the argument %j',
    async (arg) => {
      await expect(run({ command: 'echo', args: [arg] })).rejects.toMatchObject({ code: 'ARGUMENT_REJECTED' });
      expect(spawn).not.toHaveBeenCalled();
    }
  );

  it('enforces maxArgs, subcommands and the argument pattern', async () => {
    await expect(run({ command: 'echo', args: ['1', '2', '3', '4', '5'] })).rejects.toMatchObject({
      code: 'ARGUMENT_REJECTED',
      message: '"echo" accepts at most 4 argument(s), got 5.',
    });
    await expect(run({ command: 'git', args: ['push'] })).rejects.toMatchObject({ code: 'ARGUMENT_REJECTED' });
    await expect(run({ command: 'git' })).rejects.toMatchObject({ code: 'ARGUMENT_REJECTED' });
    await expect(run({ command: 'sleep', args: ['abc'] })).rejects.toMatchObject({
      code: 'ARGUMENT_REJECTED',
      message: 'Argument "abc" is not permitted for "sleep".',
    });
    expect(spawn).not.toHaveBeenCalled();
  });

  it('confines path arguments to the workspace', async () => {
    await expect(run({ command: 'cat', args: ['../secret.txt'] })).rejects.toMatchObject({
      code: 'PATH_OUTSIDE_BOUNDARY',
    });
    await expect(run({ command: 'cat', args: ['/etc/hostname'] })).rejects.toMatchObject({
      code: 'PATH_OUTSIDE_BOUNDARY',
    });
    expect(spawn).not.toHaveBeenCalled();
  });

  it('rejects a timeout above the ceiling', async () => {
    await expect(run({ command: 'echo', args: ['hi'], timeout_seconds: 11 })).rejects.toMatchObject({
      code: 'INVALID_ARGUMENTS',
      message: 'timeout_seconds 11 exceeds the maximum of 10.',
    });
    expect(spawn).not.toHaveBeenCalled();
  });
});

describe('run_command execution', () => {
  it('runs without a shell and captures stdout', async () => {
    const result = await run({ command: 'echo', args: 'hello   world' });
    expect(result.output).toBe('hello world');
    expect(result.data).toMatchObject({ exitCode: 0, stdout: 'hello world\n', stderr: '', truncated: false });
    expect(spawn).toHaveBeenCalledWith(
      'echo',
      ['hello', 'world'],
      expect.objectContaining({ shell: false, cwd: ctx.boundary.root })
    );
  });

  it('runs in the workspace root', async () => {
    const result = await run({ command: 'pwd' });
    expect(result.output).toBe(realpathSync(tmpDir));
  });

  it('passes flags through and reads files inside the workspace', async () => {
    await writeFile(join(tmpDir, 'f.txt'), 'data\n');
    const result = await run({ command: 'cat', args: ['-u', 'f.txt'] });
    expect(result.output).toBe('data');
  });

  it('reports a non-zero exit as a successful call', async () => {
    const result = await run({ command: 'sh', args: ['-c', 'exit 3'] });
    expect(result.output).toBe('Command exited with code 3');
    expect(result.data).toMatchObject({ exitCode: 3 });
  });

  it('truncates output beyond the byte cap', async () => {
    ctx = await createTestContext(tmpDir, { commands: { allowlist: ALLOWLIST, maxOutputBytes: 4 } });
    const result = await run({ command: 'echo', args: ['abcdefgh'] });
    expect(result.output).toBe('abcd\n[output truncated to 4 bytes per stream]');
    expect(result.data).toMatchObject({ stdout: 'abcd', truncated: true });
  });

  it('kills a command that runs past its timeout', async () => {
    const started = Date.now();
    await expect(run({ command: 'sleep', args: ['5'], timeout_seconds: 0.5 })).rejects.toMatchObject({
      code: 'TIMEOUT_EXCEEDED',
      message: 'Command "sleep 5" timed out after 0.5s and was killed.',
    });
    expect(Date.now() - started).toBeLessThan(4000);
  });

  it('reports LAUNCH_FAILED when the executable is missing', async () => {
    await expect(run({ command: 'codeu-no-such-binary' })).rejects.toMatchObject({ code: 'LAUNCH_FAILED' });
  });
});

describe('run_command with the default allow-list', () => {
  let outsideDir: string;
  let secret: string;

  beforeEach(async () => {
    ctx = await createTestContext(tmpDir);
    outsideDir = await mkdtemp(join(tmpdir(), 'codeu-cmd-outside-'));
    secret = join(outsideDir, 'secret.txt');
    await writeFile(secret, 'TOPSECRET\n');
    await writeFile(join(tmpDir, 'in.txt'), 'hello\n');
  });

  afterEach(() => {
    rmSync(outsideDir, { recursive: true, force: true });
  });

  it('refuses git options that read or write files outside the repository', async () => {
    await expect(run({ command: 'git', args: ['diff', '--no-index', secret, 'in.txt'] })).rejects.toMatchObject({
      code: 'ARGUMENT_REJECTED',
      message: 'Option --no-index is not permitted for "git".',
    });
    for (const args of [
      ['blame', `--contents=${secret}`, 'in.txt'],
      ['diff', `-O${secret}`],
      ['log', `--output=${secret}`],
    ]) {
      await expect(run({ command: 'git', args })).rejects.toMatchObject({ code: 'ARGUMENT_REJECTED' });
    }
    expect(spawn).not.toHaveBeenCalled();
  });

  it('checks git path operands against the workspace', async () => {
    await expect(run({ command: 'git', args: ['diff', secret] })).rejects.toMatchObject({
      code: 'PATH_OUTSIDE_BOUNDARY',
    });
    await expect(run({ command: 'git', args: ['log', '--', '../elsewhere'] })).rejects.toMatchObject({
      code: 'PATH_OUTSIDE_BOUNDARY',
    });
    expect(spawn).not.toHaveBeenCalled();
  });

  it('still accepts ordinary git inspection', async () => {
    await expect(
      validateCommand('git', ['log', '-n', '1', '--format=%H', 'HEAD~1', '--', 'in.txt'], ctx)
    ).resolves.toBeUndefined();
  });

  it('checks the value of --opt=value arguments for file viewers', async () => {
    await expect(run({ command: 'wc', args: [`--files0-from=${secret}`] })).rejects.toMatchObject({
      code: 'ARGUMENT_REJECTED',
      message: 'Option --files0-from is not permitted for "wc".',
    });
    await expect(run({ command: 'cat', args: [`--number=${secret}`] })).rejects.toMatchObject({
      code: 'PATH_OUTSIDE_BOUNDARY',
    });
    await expect(validateCommand('head', ['-n', '5', 'in.txt'], ctx)).resolves.toBeUndefined();
    expect(spawn).not.toHaveBeenCalled();
  });
});
