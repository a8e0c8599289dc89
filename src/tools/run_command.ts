import { spawn } from 'node:child_process';
import { z } from 'zod';
import { CodeuError, errnoCode } from '../utils/errors.js';
import { ByteCollector } from '../utils/text.js';
import { defineTool } from './types.js';
import type { ToolContext } from './types.js';

// Shell metacharacters, quotes and control characters (NUL and newline included).
const FORBIDDEN_CHARS = /[;&|$`<>\\(){}!*?[\]'"\x00-\x1f\x7f]/;

const RunCommandArgsSchema = z
  .object({
    command: z.string().min(1).describe('Name of an allow-listed command, e.g. "git". No paths, no shell syntax.'),
    args: z
      .union([z.string(), z.array(z.string())])
      .default([])
      .describe('Arguments as a list. A string is split on whitespace; quoting is not supported.'),
    timeout_seconds: z.number().positive().optional().describe('Kill the command after this many seconds.'),
  })
  .strict();

export interface ProcessResult {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  truncated: boolean;
  timedOut: boolean;
  durationMs: number;
}

export interface RunOptions {
  cwd: string;
  timeoutMs: number;
  maxOutputBytes: number;
}

export function splitArgs(args: string | readonly string[]): string[] {
  if (typeof args !== 'string') return [...args];
  const trimmed = args.trim();
  return trimmed === '' ? [] : trimmed.split(/\s+/);
}

/** True if `arg` is `flag`, `flag=value`, or a short `flag` with its value attached. */
export function matchesFlag(arg: string, flag: string): boolean {
  if (arg === flag || arg.startsWith(`${flag}=`)) return true;
  return /^-[A-Za-z]$/.test(flag) && arg.startsWith(flag);
}

/**
 * The part of `arg` that may name a file: the whole argument, or the value
 * of `--opt=value`. Other options name no file.
 */
export function pathOperand(arg: string): string | undefined {
  if (!arg.startsWith('-')) return arg;
  const eq = arg.indexOf('=');
  if (eq === -1) return undefined;
  const value = arg.slice(eq + 1);
  return value === '' ? undefined : value;
}

/**
 * Check a command line against the allow-list. Throws on the first rule it breaks.
 */
export async function validateCommand(
  command: string,
  argv: readonly string[],
  ctx: ToolContext
): Promise<void> {
  const { allowlist } = ctx.settings.commands;
  const spec = Object.hasOwn(allowlist, command) ? allowlist[command] : undefined;
  if (spec === undefined || /[\\/]/.test(command)) {
    throw new CodeuError(
      `Command "${command}" is not allowed. Allowed commands: ${Object.keys(allowlist).sort().join(', ') || '(none)'}`,
      'COMMAND_NOT_ALLOWED'
    );
  }

  for (const arg of argv) {
    if (FORBIDDEN_CHARS.test(arg)) {
      throw new CodeuError(
        `Argument ${JSON.stringify(arg)} contains a shell metacharacter or control character.`,
        'ARGUMENT_REJECTED'
      );
    }
  }

  if (argv.length > spec.maxArgs) {
    throw new CodeuError(
      `"${command}" accepts at most ${spec.maxArgs} argument(s), got ${argv.length}.`,
      'ARGUMENT_REJECTED'
    );
  }

  if (spec.subcommands !== undefined) {
    const sub = argv[0];
    if (sub === undefined || !spec.subcommands.includes(sub)) {
      throw new CodeuError(
        `"${command}" requires one of these subcommands first: ${spec.subcommands.join(', ')}`,
        'ARGUMENT_REJECTED'
      );
    }
  }

  const allowed = new RegExp(`^(?:${spec.argPattern})$`);
  for (const arg of argv) {
    if (!allowed.test(arg)) {
      throw new CodeuError(
        `Argument ${JSON.stringify(arg)} is not permitted for "${command}".`,
        'ARGUMENT_REJECTED'
      );
    }
  }

  const denied = spec.deniedFlags ?? [];
  for (const arg of argv) {
    const flag = denied.find((f) => matchesFlag(arg, f));
    if (flag !== undefined) {
      throw new CodeuError(`Option ${flag} is not permitted for "${command}".`, 'ARGUMENT_REJECTED');
    }
  }

  if (spec.pathArgs) {
    for (const arg of argv) {
      const operand = pathOperand(arg);
      if (operand !== undefined) await ctx.boundary.resolve(operand);
    }
  }
}

function killTree(pid: number | undefined, fallback: () => void): void {
  if (pid === undefined || process.platform === 'win32') {
    fallback();
    return;
  }
  try {
    // negative pid: the whole process group started by `detached`
    process.kill(-pid, 'SIGKILL');
  } catch (err) {
    if (errnoCode(err) !== 'ESRCH') fallback();
  }
}

/**
 * Spawn `command` without a shell and wait for it to be reaped.
 * Rejects only when the process could not be started.
 */
export function runProcess(command: string, argv: readonly string[], opts: RunOptions): Promise<ProcessResult> {
  return new Promise((resolve, reject) => {
    const started = Date.now();
    const stdout = new ByteCollector(opts.maxOutputBytes);
    const stderr = new ByteCollector(opts.maxOutputBytes);
    let timedOut = false;
    let settled = false;

    const child = spawn(command, argv, {
      cwd: opts.cwd,
      shell: false,
      stdio: ['ignore', 'pipe', 'pipe'],
      detached: process.platform !== 'win32',
      windowsHide: true,
    });

    child.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
    child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));

    const timer = setTimeout(() => {
      timedOut = true;
      killTree(child.pid, () => child.kill('SIGKILL'));
    }, opts.timeoutMs);

    child.on('error', (err) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      reject(new CodeuError(`Failed to start "${command}": ${err.message}`, 'LAUNCH_FAILED', { cause: err }));
    });

    child.on('close', (exitCode, signal) => {
      clearTimeout(timer);
      if (settled) return;
      settled = true;
      resolve({
        exitCode,
        signal,
        stdout: stdout.text(),
        stderr: stderr.text(),
        truncated: stdout.truncated || stderr.truncated,
        timedOut,
        durationMs: Date.now() - started,
      });
    });
  });
}

export function formatProcessOutput(result: ProcessResult, maxOutputBytes: number): string {
  const parts: string[] = [];
  if (result.exitCode !== null && result.exitCode !== 0) {
    parts.push(`Command exited with code ${result.exitCode}`);
  } else if (result.exitCode === null && result.signal !== null) {
    parts.push(`Command terminated by signal ${result.signal}`);
  }
  if (result.stdout.trim()) parts.push(result.stdout.trimEnd());
  if (result.stderr.trim()) parts.push(`[stderr]\n${result.stderr.trimEnd()}`);
  if (result.truncated) parts.push(`[output truncated to ${maxOutputBytes} bytes per stream]`);
  return parts.length === 0 ? '(no output)' : parts.join('\n');
}

export const runCommandTool = defineTool({
  name: 'run_command',
  description:
    'Run one allow-listed command with an argument list, without a shell, in the workspace root. ' +
    'Pipes, redirection, globbing and command chaining are not available. ' +
    'A non-zero exit code is reported in the output, not as an error.',
  readonly: false,
  schema: RunCommandArgsSchema,

  async execute(args, ctx) {
    const { commands } = ctx.settings;
    const argv = splitArgs(args.args);
    await validateCommand(args.command, argv, ctx);

    const timeoutSeconds = args.timeout_seconds ?? commands.defaultTimeoutSeconds;
    if (timeoutSeconds > commands.maxTimeoutSeconds) {
      throw new CodeuError(
        `timeout_seconds ${timeoutSeconds} exceeds the maximum of ${commands.maxTimeoutSeconds}.`,
        'INVALID_ARGUMENTS'
      );
    }

    const line = [args.command, ...argv].join(' ');
    ctx.logger.info(`run_command: ${line}`);

    const result = await runProcess(args.command, argv, {
      cwd: ctx.boundary.root,
      timeoutMs: timeoutSeconds * 1000,
      maxOutputBytes: commands.maxOutputBytes,
    });

    if (result.timedOut) {
      throw new CodeuError(
        `Command "${line}" timed out after ${timeoutSeconds}s and was killed.`,
        'TIMEOUT_EXCEEDED',
        { retryable: true }
      );
    }

    ctx.logger.debug(`run_command: ${line} exited with ${result.exitCode ?? result.signal} in ${result.durationMs}ms`);

    return {
      output: formatProcessOutput(result, commands.maxOutputBytes),
      data: {
        command: args.command,
        args: argv,
        exitCode: result.exitCode,
        signal: result.signal,
        stdout: result.stdout,
        stderr: result.stderr,
        truncated: result.truncated,
      },
      metadata: { durationMs: result.durationMs, timeoutSeconds },
    };
  },
});
