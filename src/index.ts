#!/usr/bin/env node
import { program } from 'commander';
import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';
import { readFileSync } from 'node:fs';
import type { CliOverrides } from './config/schema.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const pkg = JSON.parse(readFileSync(join(__dirname, '..', 'package.json'), 'utf-8')) as {
  version: string;
};

// ── Global options ────────────────────────────────────────────────────────────
program
  .name('codeu')
  .description('Constrained local tools for a coding agent')
  .version(pkg.version)
  .option('--root <dir>', 'workspace root the tools are confined to')
  .option('--model <name>', 'override the model')
  .option('--base-url <url>', 'override the OpenAI-compatible base URL')
  .option('--no-color', 'disable color output')
  .option('--verbose', 'enable debug logging');

// ── Helpers ───────────────────────────────────────────────────────────────────
function globalOpts(): CliOverrides {
  const g = program.opts<{ root?: string; model?: string; baseUrl?: string; verbose?: boolean }>();
  return { root: g.root, model: g.model, baseUrl: g.baseUrl, verbose: g.verbose };
}

// ── tools ─────────────────────────────────────────────────────────────────────
program
  .command('tools')
  .description('List the available tools and their parameters')
  .option('--json', 'output as JSON')
  .action(async (cmdOpts: { json?: boolean }) => {
    const { runToolsList } = await import('./commands/tools.js');
    await runToolsList({ ...globalOpts(), json: cmdOpts.json });
  });

// ── call ──────────────────────────────────────────────────────────────────────
program
  .command('call <tool> [args]')
  .description('Run one tool with JSON arguments, e.g. codeu call ls \'{"path":"src"}\'')
  .option('--json', 'print the full result object as JSON')
  .action(async (tool: string, args: string | undefined, cmdOpts: { json?: boolean }) => {
    const { runToolCall } = await import('./commands/tools.js');
    await runToolCall(tool, args, { ...globalOpts(), json: cmdOpts.json });
  });

// ── ask ───────────────────────────────────────────────────────────────────────
program
  .command('ask [prompt]')
  .description('Give the coding agent one instruction and print its answer')
  .option('--thread <id>', 'conversation thread id')
  .action(async (prompt: string | undefined, cmdOpts: { thread?: string }) => {
    const { runAsk } = await import('./commands/ask.js');
    await runAsk(prompt, { ...globalOpts(), thread: cmdOpts.thread });
  });

// ── config ────────────────────────────────────────────────────────────────────
const config = program.command('config').description('Manage codeu configuration');

config
  .command('show')
  .description('Show merged configuration')
  .action(async () => {
    const { runConfigShow } = await import('./commands/config.js');
    await runConfigShow(globalOpts());
  });

config
  .command('init')
  .description('Initialize a config file (.codeu/config.json)')
  .option('--global', 'write to user config (~/.config/codeu/config.json)')
  .action(async (opts: { global?: boolean }) => {
    const { runConfigInit } = await import('./commands/config.js');
    await runConfigInit({ global: opts.global });
  });

await program.parseAsync();
