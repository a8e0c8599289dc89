import type { CodeuConfig, CommandSpec } from './schema.js';
import { DEFAULT_ARG_PATTERN } from './schema.js';

const FILE_VIEWER: CommandSpec = {
  argPattern: DEFAULT_ARG_PATTERN,
  // reads file names from a file, which the boundary cannot see
  deniedFlags: ['--files0-from'],
  maxArgs: 16,
  pathArgs: true,
};

export const CONFIG_DEFAULTS: CodeuConfig = {
  logLevel: 'warn',
  redactPatterns: [],
  editor: {
    onMultipleMatches: 'reject',
    maxFileBytes: 2 * 1024 * 1024,
  },
  search: {
    maxMatches: 50,
    maxFileBytes: 1024 * 1024,
    ignore: ['.git', 'node_modules'],
  },
  tree: {
    maxDepth: 3,
    maxEntries: 1000,
  },
  commands: {
    allowlist: {
      git: {
        description: 'Read-only git inspection',
        argPattern: '^[A-Za-z0-9_@%+=:,./^~-]+$',
        subcommands: ['status', 'diff', 'log', 'show', 'branch', 'rev-parse', 'ls-files', 'blame'],
        // these open files outside the repository, write files or run helpers
        deniedFlags: [
          '--no-index',
          '--contents',
          '-O',
          '--output',
          '--ext-diff',
          '--exec',
          '--upload-pack',
          '--textconv',
          '--files0-from',
        ],
        maxArgs: 16,
        pathArgs: true,
      },
      npm: {
        description: 'Run package scripts and tests',
        argPattern: DEFAULT_ARG_PATTERN,
        subcommands: ['test', 'run', 'ls'],
        maxArgs: 8,
        pathArgs: false,
      },
      ls: { ...FILE_VIEWER, description: 'List files' },
      cat: { ...FILE_VIEWER, description: 'Print files' },
      head: { ...FILE_VIEWER, description: 'Print the first lines of files' },
      wc: { ...FILE_VIEWER, description: 'Count lines, words and bytes' },
      pwd: { description: 'Print the working directory', argPattern: DEFAULT_ARG_PATTERN, maxArgs: 0, pathArgs: false },
    },
    defaultTimeoutSeconds: 30,
    maxTimeoutSeconds: 300,
    maxOutputBytes: 50 * 1024,
  },
  model: {
    name: 'gpt-4o-mini',
    apiKeyEnv: 'OPENAI_API_KEY',
    temperature: 0.7,
  },
};
