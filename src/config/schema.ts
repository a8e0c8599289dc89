import { z } from 'zod';

/** Arguments made only of word characters and common path/flag punctuation. */
export const DEFAULT_ARG_PATTERN = '^[A-Za-z0-9_@%+=:,./-]+$';

function isValidRegex(source: string): boolean {
  try {
    new RegExp(source);
    return true;
  } catch {
    return false;
  }
}

export const LogLevelSchema = z.enum(['silent', 'error', 'warn', 'info', 'debug']);

export const MultiMatchPolicySchema = z.enum(['reject', 'first', 'all']);
export type MultiMatchPolicy = z.infer<typeof MultiMatchPolicySchema>;

export const CommandSpecSchema = z.object({
  description: z.string().optional(),
  argPattern: z
    .string()
    .refine(isValidRegex, { message: 'argPattern must be a valid regular expression' })
    .default(DEFAULT_ARG_PATTERN),
  subcommands: z.array(z.string().min(1)).optional(),
  /** Options refused in any form: bare, `--flag=value`, or a short flag with its value attached. */
  deniedFlags: z.array(z.string().regex(/^-/, 'denied flags must start with "-"')).optional(),
  maxArgs: z.number().int().min(0).default(16),
  pathArgs: z.boolean().default(false),
});
export type CommandSpec = z.infer<typeof CommandSpecSchema>;

const CommandNameSchema = z
  .string()
  .regex(/^[A-Za-z0-9][A-Za-z0-9._+-]*$/, 'command names must be bare executable names');

const EditorSchema = z.object({
  onMultipleMatches: MultiMatchPolicySchema,
  maxFileBytes: z.number().int().positive(),
});

const SearchSchema = z.object({
  maxMatches: z.number().int().positive(),
  maxFileBytes: z.number().int().positive(),
  ignore: z.array(z.string().min(1)),
});

const TreeSchema = z.object({
  maxDepth: z.number().int().min(1).max(10),
  maxEntries: z.number().int().positive(),
});

const CommandsSchema = z.object({
  allowlist: z.record(CommandNameSchema, CommandSpecSchema),
  defaultTimeoutSeconds: z.number().positive(),
  maxTimeoutSeconds: z.number().positive(),
  maxOutputBytes: z.number().int().positive(),
});

const ModelSchema = z.object({
  name: z.string().min(1),
  baseUrl: z.string().url().optional(),
  apiKeyEnv: z.string().min(1),
  temperature: z.number().min(0).max(2).optional(),
  maxTokens: z.number().int().positive().optional(),
});
export type ModelSettings = z.infer<typeof ModelSchema>;

export const CodeuConfigSchema = z
  .object({
    workspaceRoot: z.string().optional(),
    logLevel: LogLevelSchema,
    redactPatterns: z.array(z.string()),
    editor: EditorSchema,
    search: SearchSchema,
    tree: TreeSchema,
    commands: CommandsSchema,
    model: ModelSchema,
  })
  .superRefine((config, ctx) => {
    if (config.commands.defaultTimeoutSeconds > config.commands.maxTimeoutSeconds) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['commands', 'defaultTimeoutSeconds'],
        message: 'defaultTimeoutSeconds must not exceed maxTimeoutSeconds',
      });
    }
  });
export type CodeuConfig = z.infer<typeof CodeuConfigSchema>;

/** One configuration layer (file or environment): every key optional. */
export const ConfigLayerSchema = z.object({
  workspaceRoot: z.string().optional(),
  logLevel: LogLevelSchema.optional(),
  redactPatterns: z.array(z.string()).optional(),
  editor: EditorSchema.partial().optional(),
  search: SearchSchema.partial().optional(),
  tree: TreeSchema.partial().optional(),
  commands: CommandsSchema.partial().optional(),
  model: ModelSchema.partial().optional(),
});
export type ConfigLayer = z.infer<typeof ConfigLayerSchema>;

/** Configuration after loading: the workspace root is always known. */
export type ResolvedConfig = CodeuConfig & { workspaceRoot: string };

export type CliOverrides = {
  root?: string;
  model?: string;
  baseUrl?: string;
  verbose?: boolean;
};
