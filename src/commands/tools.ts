import { describeTool } from '../tools/describe.js';
import type { ToolInfo } from '../tools/describe.js';
import { dim, heading, printError, printJson } from '../ui/renderer.js';
import { CodeuError } from '../utils/errors.js';
import type { CliOverrides } from '../config/schema.js';
import { setupRuntime } from './setup.js';

export interface ToolsOptions extends CliOverrides {
  json?: boolean;
}

export function formatToolInfo(info: ToolInfo): string {
  const title = [
    info.name,
    info.aliases.length > 0 ? `(aliases: ${info.aliases.join(', ')})` : '',
    info.readonly ? '[read]' : '[write]',
  ]
    .filter(Boolean)
    .join(' ');

  const params = info.parameters.map((p) => {
    const flag = p.required ? '' : '?';
    return `  ${p.name}${flag}: ${p.type}${p.description ? dim(`  ${p.description}`) : ''}`;
  });

  return [heading(title), `  ${info.description}`, ...params].join('\n');
}

export async function runToolsList(options: ToolsOptions = {}): Promise<void> {
  try {
    const { registry } = await setupRuntime(options);
    const infos = registry.list().map(describeTool);

    if (options.json) {
      printJson(infos);
      return;
    }
    process.stdout.write(infos.map(formatToolInfo).join('\n\n') + '\n');
  } catch (err) {
    printError(CodeuError.fromUnknown(err).message);
    process.exit(1);
  }
}

export function parseArgsJson(raw: string | undefined): unknown {
  if (raw === undefined || raw.trim() === '') return {};
  try {
    return JSON.parse(raw);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new CodeuError(`Tool arguments are not valid JSON: ${reason}`, 'INVALID_ARGUMENTS', { cause: err });
  }
}

export async function runToolCall(
  name: string,
  rawArgs: string | undefined,
  options: ToolsOptions = {}
): Promise<void> {
  try {
    const { registry } = await setupRuntime(options);
    const outcome = await registry.execute(name, parseArgsJson(rawArgs));

    if (options.json) {
      printJson(outcome);
    } else if (outcome.success) {
      process.stdout.write(outcome.output + '\n');
    } else {
      printError(outcome.error.message);
    }
    if (!outcome.success) process.exit(1);
  } catch (err) {
    printError(CodeuError.fromUnknown(err).message);
    process.exit(1);
  }
}
