import { randomUUID } from 'node:crypto';
import { ask, createChatModel, createCodingAgent } from '../agent/coding-agent.js';
import { printError } from '../ui/renderer.js';
import { CodeuError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import type { CliOverrides } from '../config/schema.js';
import { setupRuntime } from './setup.js';

export interface AskOptions extends CliOverrides {
  thread?: string;
}

async function readPromptFromStdin(): Promise<string | null> {
  if (process.stdin.isTTY) return null;
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    process.stdin.on('data', (chunk: Buffer) => chunks.push(chunk));
    process.stdin.on('end', () => resolve(Buffer.concat(chunks).toString('utf-8').trim()));
    process.stdin.on('error', reject);
  });
}

export async function runAsk(inlinePrompt: string | undefined, options: AskOptions = {}): Promise<void> {
  try {
    const prompt = inlinePrompt ?? (await readPromptFromStdin());
    if (!prompt) {
      throw new CodeuError('No prompt given. Pass it as an argument or pipe it on stdin.', 'INVALID_ARGUMENTS');
    }

    const { config, registry } = await setupRuntime(options);
    const agent = createCodingAgent({ registry, llm: createChatModel(config.model) });
    const threadId = options.thread ?? randomUUID();
    logger.debug(`ask: model ${config.model.name}, thread ${threadId}`);

    const answer = await ask(agent, prompt, threadId);
    process.stdout.write(answer.endsWith('\n') ? answer : answer + '\n');
  } catch (err) {
    printError(CodeuError.fromUnknown(err).message);
    process.exit(1);
  }
}
