import { ChatOpenAI } from '@langchain/openai';
import { HumanMessage } from '@langchain/core/messages';
import type { BaseMessage } from '@langchain/core/messages';
import type { BaseChatModel } from '@langchain/core/language_models/chat_models';
import { MemorySaver } from '@langchain/langgraph';
import type { BaseCheckpointSaver } from '@langchain/langgraph';
import { createReactAgent } from '@langchain/langgraph/prebuilt';
import type { ModelSettings } from '../config/schema.js';
import { CodeuError } from '../utils/errors.js';
import { toLangChainTools } from '../tools/langchain.js';
import type { ToolRegistry } from '../tools/registry.js';

export const AGENT_NAME = 'coding_agent';

/**
 * Chat model for the agent. Any OpenAI-compatible endpoint works through
 * `baseUrl`; the key is read from the variable named by `apiKeyEnv`.
 */
export function createChatModel(model: ModelSettings, env: NodeJS.ProcessEnv = process.env): ChatOpenAI {
  const apiKey = env[model.apiKeyEnv];
  if (!apiKey) {
    throw new CodeuError(
      `No API key found. Set the ${model.apiKeyEnv} environment variable.`,
      'PROVIDER_AUTH_FAILED'
    );
  }
  return new ChatOpenAI({
    model: model.name,
    apiKey,
    temperature: model.temperature,
    maxTokens: model.maxTokens,
    configuration: model.baseUrl ? { baseURL: model.baseUrl } : undefined,
  });
}

export function buildSystemPrompt(registry: ToolRegistry): string {
  const tools = registry
    .list()
    .map((t) => `- ${t.name}${t.readonly ? '' : ' (modifies the workspace)'}: ${t.description}`)
    .join('\n');

  return [
    'You are a coding agent working inside one local repository.',
    'Act only through the tools below. Every path is relative to the repository root and cannot leave it.',
    '',
    'Tools:',
    tools,
    '',
    'Rules:',
    '- Explore with ls, tree and grep, and read files with text_view before you edit them.',
    '- Edit with str_replace_edit: copy old_str exactly from the file, with enough context to match once.',
    '- run_command only runs allow-listed commands with plain arguments; there is no shell.',
    '- A result starting with "Error:" means nothing changed. Read it, adjust the arguments and try again.',
    '- When the task is done, answer briefly with what you changed.',
  ].join('\n');
}

export interface CodingAgentOptions {
  registry: ToolRegistry;
  llm: BaseChatModel;
  checkpointer?: BaseCheckpointSaver;
  prompt?: string;
}

export function createCodingAgent(options: CodingAgentOptions) {
  return createReactAgent({
    llm: options.llm,
    tools: toLangChainTools(options.registry),
    prompt: options.prompt ?? buildSystemPrompt(options.registry),
    checkpointSaver: options.checkpointer ?? new MemorySaver(),
    name: AGENT_NAME,
  });
}

/** The slice of a compiled agent that `ask` needs. */
export interface Invokable {
  invoke(
    input: { messages: BaseMessage[] },
    config: { configurable: { thread_id: string } }
  ): Promise<{ messages: BaseMessage[] }>;
}

export function messageText(message: BaseMessage): string {
  const { content } = message;
  if (typeof content === 'string') return content;
  return content
    .map((part) => ('text' in part && typeof part.text === 'string' ? part.text : ''))
    .join('');
}

/** Send one user turn on `threadId` and return the final answer text. */
export async function ask(agent: Invokable, prompt: string, threadId: string): Promise<string> {
  const state = await agent.invoke(
    { messages: [new HumanMessage(prompt)] },
    { configurable: { thread_id: threadId } }
  );
  const last = state.messages[state.messages.length - 1];
  return last === undefined ? '' : messageText(last);
}
