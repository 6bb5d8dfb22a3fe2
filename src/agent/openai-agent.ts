import OpenAI from 'openai';
import type {
  ChatCompletionMessageParam,
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionTool,
} from 'openai/resources/chat/index.js';
import { z } from 'zod';
import type { AgentCollaborator, AgentHistory, Fragment, Turn } from '../types.js';
import { AgentCollaboratorError, DocscoutError, errorMessage } from '../errors.js';
import { logger } from '../logger.js';
import { buildSystemPrompt } from './prompt.js';

/**
 * Error thrown when the OpenAI API key is not configured
 */
export class APIKeyError extends DocscoutError {
  constructor() {
    super(
      'OpenAI API key not found. Please set the OPENAI_API_KEY environment variable.',
      'api_key_missing',
      500
    );
    this.name = 'APIKeyError';
  }
}

export const RUN_COMMAND_TOOL: ChatCompletionTool = {
  type: 'function',
  function: {
    name: 'run_command',
    description: 'Run one read-only command in the documentation directory and return its output.',
    parameters: {
      type: 'object',
      properties: {
        command: {
          type: 'string',
          description: "Command line, e.g. \"grep -rn 'install' .\"",
        },
      },
      required: ['command'],
    },
  },
};

const RunCommandArgsSchema = z.object({
  command: z.string().min(1),
});

/** Completed turns replayed to the model */
export const MAX_HISTORY_TURNS = 12;

export interface LLMSettings {
  model: string;
  temperature: number;
  max_tokens?: number;
}

/**
 * The part of a chat completion the agent reads
 */
export interface AssistantReply {
  content: string | null;
  tool_calls?: Array<{ id: string; function: { name: string; arguments: string } }>;
}

/**
 * Chat-completions transport. Resolves with the first choice's message.
 */
export interface CompletionClient {
  complete(params: ChatCompletionCreateParamsNonStreaming, signal?: AbortSignal): Promise<AssistantReply | undefined>;
}

export interface OpenAIAgentOptions {
  client: CompletionClient;
  llm: LLMSettings;
  systemPrompt?: string;
}

/**
 * Create an OpenAI client from the environment
 * @throws APIKeyError if no API key is configured
 */
export function createOpenAIClient(env: NodeJS.ProcessEnv = process.env): OpenAI {
  const apiKey = env.OPENAI_API_KEY;
  if (!apiKey) {
    throw new APIKeyError();
  }

  // Support custom API URL (e.g., for proxies or alternative endpoints)
  const baseURL = env.OPENAI_API_URL;
  if (baseURL) {
    logger.info(`Using custom OpenAI API URL: ${baseURL}`);
  }

  return new OpenAI({ apiKey, ...(baseURL ? { baseURL } : {}) });
}

/**
 * CompletionClient backed by the OpenAI SDK
 */
export function openAICompletionClient(client: OpenAI): CompletionClient {
  return {
    complete: async (params, signal) => {
      const completion = await client.chat.completions.create(params, { signal });
      return completion.choices[0]?.message;
    },
  };
}

// ============================================
// Message mapping
// ============================================

/**
 * Replay earlier turns as plain user/assistant messages
 */
export function turnsToMessages(turns: readonly Turn[], limit: number = MAX_HISTORY_TURNS): ChatCompletionMessageParam[] {
  const messages: ChatCompletionMessageParam[] = [];

  for (const turn of turns.slice(-limit)) {
    if (turn.content.trim() === '') {
      continue;
    }
    if (turn.role === 'user') {
      messages.push({ role: 'user', content: turn.content });
    } else {
      messages.push({ role: 'assistant', content: turn.content });
    }
  }

  return messages;
}

export type ParsedToolCall =
  | { id: string; command: string }
  | { id: string; error: string };

export interface ParsedReply {
  text: string | null;
  calls: ParsedToolCall[];
}

/**
 * Split a model reply into its text and run_command calls
 */
export function parseReply(message: AssistantReply): ParsedReply {
  const text = message.content && message.content.trim() !== '' ? message.content : null;
  const calls: ParsedToolCall[] = [];

  for (const toolCall of message.tool_calls ?? []) {
    if (toolCall.function.name !== RUN_COMMAND_TOOL.function.name) {
      calls.push({ id: toolCall.id, error: `Unknown tool '${toolCall.function.name}'. Use run_command.` });
      continue;
    }

    let args: unknown;
    try {
      args = JSON.parse(toolCall.function.arguments || '{}');
    } catch (error) {
      calls.push({ id: toolCall.id, error: `Invalid tool arguments: ${errorMessage(error)}` });
      continue;
    }

    const parsed = RunCommandArgsSchema.safeParse(args);
    if (parsed.success) {
      calls.push({ id: toolCall.id, command: parsed.data.command });
    } else {
      calls.push({ id: toolCall.id, error: 'run_command needs a non-empty "command" string' });
    }
  }

  return { text, calls };
}

/**
 * Fragments for a parsed reply. Text that accompanies tool calls is the
 * model thinking out loud; text without tool calls is the answer.
 */
export function replyToFragments(reply: ParsedReply): Fragment[] {
  const fragments: Fragment[] = [];
  const commands = reply.calls.filter((call): call is { id: string; command: string } => 'command' in call);

  if (reply.text !== null) {
    fragments.push({
      kind: 'text',
      content: reply.text,
      category: reply.calls.length > 0 ? 'thinking' : 'final',
    });
  }
  for (const call of commands) {
    fragments.push({ kind: 'command', content: call.command });
  }

  return fragments;
}

// ============================================
// Agent
// ============================================

/**
 * Chat-completions agent exposing a single run_command tool.
 *
 * One instance serves one turn. A reply can hold several fragments (text
 * plus tool calls); they are queued and handed out one per `propose()`.
 * Tool results are read back from the command steps in the history, in
 * the order the calls were issued.
 */
export class OpenAIAgent implements AgentCollaborator {
  private readonly client: CompletionClient;
  private readonly llm: LLMSettings;
  private readonly systemPrompt: string;
  private readonly pending: Fragment[] = [];
  /** Assistant and tool messages of the current turn */
  private readonly transcript: ChatCompletionMessageParam[] = [];
  /** Ids of run_command calls whose result has not been sent yet */
  private readonly awaiting: string[] = [];
  private answeredSteps = 0;

  constructor(options: OpenAIAgentOptions) {
    this.client = options.client;
    this.llm = options.llm;
    this.systemPrompt = options.systemPrompt ?? buildSystemPrompt();
  }

  async propose(history: AgentHistory, signal?: AbortSignal): Promise<Fragment> {
    const queued = this.pending.shift();
    if (queued) {
      return queued;
    }

    this.collectObservations(history);

    const reply = parseReply(await this.complete(history, signal));
    for (const call of reply.calls) {
      if ('error' in call) {
        this.transcript.push({ role: 'tool', tool_call_id: call.id, content: call.error });
      } else {
        this.awaiting.push(call.id);
      }
    }

    const fragments = replyToFragments(reply);
    const next = fragments.shift();
    if (!next) {
      if (reply.calls.length > 0) {
        // Only malformed tool calls; their errors are already in the transcript
        return { kind: 'text', content: 'Retrying with a corrected tool call', category: 'progress' };
      }
      throw new AgentCollaboratorError('Model returned an empty response');
    }
    this.pending.push(...fragments);
    return next;
  }

  private collectObservations(history: AgentHistory): void {
    const commandSteps = history.steps.filter(step => step.kind === 'command');

    for (const step of commandSteps.slice(this.answeredSteps)) {
      const id = this.awaiting.shift();
      if (id === undefined || step.kind !== 'command') {
        break;
      }
      this.transcript.push({ role: 'tool', tool_call_id: id, content: step.observation });
      this.answeredSteps++;
    }
  }

  private async complete(history: AgentHistory, signal?: AbortSignal): Promise<AssistantReply> {
    const messages: ChatCompletionMessageParam[] = [
      { role: 'system', content: this.systemPrompt },
      ...turnsToMessages(history.turns),
      { role: 'user', content: history.message },
      ...this.transcript,
    ];

    const requestParams: ChatCompletionCreateParamsNonStreaming = {
      model: this.llm.model,
      messages,
      temperature: this.llm.temperature,
      ...(this.llm.max_tokens !== undefined ? { max_tokens: this.llm.max_tokens } : {}),
      tools: [RUN_COMMAND_TOOL],
      tool_choice: 'auto',
    };

    let message: AssistantReply | undefined;
    try {
      message = await this.client.complete(requestParams, signal);
    } catch (error) {
      if (error instanceof OpenAI.APIError) {
        throw new AgentCollaboratorError(
          `OpenAI API error: ${error.message} (Status: ${error.status ?? 'n/a'})`,
          error
        );
      }
      throw new AgentCollaboratorError(errorMessage(error), error);
    }

    if (!message) {
      throw new AgentCollaboratorError('No response message received from OpenAI API');
    }

    const toolCalls = (message.tool_calls ?? []).map(call => ({
      id: call.id,
      type: 'function' as const,
      function: { name: call.function.name, arguments: call.function.arguments },
    }));
    this.transcript.push({
      role: 'assistant',
      content: message.content,
      ...(toolCalls.length > 0 ? { tool_calls: toolCalls } : {}),
    });
    return message;
  }
}

/**
 * Builds a fresh agent for each turn
 */
export type AgentFactory = () => AgentCollaborator;

export function createOpenAIAgentFactory(options: OpenAIAgentOptions): AgentFactory {
  return () => new OpenAIAgent(options);
}
