import OpenAI from 'openai';
import type {
  ChatCompletion,
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionMessageParam,
  ChatCompletionMessageToolCall,
  ChatCompletionTool
} from 'openai/resources/chat/completions';
import { assertNever, type ContentBlock, type Message } from '../core/context';
import { GenerationError } from '../core/errors';
import type { ToolDefinition } from '../tools/registry';
import { logger } from '../observability/logger';
import type { ModelClient, ModelRequest, ModelResponse, StopReason } from './types';

// The slice of the SDK this client calls; `chat.completions` of an OpenAI instance satisfies it.
export interface ChatCompletions {
  create(body: ChatCompletionCreateParamsNonStreaming, options?: { signal?: AbortSignal }): Promise<ChatCompletion>;
}

export type OpenAIClientOptions = {
  apiKey?: string;
  baseURL?: string;
  model: string;
  completions?: ChatCompletions;
};

export function toChatMessages(system: string, messages: readonly Message[]): ChatCompletionMessageParam[] {
  const out: ChatCompletionMessageParam[] = [{ role: 'system', content: system }];
  for (const message of messages) {
    switch (message.role) {
      case 'user': {
        const text = message.content.flatMap((b) => (b.type === 'text' ? [b.text] : [])).join('\n');
        out.push({ role: 'user', content: text });
        break;
      }
      case 'assistant': {
        const text = message.content.flatMap((b) => (b.type === 'text' ? [b.text] : [])).join('\n');
        const calls: ChatCompletionMessageToolCall[] = message.content.flatMap((b) =>
          b.type === 'tool_use'
            ? [{ id: b.id, type: 'function' as const, function: { name: b.name, arguments: JSON.stringify(b.input) } }]
            : []
        );
        out.push({
          role: 'assistant',
          content: text.length > 0 ? text : null,
          ...(calls.length > 0 ? { tool_calls: calls } : {})
        });
        break;
      }
      case 'tool':
        for (const block of message.content) {
          if (block.type !== 'tool_result') continue;
          out.push({ role: 'tool', tool_call_id: block.toolUseId, content: block.content });
        }
        break;
      default:
        assertNever(message.role);
    }
  }
  return out;
}

export function toChatTools(tools: readonly ToolDefinition[]): ChatCompletionTool[] {
  return tools.map((t) => ({
    type: 'function',
    function: { name: t.name, description: t.description, parameters: t.inputSchema }
  }));
}

function parseArguments(raw: string, toolName: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = raw.trim() === '' ? {} : JSON.parse(raw);
  } catch (err) {
    throw new GenerationError('malformed_response', `tool call '${toolName}' has unparsable arguments`, { cause: err });
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new GenerationError('malformed_response', `tool call '${toolName}' arguments must be an object`);
  }
  return { ...parsed };
}

function stopReasonOf(finish: string | null | undefined): StopReason {
  switch (finish) {
    case 'stop':
      return 'end_turn';
    case 'tool_calls':
      return 'tool_use';
    case 'length':
      return 'max_tokens';
    default:
      return 'other';
  }
}

export function fromChatCompletion(completion: ChatCompletion): ModelResponse {
  const choice = completion.choices[0];
  if (!choice) throw new GenerationError('malformed_response', 'model returned no choices');
  const content: ContentBlock[] = [];
  if (choice.message.content) {
    content.push({ type: 'text', text: choice.message.content });
  }
  for (const call of choice.message.tool_calls ?? []) {
    content.push({
      type: 'tool_use',
      id: call.id,
      name: call.function.name,
      input: parseArguments(call.function.arguments, call.function.name)
    });
  }
  return { content, stopReason: stopReasonOf(choice.finish_reason) };
}

export class OpenAIModelClient implements ModelClient {
  private completions: ChatCompletions;
  private model: string;

  constructor(opts: OpenAIClientOptions) {
    // retries stay off: a failed call is reported to the caller, not repeated
    this.completions =
      opts.completions ??
      new OpenAI({
        apiKey: opts.apiKey,
        baseURL: opts.baseURL,
        maxRetries: 0
      }).chat.completions;
    this.model = opts.model;
  }

  async create(request: ModelRequest, signal?: AbortSignal): Promise<ModelResponse> {
    const tools = request.tools && request.tools.length > 0 ? toChatTools(request.tools) : undefined;
    let completion: ChatCompletion;
    try {
      completion = await this.completions.create(
        {
          model: this.model,
          messages: toChatMessages(request.system, request.messages),
          max_tokens: request.maxTokens,
          temperature: request.temperature,
          ...(tools ? { tools, tool_choice: 'auto' as const } : {})
        },
        { signal }
      );
    } catch (err) {
      if (signal?.aborted) throw new GenerationError('aborted', 'model request aborted', { cause: err });
      throw new GenerationError('request_failed', 'model request failed', { cause: err });
    }
    logger.debug('llm usage', { model: this.model, usage: completion.usage });
    return fromChatCompletion(completion);
  }
}
