import type { ContentBlock, Message } from '../src/core/context';
import type { ModelClient, ModelRequest, ModelResponse } from '../src/llm/types';
import type { ToolDefinition } from '../src/tools/registry';

export type Step = ModelResponse | Error;

export function text(value: string): ModelResponse {
  return { content: [{ type: 'text', text: value }], stopReason: 'end_turn' };
}

export function toolUse(id: string, name: string, input: Record<string, unknown>): ContentBlock {
  return { type: 'tool_use', id, name, input };
}

export function wantsTools(...blocks: ContentBlock[]): ModelResponse {
  return { content: blocks, stopReason: 'tool_use' };
}

export function toolDef(name: string): ToolDefinition {
  return {
    name,
    description: `${name} tool`,
    inputSchema: { type: 'object', properties: { query: { type: 'string' } } }
  };
}

export type RecordedCall = {
  messages: Message[];
  tools: string[] | undefined;
  system: string;
};

// Replays a fixed script of responses and records what each call was sent.
export class ScriptedModel implements ModelClient {
  readonly calls: RecordedCall[] = [];
  private steps: Step[];

  constructor(steps: Step[]) {
    this.steps = [...steps];
  }

  async create(request: ModelRequest): Promise<ModelResponse> {
    this.calls.push({
      messages: [...request.messages],
      tools: request.tools?.map((t) => t.name),
      system: request.system
    });
    const step = this.steps.shift();
    if (step === undefined) throw new Error('script exhausted');
    if (step instanceof Error) throw step;
    return step;
  }
}

// Never answers on its own; settles only when the round signal aborts.
export class StalledModel implements ModelClient {
  calls = 0;

  create(_request: ModelRequest, signal?: AbortSignal): Promise<ModelResponse> {
    this.calls += 1;
    return new Promise<ModelResponse>((_, reject) => {
      signal?.addEventListener('abort', () => reject(new Error('request cancelled')), { once: true });
    });
  }
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
