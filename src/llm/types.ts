import type { ContentBlock, Message } from '../core/context';
import type { ToolDefinition } from '../tools/registry';

export type StopReason = 'end_turn' | 'tool_use' | 'max_tokens' | 'other';

export interface ModelRequest {
  system: string;
  messages: readonly Message[];
  // absent: the model may only answer in text
  tools?: readonly ToolDefinition[];
  maxTokens: number;
  temperature: number;
}

export interface ModelResponse {
  content: ContentBlock[];
  stopReason: StopReason;
}

export interface ModelClient {
  create(request: ModelRequest, signal?: AbortSignal): Promise<ModelResponse>;
}
