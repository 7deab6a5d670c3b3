import type { SourceRef } from '../core/context';
import { DuplicateToolError, UnknownToolError } from '../core/errors';

export type JsonSchema = {
  type: 'object';
  properties: Record<string, Record<string, unknown>>;
  required?: string[];
};

export interface ToolDefinition {
  name: string;
  description: string;
  inputSchema: JsonSchema;
}

export type ToolOutput =
  | string
  | {
      content: string | Record<string, unknown>;
      sources?: SourceRef[];
    };

export interface ToolContext {
  callId: string;
  signal?: AbortSignal;
}

export type ToolHandler = (args: Record<string, unknown>, ctx: ToolContext) => Promise<ToolOutput>;

export interface ToolCallResult {
  callId: string;
  name: string;
  output: string | Record<string, unknown>;
  isError: boolean;
  sources: SourceRef[];
}

type Entry = { definition: ToolDefinition; handler: ToolHandler };

export class ToolRegistry {
  private tools = new Map<string, Entry>();

  register(definition: ToolDefinition, handler: ToolHandler) {
    if (this.tools.has(definition.name)) throw new DuplicateToolError(definition.name);
    this.tools.set(definition.name, { definition, handler });
  }

  require(name: string): ToolHandler {
    const entry = this.tools.get(name);
    if (!entry) throw new UnknownToolError(name);
    return entry.handler;
  }

  // Map iteration follows insertion, so this is registration order.
  definitions(): ToolDefinition[] {
    return [...this.tools.values()].map((e) => e.definition);
  }

  get size(): number {
    return this.tools.size;
  }
}
