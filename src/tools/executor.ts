import { randomUUID } from 'node:crypto';
import { errorMessage } from '../core/errors';
import { logger } from '../observability/logger';
import {
  ToolRegistry,
  type ToolCallResult,
  type ToolDefinition,
  type ToolHandler,
  type ToolOutput
} from './registry';

/**
 * Owns the tool registry and runs tools by name. Every failure, including an
 * unknown name, comes back as a result with `isError` set; `execute` does not
 * reject.
 */
export class ToolManager {
  private registry = new ToolRegistry();

  register(definition: ToolDefinition, handler: ToolHandler) {
    this.registry.register(definition, handler);
    logger.debug('tool registered', { name: definition.name });
  }

  get size(): number {
    return this.registry.size;
  }

  schemas(): ToolDefinition[] {
    return this.registry.definitions();
  }

  async execute(
    name: string,
    args: Record<string, unknown>,
    callId: string = randomUUID(),
    signal?: AbortSignal
  ): Promise<ToolCallResult> {
    const started = Date.now();
    try {
      const handler = this.registry.require(name);
      const output = await handler(args, { callId, signal });
      logger.info('tool done', { name, callId, elapsed_ms: Date.now() - started });
      return toResult(name, callId, output);
    } catch (err) {
      logger.warn('tool failed', { name, callId, error: errorMessage(err) });
      return {
        callId,
        name,
        output: `Error executing tool '${name}': ${errorMessage(err)}`,
        isError: true,
        sources: []
      };
    }
  }
}

function toResult(name: string, callId: string, output: ToolOutput): ToolCallResult {
  if (typeof output === 'string') {
    return { callId, name, output, isError: false, sources: [] };
  }
  return { callId, name, output: output.content, isError: false, sources: output.sources ?? [] };
}
