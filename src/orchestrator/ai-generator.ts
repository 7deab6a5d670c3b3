import {
  textOf,
  toolUses,
  userMessage,
  type ContentBlock,
  type ConversationHistory,
  type Message,
  type ToolResultBlock,
  type ToolUseBlock
} from '../core/context';
import { withDeadline } from '../core/deadline';
import { UnknownToolError } from '../core/errors';
import { FSM, State } from '../core/fsm';
import type { ModelClient, ModelResponse } from '../llm/types';
import { logger } from '../observability/logger';
import type { ToolManager } from '../tools/executor';
import type { ToolCallResult, ToolDefinition } from '../tools/registry';
import { buildSystemPrompt } from './system-prompt';

export const FALLBACK_ANSWER = 'I was unable to generate a response.';

export type GeneratorOptions = {
  model: ModelClient;
  tools: ToolManager;
  maxRounds: number;
  roundTimeoutMs: number;
  maxTokens: number;
  temperature: number;
  systemPrompt?: string;
};

export interface GenerateResult {
  answer: string;
  // prior history followed by `turn`
  history: Message[];
  // messages added by this call, starting with the user query
  turn: Message[];
  toolResults: ToolCallResult[];
  modelCalls: number;
}

type RoundOutcome =
  | { kind: 'answer'; message: Message; answer: string }
  | { kind: 'tools'; request: Message; reply: Message; results: ToolCallResult[] };

function renderOutput(output: ToolCallResult['output']): string {
  return typeof output === 'string' ? output : JSON.stringify(output);
}

function toResultBlock(result: ToolCallResult): ToolResultBlock {
  return { type: 'tool_result', toolUseId: result.callId, content: renderOutput(result.output), isError: result.isError };
}

function unavailable(use: ToolUseBlock): ToolCallResult {
  const err = new UnknownToolError(use.name);
  return { callId: use.id, name: use.name, output: `Error executing tool '${use.name}': ${err.message}`, isError: true, sources: [] };
}

/**
 * Answers a query with a bounded number of tool rounds. Each round is one model
 * call; when the model asks for tools they are executed and their results fed
 * into the next call. After `maxRounds` tool rounds the next call is made
 * without tools, so a call never issues more than `maxRounds + 1` model requests.
 *
 * Tool failures go back to the model as error results. Model failures and
 * round timeouts reject with GenerationError.
 */
export class AIGenerator {
  private model: ModelClient;
  private tools: ToolManager;

  constructor(private opts: GeneratorOptions) {
    this.model = opts.model;
    this.tools = opts.tools;
  }

  async generate(
    query: string,
    history: ConversationHistory,
    availableTools: readonly ToolDefinition[],
    maxRounds: number = this.opts.maxRounds,
    signal?: AbortSignal
  ): Promise<GenerateResult> {
    if (!Number.isInteger(maxRounds) || maxRounds < 1) {
      throw new RangeError(`maxRounds must be a positive integer, got ${maxRounds}`);
    }

    const fsm = new FSM(maxRounds);
    const system = this.opts.systemPrompt ?? buildSystemPrompt(maxRounds);
    const turn: Message[] = [userMessage(query)];
    const toolResults: ToolCallResult[] = [];
    let modelCalls = 0;
    let answer = FALLBACK_ANSWER;

    while (fsm.state !== State.DONE) {
      const round = fsm.round + 1;
      const offered = availableTools.length > 0 && fsm.toolsAllowed ? availableTools : undefined;
      const outcome = await withDeadline(this.opts.roundTimeoutMs, signal, `round ${round}`, async (roundSignal) => {
        const response = await this.model.create(
          {
            system,
            messages: [...history, ...turn],
            tools: offered,
            maxTokens: this.opts.maxTokens,
            temperature: this.opts.temperature
          },
          roundSignal
        );
        modelCalls += 1;
        return this.handleResponse(fsm, response, offered, roundSignal);
      });

      if (outcome.kind === 'answer') {
        turn.push(outcome.message);
        answer = outcome.answer;
        logger.info('generation done', { rounds: fsm.round, model_calls: modelCalls });
      } else {
        turn.push(outcome.request, outcome.reply);
        toolResults.push(...outcome.results);
        fsm.to(State.AWAITING_MODEL);
      }
    }

    return { answer, history: [...history, ...turn], turn, toolResults, modelCalls };
  }

  private async handleResponse(
    fsm: FSM,
    response: ModelResponse,
    offered: readonly ToolDefinition[] | undefined,
    signal: AbortSignal
  ): Promise<RoundOutcome> {
    const uses = toolUses(response.content);

    // Without offered tools any response is final; stray tool_use blocks are dropped.
    if (!offered || uses.length === 0) {
      fsm.to(State.DONE);
      const content = textOf(response.content);
      // text is returned as sent; only a blank response falls back
      const answer = content.trim().length > 0 ? content : FALLBACK_ANSWER;
      return { kind: 'answer', message: { role: 'assistant', content: [{ type: 'text', text: answer }] }, answer };
    }

    fsm.to(State.EXECUTING_TOOLS);
    logger.info('tool round', { round: fsm.round + 1, calls: uses.map((u) => u.name) });
    const names = new Set(offered.map((t) => t.name));
    // Promise.all keeps input order, so results line up with the tool_use blocks.
    const results = await Promise.all(
      uses.map((use) =>
        names.has(use.name) ? this.tools.execute(use.name, use.input, use.id, signal) : Promise.resolve(unavailable(use))
      )
    );
    const reply: ContentBlock[] = results.map(toResultBlock);
    return {
      kind: 'tools',
      request: { role: 'assistant', content: [...response.content] },
      reply: { role: 'tool', content: reply },
      results
    };
  }
}
