import test from 'node:test';
import assert from 'node:assert/strict';
import { userMessage, type Message } from '../src/core/context';
import { GenerationError } from '../src/core/errors';
import { AIGenerator, FALLBACK_ANSWER } from '../src/orchestrator/ai-generator';
import { ToolManager } from '../src/tools/executor';
import type { ToolHandler } from '../src/tools/registry';
import { delay, ScriptedModel, StalledModel, text, toolDef, toolUse, wantsTools, type Step } from './helpers';

type Setup = {
  model: ScriptedModel;
  tools: ToolManager;
  gen: AIGenerator;
  calls: Array<{ name: string; args: Record<string, unknown> }>;
};

function setup(steps: Step[], handler?: ToolHandler): Setup {
  const model = new ScriptedModel(steps);
  const tools = new ToolManager();
  const calls: Setup['calls'] = [];
  for (const name of ['search_course_content', 'get_course_outline']) {
    tools.register(toolDef(name), async (args, ctx) => {
      calls.push({ name, args });
      return handler ? handler(args, ctx) : 'tool result text';
    });
  }
  const gen = new AIGenerator({ model, tools, maxRounds: 2, roundTimeoutMs: 1000, maxTokens: 800, temperature: 0 });
  return { model, tools, gen, calls };
}

test('direct text answer takes a single model call', async () => {
  const { model, tools, gen, calls } = setup([text('Hello!')]);
  const res = await gen.generate('hi', [], tools.schemas());
  assert.equal(res.answer, 'Hello!');
  assert.equal(res.modelCalls, 1);
  assert.equal(model.calls.length, 1);
  assert.deepEqual(model.calls[0].tools, ['search_course_content', 'get_course_outline']);
  assert.equal(calls.length, 0);
  assert.deepEqual(res.turn, [userMessage('hi'), { role: 'assistant', content: [{ type: 'text', text: 'Hello!' }] }]);
});

test('no tools are offered when the tool list is empty', async () => {
  const { model, gen } = setup([text('plain')]);
  const res = await gen.generate('hi', [], []);
  assert.equal(res.answer, 'plain');
  assert.equal(model.calls[0].tools, undefined);
});

test('tool_use without offered tools is final and keeps only the text', async () => {
  const { model, gen, calls } = setup([wantsTools({ type: 'text', text: 'Partial text' }, toolUse('t1', 'search', { q: 'x' }))]);
  const res = await gen.generate('test', [], []);
  assert.equal(res.answer, 'Partial text');
  assert.equal(model.calls.length, 1);
  assert.equal(calls.length, 0);
  assert.deepEqual(res.turn[1], { role: 'assistant', content: [{ type: 'text', text: 'Partial text' }] });
});

test('one tool round takes two calls and pairs tool_use with tool_result', async () => {
  const { model, tools, gen, calls } = setup([
    wantsTools(toolUse('t1', 'search_course_content', { query: 'tool loops' })),
    text('Here are the results')
  ]);
  const res = await gen.generate('search tool loops', [], tools.schemas());

  assert.equal(res.answer, 'Here are the results');
  assert.equal(model.calls.length, 2);
  assert.deepEqual(calls, [{ name: 'search_course_content', args: { query: 'tool loops' } }]);
  // the round limit is not reached yet, so tools are still offered
  assert.deepEqual(model.calls[1].tools, ['search_course_content', 'get_course_outline']);

  const sent = model.calls[1].messages;
  assert.deepEqual(
    sent.map((m) => m.role),
    ['user', 'assistant', 'tool']
  );
  assert.deepEqual(sent[1].content, [toolUse('t1', 'search_course_content', { query: 'tool loops' })]);
  assert.deepEqual(sent[2].content, [
    { type: 'tool_result', toolUseId: 't1', content: 'tool result text', isError: false }
  ]);
  assert.equal(res.turn.length, 4);
  assert.equal(res.toolResults.length, 1);
});

test('two tool rounds end with a tool-free third call', async () => {
  let n = 0;
  const { model, tools, gen, calls } = setup(
    [
      wantsTools(toolUse('t1', 'get_course_outline', { course_title: 'MCP' })),
      wantsTools(toolUse('t2', 'search_course_content', { query: 'lesson 4 topic' })),
      text('Final answer')
    ],
    async () => (++n === 1 ? 'outline result' : 'search result')
  );
  const res = await gen.generate('complex query', [], tools.schemas());

  assert.equal(res.answer, 'Final answer');
  assert.equal(model.calls.length, 3);
  assert.equal(calls.length, 2);
  assert.equal(model.calls[2].tools, undefined);
  assert.deepEqual(
    model.calls[2].messages.map((m) => m.role),
    ['user', 'assistant', 'tool', 'assistant', 'tool']
  );
  assert.deepEqual(
    res.toolResults.map((r) => r.output),
    ['outline result', 'search result']
  );
});

test('a tool request on the tool-free final call is not executed', async () => {
  const { model, tools, gen, calls } = setup([
    wantsTools(toolUse('t1', 'search_course_content', { query: 'a' })),
    wantsTools(toolUse('t2', 'search_course_content', { query: 'b' })),
    wantsTools({ type: 'text', text: 'Best effort answer' }, toolUse('t3', 'search_course_content', { query: 'c' }))
  ]);
  const res = await gen.generate('q', [], tools.schemas());

  assert.equal(res.answer, 'Best effort answer');
  assert.equal(model.calls.length, 3);
  assert.equal(calls.length, 2);
  assert.deepEqual(res.turn[res.turn.length - 1], {
    role: 'assistant',
    content: [{ type: 'text', text: 'Best effort answer' }]
  });
});

test('maxRounds of one withholds tools from the second call', async () => {
  const { model, tools, gen } = setup([wantsTools(toolUse('t1', 'search_course_content', { query: 'a' })), text('Done')]);
  const res = await gen.generate('q', [], tools.schemas(), 1);
  assert.equal(res.answer, 'Done');
  assert.deepEqual(model.calls[0].tools, ['search_course_content', 'get_course_outline']);
  assert.equal(model.calls[1].tools, undefined);
});

test('a throwing tool becomes an error result and generation continues', async () => {
  const { model, tools, gen } = setup(
    [wantsTools(toolUse('t1', 'search_course_content', { query: 'test' })), text('Sorry, error occurred')],
    async () => {
      throw new Error('connection failed');
    }
  );
  const res = await gen.generate('test', [], tools.schemas());

  assert.equal(res.answer, 'Sorry, error occurred');
  assert.equal(model.calls.length, 2);
  assert.deepEqual(model.calls[1].tools, ['search_course_content', 'get_course_outline']);
  assert.deepEqual(model.calls[1].messages[2].content, [
    {
      type: 'tool_result',
      toolUseId: 't1',
      content: "Error executing tool 'search_course_content': connection failed",
      isError: true
    }
  ]);
  assert.equal(res.toolResults[0].isError, true);
});

test('unknown and unoffered tools come back as error results', async () => {
  const { model, tools, gen, calls } = setup([
    wantsTools(toolUse('t1', 'bad_tool', { query: 'test' }), toolUse('t2', 'get_course_outline', {})),
    text('No tool found')
  ]);
  const offered = tools.schemas().filter((t) => t.name === 'search_course_content');
  const res = await gen.generate('test', [], offered);

  assert.equal(res.answer, 'No tool found');
  assert.equal(calls.length, 0);
  assert.deepEqual(model.calls[1].messages[2].content, [
    { type: 'tool_result', toolUseId: 't1', content: "Error executing tool 'bad_tool': tool 'bad_tool' not found", isError: true },
    {
      type: 'tool_result',
      toolUseId: 't2',
      content: "Error executing tool 'get_course_outline': tool 'get_course_outline' not found",
      isError: true
    }
  ]);
});

test('text next to a tool request stays in history but is not the answer', async () => {
  const { gen, tools } = setup([
    wantsTools({ type: 'text', text: 'Let me look that up.' }, toolUse('t1', 'search_course_content', { query: 'x' })),
    text('Final')
  ]);
  const res = await gen.generate('q', [], tools.schemas());
  assert.equal(res.answer, 'Final');
  assert.deepEqual(res.turn[1].content, [
    { type: 'text', text: 'Let me look that up.' },
    toolUse('t1', 'search_course_content', { query: 'x' })
  ]);
});

test('a response without text falls back to the default answer', async () => {
  const { gen } = setup([{ content: [], stopReason: 'end_turn' }]);
  const res = await gen.generate('q', [], []);
  assert.equal(res.answer, FALLBACK_ANSWER);
});

test('answer text keeps its whitespace and blank text falls back', async () => {
  const { gen } = setup([text('  - item\n'), text(' \n ')]);
  const res = await gen.generate('q', [], []);
  assert.equal(res.answer, '  - item\n');
  assert.deepEqual(res.turn[1], { role: 'assistant', content: [{ type: 'text', text: '  - item\n' }] });
  const blank = await gen.generate('q', [], []);
  assert.equal(blank.answer, FALLBACK_ANSWER);
});

test('prior history is sent first and left untouched', async () => {
  const history: readonly Message[] = Object.freeze([
    userMessage('earlier question'),
    { role: 'assistant', content: [{ type: 'text', text: 'earlier answer' }] }
  ]);
  const { model, gen } = setup([text('response')]);
  const res = await gen.generate('hi', history, []);

  assert.deepEqual(model.calls[0].messages, [...history, userMessage('hi')]);
  assert.equal(history.length, 2);
  assert.equal(res.history.length, 4);
  assert.deepEqual(res.history.slice(0, 2), [...history]);
});

test('results keep tool_use order whatever order the tools finish in', async () => {
  const finished: string[] = [];
  const waits: Record<string, number> = { a: 30, b: 5, c: 15 };
  const { model, tools, gen } = setup(
    [
      wantsTools(
        toolUse('a', 'search_course_content', { query: 'a' }),
        toolUse('b', 'search_course_content', { query: 'b' }),
        toolUse('c', 'search_course_content', { query: 'c' })
      ),
      text('ok')
    ],
    async (args) => {
      const key = String(args.query);
      await delay(waits[key]);
      finished.push(key);
      return `result ${key}`;
    }
  );
  await gen.generate('q', [], tools.schemas());

  assert.deepEqual(finished, ['b', 'c', 'a']);
  const reply = model.calls[1].messages[2].content;
  assert.deepEqual(
    reply.map((b) => (b.type === 'tool_result' ? [b.toolUseId, b.content] : [])),
    [
      ['a', 'result a'],
      ['b', 'result b'],
      ['c', 'result c']
    ]
  );
});

test('identical inputs with a deterministic model give identical results', async () => {
  const script = (): Step[] => [
    wantsTools(toolUse('t1', 'search_course_content', { query: 'x' })),
    text('same answer')
  ];
  const first = setup(script());
  const second = setup(script());
  const a = await first.gen.generate('q', [userMessage('before')], first.tools.schemas());
  const b = await second.gen.generate('q', [userMessage('before')], second.tools.schemas());
  assert.deepEqual(a, b);
});

test('model failures propagate unchanged', async () => {
  const { gen } = setup([new GenerationError('request_failed', 'quota exceeded')]);
  await assert.rejects(gen.generate('q', [], []), { name: 'GenerationError', reason: 'request_failed' });
});

test('a stalled model call fails the round with a timeout', async () => {
  const tools = new ToolManager();
  const model = new StalledModel();
  const gen = new AIGenerator({ model, tools, maxRounds: 2, roundTimeoutMs: 20, maxTokens: 800, temperature: 0 });
  await assert.rejects(gen.generate('q', [], []), { name: 'GenerationError', reason: 'timeout' });
  assert.equal(model.calls, 1);
});

test('a stalled tool fails the round with a timeout', async () => {
  const model = new ScriptedModel([wantsTools(toolUse('t1', 'slow', {})), text('never')]);
  const tools = new ToolManager();
  tools.register(
    toolDef('slow'),
    (_args, ctx) =>
      new Promise((_, reject) => {
        ctx.signal?.addEventListener('abort', () => reject(new Error('cancelled')), { once: true });
      })
  );
  const gen = new AIGenerator({ model, tools, maxRounds: 2, roundTimeoutMs: 20, maxTokens: 800, temperature: 0 });
  await assert.rejects(gen.generate('q', [], tools.schemas()), { name: 'GenerationError', reason: 'timeout' });
  assert.equal(model.calls.length, 1);
});

test('an aborted caller signal stops generation', async () => {
  const { gen, model } = setup([text('unused')]);
  const controller = new AbortController();
  controller.abort();
  await assert.rejects(gen.generate('q', [], [], 2, controller.signal), { name: 'GenerationError', reason: 'aborted' });
  assert.equal(model.calls.length, 0);
});

test('maxRounds must be a positive integer', async () => {
  const { gen } = setup([]);
  await assert.rejects(gen.generate('q', [], [], 0), RangeError);
});

test('the system prompt states the round limit in force', async () => {
  const { model, tools, gen } = setup([text('a'), text('b'), text('c')]);
  await gen.generate('q', [], tools.schemas());
  await gen.generate('q', [], tools.schemas(), 3);
  assert.ok(model.calls[0].system.includes('- Up to 2 rounds of tool calls may be made in sequence'));
  assert.ok(model.calls[1].system.includes('- Up to 3 rounds of tool calls may be made in sequence'));

  const custom = new AIGenerator({
    model,
    tools,
    maxRounds: 2,
    roundTimeoutMs: 1000,
    maxTokens: 800,
    temperature: 0,
    systemPrompt: 'custom prompt'
  });
  await custom.generate('q', [], []);
  assert.equal(model.calls[2].system, 'custom prompt');
});
