import { buildApp } from './adapters/http-routes';
import { config } from './config';
import { InMemorySessionManager } from './core/session';
import { OpenAIModelClient } from './llm/openai-client';
import { logger } from './observability/logger';
import { AIGenerator } from './orchestrator/ai-generator';
import { RAGSystem } from './orchestrator/rag-system';
import { loadCatalog } from './search/catalog';
import { InMemoryVectorStore } from './search/memory-store';
import { registerCourseTools } from './tools/builtins';
import { ToolManager } from './tools/executor';

async function start() {
  logger.info('=== course-rag-assistant start ===');
  if (!config.openaiApiKey) {
    throw new Error('OPENAI_API_KEY is required');
  }

  const courses = await loadCatalog(config.coursesPath);
  const store = new InMemoryVectorStore(courses, config.maxResults);
  logger.info('course catalog loaded', { path: config.coursesPath, courses: courses.length });

  const tools = new ToolManager();
  registerCourseTools(tools, store, config.maxResults);
  logger.info('tools registered', { count: tools.size });

  const generator = new AIGenerator({
    model: new OpenAIModelClient({
      apiKey: config.openaiApiKey,
      baseURL: config.openaiBaseUrl,
      model: config.openaiModel
    }),
    tools,
    maxRounds: config.maxToolRounds,
    roundTimeoutMs: config.roundTimeoutMs,
    maxTokens: config.maxTokens,
    temperature: config.temperature
  });

  const rag = new RAGSystem({
    generator,
    tools,
    sessions: new InMemorySessionManager(config.maxHistoryExchanges),
    store
  });

  const server = await buildApp(rag, { logger: true });
  await server.listen({ port: config.port, host: config.host });
  logger.info('server listening', { port: config.port, host: config.host, model: config.openaiModel });
}

start().catch((err) => {
  logger.error('failed to start server', err);
  process.exit(1);
});
