import cors from '@fastify/cors';
import Fastify, { type FastifyInstance, type FastifyServerOptions } from 'fastify';
import type { RAGSystem } from '../orchestrator/rag-system';
import { logger } from '../observability/logger';

type QueryBody = {
  query: string;
  session_id?: string | null;
};

const queryBodySchema = {
  type: 'object',
  required: ['query'],
  properties: {
    query: { type: 'string' },
    session_id: { type: ['string', 'null'] }
  }
} as const;

export type QueryService = Pick<RAGSystem, 'query' | 'getCourseAnalytics'>;

export async function buildApp(rag: QueryService, opts: FastifyServerOptions = {}): Promise<FastifyInstance> {
  const app = Fastify(opts);
  await app.register(cors, { origin: '*', methods: 'GET, POST, OPTIONS', exposedHeaders: '*' });

  // Client errors (schema validation, unparsable JSON) keep their status and message;
  // anything else is reported as a generic 500.
  app.setErrorHandler((err, req, reply) => {
    const status = err.statusCode ?? 500;
    if (status < 500) {
      reply.status(status).send({ detail: err.message });
      return;
    }
    logger.error('request failed', { method: req.method, url: req.url, error: err });
    reply.status(500).send({ detail: 'Internal server error' });
  });

  app.get('/', async () => ({ status: 'ok' }));

  app.post<{ Body: QueryBody }>('/api/query', { schema: { body: queryBodySchema } }, async (req) => {
    const { query, session_id } = req.body;
    const res = await rag.query(query, session_id ?? undefined);
    return { answer: res.answer, sources: res.sources, session_id: res.sessionId };
  });

  app.get('/api/courses', async () => {
    const analytics = await rag.getCourseAnalytics();
    return { total_courses: analytics.totalCourses, course_titles: analytics.courseTitles };
  });

  return app;
}
