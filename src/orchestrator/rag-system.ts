import type { SourceRef } from '../core/context';
import { KeyedMutex } from '../core/keyed-mutex';
import type { SessionManager } from '../core/session';
import { logger } from '../observability/logger';
import type { VectorStore } from '../search/types';
import type { ToolManager } from '../tools/executor';
import type { ToolCallResult } from '../tools/registry';
import type { AIGenerator } from './ai-generator';

export interface QueryResponse {
  answer: string;
  sources: SourceRef[];
  sessionId: string;
}

export interface CourseAnalytics {
  totalCourses: number;
  courseTitles: string[];
}

export type RagSystemDeps = {
  generator: AIGenerator;
  tools: ToolManager;
  sessions: SessionManager;
  store: VectorStore;
};

export function collectSources(results: readonly ToolCallResult[]): SourceRef[] {
  const seen = new Set<string>();
  const sources: SourceRef[] = [];
  for (const result of results) {
    if (result.isError) continue;
    for (const source of result.sources) {
      const key = `${source.title}\u0000${source.url ?? ''}`;
      if (seen.has(key)) continue;
      seen.add(key);
      sources.push(source);
    }
  }
  return sources;
}

export class RAGSystem {
  private locks = new KeyedMutex();

  constructor(private deps: RagSystemDeps) {}

  async query(text: string, sessionId?: string, signal?: AbortSignal): Promise<QueryResponse> {
    const { generator, tools, sessions } = this.deps;
    const sid = sessionId || (await sessions.createSession());

    return this.locks.runExclusive(sid, async () => {
      const history = await sessions.getHistory(sid);
      const started = Date.now();
      const result = await generator.generate(text, history, tools.schemas(), undefined, signal);
      await sessions.append(sid, result.turn);

      const sources = collectSources(result.toolResults);
      logger.info('query answered', {
        sid,
        model_calls: result.modelCalls,
        tool_calls: result.toolResults.length,
        sources: sources.length,
        elapsed_ms: Date.now() - started
      });
      return { answer: result.answer, sources, sessionId: sid };
    });
  }

  async getCourseAnalytics(): Promise<CourseAnalytics> {
    const courseTitles = await this.deps.store.listCourseTitles();
    return { totalCourses: courseTitles.length, courseTitles };
  }
}
