import { randomUUID } from 'node:crypto';
import { isQueryMessage, type ConversationHistory, type Message } from './context';
import { SessionError } from './errors';
import { logger } from '../observability/logger';

export interface SessionManager {
  createSession(): Promise<string>;
  getHistory(sessionId: string): Promise<ConversationHistory>;
  append(sessionId: string, messages: readonly Message[]): Promise<void>;
}

/**
 * Keeps the newest `maxExchanges` exchanges. An exchange starts at a user
 * query, so a tool_use and its tool_result are always dropped together.
 */
export function retainExchanges(history: readonly Message[], maxExchanges: number): Message[] {
  if (maxExchanges <= 0) return [...history];
  let seen = 0;
  for (let i = history.length - 1; i >= 0; i -= 1) {
    if (!isQueryMessage(history[i])) continue;
    seen += 1;
    if (seen === maxExchanges) return history.slice(i);
  }
  return [...history];
}

function assertSessionId(sessionId: string) {
  if (sessionId.trim().length === 0) throw new SessionError(sessionId, 'session id must not be blank');
}

export class InMemorySessionManager implements SessionManager {
  private sessions = new Map<string, Message[]>();

  constructor(private maxExchanges = 0) {}

  async createSession(): Promise<string> {
    const sessionId = randomUUID();
    this.sessions.set(sessionId, []);
    logger.info('session created', { sid: sessionId });
    return sessionId;
  }

  async getHistory(sessionId: string): Promise<ConversationHistory> {
    assertSessionId(sessionId);
    return Object.freeze([...(this.sessions.get(sessionId) ?? [])]);
  }

  async append(sessionId: string, messages: readonly Message[]): Promise<void> {
    assertSessionId(sessionId);
    const next = [...(this.sessions.get(sessionId) ?? []), ...messages];
    this.sessions.set(sessionId, retainExchanges(next, this.maxExchanges));
  }
}
