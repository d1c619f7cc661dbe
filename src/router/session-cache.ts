/**
 * Open routing sessions keyed by decision id, so a caller can ask for the
 * next-ranked model after an execution fails. Oldest sessions are evicted
 * once maxSessions is reached.
 */

import { SessionNotFoundError } from '../errors.js';
import type { RoutingSession } from './routing-session.js';

export const DEFAULT_SESSION_CACHE_SIZE = 1000;

export class RoutingSessionCache {
  private readonly sessions = new Map<string, RoutingSession>();

  constructor(readonly maxSessions: number = DEFAULT_SESSION_CACHE_SIZE) {}

  /**
   * Files the session under the decision it just produced
   */
  set(decisionId: string, session: RoutingSession): void {
    this.sessions.delete(decisionId);
    this.sessions.set(decisionId, session);
    while (this.sessions.size > this.maxSessions) {
      const oldest = this.sessions.keys().next();
      if (oldest.done) break;
      this.sessions.delete(oldest.value);
    }
  }

  get(decisionId: string): RoutingSession | undefined {
    return this.sessions.get(decisionId);
  }

  /**
   * @throws SessionNotFoundError when the decision has no open session
   */
  require(decisionId: string): RoutingSession {
    const session = this.sessions.get(decisionId);
    if (!session) {
      throw new SessionNotFoundError(decisionId);
    }
    return session;
  }

  get size(): number {
    return this.sessions.size;
  }
}
