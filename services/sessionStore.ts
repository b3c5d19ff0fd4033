import type { Session } from '../types.js';

/**
 * Keyed lookup for live sessions. Implementations never look inside a
 * session; lifecycle decisions belong to the Actor.
 */
export interface SessionStore {
  get(sessionId: string): Session | undefined;
  set(session: Session): void;
  delete(sessionId: string): boolean;
  entries(): IterableIterator<[string, Session]>;
  size(): number;
  /** Remembers an id whose report went out so a recreated session cannot report again. */
  retire(sessionId: string, at?: number): void;
  isRetired(sessionId: string): boolean;
  retiredCount(): number;
  pruneRetired(olderThan: number): number;
}

export class InMemorySessionStore implements SessionStore {
  private sessions = new Map<string, Session>();
  private retired = new Map<string, number>();

  get(sessionId: string): Session | undefined {
    return this.sessions.get(sessionId);
  }

  set(session: Session): void {
    this.sessions.set(session.sessionId, session);
  }

  delete(sessionId: string): boolean {
    return this.sessions.delete(sessionId);
  }

  entries(): IterableIterator<[string, Session]> {
    return this.sessions.entries();
  }

  size(): number {
    return this.sessions.size;
  }

  retire(sessionId: string, at = Date.now()): void {
    this.retired.set(sessionId, at);
  }

  isRetired(sessionId: string): boolean {
    return this.retired.has(sessionId);
  }

  retiredCount(): number {
    return this.retired.size;
  }

  pruneRetired(olderThan: number): number {
    let pruned = 0;
    for (const [id, at] of this.retired) {
      if (at < olderThan) {
        this.retired.delete(id);
        pruned++;
      }
    }
    return pruned;
  }
}
