import {QuizSession} from '../types/quiz';

/**
 * In-memory registry of quiz sessions: at most one session per user.
 * Opening a session for a user replaces whatever was there before.
 */
export class QuizSessionManager {
  private readonly activeSessions = new Map<string, QuizSession>();

  /**
   * @param ttlMs sessions older than this are treated as gone; null keeps them until answered
   */
  constructor(private readonly ttlMs: number | null = null) {}

  /** Returns the session it replaced, if any. */
  open(session: QuizSession): QuizSession | undefined {
    const previous = this.activeSessions.get(session.userId);
    this.activeSessions.set(session.userId, session);
    return previous;
  }

  peek(userId: string, now: Date = new Date()): QuizSession | undefined {
    const session = this.activeSessions.get(userId);
    if (!session) {
      return undefined;
    }
    if (this.isExpired(session, now)) {
      session.status = 'expired';
      this.activeSessions.delete(userId);
      return undefined;
    }
    return session;
  }

  /** Removes and returns the user's live session. */
  take(userId: string, now: Date = new Date()): QuizSession | undefined {
    const session = this.peek(userId, now);
    if (session) {
      this.activeSessions.delete(userId);
    }
    return session;
  }

  /**
   * Puts a taken session back after a failed write. A session opened in
   * the meantime wins.
   */
  restore(session: QuizSession): boolean {
    if (this.activeSessions.has(session.userId)) {
      return false;
    }
    this.activeSessions.set(session.userId, session);
    return true;
  }

  delete(userId: string): boolean {
    return this.activeSessions.delete(userId);
  }

  sweepExpired(now: Date = new Date()): QuizSession[] {
    const expired: QuizSession[] = [];
    for (const [userId, session] of this.activeSessions) {
      if (this.isExpired(session, now)) {
        session.status = 'expired';
        this.activeSessions.delete(userId);
        expired.push(session);
      }
    }
    return expired;
  }

  get size(): number {
    return this.activeSessions.size;
  }

  clear(): void {
    this.activeSessions.clear();
  }

  private isExpired(session: QuizSession, now: Date): boolean {
    return this.ttlMs !== null && now.getTime() - session.posedAt.getTime() >= this.ttlMs;
  }
}
