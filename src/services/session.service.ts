import { ConversationState } from '../types/conversation';
import { logger } from '../utils/logger';

/**
 * In-memory conversation state per session. Nothing is shared between
 * sessions and nothing outlives the process.
 */
export class SessionService {
  private readonly sessions = new Map<string, ConversationState>();

  constructor(
    private readonly idleTtlMs: number,
    private readonly clock: () => Date = () => new Date()
  ) {}

  getOrCreate(sessionId: string): ConversationState {
    this.pruneIdle();
    const existing = this.sessions.get(sessionId);
    if (existing) return existing;

    const now = this.clock().toISOString();
    const state: ConversationState = {
      sessionId,
      turns: [],
      phase: 'AwaitingUserInput',
      createdAt: now,
      lastActivityAt: now,
    };
    this.sessions.set(sessionId, state);
    logger.debug('Session started', { sessionId });
    return state;
  }

  get(sessionId: string): ConversationState | undefined {
    return this.sessions.get(sessionId);
  }

  touch(state: ConversationState): void {
    state.lastActivityAt = this.clock().toISOString();
  }

  end(sessionId: string): boolean {
    const removed = this.sessions.delete(sessionId);
    if (removed) logger.info('Session ended', { sessionId });
    return removed;
  }

  get size(): number {
    return this.sessions.size;
  }

  private pruneIdle(): void {
    const cutoff = this.clock().getTime() - this.idleTtlMs;
    for (const [sessionId, state] of this.sessions) {
      // A session mid-turn is never pruned.
      if (state.phase === 'AwaitingUserInput' && Date.parse(state.lastActivityAt) < cutoff) {
        this.sessions.delete(sessionId);
        logger.debug('Idle session expired', { sessionId });
      }
    }
  }
}
