import { ConversationOrchestrator } from './orchestrator.service';
import { SessionService } from './session.service';
import { AgentReply } from '../types/agent';
import { BackendTimeoutError, BackendUnavailableError, errorMessage } from '../utils/errors';
import { buildFallbackReply } from '../utils/prompts';
import { logger } from '../utils/logger';

/**
 * Caller-facing surface. Turns of one session run strictly one after the
 * other; different sessions proceed independently.
 */
export class AgentService {
  private readonly pending = new Map<string, Promise<void>>();

  constructor(
    private readonly orchestrator: ConversationOrchestrator,
    private readonly sessions: SessionService
  ) {}

  async handleUserMessage(sessionId: string, text: string): Promise<AgentReply> {
    const previous = this.pending.get(sessionId) ?? Promise.resolve();
    const current = previous.then(() => this.processTurn(sessionId, text));
    // Errors surface through `current`; the queue only needs to know it settled.
    const tail = current.then(
      () => undefined,
      () => undefined
    );
    this.pending.set(sessionId, tail);

    try {
      return await current;
    } finally {
      if (this.pending.get(sessionId) === tail) {
        this.pending.delete(sessionId);
      }
    }
  }

  endSession(sessionId: string): boolean {
    return this.sessions.end(sessionId);
  }

  private async processTurn(sessionId: string, text: string): Promise<AgentReply> {
    const state = this.sessions.getOrCreate(sessionId);

    try {
      const result = await this.orchestrator.runTurn(state, text);
      this.sessions.touch(state);

      logger.info('Message handled', {
        sessionId,
        outcome: result.outcome,
        toolCalls: result.toolCalls,
        turns: state.turns.length,
      });

      return { sessionId, reply: result.reply, outcome: result.outcome, toolCalls: result.toolCalls };
    } catch (error) {
      this.sessions.touch(state);

      if (error instanceof BackendTimeoutError) {
        logger.warn('Turn failed: reasoning backend timed out', { sessionId });
        return { sessionId, reply: buildFallbackReply(text), outcome: 'backend_timeout', toolCalls: 0 };
      }

      if (error instanceof BackendUnavailableError) {
        logger.warn('Turn failed: reasoning backend unavailable', {
          sessionId,
          retryable: error.retryable,
          error: error.message,
        });
        return { sessionId, reply: buildFallbackReply(text), outcome: 'backend_unavailable', toolCalls: 0 };
      }

      logger.error('Failed to handle message', { sessionId, error: errorMessage(error) });
      throw error;
    }
  }
}
