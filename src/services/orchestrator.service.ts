import { ConversationState, Turn, TurnPhase } from '../types/conversation';
import { ReasoningBackend, TurnOutcome } from '../types/agent';
import { logger } from '../utils/logger';
import { ToolDispatcher } from './dispatcher.service';

export const DEFAULT_MAX_TOOL_ITERATIONS = 5;

export const HOLDING_REPLY =
  "I'm still working through that request. Could you tell me a bit more, or rephrase what you need?";

export const EMPTY_REPLY = "Sorry, I didn't catch that. Could you rephrase?";

export interface OrchestratorOptions {
  systemPrompt: string;
  maxToolIterations?: number;
  clock?: () => Date;
}

export interface TurnResult {
  reply: string;
  outcome: Extract<TurnOutcome, 'replied' | 'loop_bound_exceeded'>;
  toolCalls: number;
}

/**
 * Drives one user turn: reasoning step, then sequential tool dispatch, until
 * the model answers without tool calls or the iteration bound is hit.
 *
 * If the reasoning step throws, the turns recorded so far stay in history,
 * the session returns to AwaitingUserInput and the error propagates.
 */
export class ConversationOrchestrator {
  private readonly maxToolIterations: number;
  private readonly clock: () => Date;

  constructor(
    private readonly backend: ReasoningBackend,
    private readonly dispatcher: ToolDispatcher,
    private readonly options: OrchestratorOptions
  ) {
    this.maxToolIterations = options.maxToolIterations ?? DEFAULT_MAX_TOOL_ITERATIONS;
    this.clock = options.clock ?? (() => new Date());
  }

  async runTurn(state: ConversationState, text: string): Promise<TurnResult> {
    if (state.phase !== 'AwaitingUserInput') {
      throw new Error(`Session ${state.sessionId} is already processing a turn (${state.phase})`);
    }

    const tools = this.dispatcher.schemas();
    let iterations = 0;
    let toolCalls = 0;
    let lastText = '';

    this.append(state, { role: 'user', content: text, at: this.now() });

    try {
      for (;;) {
        this.transition(state, 'ReasoningStep');
        const response = await this.backend.complete({
          system: this.options.systemPrompt,
          turns: [...state.turns],
          tools,
        });
        const replyText = response.text.trim();
        if (replyText) lastText = replyText;

        if (response.toolCalls.length === 0) {
          const reply = replyText || EMPTY_REPLY;
          this.append(state, { role: 'model', content: reply, toolCalls: [], at: this.now() });
          this.finish(state);
          return { reply, outcome: 'replied', toolCalls };
        }

        if (iterations >= this.maxToolIterations) {
          // Unanswered tool calls are dropped so the history stays well-formed.
          const reply = lastText || HOLDING_REPLY;
          this.append(state, { role: 'model', content: reply, toolCalls: [], at: this.now() });
          logger.warn('Tool loop bound exceeded', {
            sessionId: state.sessionId,
            maxToolIterations: this.maxToolIterations,
            pendingTools: response.toolCalls.map((c) => c.name),
          });
          this.finish(state);
          return { reply, outcome: 'loop_bound_exceeded', toolCalls };
        }

        iterations++;
        this.append(state, { role: 'model', content: replyText, toolCalls: response.toolCalls, at: this.now() });
        this.transition(state, 'ToolCallPending');

        for (const call of response.toolCalls) {
          const result = await this.dispatcher.dispatch(call, { sessionId: state.sessionId });
          toolCalls++;
          this.append(state, { role: 'tool', callId: call.id, name: call.name, result, at: this.now() });
        }
      }
    } catch (error) {
      // Every tool_use already has its tool_result, so the history stays well-formed.
      this.transition(state, 'AwaitingUserInput');
      throw error;
    }
  }

  private append(state: ConversationState, turn: Turn): void {
    state.turns.push(turn);
  }

  private finish(state: ConversationState): void {
    this.transition(state, 'TerminalReply');
    this.transition(state, 'AwaitingUserInput');
  }

  private transition(state: ConversationState, next: TurnPhase): void {
    logger.debug('Conversation phase', { sessionId: state.sessionId, from: state.phase, to: next });
    state.phase = next;
  }

  private now(): string {
    return this.clock().toISOString();
  }
}
