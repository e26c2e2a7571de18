import { ToolCallRequest, ToolCallResult } from './tools';

export interface UserTurn {
  role: 'user';
  content: string;
  at: string;
}

export interface ModelTurn {
  role: 'model';
  content: string;
  toolCalls: ToolCallRequest[];
  at: string;
}

export interface ToolTurn {
  role: 'tool';
  callId: string;
  name: string;
  result: ToolCallResult;
  at: string;
}

export type Turn = UserTurn | ModelTurn | ToolTurn;

export type TurnPhase = 'AwaitingUserInput' | 'ReasoningStep' | 'ToolCallPending' | 'TerminalReply';

export interface ConversationState {
  sessionId: string;
  turns: Turn[];
  phase: TurnPhase;
  createdAt: string;
  lastActivityAt: string;
}
