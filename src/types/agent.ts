import { ToolSchema, ToolCallRequest } from './tools';
import { Turn } from './conversation';

export type TurnOutcome = 'replied' | 'loop_bound_exceeded' | 'backend_timeout' | 'backend_unavailable';

export interface AgentReply {
  sessionId: string;
  reply: string;
  outcome: TurnOutcome;
  toolCalls: number;
}

export interface ReasoningRequest {
  system: string;
  turns: Turn[];
  tools: ToolSchema[];
}

export interface ReasoningResponse {
  text: string;
  toolCalls: ToolCallRequest[];
}

/** One reasoning step of the conversation loop. Implementations may suspend on network I/O. */
export interface ReasoningBackend {
  complete(request: ReasoningRequest): Promise<ReasoningResponse>;
}
