import Anthropic from '@anthropic-ai/sdk';
import { env } from '../config/env';
import { logger } from '../utils/logger';
import { Turn } from '../types/conversation';
import { ReasoningBackend, ReasoningRequest, ReasoningResponse } from '../types/agent';
import { ToolCallRequest } from '../types/tools';
import { BackendTimeoutError, BackendUnavailableError, errorMessage } from '../utils/errors';

type MessageParam = Anthropic.MessageParam;
type BlockParam = Exclude<MessageParam['content'], string>[number];

export interface AnthropicServiceOptions {
  apiKey: string;
  model: string;
  timeoutMs: number;
  maxAttempts: number;
  /** Base delay for exponential back-off between attempts. */
  retryDelayMs: number;
  maxTokens: number;
  temperature: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Maps the session's turn list onto Anthropic messages. Consecutive turns that
 * land on the same role (tool results, a user retry after a failed turn) are
 * merged into one message.
 */
export function toMessageParams(turns: Turn[]): MessageParam[] {
  const messages: Array<{ role: 'user' | 'assistant'; content: BlockParam[] }> = [];

  const push = (role: 'user' | 'assistant', blocks: BlockParam[]) => {
    const last = messages[messages.length - 1];
    if (last && last.role === role) {
      last.content.push(...blocks);
    } else {
      messages.push({ role, content: blocks });
    }
  };

  for (const turn of turns) {
    if (turn.role === 'user') {
      push('user', [{ type: 'text', text: turn.content }]);
    } else if (turn.role === 'model') {
      const blocks: BlockParam[] = [];
      if (turn.content) blocks.push({ type: 'text', text: turn.content });
      for (const call of turn.toolCalls) {
        blocks.push({ type: 'tool_use', id: call.id, name: call.name, input: call.arguments });
      }
      if (blocks.length > 0) push('assistant', blocks);
    } else {
      push('user', [
        {
          type: 'tool_result',
          tool_use_id: turn.callId,
          content: JSON.stringify(turn.result),
          is_error: !turn.result.ok,
        },
      ]);
    }
  }

  return messages;
}

export class AnthropicService implements ReasoningBackend {
  private readonly options: AnthropicServiceOptions;
  private readonly client: Anthropic;

  constructor(options: Partial<AnthropicServiceOptions> = {}) {
    this.options = {
      apiKey: env.ANTHROPIC_API_KEY,
      model: env.ANTHROPIC_MODEL,
      timeoutMs: env.REASONING_TIMEOUT_MS,
      maxAttempts: 3,
      retryDelayMs: 1000,
      maxTokens: 1024,
      temperature: 0.2,
      ...options,
    };
    // Retries are handled here so timeouts are never retried.
    this.client = new Anthropic({ apiKey: this.options.apiKey, maxRetries: 0 });
  }

  async complete(request: ReasoningRequest): Promise<ReasoningResponse> {
    const { maxAttempts } = this.options;
    let lastError: Error = new Error('no attempt made');

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      try {
        const response = await this.client.messages.create(
          {
            model: this.options.model,
            system: request.system,
            messages: toMessageParams(request.turns),
            tools: request.tools.map((tool) => ({
              name: tool.name,
              description: tool.description,
              input_schema: tool.inputSchema,
            })),
            temperature: this.options.temperature,
            max_tokens: this.options.maxTokens,
          },
          { timeout: this.options.timeoutMs }
        );

        const text = response.content
          .map((block) => (block.type === 'text' ? block.text : ''))
          .join('')
          .trim();

        const toolCalls: ToolCallRequest[] = [];
        for (const block of response.content) {
          if (block.type === 'tool_use') {
            toolCalls.push({ id: block.id, name: block.name, arguments: isRecord(block.input) ? block.input : {} });
          }
        }

        logger.debug('Anthropic response generated', {
          attempt,
          stopReason: response.stop_reason,
          toolCalls: toolCalls.map((c) => c.name),
          tokens: { prompt: response.usage?.input_tokens ?? 0, completion: response.usage?.output_tokens ?? 0 },
        });
        return { text, toolCalls };
      } catch (error) {
        if (error instanceof Anthropic.APIConnectionTimeoutError) {
          logger.warn('Anthropic request timed out', { attempt, timeoutMs: this.options.timeoutMs });
          throw new BackendTimeoutError('complete', error);
        }

        lastError = error instanceof Error ? error : new Error(errorMessage(error));
        const status = error instanceof Anthropic.APIError ? error.status : undefined;

        if (status === 429 || (status !== undefined && status >= 500) || error instanceof Anthropic.APIConnectionError) {
          if (attempt < maxAttempts) {
            const delay = Math.pow(2, attempt - 1) * this.options.retryDelayMs;
            logger.warn('Anthropic unavailable, backing off', { attempt, status, delay });
            await new Promise((resolve) => setTimeout(resolve, delay));
          }
          continue;
        }

        logger.error('Anthropic request rejected', { attempt, status, error: lastError.message });
        throw new BackendUnavailableError('complete', lastError, false);
      }
    }

    logger.error('Anthropic failed after retries', { attempts: maxAttempts, error: lastError.message });
    throw new BackendUnavailableError('complete', lastError);
  }
}
