import { ToolCallRequest, ToolCallResult, ToolContext, ToolSchema } from '../types/tools';
import { errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';
import { ToolRegistry } from './tools/registry';

/**
 * Single entry point for tool execution. Every outcome, including a handler
 * crash, comes back as a ToolCallResult; nothing thrown by a handler reaches
 * the conversation loop.
 */
export class ToolDispatcher {
  constructor(private readonly registry: ToolRegistry) {}

  schemas(): ToolSchema[] {
    return this.registry.schemas();
  }

  async dispatch(request: ToolCallRequest, context: ToolContext): Promise<ToolCallResult> {
    const tool = this.registry.get(request.name);
    if (!tool) {
      logger.warn('Unknown tool requested', { tool: request.name, sessionId: context.sessionId });
      return {
        ok: false,
        error: 'UnknownTool',
        message: `Unknown tool "${request.name}". Available tools: ${this.registry.names().join(', ')}.`,
      };
    }

    const bound = tool.bind(request.arguments, context);
    if (!bound.ok) {
      logger.warn('Tool call rejected: invalid arguments', {
        tool: request.name,
        issues: bound.issues,
        sessionId: context.sessionId,
      });
      return {
        ok: false,
        error: 'InvalidArguments',
        message: `Invalid arguments for ${request.name}: ${bound.issues.join('; ')}`,
        details: { issues: bound.issues },
      };
    }

    const started = Date.now();
    try {
      const result = await bound.run();
      logger.info('Tool executed', {
        tool: request.name,
        ok: result.ok,
        error: result.ok ? undefined : result.error,
        durationMs: Date.now() - started,
        sessionId: context.sessionId,
      });
      return result;
    } catch (error) {
      logger.error('Tool handler failed', {
        tool: request.name,
        error: errorMessage(error),
        sessionId: context.sessionId,
      });
      return {
        ok: false,
        error: 'HandlerFailure',
        message: `The ${request.name} tool hit an internal error and did not complete. Apologize and offer another way to help.`,
      };
    }
  }
}
