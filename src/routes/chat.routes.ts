import { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { AgentService } from '../services/agent.service';
import { ValidationError } from '../utils/errors';

const chatMessageSchema = z.object({
  session_id: z.string().min(1).max(128),
  message: z.string().min(1).max(5000),
});

const BACKEND_FAILURES = new Set(['backend_timeout', 'backend_unavailable']);

export function createChatRouter(agentService: AgentService): Router {
  const router = Router();

  router.post('/message', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const parsed = chatMessageSchema.safeParse(req.body);
      if (!parsed.success) {
        throw new ValidationError(parsed.error.issues.map((i) => i.message).join(', '));
      }

      const result = await agentService.handleUserMessage(parsed.data.session_id, parsed.data.message);
      const failed = BACKEND_FAILURES.has(result.outcome);

      res.status(failed ? 503 : 200).json({
        success: !failed,
        session_id: result.sessionId,
        reply: result.reply,
        outcome: result.outcome,
        tool_calls: result.toolCalls,
      });
    } catch (error) {
      next(error);
    }
  });

  router.delete('/session/:sessionId', (req: Request, res: Response) => {
    const ended = agentService.endSession(String(req.params.sessionId));
    res.json({ success: true, ended });
  });

  return router;
}
