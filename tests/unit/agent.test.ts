import { AgentService } from '../../src/services/agent.service';
import { ConversationOrchestrator } from '../../src/services/orchestrator.service';
import { SessionService } from '../../src/services/session.service';
import { BackendTimeoutError, BackendUnavailableError } from '../../src/utils/errors';
import { ScriptedBackend, makeDispatcher, reply } from '../helpers/fixtures';

jest.mock('../../src/utils/logger', () => ({
  logger: {
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

describe('AgentService', () => {
  let sessions: SessionService;

  function build(backend: ScriptedBackend): AgentService {
    sessions = new SessionService(60_000);
    const orchestrator = new ConversationOrchestrator(backend, makeDispatcher(), { systemPrompt: 'test prompt' });
    return new AgentService(orchestrator, sessions);
  }

  it('should answer a message and keep the session', async () => {
    const agent = build(new ScriptedBackend([reply('Welcome in!')]));

    const result = await agent.handleUserMessage('s-1', 'hello');

    expect(result).toEqual({ sessionId: 's-1', reply: 'Welcome in!', outcome: 'replied', toolCalls: 0 });
    expect(sessions.get('s-1')?.turns).toHaveLength(2);
  });

  it('should fall back on a backend timeout and keep the session usable', async () => {
    const agent = build(
      new ScriptedBackend([
        () => {
          throw new BackendTimeoutError('complete', new Error('Request timed out.'));
        },
        reply('Back now. A scratch on a small wood table starts at $28.'),
      ])
    );

    const failed = await agent.handleUserMessage('s-1', 'Can you fix a scratch?');

    expect(failed).toEqual({
      sessionId: 's-1',
      reply:
        "Sorry, I can't pull up repair estimates right this moment. Could you try again shortly? " +
        "You can also leave your name and email and we'll follow up.",
      outcome: 'backend_timeout',
      toolCalls: 0,
    });
    expect(sessions.get('s-1')?.turns.map((t) => t.role)).toEqual(['user']);
    expect(sessions.get('s-1')?.phase).toBe('AwaitingUserInput');

    const retried = await agent.handleUserMessage('s-1', 'Can you fix a scratch?');
    expect(retried.outcome).toBe('replied');
    expect(sessions.get('s-1')?.turns.map((t) => t.role)).toEqual(['user', 'user', 'model']);
  });

  it('should fall back when the backend is unavailable', async () => {
    const agent = build(
      new ScriptedBackend([
        () => {
          throw new BackendUnavailableError('complete', new Error('overloaded'));
        },
      ])
    );

    const result = await agent.handleUserMessage('s-1', 'How much is the sofa?');

    expect(result.outcome).toBe('backend_unavailable');
    expect(result.reply).toBe(
      "Sorry, I can't check our catalog right this moment. Please try again in a minute and I'll look that up for you."
    );
  });

  it('should propagate unexpected errors without blocking the session', async () => {
    const agent = build(
      new ScriptedBackend([
        () => {
          throw new Error('boom');
        },
        reply('All good.'),
      ])
    );

    await expect(agent.handleUserMessage('s-1', 'hi')).rejects.toThrow('boom');
    await expect(agent.handleUserMessage('s-1', 'hi again')).resolves.toMatchObject({ reply: 'All good.' });
  });

  it('should run turns of one session one after the other', async () => {
    const backend = new ScriptedBackend([
      async () => {
        await new Promise((resolve) => setTimeout(resolve, 20));
        return reply('first');
      },
      reply('second'),
    ]);
    const agent = build(backend);

    const [first, second] = await Promise.all([
      agent.handleUserMessage('s-1', 'one'),
      agent.handleUserMessage('s-1', 'two'),
    ]);

    expect(first.reply).toBe('first');
    expect(second.reply).toBe('second');
    expect(backend.requests[1].turns.map((t) => t.role)).toEqual(['user', 'model', 'user']);
    expect(sessions.get('s-1')?.turns.map((t) => t.role)).toEqual(['user', 'model', 'user', 'model']);
  });

  it('should not hold one session behind another', async () => {
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const agent = build(
      new ScriptedBackend([
        async () => {
          await gate;
          return reply('slow');
        },
        reply('fast'),
      ])
    );

    const slow = agent.handleUserMessage('s-1', 'one');
    const fast = await agent.handleUserMessage('s-2', 'two');

    expect(fast.reply).toBe('fast');
    release();
    expect((await slow).reply).toBe('slow');
  });

  it('should end sessions', async () => {
    const agent = build(new ScriptedBackend([reply('Hi!')]));
    await agent.handleUserMessage('s-1', 'hello');

    expect(agent.endSession('s-1')).toBe(true);
    expect(agent.endSession('s-1')).toBe(false);
    expect(sessions.size).toBe(0);
  });
});

describe('SessionService', () => {
  it('should expire idle sessions on the next access', () => {
    let now = new Date('2026-03-01T12:00:00.000Z');
    const sessions = new SessionService(1_000, () => now);

    sessions.getOrCreate('old');
    now = new Date('2026-03-01T12:00:05.000Z');
    sessions.getOrCreate('new');

    expect(sessions.get('old')).toBeUndefined();
    expect(sessions.size).toBe(1);
  });

  it('should not expire a session in the middle of a turn', () => {
    let now = new Date('2026-03-01T12:00:00.000Z');
    const sessions = new SessionService(1_000, () => now);

    sessions.getOrCreate('busy').phase = 'ToolCallPending';
    now = new Date('2026-03-01T12:00:05.000Z');
    sessions.getOrCreate('other');

    expect(sessions.get('busy')).toBeDefined();
  });
});
