jest.mock('../../src/config/env', () => ({
  env: {
    PORT: '3000',
    NODE_ENV: 'test',
    ANTHROPIC_API_KEY: 'test-key',
    ANTHROPIC_MODEL: 'test-model',
    REASONING_TIMEOUT_MS: 20000,
    MAX_TOOL_ITERATIONS: 5,
    SESSION_IDLE_TTL_MS: 3600000,
    DATA_DIR: './data',
    LOG_DIR: './logs',
  },
}));

jest.mock('../../src/utils/logger', () => ({
  logger: {
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

import http from 'http';
import { createApp } from '../../src';
import { AgentService } from '../../src/services/agent.service';
import { ConversationOrchestrator } from '../../src/services/orchestrator.service';
import { SessionService } from '../../src/services/session.service';
import { BackendTimeoutError } from '../../src/utils/errors';
import { ScriptedBackend, makeDispatcher, reply } from '../helpers/fixtures';

describe('Chat routes', () => {
  let server: http.Server;
  let baseUrl = '';

  beforeAll(async () => {
    const backend = new ScriptedBackend([
      (request) => {
        const last = request.turns[request.turns.length - 1];
        if (last?.role === 'user' && last.content.includes('timeout')) {
          throw new BackendTimeoutError('complete', new Error('Request timed out.'));
        }
        if (last?.role === 'user' && last.content.includes('crash')) {
          throw new Error('boom');
        }
        return reply('Hi there!');
      },
    ]);
    const orchestrator = new ConversationOrchestrator(backend, makeDispatcher(), { systemPrompt: 'test prompt' });
    const app = createApp(new AgentService(orchestrator, new SessionService(60_000)));

    server = await new Promise<http.Server>((resolve) => {
      const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
    });
    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('server is not listening on a TCP port');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
  });

  function postMessage(body: unknown) {
    return fetch(`${baseUrl}/api/chat/message`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
    });
  }

  it('should answer a chat message', async () => {
    const res = await postMessage({ session_id: 'web-1', message: 'hello' });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      success: true,
      session_id: 'web-1',
      reply: 'Hi there!',
      outcome: 'replied',
      tool_calls: 0,
    });
  });

  it('should reject a request without a message', async () => {
    const res = await postMessage({ session_id: 'web-1' });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ success: false, error: 'Required' });
  });

  it('should report a backend timeout as 503 with a fallback reply', async () => {
    const res = await postMessage({ session_id: 'web-2', message: 'timeout please' });

    expect(res.status).toBe(503);
    expect(await res.json()).toEqual({
      success: false,
      session_id: 'web-2',
      reply: "Sorry, I'm having trouble responding right now. Please send your message again in a moment.",
      outcome: 'backend_timeout',
      tool_calls: 0,
    });
  });

  it('should answer an unexpected failure with a plain 500', async () => {
    const res = await postMessage({ session_id: 'web-4', message: 'crash now' });

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({ success: false, error: 'boom' });
  });

  it('should end a session', async () => {
    await postMessage({ session_id: 'web-3', message: 'hello' });

    const res = await fetch(`${baseUrl}/api/chat/session/web-3`, { method: 'DELETE' });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ success: true, ended: true });
  });

  it('should report health', async () => {
    const res = await fetch(`${baseUrl}/health`);
    const body: unknown = await res.json();

    expect(res.status).toBe(200);
    expect(body).toMatchObject({ status: 'ok' });
  });
});
