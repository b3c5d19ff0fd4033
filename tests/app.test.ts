import { once } from 'node:events';
import type { Server } from 'node:http';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { createApp } from '../app.js';
import { RateLimiter } from '../utils/rateLimit.js';
import { ScriptedOracle, testHoneypot } from './helpers.js';

let server: Server | undefined;

afterEach(async () => {
  if (!server) return;
  const closing = server;
  server = undefined;
  closing.closeAllConnections();
  await new Promise<void>((resolve, reject) => closing.close((error) => (error ? reject(error) : resolve())));
});

async function start(options: { honeypot?: ReturnType<typeof testHoneypot>; limiter?: RateLimiter } = {}) {
  const hp = options.honeypot ?? testHoneypot({ oracle: new ScriptedOracle() });
  const app = createApp({ honeypot: hp, config: hp.config, rateLimiter: options.limiter });
  server = app.listen(0, '127.0.0.1');
  await once(server, 'listening');
  const address = server.address();
  if (address === null || typeof address === 'string') throw new Error('server has no port');
  const base = `http://127.0.0.1:${address.port}`;

  const post = (path: string, body: unknown, headers: Record<string, string> = { 'x-api-key': 'test-secret' }) =>
    fetch(`${base}${path}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', ...headers },
      body: typeof body === 'string' ? body : JSON.stringify(body),
    });
  return { hp, base, post };
}

const SCAM_EVENT = {
  sessionId: 'http-session',
  message: {
    sender: 'scammer',
    text: 'Your bank account will be blocked today. Verify immediately.',
    timestamp: 1772359200000,
  },
  conversationHistory: [],
  metadata: { channel: 'SMS', language: 'English', locale: 'IN' },
};

describe('POST /honeypot', () => {
  it('answers a scam message in character', async () => {
    const { post, hp } = await start();

    const res = await post('/honeypot', SCAM_EVENT);

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: 'success', reply: 'Oh dear, which bank are you calling from?' });
    expect(hp.store.get('http-session')?.status).toBe('ENGAGED');
  });

  it('returns status only while monitoring', async () => {
    const { post } = await start({ honeypot: testHoneypot({ oracle: new ScriptedOracle({ score: 0.1 }) }) });

    const res = await post('/scam-event', {
      sessionId: 'quiet',
      message: { sender: 'scammer', text: 'Hello, is this the Sharma residence?', timestamp: 1772359200000 },
    });

    expect(await res.json()).toEqual({ status: 'success' });
  });

  it('rejects a wrong API key', async () => {
    const { post, hp } = await start();

    const res = await post('/honeypot', SCAM_EVENT, { 'x-api-key': 'wrong' });

    expect(res.status).toBe(401);
    expect(await res.json()).toEqual({ status: 'error', error: 'Unauthorized access' });
    expect(hp.store.size()).toBe(0);
  });

  it('rejects an event without a session id', async () => {
    const { post } = await start();

    const res = await post('/honeypot', { message: SCAM_EVENT.message });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      status: 'error',
      error: 'Validation failed',
      details: ['sessionId: Required'],
    });
  });

  it('rejects malformed JSON', async () => {
    const { post } = await start();

    const res = await post('/honeypot', '{"sessionId": ');

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ status: 'error', error: 'Validation failed', details: ['body: malformed JSON'] });
  });

  it('rate limits a client before checking auth', async () => {
    const { post } = await start({ limiter: new RateLimiter(2, 60_000) });

    await post('/honeypot', {}, {});
    await post('/honeypot', {}, {});
    const res = await post('/honeypot', SCAM_EVENT);

    expect(res.status).toBe(429);
    expect(await res.json()).toEqual({ status: 'error', error: 'Too many requests. Please slow down.' });
  });

  it('hides internal failures behind a 500', async () => {
    const { post, hp } = await start();
    vi.spyOn(hp.actor, 'handle').mockRejectedValue(new Error('store offline'));

    const res = await post('/honeypot', SCAM_EVENT);

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({ status: 'error', error: 'Internal error. Please retry.' });
  });
});

describe('GET /health', () => {
  it('reports liveness and session counts', async () => {
    const { base, post } = await start();
    await post('/honeypot', SCAM_EVENT);

    const res = await fetch(`${base}/health`);
    const body = await res.json();

    expect(res.status).toBe(200);
    expect(body).toMatchObject({ status: 'ok', sessions_active: 1, sessions_retired: 0, api_configured: true });
  });
});
