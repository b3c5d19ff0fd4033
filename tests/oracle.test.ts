import { once } from 'node:events';
import express from 'express';
import { describe, expect, it } from 'vitest';
import { GeminiOracle, type GenerateContentClient } from '../services/geminiOracle.js';
import { OpenRouterOracle } from '../services/openRouterOracle.js';
import { DisabledOracle, OracleUnavailableError, parseConfidence, type OracleRequest } from '../services/oracle.js';
import { Sentinel } from '../services/sentinel.js';
import type { FetchFn } from '../utils/timeout.js';

const SCORING: OracleRequest = {
  system: 'Rate the message.',
  messages: [{ role: 'user', content: 'LATEST: pay now' }],
  json: true,
  temperature: 0,
};

describe('parseConfidence', () => {
  it('reads a JSON object with a reason', () => {
    expect(parseConfidence('{"confidence": 0.82, "reason": "threat"}')).toEqual({ confidence: 0.82, reason: 'threat' });
  });

  it('strips code fences and clamps out-of-range values', () => {
    expect(parseConfidence('```json\n{"confidence": 1.4}\n```').confidence).toBe(1);
  });

  it('accepts a bare number', () => {
    expect(parseConfidence(' 0.3 ')).toEqual({ confidence: 0.3 });
  });

  it('rejects prose as malformed', () => {
    expect(() => parseConfidence('Looks like a scam to me')).toThrow(OracleUnavailableError);
    try {
      parseConfidence('Looks like a scam to me');
    } catch (error) {
      expect(error).toMatchObject({ reason: 'malformed' });
    }
  });
});

describe('DisabledOracle', () => {
  it('always reports itself as not configured', async () => {
    await expect(new DisabledOracle().complete()).rejects.toMatchObject({ reason: 'not-configured' });
  });
});

function completion(content: unknown, status = 200): Response {
  return new Response(JSON.stringify({ choices: [{ message: { content } }] }), { status });
}

function openRouter(fetchFn: FetchFn, timeoutMs = 1000) {
  return new OpenRouterOracle({
    apiKey: 'test-key',
    model: 'test/model',
    baseUrl: 'https://llm.example/v1/chat/completions',
    timeoutMs,
    fetchFn,
  });
}

describe('OpenRouterOracle', () => {
  it('posts a chat completion with the system prompt and JSON mode', async () => {
    const calls: { url: string; init?: RequestInit }[] = [];
    const oracle = openRouter(async (url, init) => {
      calls.push({ url, init });
      return completion('{"confidence":0.7}');
    });

    expect(await oracle.complete(SCORING)).toBe('{"confidence":0.7}');

    expect(calls[0]?.url).toBe('https://llm.example/v1/chat/completions');
    const init = calls[0]?.init;
    expect(new Headers(init?.headers).get('Authorization')).toBe('Bearer test-key');
    const body = typeof init?.body === 'string' ? JSON.parse(init.body) : undefined;
    expect(body).toEqual({
      model: 'test/model',
      messages: [
        { role: 'system', content: 'Rate the message.' },
        { role: 'user', content: 'LATEST: pay now' },
      ],
      temperature: 0,
      response_format: { type: 'json_object' },
    });
  });

  it('maps HTTP 429 to rate-limit', async () => {
    const oracle = openRouter(async () => new Response('slow down', { status: 429 }));
    await expect(oracle.complete(SCORING)).rejects.toMatchObject({ reason: 'rate-limit' });
  });

  it('maps other HTTP failures to transport', async () => {
    const oracle = openRouter(async () => new Response('boom', { status: 502 }));
    await expect(oracle.complete(SCORING)).rejects.toMatchObject({
      reason: 'transport',
      message: 'AI API error [502]: boom',
    });
  });

  it('maps a network error to transport', async () => {
    const oracle = openRouter(async () => {
      throw new TypeError('fetch failed');
    });
    await expect(oracle.complete(SCORING)).rejects.toMatchObject({ reason: 'transport', message: 'fetch failed' });
  });

  it('maps an aborted request to timeout', async () => {
    const hanging: FetchFn = (_url, init) =>
      new Promise((_resolve, reject) => {
        init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
      });
    await expect(openRouter(hanging, 10).complete(SCORING)).rejects.toMatchObject({ reason: 'timeout' });
  });

  it('times out a response whose body stalls after the headers', async () => {
    const app = express();
    app.post('/v1/chat/completions', (_req, res) => {
      res.writeHead(200, { 'Content-Type': 'application/json' });
      res.write('{"choices":');
    });
    const server = app.listen(0, '127.0.0.1');
    await once(server, 'listening');
    try {
      const address = server.address();
      if (address === null || typeof address === 'string') throw new Error('server has no port');
      const oracle = new OpenRouterOracle({
        apiKey: 'test-key',
        model: 'test/model',
        baseUrl: `http://127.0.0.1:${address.port}/v1/chat/completions`,
        timeoutMs: 200,
      });

      await expect(oracle.complete(SCORING)).rejects.toMatchObject({ reason: 'timeout' });

      const evaluation = await new Sentinel(oracle).evaluate('Your bank account will be blocked today. Verify immediately.');
      expect(evaluation.degraded).toBe(true);
      expect(evaluation.isScam).toBe(true);
    } finally {
      server.closeAllConnections();
      server.close();
    }
  });

  it('treats a body without message content as malformed', async () => {
    const oracle = openRouter(async () => new Response(JSON.stringify({ choices: [] }), { status: 200 }));
    await expect(oracle.complete(SCORING)).rejects.toMatchObject({ reason: 'malformed' });
  });
});

type GenerateParams = Parameters<GenerateContentClient['models']['generateContent']>[0];

function fakeGemini(respond: (params: GenerateParams) => Promise<{ text?: string }>) {
  const calls: GenerateParams[] = [];
  const client: GenerateContentClient = {
    models: {
      generateContent: (params) => {
        calls.push(params);
        return respond(params);
      },
    },
  };
  return { client, calls };
}

describe('GeminiOracle', () => {
  const options = { apiKey: 'test-key', model: 'gemini-test', timeoutMs: 1000 };

  it('maps roles and passes the system instruction', async () => {
    const { client, calls } = fakeGemini(async () => ({ text: 'Which bank, beta?' }));
    const oracle = new GeminiOracle(options, client);

    const reply = await oracle.complete({
      system: 'You are Ramesh.',
      messages: [
        { role: 'user', content: 'Your account is blocked' },
        { role: 'assistant', content: 'Oh no' },
        { role: 'user', content: 'Send OTP' },
      ],
      temperature: 0.7,
    });

    expect(reply).toBe('Which bank, beta?');
    expect(calls[0]?.model).toBe('gemini-test');
    expect(calls[0]?.contents.map((c) => c.role)).toEqual(['user', 'model', 'user']);
    expect(calls[0]?.config).toEqual({ systemInstruction: 'You are Ramesh.', temperature: 0.7, responseMimeType: undefined });
  });

  it('requests JSON output for scoring', async () => {
    const { client, calls } = fakeGemini(async () => ({ text: '{"confidence":0.4}' }));
    await new GeminiOracle(options, client).complete(SCORING);
    expect(calls[0]?.config?.responseMimeType).toBe('application/json');
  });

  it('maps a 429 from the SDK to rate-limit', async () => {
    const { client } = fakeGemini(async () => {
      throw Object.assign(new Error('Resource exhausted'), { status: 429 });
    });
    await expect(new GeminiOracle(options, client).complete(SCORING)).rejects.toMatchObject({ reason: 'rate-limit' });
  });

  it('treats an empty response as malformed', async () => {
    const { client } = fakeGemini(async () => ({ text: '  ' }));
    await expect(new GeminiOracle(options, client).complete(SCORING)).rejects.toMatchObject({ reason: 'malformed' });
  });

  it('times out a call that never settles', async () => {
    const { client } = fakeGemini(() => new Promise(() => undefined));
    const oracle = new GeminiOracle({ ...options, timeoutMs: 10 }, client);
    await expect(oracle.complete(SCORING)).rejects.toMatchObject({ reason: 'timeout' });
  });
});
