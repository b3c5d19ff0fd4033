import { loadConfig, type AppConfig } from '../config.js';
import { buildHoneypot, type Honeypot, type HoneypotOverrides } from '../services/honeypot.js';
import { type IntelligenceOracle, type OracleRequest, OracleUnavailableError } from '../services/oracle.js';
import type { FinalReport, HoneypotEvent, Message } from '../types.js';
import type { FetchFn } from '../utils/timeout.js';

/**
 * In-process oracle. Scoring requests (JSON mode) get `score`, persona
 * requests get the next scripted reply. `null` simulates an outage.
 */
export class ScriptedOracle implements IntelligenceOracle {
  readonly name = 'scripted';
  readonly requests: OracleRequest[] = [];
  score: number | null;
  replies: string[];

  constructor(options: { score?: number | null; replies?: string[] } = {}) {
    this.score = options.score === undefined ? 0.9 : options.score;
    this.replies = options.replies ?? ['Oh dear, which bank are you calling from?'];
  }

  async complete(request: OracleRequest): Promise<string> {
    this.requests.push(request);
    if (request.json) {
      if (this.score === null) throw new OracleUnavailableError('timeout', 'scripted outage');
      return JSON.stringify({ confidence: this.score, reason: 'scripted' });
    }
    const reply = this.replies.shift();
    if (reply === undefined) throw new OracleUnavailableError('transport', 'no scripted reply left');
    return reply;
  }

  get replyRequests(): OracleRequest[] {
    return this.requests.filter((r) => !r.json);
  }
}

export class DownOracle implements IntelligenceOracle {
  readonly name = 'down';
  calls = 0;

  async complete(): Promise<string> {
    this.calls++;
    throw new OracleUnavailableError('timeout', 'oracle timed out');
  }
}

/** Records callback posts and answers with the queued statuses (200 once the queue is empty). */
export function createCallbackRecorder(statuses: number[] = []) {
  const reports: FinalReport[] = [];
  const queue = [...statuses];
  const fetchFn: FetchFn = async (_url, init) => {
    const body = typeof init?.body === 'string' ? init.body : '{}';
    reports.push(JSON.parse(body));
    const status = queue.shift() ?? 200;
    return new Response(status === 200 ? '{"status":"ok"}' : 'error', { status });
  };
  return { reports, fetchFn };
}

export function testConfig(env: Record<string, string> = {}): AppConfig {
  return loadConfig({
    AUTH_KEY: 'test-secret',
    API_KEY: 'test-key',
    CALLBACK_URL: 'https://evaluator.example/report',
    REPORT_BACKOFF_MS: '0',
    REPORT_MAX_ATTEMPTS: '3',
    ...env,
  });
}

export function testHoneypot(
  overrides: HoneypotOverrides & { env?: Record<string, string> } = {},
): Honeypot & { config: AppConfig } {
  const { env, ...rest } = overrides;
  const config = testConfig(env);
  const honeypot = buildHoneypot(config, { sleep: async () => undefined, ...rest });
  return { ...honeypot, config };
}

let clock = Date.parse('2026-03-01T10:00:00.000Z');

export function scammer(text: string, timestamp?: string): Message {
  clock += 60_000;
  return { sender: 'scammer', text, timestamp: timestamp ?? new Date(clock).toISOString() };
}

export function agent(text: string, timestamp?: string): Message {
  clock += 60_000;
  return { sender: 'user', text, timestamp: timestamp ?? new Date(clock).toISOString() };
}

export function event(sessionId: string, message: Message, conversationHistory: Message[] = []): HoneypotEvent {
  return { sessionId, message, conversationHistory };
}
