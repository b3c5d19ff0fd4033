import type { AppConfig } from '../config.js';
import { KeyedMutex } from '../utils/keyedMutex.js';
import type { FetchFn } from '../utils/timeout.js';
import { Actor } from './actor.js';
import { GeminiOracle } from './geminiOracle.js';
import { OpenRouterOracle } from './openRouterOracle.js';
import { DisabledOracle, type IntelligenceOracle } from './oracle.js';
import { ReportingDispatcher } from './reporter.js';
import { Sentinel } from './sentinel.js';
import { InMemorySessionStore, type SessionStore } from './sessionStore.js';

export interface Honeypot {
  actor: Actor;
  reporter: ReportingDispatcher;
  store: SessionStore;
  oracle: IntelligenceOracle;
}

export interface HoneypotOverrides {
  oracle?: IntelligenceOracle;
  store?: SessionStore;
  /** Transport for report callbacks. */
  fetchFn?: FetchFn;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

export function createOracle(config: AppConfig['ai']): IntelligenceOracle {
  if (!config.apiKey) {
    return new DisabledOracle();
  }
  if (config.provider === 'gemini') {
    return new GeminiOracle({ apiKey: config.apiKey, model: config.model, timeoutMs: config.timeoutMs });
  }
  return new OpenRouterOracle({
    apiKey: config.apiKey,
    model: config.model,
    baseUrl: config.baseUrl,
    timeoutMs: config.timeoutMs,
  });
}

/** Wires the detection-and-engagement pipeline from config. */
export function buildHoneypot(config: AppConfig, overrides: HoneypotOverrides = {}): Honeypot {
  const store = overrides.store ?? new InMemorySessionStore();
  const mutex = new KeyedMutex();
  const oracle = overrides.oracle ?? createOracle(config.ai);

  const reporter = new ReportingDispatcher(store, mutex, {
    callbackUrl: config.report.callbackUrl,
    timeoutMs: config.report.timeoutMs,
    maxAttempts: config.report.maxAttempts,
    baseDelayMs: config.report.backoffMs,
    fetchFn: overrides.fetchFn,
    sleep: overrides.sleep,
    now: overrides.now,
  });

  const sentinel = new Sentinel(oracle, { threshold: config.detection.threshold });

  const actor = new Actor(
    { store, mutex, sentinel, oracle, reporter },
    {
      policy: { minTurns: config.engagement.minTurns, maxTurns: config.engagement.maxTurns },
      monitoringReply: config.engagement.monitoringReply,
      sessionTtlMs: config.engagement.sessionTtlMs,
      retiredTtlMs: config.engagement.retiredTtlMs,
      now: overrides.now,
    },
  );

  return { actor, reporter, store, oracle };
}
