import type { FinalReport, Session } from '../types.js';
import type { KeyedMutex } from '../utils/keyedMutex.js';
import { createLogger, errorMessage } from '../utils/logger.js';
import { RetryExhaustedError, retryWithBackoff } from '../utils/retry.js';
import { fetchWithTimeout, type FetchFn } from '../utils/timeout.js';
import { snapshot } from './intelligence.js';
import type { SessionStore } from './sessionStore.js';
import { summarizeSession } from './summary.js';

const logger = createLogger('reporter');

export class ReportDeliveryError extends Error {
  constructor(
    message: string,
    readonly status?: number,
  ) {
    super(message);
    this.name = 'ReportDeliveryError';
  }
}

export type DispatchResult =
  | { delivered: true; attempts: number }
  | { delivered: false; attempts: number; error: string }
  | { delivered: false; skipped: 'already-sent' | 'not-concluding' | 'unknown-session' };

export interface ReporterOptions {
  callbackUrl: string;
  timeoutMs: number;
  maxAttempts: number;
  baseDelayMs: number;
  fetchFn?: FetchFn;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

/** Client errors other than 408 and 429 will not change on a resend. */
export function isTransientDeliveryError(error: unknown): boolean {
  if (!(error instanceof ReportDeliveryError) || error.status === undefined) return true;
  return error.status >= 500 || error.status === 408 || error.status === 429;
}

export function buildFinalReport(session: Session): FinalReport {
  return {
    sessionId: session.sessionId,
    scamDetected: session.scamDetected,
    totalMessagesExchanged: session.messages.length,
    extractedIntelligence: snapshot(session.intel),
    agentNotes: summarizeSession(session),
  };
}

/**
 * Delivers one Final Report per session. A session is closed only after the
 * evaluation endpoint confirms with a 2xx; exhausted retries leave it in
 * CONCLUDING for the next inbound event or maintenance tick.
 */
export class ReportingDispatcher {
  private inFlight = new Map<string, Promise<DispatchResult>>();

  constructor(
    private readonly store: SessionStore,
    private readonly mutex: KeyedMutex,
    private readonly options: ReporterOptions,
  ) {}

  finalize(sessionId: string): Promise<DispatchResult> {
    const existing = this.inFlight.get(sessionId);
    if (existing) return existing;

    const run = this.dispatch(sessionId).finally(() => {
      this.inFlight.delete(sessionId);
    });
    this.inFlight.set(sessionId, run);
    return run;
  }

  async flush(): Promise<void> {
    await Promise.allSettled([...this.inFlight.values()]);
  }

  private async dispatch(sessionId: string): Promise<DispatchResult> {
    const prepared = await this.mutex.runExclusive(sessionId, () => {
      const session = this.store.get(sessionId);
      if (!session) return 'unknown-session' as const;
      if (session.reportSent) return 'already-sent' as const;
      if (session.status !== 'CONCLUDING') return 'not-concluding' as const;
      return buildFinalReport(session);
    });

    if (typeof prepared === 'string') {
      return { delivered: false, skipped: prepared };
    }

    let outcome: DispatchResult;
    try {
      const { attempts } = await retryWithBackoff(() => this.deliver(prepared), {
        maxAttempts: this.options.maxAttempts,
        initialDelayMs: this.options.baseDelayMs,
        sleep: this.options.sleep,
        shouldRetry: isTransientDeliveryError,
        onRetry: (error, attempt, delayMs) =>
          logger.warn(
            `Report delivery attempt ${attempt}/${this.options.maxAttempts} failed: ${errorMessage(error)}. Retrying in ${delayMs}ms`,
            sessionId,
          ),
      });
      outcome = { delivered: true, attempts };
    } catch (error) {
      const attempts = error instanceof RetryExhaustedError ? error.attempts : this.options.maxAttempts;
      const cause = error instanceof RetryExhaustedError ? error.lastError : error;
      outcome = { delivered: false, attempts, error: errorMessage(cause) };
    }

    await this.mutex.runExclusive(sessionId, () => {
      const session = this.store.get(sessionId);
      if (session && 'attempts' in outcome) {
        session.reportAttempts += outcome.attempts;
      }
      if (outcome.delivered) {
        if (session) {
          session.reportSent = true;
          session.status = 'CLOSED';
          session.lastReportError = undefined;
        }
        this.store.retire(sessionId, (this.options.now ?? Date.now)());
      } else if (session && 'error' in outcome) {
        session.lastReportError = outcome.error;
      }
    });

    if (outcome.delivered) {
      logger.info(
        `✅ Final report delivered (${prepared.totalMessagesExchanged} messages, attempt ${outcome.attempts})`,
        sessionId,
      );
    } else if ('error' in outcome) {
      logger.error(
        `🚨 Report delivery exhausted after ${outcome.attempts} attempts: ${outcome.error}. Session held in CONCLUDING`,
        sessionId,
      );
    }
    return outcome;
  }

  private async deliver(report: FinalReport): Promise<void> {
    const status = await fetchWithTimeout(
      this.options.callbackUrl,
      {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(report),
      },
      this.options.timeoutMs,
      async (response) => {
        await response.text();
        return response.status;
      },
      this.options.fetchFn,
    );

    if (status < 200 || status > 299) {
      throw new ReportDeliveryError(`Evaluation endpoint returned ${status}`, status);
    }
  }
}
