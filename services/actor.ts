import type { HoneypotEvent, HoneypotReply, IntentEvaluation, Message, Session } from '../types.js';
import type { KeyedMutex } from '../utils/keyedMutex.js';
import { createLogger, errorMessage } from '../utils/logger.js';
import { absorb, countArtifacts, createBundle, describeDelta, hasHardArtifacts, isEmpty, snapshot } from './intelligence.js';
import type { IntelligenceOracle } from './oracle.js';
import { buildReplyRequest, CANNED_REPLIES, cleanReply, NEUTRAL_REPLIES, pickRotating } from './persona.js';
import type { ReportingDispatcher } from './reporter.js';
import type { Sentinel } from './sentinel.js';
import type { SessionStore } from './sessionStore.js';

const logger = createLogger('actor');

export type MonitoringReply = 'silent' | 'neutral';

export interface EngagementPolicy {
  /** Qualifying turns required before a session may conclude. */
  minTurns: number;
  /** Qualifying turns after which a session concludes even without hard artifacts. */
  maxTurns: number;
}

export const DEFAULT_POLICY: EngagementPolicy = { minTurns: 3, maxTurns: 10 };

export interface ActorOptions {
  policy?: EngagementPolicy;
  monitoringReply?: MonitoringReply;
  /** Inactivity bound after which a session is concluded or evicted. */
  sessionTtlMs?: number;
  /** How long a delivered session id stays retired after eviction. */
  retiredTtlMs?: number;
  now?: () => number;
}

export interface ActorDeps {
  store: SessionStore;
  mutex: KeyedMutex;
  sentinel: Sentinel;
  oracle: IntelligenceOracle;
  reporter: ReportingDispatcher;
}

export interface SweepResult {
  evicted: number;
  dispatched: number;
  prunedRetired: number;
}

interface TurnOutcome {
  reply?: string;
  dispatch: boolean;
}

export function messageKey(message: Message): string {
  return `${message.sender}\u0000${message.timestamp}\u0000${message.text}`;
}

export function createSession(sessionId: string, now: number): Session {
  return {
    sessionId,
    messages: [],
    seen: new Set(),
    unconfirmedReplies: [],
    repliesByMessage: new Map(),
    status: 'NEW',
    scamDetected: false,
    peakConfidence: 0,
    qualifyingTurns: 0,
    tactics: new Set(),
    intel: createBundle(),
    reportSent: false,
    reportAttempts: 0,
    cannedReplyCursor: 0,
    updatedAt: now,
  };
}

export function isPolicySatisfied(session: Session, policy: EngagementPolicy): boolean {
  if (session.qualifyingTurns < policy.minTurns) return false;
  return hasHardArtifacts(session.intel) || session.qualifyingTurns >= policy.maxTurns;
}

/**
 * Owns every session's lifecycle:
 * NEW → MONITORING → ENGAGED → CONCLUDING → CLOSED.
 *
 * Each turn runs inside the session's exclusive section, oracle calls
 * included; report dispatch happens after the section is released.
 */
export class Actor {
  private readonly policy: EngagementPolicy;
  private readonly monitoringReply: MonitoringReply;
  private readonly sessionTtlMs: number;
  private readonly retiredTtlMs: number;
  private readonly now: () => number;

  constructor(
    private readonly deps: ActorDeps,
    options: ActorOptions = {},
  ) {
    this.policy = options.policy ?? DEFAULT_POLICY;
    this.monitoringReply = options.monitoringReply ?? 'silent';
    this.sessionTtlMs = options.sessionTtlMs ?? 60 * 60 * 1000;
    this.retiredTtlMs = options.retiredTtlMs ?? 24 * 60 * 60 * 1000;
    this.now = options.now ?? Date.now;
  }

  async handle(event: HoneypotEvent): Promise<HoneypotReply> {
    const outcome = await this.deps.mutex.runExclusive(event.sessionId, () => this.processTurn(event));

    if (outcome.dispatch) {
      this.scheduleDispatch(event.sessionId);
    }
    return outcome.reply ? { status: 'success', reply: outcome.reply } : { status: 'success' };
  }

  /** Concludes idle engagements, re-dispatches pending reports and evicts finished sessions. */
  async sweep(): Promise<SweepResult> {
    const now = this.now();
    const pending: string[] = [];
    let evicted = 0;

    for (const [sessionId] of [...this.deps.store.entries()]) {
      await this.deps.mutex.runExclusive(sessionId, () => {
        const session = this.deps.store.get(sessionId);
        if (!session) return;
        const idle = now - session.updatedAt > this.sessionTtlMs;

        switch (session.status) {
          case 'CLOSED':
            this.deps.store.retire(sessionId, now);
            this.deps.store.delete(sessionId);
            evicted++;
            break;
          case 'CONCLUDING':
            pending.push(sessionId);
            break;
          case 'ENGAGED':
            if (idle) {
              session.status = 'CONCLUDING';
              logger.info('Engagement went idle, concluding', sessionId);
              pending.push(sessionId);
            }
            break;
          default:
            if (idle) {
              this.deps.store.delete(sessionId);
              evicted++;
            }
        }
      });
    }

    const prunedRetired = this.deps.store.pruneRetired(now - this.retiredTtlMs);
    await Promise.all(pending.map((sessionId) => this.deps.reporter.finalize(sessionId)));
    return { evicted, dispatched: pending.length, prunedRetired };
  }

  private scheduleDispatch(sessionId: string): void {
    this.deps.reporter.finalize(sessionId).catch((error: unknown) => {
      logger.error(`Report dispatch crashed: ${errorMessage(error)}`, sessionId);
    });
  }

  private async processTurn(event: HoneypotEvent): Promise<TurnOutcome> {
    const { sessionId } = event;
    const now = this.now();
    const existing = this.deps.store.get(sessionId);

    if (existing?.status === 'CLOSED') {
      // Reported: stay in character, change nothing.
      const stored = existing.repliesByMessage.get(messageKey(event.message));
      if (stored !== undefined) return { reply: stored, dispatch: false };
      return { reply: await this.statelessReply(event, existing.intel), dispatch: false };
    }
    if (!existing && this.deps.store.isRetired(sessionId)) {
      return { reply: await this.statelessReply(event, createBundle()), dispatch: false };
    }

    const session = existing ?? createSession(sessionId, now);
    if (!existing) {
      this.deps.store.set(session);
      logger.info('New session', sessionId);
    }

    const fresh = this.reconcile(session, [...event.conversationHistory, event.message]);
    const currentKey = messageKey(event.message);
    const currentIsNew = fresh.includes(event.message);

    if (fresh.length > 0) {
      session.updatedAt = now;
    }

    if (!currentIsNew) {
      if (fresh.length > 0) {
        await this.scoreMessages(session, fresh, event.message);
        this.advance(session);
      }
      return {
        reply: session.repliesByMessage.get(currentKey),
        dispatch: session.status === 'CONCLUDING' && !session.reportSent,
      };
    }

    await this.scoreMessages(session, fresh, event.message);
    this.advance(session);

    let reply: string | undefined;
    if (event.message.sender === 'scammer') {
      reply = await this.replyFor(session, now);
      if (reply !== undefined) {
        session.repliesByMessage.set(currentKey, reply);
      }
    }

    return { reply, dispatch: session.status === 'CONCLUDING' && !session.reportSent };
  }

  /**
   * Appends messages the session has not absorbed yet and returns them.
   * Our own replies come back re-stamped by the platform, so an unmatched
   * agent message adopts the earliest unconfirmed reply with the same text.
   */
  private reconcile(session: Session, incoming: Message[]): Message[] {
    const fresh: Message[] = [];

    for (const message of incoming) {
      const key = messageKey(message);
      if (session.seen.has(key)) continue;

      if (message.sender === 'user') {
        const pendingIndex = session.unconfirmedReplies.findIndex((i) => session.messages[i]?.text === message.text);
        if (pendingIndex !== -1) {
          session.unconfirmedReplies.splice(pendingIndex, 1);
          session.seen.add(key);
          continue;
        }
      }

      session.seen.add(key);
      session.messages.push(message);
      fresh.push(message);
    }

    if (fresh.length === 0 && incoming.length > 0) {
      logger.trace(`Skipped ${incoming.length} replayed message(s)`, session.sessionId);
    }
    return fresh;
  }

  /**
   * History messages get the rule channel only; the current message also
   * consults the oracle. Artifacts are collected once the session is a scam.
   */
  private async scoreMessages(session: Session, fresh: Message[], current: Message): Promise<void> {
    const wasScam = session.scamDetected;

    for (const message of fresh) {
      if (message.sender !== 'scammer') continue;

      const evaluation =
        message === current
          ? await this.deps.sentinel.evaluate(message.text, this.contextBefore(session, message), session.sessionId)
          : this.deps.sentinel.evaluateRules(message.text);
      this.recordEvaluation(session, evaluation);

      if (wasScam) {
        this.absorbInto(session, message.text);
      }
    }

    if (session.scamDetected && !wasScam) {
      // First detection: harvest everything the counterparty has said so far.
      for (const message of session.messages) {
        if (message.sender === 'scammer') this.absorbInto(session, message.text);
      }
    }
  }

  private recordEvaluation(session: Session, evaluation: IntentEvaluation): void {
    session.peakConfidence = Math.max(session.peakConfidence, evaluation.confidence);
    if (!evaluation.isScam) return;

    session.scamDetected = true;
    session.qualifyingTurns++;
    for (const category of evaluation.categories) {
      session.tactics.add(category);
    }
    logger.info(
      `Scam intent confidence=${evaluation.confidence.toFixed(2)}${evaluation.degraded ? ' (rules only)' : ''} ` +
        `turns=${session.qualifyingTurns}`,
      session.sessionId,
    );
  }

  private absorbInto(session: Session, text: string): void {
    const delta = absorb(session.intel, text);
    if (!isEmpty(delta)) {
      logger.info(`🕵️ New intelligence: ${describeDelta(delta)}`, session.sessionId);
    }
  }

  private advance(session: Session): void {
    const before = session.status;

    if ((session.status === 'NEW' || session.status === 'MONITORING') && session.scamDetected) {
      session.status = 'ENGAGED';
    } else if (session.status === 'NEW') {
      session.status = 'MONITORING';
    }

    if (session.status === 'ENGAGED' && isPolicySatisfied(session, this.policy)) {
      session.status = 'CONCLUDING';
    }

    if (session.status !== before) {
      logger.info(
        `${before} → ${session.status} (turns=${session.qualifyingTurns}, artifacts=${countArtifacts(session.intel)})`,
        session.sessionId,
      );
    }
  }

  private async replyFor(session: Session, now: number): Promise<string | undefined> {
    if (session.status === 'MONITORING' || session.status === 'NEW') {
      if (this.monitoringReply === 'silent') return undefined;
      const text = pickRotating(NEUTRAL_REPLIES, session.messages.length);
      this.appendReply(session, text, now);
      return text;
    }

    const reply = await this.generateReply(session.sessionId, session.messages, session.intel, session.cannedReplyCursor);
    if (reply.canned) {
      session.cannedReplyCursor++;
    }
    this.appendReply(session, reply.text, now);
    return reply.text;
  }

  private async statelessReply(event: HoneypotEvent, intel: Session['intel']): Promise<string> {
    const transcript = [...event.conversationHistory, event.message];
    const reply = await this.generateReply(event.sessionId, transcript, intel, transcript.length);
    return reply.text;
  }

  private appendReply(session: Session, text: string, now: number): void {
    const message: Message = { sender: 'user', text, timestamp: new Date(now).toISOString() };
    session.messages.push(message);
    session.seen.add(messageKey(message));
    session.unconfirmedReplies.push(session.messages.length - 1);
  }

  private async generateReply(
    sessionId: string,
    messages: Message[],
    intel: Session['intel'],
    cannedCursor: number,
  ): Promise<{ text: string; canned: boolean }> {
    const started = Date.now();
    try {
      const raw = await this.deps.oracle.complete(buildReplyRequest(messages, snapshot(intel)));
      const text = cleanReply(raw);
      if (text) {
        logger.trace('Persona reply generated', sessionId, Date.now() - started);
        return { text, canned: false };
      }
      logger.warn('Oracle returned an empty reply, using canned reply', sessionId);
    } catch (error) {
      logger.warn(`Reply generation failed: ${errorMessage(error)}. Using canned reply`, sessionId);
    }
    return { text: pickRotating(CANNED_REPLIES, cannedCursor), canned: true };
  }

  private contextBefore(session: Session, message: Message): Message[] {
    const index = session.messages.lastIndexOf(message);
    return index === -1 ? session.messages : session.messages.slice(0, index);
  }
}
