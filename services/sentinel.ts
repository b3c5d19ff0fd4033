import type { IntentEvaluation, Message, SignatureCategory, SignatureMatch } from '../types.js';
import { createLogger, errorMessage } from '../utils/logger.js';
import { type IntelligenceOracle, OracleUnavailableError, parseConfidence } from './oracle.js';
import { matchSignatures } from './patterns.js';

const logger = createLogger('sentinel');

export const DEFAULT_THRESHOLD = 0.65;
export const ORACLE_WEIGHT = 0.8;
export const RULE_WEIGHT = 0.4;
const CONTEXT_WINDOW = 6;

const CLASSIFIER_PROMPT = `You are a scam detection engine for SMS, WhatsApp and e-mail messages.
Judge whether the LATEST message attempts fraud or scam solicitation: phishing or credential theft,
KYC/verification fraud, bank or government impersonation, urgent payment requests, lottery, refund,
job or investment scams.
Legitimate messages get a confidence below 0.3.
Return JSON only: {"confidence": <number 0.0-1.0>, "reason": "<one short sentence>"}`;

/** Probabilistic OR over matched signature weights; stays within [0, 1] however many match. */
export function ruleScore(matches: SignatureMatch[]): number {
  const miss = matches.reduce((acc, match) => acc * (1 - match.weight), 1);
  return 1 - miss;
}

/**
 * Two-channel fusion. Either channel clearing the threshold on its own flags
 * the message; otherwise the boosted combination has to clear it.
 */
export function fuseScores(
  rule: number,
  oracle: number | null,
  threshold = DEFAULT_THRESHOLD,
): Pick<IntentEvaluation, 'confidence' | 'fusedScore' | 'isScam'> {
  if (oracle === null) {
    return { confidence: rule, fusedScore: rule, isScam: rule >= threshold };
  }
  const fusedScore = Math.min(1, ORACLE_WEIGHT * oracle + RULE_WEIGHT * rule);
  const confidence = Math.max(rule, oracle, fusedScore);
  return { confidence, fusedScore, isScam: confidence >= threshold };
}

function formatContext(context: Message[]): string {
  if (context.length === 0) return 'None';
  return context
    .slice(-CONTEXT_WINDOW)
    .map((m) => `${m.sender === 'scammer' ? 'SENDER' : 'RECIPIENT'}: ${m.text}`)
    .join('\n');
}

export interface SentinelOptions {
  threshold?: number;
}

export class Sentinel {
  readonly threshold: number;

  constructor(
    private readonly oracle: IntelligenceOracle,
    options: SentinelOptions = {},
  ) {
    this.threshold = options.threshold ?? DEFAULT_THRESHOLD;
  }

  /** Rule channel only; no oracle call. */
  evaluateRules(text: string): IntentEvaluation {
    const matches = matchSignatures(text);
    const rule = ruleScore(matches);
    return {
      ...fuseScores(rule, null, this.threshold),
      ruleScore: rule,
      oracleScore: null,
      matches,
      categories: categoriesOf(matches),
      reason: matches.length > 0 ? `Matched ${matches.map((m) => m.id).join(', ')}` : 'No scam signatures matched',
      degraded: false,
    };
  }

  async evaluate(text: string, context: Message[] = [], sessionId?: string): Promise<IntentEvaluation> {
    const started = Date.now();
    const rules = this.evaluateRules(text);

    let oracleScore: number | null = null;
    let reason = rules.reason;
    try {
      const raw = await this.oracle.complete({
        system: CLASSIFIER_PROMPT,
        messages: [
          {
            role: 'user',
            content: `Earlier messages:\n${formatContext(context)}\n\nLATEST: "${text.slice(0, 4000)}"\n\nPre-detected signals: ${
              rules.categories.join(', ') || 'none'
            }`,
          },
        ],
        json: true,
        temperature: 0,
      });
      const parsed = parseConfidence(raw);
      oracleScore = parsed.confidence;
      reason = parsed.reason ?? reason;
    } catch (error) {
      const cause = error instanceof OracleUnavailableError ? error.reason : 'unexpected';
      logger.warn(`Oracle scoring unavailable (${cause}): ${errorMessage(error)}. Using rule score alone`, sessionId);
    }

    const evaluation: IntentEvaluation = {
      ...rules,
      ...fuseScores(rules.ruleScore, oracleScore, this.threshold),
      oracleScore,
      reason,
      degraded: oracleScore === null,
    };

    logger.trace(
      `rule=${evaluation.ruleScore.toFixed(2)} oracle=${oracleScore?.toFixed(2) ?? 'n/a'} ` +
        `confidence=${evaluation.confidence.toFixed(2)} scam=${evaluation.isScam}`,
      sessionId,
      Date.now() - started,
    );
    return evaluation;
  }
}

function categoriesOf(matches: SignatureMatch[]): SignatureCategory[] {
  return [...new Set(matches.map((m) => m.category))];
}
