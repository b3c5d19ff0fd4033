export type OracleRole = 'user' | 'assistant';

export interface OracleTurn {
  role: OracleRole;
  content: string;
}

export interface OracleRequest {
  system: string;
  messages: OracleTurn[];
  /** Ask the backend for a JSON object response. */
  json?: boolean;
  temperature?: number;
}

/** Opaque text-completion collaborator used for both scoring and persona replies. */
export interface IntelligenceOracle {
  readonly name: string;
  complete(request: OracleRequest): Promise<string>;
}

export type OracleFailure = 'timeout' | 'rate-limit' | 'malformed' | 'transport' | 'not-configured';

export class OracleUnavailableError extends Error {
  constructor(
    readonly reason: OracleFailure,
    message: string,
  ) {
    super(message);
    this.name = 'OracleUnavailableError';
  }
}

/** Stand-in used when no API key is configured; every call degrades to the fallback path. */
export class DisabledOracle implements IntelligenceOracle {
  readonly name = 'disabled';

  async complete(): Promise<string> {
    throw new OracleUnavailableError('not-configured', 'API_KEY is not configured');
  }
}

/**
 * Pulls a confidence out of a scoring reply. Accepts `{"confidence": 0.8}`,
 * fenced JSON, or a bare number; out-of-range values are clamped.
 */
export function parseConfidence(raw: string): { confidence: number; reason?: string } {
  const cleaned = raw.replace(/```(?:json)?/gi, '').trim();

  let parsed: unknown;
  try {
    parsed = JSON.parse(cleaned);
  } catch {
    parsed = undefined;
  }

  if (typeof parsed === 'number') {
    return { confidence: clamp01(parsed) };
  }
  if (parsed !== null && typeof parsed === 'object' && 'confidence' in parsed) {
    const value = Number(parsed.confidence);
    if (Number.isFinite(value)) {
      const reason = 'reason' in parsed && typeof parsed.reason === 'string' ? parsed.reason : undefined;
      return { confidence: clamp01(value), reason };
    }
  }

  const bare = /^(-?\d+(?:\.\d+)?)$/.exec(cleaned);
  if (bare?.[1] !== undefined) {
    return { confidence: clamp01(Number(bare[1])) };
  }

  throw new OracleUnavailableError('malformed', `Oracle returned no usable confidence: ${cleaned.slice(0, 80)}`);
}

export function clamp01(value: number): number {
  return Math.min(1, Math.max(0, value));
}
