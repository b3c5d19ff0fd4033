
/** `scammer` is the counterparty; `user` is the honeypot persona speaking for the targeted user. */
export type Sender = 'scammer' | 'user';

export interface Message {
  sender: Sender;
  text: string;
  timestamp: string;
}

export interface Metadata {
  channel?: string;
  language?: string;
  locale?: string;
}

/** A validated, normalized inbound event. */
export interface HoneypotEvent {
  sessionId: string;
  message: Message;
  conversationHistory: Message[];
  metadata?: Metadata;
}

export interface HoneypotReply {
  status: 'success';
  reply?: string;
}

export interface ExtractedIntelligence {
  bankAccounts: string[];
  upiIds: string[];
  phishingLinks: string[];
  phoneNumbers: string[];
  suspiciousKeywords: string[];
}

export type ArtifactCategory = keyof ExtractedIntelligence;

export const ARTIFACT_CATEGORIES: readonly ArtifactCategory[] = [
  'bankAccounts',
  'upiIds',
  'phishingLinks',
  'phoneNumbers',
  'suspiciousKeywords',
];

/** Payment, account, link and contact artifacts; keywords are supporting evidence only. */
export const HARD_ARTIFACT_CATEGORIES: readonly ArtifactCategory[] = [
  'bankAccounts',
  'upiIds',
  'phishingLinks',
  'phoneNumbers',
];

export type IntelligenceBundle = Record<ArtifactCategory, Set<string>>;

export type SignatureCategory =
  | 'urgency'
  | 'threat'
  | 'verification-request'
  | 'financial-pressure'
  | 'payment-solicitation'
  | 'link-lure';

export interface SignatureMatch {
  id: string;
  category: SignatureCategory;
  weight: number;
}

export interface IntentEvaluation {
  confidence: number;
  ruleScore: number;
  oracleScore: number | null;
  fusedScore: number;
  matches: SignatureMatch[];
  categories: SignatureCategory[];
  reason: string;
  isScam: boolean;
  /** The oracle channel was unavailable and the rule channel decided alone. */
  degraded: boolean;
}

export type SessionStatus = 'NEW' | 'MONITORING' | 'ENGAGED' | 'CONCLUDING' | 'CLOSED';

export interface Session {
  sessionId: string;
  messages: Message[];
  seen: Set<string>;
  /** Indexes into `messages` of agent replies the platform has not echoed back yet. */
  unconfirmedReplies: number[];
  /** Reply given to each counterparty message, keyed by message identity; a retried event gets the same answer. */
  repliesByMessage: Map<string, string>;
  status: SessionStatus;
  scamDetected: boolean;
  peakConfidence: number;
  qualifyingTurns: number;
  tactics: Set<SignatureCategory>;
  intel: IntelligenceBundle;
  reportSent: boolean;
  reportAttempts: number;
  lastReportError?: string;
  cannedReplyCursor: number;
  updatedAt: number;
}

export interface FinalReport {
  sessionId: string;
  scamDetected: boolean;
  totalMessagesExchanged: number;
  extractedIntelligence: ExtractedIntelligence;
  agentNotes: string;
}
