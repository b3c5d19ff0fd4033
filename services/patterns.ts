import type { ExtractedIntelligence, SignatureCategory, SignatureMatch } from '../types.js';

interface ScoringSignature {
  id: string;
  category: SignatureCategory;
  weight: number;
  pattern: RegExp;
}

// --- SCORING SIGNATURES ---
// Weights are per-signature probabilities; the Sentinel combines them with a probabilistic OR.
export const SCORING_SIGNATURES: readonly ScoringSignature[] = [
  { id: 'urgent-action', category: 'urgency', weight: 0.35, pattern: /\b(urgent(ly)?|immediately|right away|asap|at the earliest)\b/i },
  {
    id: 'deadline',
    category: 'urgency',
    weight: 0.25,
    pattern: /\b(today|tonight|within \d+\s*(hours?|hrs?|minutes?|mins?)|24 hours|last chance|final (notice|warning)|expires?|expired)\b/i,
  },
  {
    id: 'account-threat',
    category: 'threat',
    weight: 0.5,
    pattern: /\b(account|card|sim|number|service|wallet)\b.{0,40}\b(block(ed)?|suspend(ed)?|frozen|freeze|deactivat\w*|terminat\w*|clos(e|ed))\b/i,
  },
  { id: 'suspension', category: 'threat', weight: 0.3, pattern: /\b(blocked|suspend(ed)?|suspension|frozen|deactivated)\b/i },
  {
    id: 'legal-threat',
    category: 'threat',
    weight: 0.45,
    pattern: /\b(arrest(ed)?|police|legal action|court|warrant|case (will be )?filed|fir|penalty|jail)\b/i,
  },
  {
    id: 'identity-verification',
    category: 'verification-request',
    weight: 0.35,
    pattern: /\b(verify|verification|re-?verify|kyc|confirm your|update your (details|kyc|pan|aadhaar))\b/i,
  },
  {
    id: 'credential-request',
    category: 'verification-request',
    weight: 0.6,
    pattern: /\b(share|send|enter|provide|give|tell)\b.{0,30}\b(otp|pin|cvv|password|mpin|card (number|details))\b/i,
  },
  {
    id: 'money-transfer',
    category: 'financial-pressure',
    weight: 0.4,
    pattern: /\b(transfer|send|pay|deposit)\b.{0,20}(₹|\brs\.?|\binr\b|\brupees?\b|\d)/i,
  },
  {
    id: 'fee-or-reward',
    category: 'financial-pressure',
    weight: 0.3,
    pattern: /\b(processing fee|registration fee|refund|cashback|lottery|prize|you have won)\b/i,
  },
  { id: 'banking-instrument', category: 'financial-pressure', weight: 0.2, pattern: /\b(bank account|debit card|credit card|net ?banking)\b/i },
  { id: 'upi-mention', category: 'payment-solicitation', weight: 0.3, pattern: /\b(upi|gpay|google pay|phonepe|paytm)\b/i },
  {
    id: 'payment-detail-request',
    category: 'payment-solicitation',
    weight: 0.45,
    pattern: /\b(share|send|give|provide|tell)\b.{0,20}\b(upi|account number|bank details|card)\b/i,
  },
  {
    id: 'upi-scam-phrase',
    category: 'payment-solicitation',
    weight: 0.55,
    pattern: /(enter (your )?upi pin|to receive money|scan (the |this )?qr|refund.{0,20}upi|upi.{0,20}refund)/i,
  },
  { id: 'link-present', category: 'link-lure', weight: 0.2, pattern: /(https?:\/\/|\bwww\.)\S+/i },
  { id: 'click-lure', category: 'link-lure', weight: 0.35, pattern: /\b(click|tap|open|visit)\b.{0,20}\b(link|url|here|below)\b/i },
];

export function matchSignatures(text: string): SignatureMatch[] {
  return SCORING_SIGNATURES.filter((signature) => signature.pattern.test(text)).map(({ id, category, weight }) => ({
    id,
    category,
    weight,
  }));
}

// --- EXTRACTION GRAMMARS ---
// UPI handles have no dotted TLD after the provider, which keeps e-mail addresses out.
const UPI_PATTERN = /\b[a-z0-9][a-z0-9._-]*@[a-z][a-z0-9]+\b(?!\.[a-z])/gi;
// 4–18 digits, single spaces or hyphens allowed between them.
const BANK_ACCOUNT_PATTERN = /(?<![\w+])\d(?:[ -]?\d){3,17}(?!\w)/g;
const CURRENCY_PREFIX = /(?:\brs\.?|\binr|₹)\s*$/i;
const URL_PATTERN = /(?:\bhttps?:\/\/|\bwww\.)[^\s<>"']+/gi;
const INDIAN_PHONE_PATTERN = /(?<![\d+])(?:\+?91[-\s]?|0)?[6-9]\d{4}[-\s]?\d{5}(?!\d)/g;
const INTERNATIONAL_PHONE_PATTERN = /(?<![\d+])\+(?!91)\d{1,3}[-\s]?\d{6,12}(?!\d)/g;
const TRAILING_PUNCTUATION = /[.,;:!?)\]}'"]+$/;

export const SUSPICIOUS_KEYWORDS: readonly { keyword: string; pattern: RegExp }[] = [
  { keyword: 'urgent', pattern: /\burgent(ly)?\b/i },
  { keyword: 'immediately', pattern: /\bimmediately\b/i },
  { keyword: 'blocked', pattern: /\bblocked\b/i },
  { keyword: 'suspend', pattern: /\bsuspen(d|ded|sion)\b/i },
  { keyword: 'verify', pattern: /\bverify\b/i },
  { keyword: 'kyc', pattern: /\bkyc\b/i },
  { keyword: 'otp', pattern: /\botp\b/i },
  { keyword: 'pin', pattern: /\b(m?pin)\b/i },
  { keyword: 'cvv', pattern: /\bcvv\b/i },
  { keyword: 'password', pattern: /\bpasswords?\b/i },
  { keyword: 'login', pattern: /\blog ?in\b/i },
  { keyword: 'refund', pattern: /\brefunds?\b/i },
  { keyword: 'lottery', pattern: /\blottery\b/i },
  { keyword: 'prize', pattern: /\bprizes?\b/i },
  { keyword: 'arrest', pattern: /\barrest(ed)?\b/i },
  { keyword: 'penalty', pattern: /\bpenalty\b/i },
];

export function normalizeUpiId(raw: string): string {
  return raw.replace(TRAILING_PUNCTUATION, '').toLowerCase();
}

export function normalizeBankAccount(raw: string): string {
  return raw.replace(/\D/g, '');
}

export function normalizeUrl(raw: string): string {
  const trimmed = raw.replace(TRAILING_PUNCTUATION, '');
  const match = /^(https?:\/\/)?([^/?#]+)(.*)$/i.exec(trimmed);
  if (!match) return trimmed;
  const [, scheme = '', host = '', rest = ''] = match;
  return `${scheme.toLowerCase()}${host.toLowerCase()}${rest}`;
}

export function normalizePhone(raw: string): string {
  const digits = raw.replace(/\D/g, '');
  if (raw.trim().startsWith('+') && !digits.startsWith('91')) {
    return `+${digits}`;
  }
  return `+91${digits.slice(-10)}`;
}

function uniqueMatches(text: string, pattern: RegExp, normalize: (raw: string) => string): string[] {
  const values = new Set<string>();
  for (const match of text.matchAll(pattern)) {
    const value = normalize(match[0]);
    if (value) values.add(value);
  }
  return [...values];
}

type Span = [start: number, end: number];

function spansOf(text: string, pattern: RegExp): Span[] {
  return [...text.matchAll(pattern)].map((m) => [m.index ?? 0, (m.index ?? 0) + m[0].length]);
}

/**
 * All artifacts in `text`, normalized and deduplicated, in order of first appearance.
 * Digits that belong to a phone number, link or UPI handle, or that follow a
 * currency marker, are not account numbers.
 */
export function extractArtifacts(text: string): ExtractedIntelligence {
  const international = [...text.matchAll(INTERNATIONAL_PHONE_PATTERN)];
  const insideInternational = (index: number) =>
    international.some((m) => index >= (m.index ?? 0) && index < (m.index ?? 0) + m[0].length);
  const indian = [...text.matchAll(INDIAN_PHONE_PATTERN)].filter((m) => !insideInternational(m.index ?? 0));
  const phones = [...indian, ...international].sort((a, b) => (a.index ?? 0) - (b.index ?? 0));

  const claimed: Span[] = [
    ...phones.map((m): Span => [m.index ?? 0, (m.index ?? 0) + m[0].length]),
    ...spansOf(text, URL_PATTERN),
    ...spansOf(text, UPI_PATTERN),
  ];
  const isClaimed = (start: number, end: number) => claimed.some(([s, e]) => start < e && s < end);

  const bankAccounts = new Set<string>();
  for (const match of text.matchAll(BANK_ACCOUNT_PATTERN)) {
    const start = match.index ?? 0;
    if (isClaimed(start, start + match[0].length)) continue;
    if (CURRENCY_PREFIX.test(text.slice(0, start))) continue;
    bankAccounts.add(normalizeBankAccount(match[0]));
  }

  return {
    bankAccounts: [...bankAccounts],
    upiIds: uniqueMatches(text, UPI_PATTERN, normalizeUpiId),
    phishingLinks: uniqueMatches(text, URL_PATTERN, normalizeUrl),
    phoneNumbers: [...new Set(phones.map((match) => normalizePhone(match[0])))],
    suspiciousKeywords: SUSPICIOUS_KEYWORDS.filter(({ pattern }) => pattern.test(text)).map(({ keyword }) => keyword),
  };
}
