import type { Session, SignatureCategory } from '../types.js';

const TACTIC_LABELS: Record<SignatureCategory, string> = {
  urgency: 'urgency pressure',
  threat: 'account or legal threats',
  'verification-request': 'fake verification or credential requests',
  'financial-pressure': 'payment or fee demands',
  'payment-solicitation': 'UPI payment solicitation',
  'link-lure': 'link lures',
};

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}

/** Deterministic behavioral summary used as the report's `agentNotes`. */
export function summarizeSession(session: Session): string {
  const tactics = [...session.tactics].map((t) => TACTIC_LABELS[t]);
  const tacticLine =
    tactics.length > 0 ? `Scammer used ${tactics.join(', ')}.` : 'No specific scam tactics were matched.';

  const got: string[] = [];
  if (session.intel.upiIds.size > 0) got.push(plural(session.intel.upiIds.size, 'UPI ID'));
  if (session.intel.bankAccounts.size > 0) got.push(plural(session.intel.bankAccounts.size, 'bank account'));
  if (session.intel.phishingLinks.size > 0) got.push(plural(session.intel.phishingLinks.size, 'phishing link'));
  if (session.intel.phoneNumbers.size > 0) got.push(plural(session.intel.phoneNumbers.size, 'phone number'));
  const gotLine = got.length > 0 ? `Extracted ${got.join(', ')}.` : 'No payment or contact details were shared.';

  const engagementLine =
    `Engaged over ${plural(session.qualifyingTurns, 'scam turn')} ` +
    `(peak confidence ${session.peakConfidence.toFixed(2)}), ${plural(session.messages.length, 'message')} exchanged.`;

  return [tacticLine, gotLine, engagementLine].join(' ');
}
