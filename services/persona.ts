import type { ExtractedIntelligence, Message } from '../types.js';
import type { OracleRequest } from './oracle.js';

export const PERSONA = {
  name: 'Ramesh',
  age: 67,
  background: 'retired railway clerk living in Pune on a pension',
} as const;

const TAIL_LENGTH = 12;

export const PERSONA_PROMPT = `You are ${PERSONA.name}, a ${PERSONA.age}-year-old ${PERSONA.background}.
You are chatting with someone who contacted you first.

PERSONALITY:
- Polite, cooperative and a little anxious about your savings.
- Easily confused by technology; your grandson usually helps you with the phone.
- Slow to follow urgent instructions.

STRATEGY:
- Keep the other person talking. Ask ONE clarifying question per reply.
- Ask how the process works step by step, who you are speaking with, where to send things, and whether there is another way.
- If a payment ID, account or link is given, say it is not working and ask for another one.
- Never share a real OTP, PIN, password or card number; say you cannot find it or it has not arrived.

RULES (CRITICAL):
- NEVER reveal or hint that you suspect a scam, and never mention AI, bots or testing.
- Reply in the same language and script as the latest message.
- Keep replies short: one or two sentences, no emojis, no role labels, no quotation marks.`;

/** In-character replies used when the oracle cannot produce one. */
export const CANNED_REPLIES: readonly string[] = [
  'I am not understanding properly. Can you explain again slowly?',
  'Which office are you calling from? I want to write it down for my records.',
  'My grandson usually helps with these things. Can you tell me the steps one by one?',
  'I am trying but it is not working on my phone. What should I do now?',
  'I am a retired person, I do not know these technical things. Can you guide me properly?',
  'Is there any other way to do this? The app is showing some error.',
];

/** Replies for monitored, not-yet-suspicious conversations. */
export const NEUTRAL_REPLIES: readonly string[] = [
  'Sorry, who is this?',
  'Hello, I did not understand. Can you tell me more?',
  'Okay. What is this regarding?',
];

const ROLE_LABEL = new RegExp(`^(${PERSONA.name}|assistant|agent|you|reply|user)\\s*:\\s*`, 'i');

/** Strips wrapping quotes, role labels and surrounding whitespace from a completion. */
export function cleanReply(raw: string): string {
  let cleaned = raw.trim().replace(/^["'`]+|["'`]+$/g, '').trim();
  while (ROLE_LABEL.test(cleaned)) {
    cleaned = cleaned.replace(ROLE_LABEL, '').trim();
  }
  return cleaned.replace(/^["'`]+|["'`]+$/g, '').trim();
}

export function pickRotating(replies: readonly string[], cursor: number): string {
  const index = ((cursor % replies.length) + replies.length) % replies.length;
  return replies[index] ?? replies[0] ?? '';
}

function collectedFacts(intel: ExtractedIntelligence): string {
  const facts = [
    ...intel.upiIds.map((v) => `UPI ID ${v}`),
    ...intel.bankAccounts.map((v) => `account ${v}`),
    ...intel.phishingLinks.map((v) => `link ${v}`),
    ...intel.phoneNumbers.map((v) => `phone ${v}`),
  ];
  return facts.length > 0 ? facts.join(', ') : 'nothing yet';
}

/**
 * The conversation tail becomes chat turns: counterparty messages are `user`,
 * our own earlier replies are `assistant`. Consecutive same-role turns are merged.
 */
export function buildReplyRequest(messages: Message[], intel: ExtractedIntelligence): OracleRequest {
  const turns: OracleRequest['messages'] = [];
  for (const message of messages.slice(-TAIL_LENGTH)) {
    const role = message.sender === 'scammer' ? 'user' : 'assistant';
    const last = turns[turns.length - 1];
    if (last && last.role === role) {
      last.content = `${last.content}\n${message.text}`;
    } else {
      turns.push({ role, content: message.text });
    }
  }
  if (turns.length === 0 || turns[0]?.role !== 'user') {
    turns.unshift({ role: 'user', content: '(conversation started)' });
  }

  return {
    system: `${PERSONA_PROMPT}\n\nDetails they already gave you (do not ask for these again): ${collectedFacts(intel)}.`,
    messages: turns,
    temperature: 0.7,
  };
}
