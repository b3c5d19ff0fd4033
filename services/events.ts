import { z } from 'zod';
import type { HoneypotEvent, Message, Sender } from '../types.js';

const AGENT_LABELS = new Set(['user', 'agent', 'assistant', 'honeypot']);

export function normalizeSender(raw: string): Sender {
  return AGENT_LABELS.has(raw.trim().toLowerCase()) ? 'user' : 'scammer';
}

/** Epoch milliseconds and parseable dates become ISO strings; anything else is kept verbatim. */
export function normalizeTimestamp(raw: string | number | undefined): string {
  if (raw === undefined) return '';
  const date = typeof raw === 'number' ? new Date(raw) : /^\d+$/.test(raw.trim()) ? new Date(Number(raw)) : new Date(raw);
  return Number.isNaN(date.getTime()) ? String(raw) : date.toISOString();
}

const messageSchema = z
  .object({
    sender: z.string().min(1).default('scammer'),
    text: z.string().min(1, 'text must not be empty'),
    timestamp: z.union([z.string(), z.number()]).optional(),
  })
  .transform(
    (m): Message => ({
      sender: normalizeSender(m.sender),
      text: m.text,
      timestamp: normalizeTimestamp(m.timestamp),
    }),
  );

export const honeypotEventSchema = z.object({
  sessionId: z.string().trim().min(1, 'sessionId is required'),
  // A bare string is accepted as the counterparty's message.
  message: z.preprocess((raw) => (typeof raw === 'string' ? { sender: 'scammer', text: raw } : raw), messageSchema),
  conversationHistory: z.array(messageSchema).default([]),
  metadata: z
    .object({
      channel: z.string().optional(),
      language: z.string().optional(),
      locale: z.string().optional(),
    })
    .passthrough()
    .optional(),
});

export type ParseResult = { ok: true; event: HoneypotEvent } | { ok: false; errors: string[] };

export function parseHoneypotEvent(body: unknown): ParseResult {
  const result = honeypotEventSchema.safeParse(body);
  if (!result.success) {
    return {
      ok: false,
      errors: result.error.issues.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`),
    };
  }
  return { ok: true, event: result.data };
}
