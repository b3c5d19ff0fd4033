import { describe, expect, it } from 'vitest';
import { normalizeSender, normalizeTimestamp, parseHoneypotEvent } from '../services/events.js';

describe('normalizeSender', () => {
  it('maps agent-side labels to user and everything else to scammer', () => {
    expect(normalizeSender('user')).toBe('user');
    expect(normalizeSender(' Assistant ')).toBe('user');
    expect(normalizeSender('honeypot')).toBe('user');
    expect(normalizeSender('scammer')).toBe('scammer');
    expect(normalizeSender('caller')).toBe('scammer');
  });
});

describe('normalizeTimestamp', () => {
  it('converts epoch milliseconds to ISO', () => {
    expect(normalizeTimestamp(1772359200000)).toBe('2026-03-01T10:00:00.000Z');
    expect(normalizeTimestamp('1772359200000')).toBe('2026-03-01T10:00:00.000Z');
  });

  it('canonicalizes parseable dates and keeps the rest verbatim', () => {
    expect(normalizeTimestamp('2026-03-01T15:30:00+05:30')).toBe('2026-03-01T10:00:00.000Z');
    expect(normalizeTimestamp('yesterday-ish')).toBe('yesterday-ish');
    expect(normalizeTimestamp(undefined)).toBe('');
  });
});

describe('parseHoneypotEvent', () => {
  it('parses a full event and fills defaults', () => {
    const result = parseHoneypotEvent({
      sessionId: 'abc-123',
      message: { sender: 'scammer', text: 'Your account is blocked', timestamp: 1772359200000 },
      metadata: { channel: 'SMS', language: 'English', locale: 'IN' },
    });

    expect(result).toEqual({
      ok: true,
      event: {
        sessionId: 'abc-123',
        message: { sender: 'scammer', text: 'Your account is blocked', timestamp: '2026-03-01T10:00:00.000Z' },
        conversationHistory: [],
        metadata: { channel: 'SMS', language: 'English', locale: 'IN' },
      },
    });
  });

  it('accepts a bare string message as the counterparty speaking', () => {
    const result = parseHoneypotEvent({ sessionId: 's1', message: 'Pay the fine now' });
    expect(result.ok && result.event.message).toEqual({ sender: 'scammer', text: 'Pay the fine now', timestamp: '' });
  });

  it('normalizes history senders', () => {
    const result = parseHoneypotEvent({
      sessionId: 's1',
      message: { sender: 'scammer', text: 'hello', timestamp: '2026-03-01T10:02:00.000Z' },
      conversationHistory: [
        { sender: 'scammer', text: 'hi', timestamp: '2026-03-01T10:00:00.000Z' },
        { sender: 'agent', text: 'who is this?', timestamp: '2026-03-01T10:01:00.000Z' },
      ],
    });
    expect(result.ok && result.event.conversationHistory.map((m) => m.sender)).toEqual(['scammer', 'user']);
  });

  it('rejects a missing session id and empty text with field paths', () => {
    const result = parseHoneypotEvent({ sessionId: '  ', message: { sender: 'scammer', text: '' } });
    expect(result).toEqual({
      ok: false,
      errors: ['sessionId: sessionId is required', 'message.text: text must not be empty'],
    });
  });

  it('rejects a body that is not an object', () => {
    const result = parseHoneypotEvent('hello');
    expect(result.ok).toBe(false);
  });
});
