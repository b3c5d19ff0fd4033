import 'dotenv/config';
import { randomUUID } from 'node:crypto';
import type { Message } from '../types.js';

const API_URL = process.env.HONEYPOT_URL ?? 'http://localhost:8080/honeypot';
const AUTH_KEY = process.env.AUTH_KEY ?? 'change-me';

const SCRIPT = [
  'Your bank account will be blocked today. Verify immediately.',
  'Share your UPI ID to avoid account suspension.',
  'Send Rs 1 to verify.sbi@ybl now, or call our desk on +91 98765 43210.',
  'Why are you asking so many questions? Do it fast or a police case will be filed.',
  'Last warning. Open http://sbi-kyc-update.example/verify and enter your OTP.',
];

interface HoneypotResponse {
  status?: string;
  reply?: string;
  error?: string;
}

function toResponse(data: unknown): HoneypotResponse {
  if (data === null || typeof data !== 'object') return {};
  const field = (key: string): string | undefined => {
    const value: unknown = Reflect.get(data, key);
    return typeof value === 'string' ? value : undefined;
  };
  return { status: field('status'), reply: field('reply'), error: field('error') };
}

async function send(sessionId: string, text: string, history: Message[]): Promise<HoneypotResponse> {
  const message: Message = { sender: 'scammer', text, timestamp: new Date().toISOString() };
  const response = await fetch(API_URL, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json', 'x-api-key': AUTH_KEY },
    body: JSON.stringify({
      sessionId,
      message,
      conversationHistory: history,
      metadata: { channel: 'SMS', language: 'English', locale: 'IN' },
    }),
  });

  const body = toResponse(await response.json());
  if (!response.ok) {
    throw new Error(`Honeypot returned ${response.status}: ${body.error ?? 'unknown error'}`);
  }
  history.push(message);
  if (body.reply) {
    history.push({ sender: 'user', text: body.reply, timestamp: new Date().toISOString() });
  }
  return body;
}

async function main(): Promise<void> {
  const sessionId = randomUUID();
  const history: Message[] = [];
  console.log(`Session ${sessionId} → ${API_URL}`);

  for (const line of SCRIPT) {
    console.log(`\n[Scammer] ${line}`);
    const result = await send(sessionId, line, history);
    console.log(result.reply ? `[Agent]   ${result.reply}` : '[Agent]   (no reply)');
  }
  console.log(`\nDone: ${history.length} messages exchanged.`);
}

main().catch((error: unknown) => {
  console.error(`Simulation failed: ${error instanceof Error ? error.message : String(error)}`);
  process.exitCode = 1;
});
