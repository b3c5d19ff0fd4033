import cors from 'cors';
import express, { type NextFunction, type Request, type Response } from 'express';
import type { AppConfig } from './config.js';
import { parseHoneypotEvent } from './services/events.js';
import type { Honeypot } from './services/honeypot.js';
import { createLogger, errorMessage } from './utils/logger.js';
import { RateLimiter } from './utils/rateLimit.js';

const logger = createLogger('http');

export interface AppOptions {
  honeypot: Honeypot;
  config: Pick<AppConfig, 'authKey' | 'rateLimit' | 'ai'>;
  rateLimiter?: RateLimiter;
}

export function createApp({ honeypot, config, rateLimiter }: AppOptions): express.Express {
  const limiter = rateLimiter ?? new RateLimiter(config.rateLimit.max, config.rateLimit.windowMs);
  const app = express();
  app.use(express.json({ limit: '1mb' }));
  app.use(cors());

  // --- MAIN ENDPOINT ---
  app.post(['/honeypot', '/scam-event'], async (req: Request, res: Response, next: NextFunction) => {
    const clientIp = req.ip ?? req.socket.remoteAddress ?? 'unknown';
    if (limiter.isLimited(clientIp)) {
      res.status(429).json({ status: 'error', error: 'Too many requests. Please slow down.' });
      return;
    }

    if (req.header('x-api-key') !== config.authKey) {
      res.status(401).json({ status: 'error', error: 'Unauthorized access' });
      return;
    }

    const parsed = parseHoneypotEvent(req.body);
    if (!parsed.ok) {
      logger.warn(`Rejected malformed event: ${parsed.errors.join('; ')}`);
      res.status(400).json({ status: 'error', error: 'Validation failed', details: parsed.errors });
      return;
    }

    const started = Date.now();
    try {
      const result = await honeypot.actor.handle(parsed.event);
      logger.trace(`Turn handled (reply=${result.reply !== undefined})`, parsed.event.sessionId, Date.now() - started);
      res.json(result);
    } catch (error) {
      next(error);
    }
  });

  // --- HEALTH CHECK ---
  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      uptime: Math.floor(process.uptime()),
      sessions_active: honeypot.store.size(),
      sessions_retired: honeypot.store.retiredCount(),
      api_configured: Boolean(config.ai.apiKey),
    });
  });

  app.use((error: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(error);
      return;
    }
    // body-parser marks its own failures with a 4xx status.
    if (error !== null && typeof error === 'object' && 'status' in error && error.status === 400) {
      res.status(400).json({ status: 'error', error: 'Validation failed', details: ['body: malformed JSON'] });
      return;
    }
    logger.error(`❌ Honeypot error: ${errorMessage(error)}`);
    res.status(500).json({ status: 'error', error: 'Internal error. Please retry.' });
  });

  return app;
}
