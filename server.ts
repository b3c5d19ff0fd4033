import 'dotenv/config';
import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { buildHoneypot } from './services/honeypot.js';
import { startMaintenance } from './services/maintenance.js';
import { createLogger, setLogLevel } from './utils/logger.js';
import { RateLimiter } from './utils/rateLimit.js';

const logger = createLogger('server');

const config = loadConfig();
setLogLevel(config.logLevel);

const honeypot = buildHoneypot(config);
const rateLimiter = new RateLimiter(config.rateLimit.max, config.rateLimit.windowMs);
const app = createApp({ honeypot, config, rateLimiter });

const stopMaintenance = startMaintenance(honeypot.actor, config.engagement.maintenanceIntervalMs, () =>
  rateLimiter.prune(),
);

const server = app.listen(config.port, '0.0.0.0', () => {
  logger.info(`🚀 Honeypot ready on port ${config.port}`);
  logger.info(`🔐 Auth: ${config.authKey === 'change-me' ? '⚠️ DEFAULT KEY (set AUTH_KEY env var!)' : '✅ Custom key'}`);
  logger.info(`🤖 Oracle: ${honeypot.oracle.name}${config.ai.apiKey ? ` (${config.ai.model})` : ' (API_KEY missing, fallbacks only)'}`);
});

function shutdown(signal: string): void {
  logger.info(`${signal} received, draining pending reports`);
  stopMaintenance();
  server.close();
  honeypot.reporter
    .flush()
    .then(() => process.exit(0))
    .catch((error: unknown) => {
      logger.error(`Shutdown flush failed: ${String(error)}`);
      process.exit(1);
    });
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
