import { createLogger, errorMessage } from '../utils/logger.js';
import type { Actor } from './actor.js';

const logger = createLogger('maintenance');

/**
 * Periodic sweep: concludes idle engagements, retries held reports and
 * evicts finished sessions. Ticks never overlap. Returns a stop function.
 */
export function startMaintenance(actor: Actor, intervalMs: number, onTick?: () => void): () => void {
  let running = false;

  const timer = setInterval(() => {
    if (running) return;
    running = true;
    actor
      .sweep()
      .then((result) => {
        if (result.evicted > 0 || result.dispatched > 0) {
          logger.info(
            `Swept sessions: evicted=${result.evicted} dispatched=${result.dispatched} retiredPruned=${result.prunedRetired}`,
          );
        }
      })
      .catch((error: unknown) => logger.error(`Sweep failed: ${errorMessage(error)}`))
      .finally(() => {
        running = false;
        onTick?.();
      });
  }, intervalMs);
  timer.unref();

  return () => clearInterval(timer);
}
