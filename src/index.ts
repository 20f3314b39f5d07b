#!/usr/bin/env node
/**
 * Daily Sermon Mailer — entry point.
 *
 * Runs as a persistent Node.js process: one delivery immediately on startup,
 * then one every CHECK_INTERVAL_HOURS (node-cron tick + interval gate).
 *
 *   server (default)  long-running scheduled mode
 *   run               single delivery, exit code reflects the outcome
 */
import { env, findSuspectChannelIds } from './config.js';
import { logger } from './utils/logger.js';
import { createDeliveryState, isSuccessfulOutcome, runDailyDelivery } from './pipeline/index.js';
import { startIntervalSchedule } from './scheduler.js';

const state = createDeliveryState();

function warnSuspectChannelIds(): void {
  for (const channelId of findSuspectChannelIds(env.YOUTUBE_CHANNEL_IDS)) {
    logger.warn('Config: channel ID may not be in the correct format', { channelId });
  }
}

// ── Server mode ───────────────────────────────────────────────────────────────

async function startServer(): Promise<void> {
  const schedule = startIntervalSchedule(() => runDailyDelivery(state));

  const shutdown = (signal: NodeJS.Signals): void => {
    logger.info('Sermon Mailer: stopping', { signal });
    schedule.stop();
    process.exit(0);
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  // First delivery right away rather than one interval after startup
  await schedule.tick();
  logger.info('Sermon Mailer: server mode running', { intervalHours: env.CHECK_INTERVAL_HOURS });
}

// ── CLI entrypoint ────────────────────────────────────────────────────────────

const [,, command] = process.argv;

async function main(): Promise<void> {
  logger.info('Sermon Mailer: starting', {
    command:  command ?? 'server',
    channels: env.YOUTUBE_CHANNEL_IDS.length,
  });
  warnSuspectChannelIds();

  switch (command) {
    case 'run': {
      const outcome = await runDailyDelivery(state);
      process.exitCode = isSuccessfulOutcome(outcome) ? 0 : 1;
      break;
    }

    case undefined:
    case 'server':
      await startServer();
      break;

    default:
      logger.error(`Unknown command: ${command}`, { available: ['server', 'run'] });
      process.exitCode = 1;
  }
}

main().catch((err) => {
  logger.error('Fatal startup error', { err });
  process.exit(1);
});
