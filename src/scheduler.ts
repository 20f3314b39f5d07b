/**
 * Interval scheduler on top of node-cron.
 *
 * node-cron only speaks calendar expressions, so it ticks every minute and
 * isDue() decides whether CHECK_INTERVAL_HOURS have passed since the last
 * run. Runs never overlap: a tick during a run is skipped.
 */
import cron, { type ScheduledTask } from 'node-cron';
import { SCHEDULE } from './config.js';
import { logger } from './utils/logger.js';
import { describeError } from './utils/errors.js';

const HOUR_MS = 3_600_000;

export function isDue(lastRunAt: Date | null, now: Date, intervalHours: number): boolean {
  if (lastRunAt === null) return true;
  return now.getTime() - lastRunAt.getTime() >= intervalHours * HOUR_MS;
}

export interface IntervalSchedule {
  /** Run the job if it is due and not already running. Resolves true if it ran. */
  tick(): Promise<boolean>;
  stop(): void;
  lastRunAt(): Date | null;
}

export interface IntervalScheduleOptions {
  intervalHours?: number;
  cronExpression?: string;
  clock?: () => Date;
}

export function startIntervalSchedule(
  job: () => Promise<unknown>,
  options: IntervalScheduleOptions = {},
): IntervalSchedule {
  const {
    intervalHours = SCHEDULE.intervalHours,
    cronExpression = SCHEDULE.cronExpression,
    clock = () => new Date(),
  } = options;

  let lastRunAt: Date | null = null;
  let running = false;

  const tick = async (): Promise<boolean> => {
    if (running) {
      logger.debug('Scheduler: previous run still in progress — skipping tick');
      return false;
    }
    const now = clock();
    if (!isDue(lastRunAt, now, intervalHours)) return false;

    lastRunAt = now;
    running = true;
    try {
      await job();
    } catch (err) {
      logger.error('Scheduler: job error', { error: describeError(err) });
    } finally {
      running = false;
    }
    return true;
  };

  const task: ScheduledTask = cron.schedule(cronExpression, () => {
    void tick();
  });
  logger.info('Scheduler: registered', { intervalHours, cronExpression });

  return {
    tick,
    stop: () => {
      task.stop();
      logger.info('Scheduler: stopped');
    },
    lastRunAt: () => lastRunAt,
  };
}
