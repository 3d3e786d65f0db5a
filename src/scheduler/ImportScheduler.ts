import cron, { type ScheduledTask } from 'node-cron';
import { logger } from '../infra/logger.js';

const MINUTES_PER_HOUR = 60;
const HOURS_PER_DAY = 24;
/** Cron fires on minute boundaries; absorbs start-time jitter between ticks */
const GATE_SLACK_MS = 30_000;

/**
 * Cron expression firing every `intervalMinutes`
 * Cron steps restart each hour (and each day), so only intervals dividing them
 * map onto a step; any other interval fires every minute and is gated by
 * elapsed time
 */
export function cronExpressionFor(intervalMinutes: number): { expression: string; gated: boolean } {
  if (intervalMinutes < MINUTES_PER_HOUR && MINUTES_PER_HOUR % intervalMinutes === 0) {
    return { expression: `*/${intervalMinutes} * * * *`, gated: false };
  }
  const hours = intervalMinutes / MINUTES_PER_HOUR;
  if (Number.isInteger(hours) && hours < HOURS_PER_DAY && HOURS_PER_DAY % hours === 0) {
    return { expression: `0 */${hours} * * *`, gated: false };
  }
  return { expression: '* * * * *', gated: true };
}

/**
 * ImportScheduler - periodic imports using node-cron
 * Skips a tick while the previous import is still running
 */
export class ImportScheduler {
  private task: ScheduledTask | null = null;
  private running = false;
  private lastStartedAt: number | null = null;
  private gated = false;

  constructor(
    private readonly intervalMinutes: number,
    private readonly runImport: () => Promise<unknown>,
    private readonly now: () => number = Date.now
  ) {}

  start(): void {
    const { expression, gated } = cronExpressionFor(this.intervalMinutes);
    this.gated = gated;
    this.task = cron.schedule(expression, () => this.tick());

    logger.info('ImportScheduler started', {
      intervalMinutes: this.intervalMinutes,
      cronExpression: expression,
    });
  }

  stop(): void {
    if (this.task) {
      this.task.stop();
      this.task = null;
      logger.info('ImportScheduler stopped');
    }
  }

  /**
   * Runs one scheduled import unless one is in progress or the interval has not elapsed
   */
  async tick(): Promise<void> {
    if (this.running) {
      logger.info('Scheduled import skipped - previous import still running');
      return;
    }
    const now = this.now();
    if (
      this.gated &&
      this.lastStartedAt !== null &&
      now - this.lastStartedAt < this.intervalMinutes * 60_000 - GATE_SLACK_MS
    ) {
      return;
    }

    this.running = true;
    this.lastStartedAt = now;
    try {
      logger.info('Scheduled import starting');
      await this.runImport();
      logger.info('Scheduled import finished');
    } catch (error) {
      logger.error('Scheduled import failed', {
        error: error instanceof Error ? error.message : String(error),
      });
    } finally {
      this.running = false;
    }
  }
}
