import { logger as defaultLogger, type Logger } from '../log.js';
import { systemClock, type Clock } from './clock.js';

export interface CycleRunner {
  runCycle(): Promise<unknown>;
}

export interface SchedulerOptions {
  /** wait after a cycle, measured from its end */
  intervalMs: number;
  /** shorter wait after a cycle threw */
  backoffMs: number;
  clock?: Clock;
  logger?: Logger;
}

function formatDelay(ms: number): string {
  return ms % 60_000 === 0 ? `${ms / 60_000} min` : `${ms / 1000} s`;
}

/**
 * Runs cycles back to back, one at a time, until stopped. A stop request
 * lets the current cycle finish and cuts the following sleep short.
 */
export class CycleScheduler {
  private readonly runner: CycleRunner;
  private readonly intervalMs: number;
  private readonly backoffMs: number;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private controller: AbortController | null = null;

  constructor(runner: CycleRunner, options: SchedulerOptions) {
    this.runner = runner;
    this.intervalMs = options.intervalMs;
    this.backoffMs = options.backoffMs;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? defaultLogger;
  }

  get running(): boolean {
    return this.controller !== null;
  }

  async run(): Promise<void> {
    if (this.controller) {
      throw new Error('Scheduler is already running');
    }
    const controller = new AbortController();
    this.controller = controller;
    this.logger.info('Trend monitor started');

    try {
      while (!controller.signal.aborted) {
        const delay = await this.runOnce();
        if (controller.signal.aborted) break;

        this.logger.info(`Sleeping for ${formatDelay(delay)}...`);
        await this.clock.sleep(delay, controller.signal);
      }
    } finally {
      this.controller = null;
    }

    this.logger.info('Trend monitor stopped');
  }

  stop(): void {
    this.controller?.abort();
  }

  private async runOnce(): Promise<number> {
    try {
      await this.runner.runCycle();
      return this.intervalMs;
    } catch (err) {
      this.logger.error('Unexpected error during cycle', err);
      return this.backoffMs;
    }
  }
}
