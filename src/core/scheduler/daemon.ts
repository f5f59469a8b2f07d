/**
 * Scheduler daemon: runs one job whenever its cron expression fires
 */

import { logger } from "../../utils/logger";
import { errorMessage } from "../errors";
import { getNextRun, matchesCron, type ParsedCron, parseCron } from "./cron-parser";

export type TickOutcome = "not_due" | "already_ran" | "busy" | "ran" | "failed";

export interface SchedulerOptions {
  /** Check period, one minute by default */
  intervalMs?: number;
  now?: () => Date;
}

export class Scheduler {
  private readonly cron: ParsedCron;
  private readonly intervalMs: number;
  private readonly now: () => Date;
  private checkInterval: NodeJS.Timeout | null = null;
  private inFlight: Promise<TickOutcome> | null = null;
  private lastRun: Date | null = null;

  constructor(
    expression: string,
    private readonly job: () => Promise<void>,
    options: SchedulerOptions = {},
  ) {
    this.cron = parseCron(expression);
    this.intervalMs = options.intervalMs ?? 60_000;
    this.now = options.now ?? (() => new Date());
  }

  get running(): boolean {
    return this.checkInterval !== null;
  }

  start(): void {
    if (this.checkInterval) {
      logger.warn("Scheduler is already running");
      return;
    }

    logger.info(`Scheduler started (${this.cron.expression}), next run ${this.getNextRun().toISOString()}`);
    this.checkInterval = setInterval(() => {
      void this.tick();
    }, this.intervalMs);
    void this.tick();
  }

  /**
   * Stop checking; resolves once an in-flight run has finished
   */
  async stop(): Promise<void> {
    if (this.checkInterval) {
      clearInterval(this.checkInterval);
      this.checkInterval = null;
      logger.info("Scheduler stopped");
    }
    if (this.inFlight) {
      await this.inFlight;
    }
  }

  /**
   * Run the job if the current minute is due. Overlapping ticks are skipped
   * while a run is in flight; a minute never runs twice.
   */
  async tick(): Promise<TickOutcome> {
    const now = this.now();
    now.setSeconds(0, 0);

    if (!matchesCron(this.cron, now)) {
      return "not_due";
    }
    if (this.lastRun && this.lastRun.getTime() === now.getTime()) {
      return "already_ran";
    }
    if (this.inFlight) {
      logger.warn("Previous backup still running, skipping this trigger");
      return "busy";
    }

    this.lastRun = now;
    logger.info(`Scheduled backup triggered at ${now.toISOString()}`);

    this.inFlight = this.job().then(
      (): TickOutcome => "ran",
      (error: unknown): TickOutcome => {
        logger.error(`Scheduled backup failed: ${errorMessage(error)}`);
        return "failed";
      },
    );

    try {
      return await this.inFlight;
    } finally {
      this.inFlight = null;
    }
  }

  getNextRun(): Date {
    return getNextRun(this.cron, this.now());
  }

  getStatus(): { cron: string; lastRun: Date | null; nextRun: Date; busy: boolean } {
    return {
      cron: this.cron.expression,
      lastRun: this.lastRun,
      nextRun: this.getNextRun(),
      busy: this.inFlight !== null,
    };
  }
}
