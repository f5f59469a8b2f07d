/**
 * Cron expressions (minute hour day-of-month month day-of-week) via cron-parser
 *
 *   "0 2 * * *"    every day at 02:00, the default backup time
 *   "30 6,18 * * *" at 06:30 and 18:30
 */

import { CronExpressionParser } from "cron-parser";

export interface ParsedCron {
  expression: string;
  timezone?: string;
}

export function parseCron(expression: string, timezone?: string): ParsedCron {
  const fields = expression.trim().split(/\s+/);
  if (fields.length !== 5) {
    throw new Error(`Invalid cron expression: "${expression}". Expected 5 fields, got ${fields.length}.`);
  }

  // Throws on malformed fields
  CronExpressionParser.parse(expression, timezone ? { tz: timezone } : undefined);
  return { expression, timezone };
}

function truncateToMinute(date: Date): Date {
  const truncated = new Date(date);
  truncated.setSeconds(0, 0);
  return truncated;
}

/**
 * First scheduled minute strictly after from
 */
export function getNextRun(cron: ParsedCron, from: Date = new Date()): Date {
  const interval = CronExpressionParser.parse(cron.expression, {
    currentDate: from,
    ...(cron.timezone ? { tz: cron.timezone } : {}),
  });
  return truncateToMinute(interval.next().toDate());
}

/**
 * True when date falls in a minute the expression fires on
 */
export function matchesCron(cron: ParsedCron, date: Date): boolean {
  const minute = truncateToMinute(date);
  const next = getNextRun(cron, new Date(minute.getTime() - 60_000));
  return next.getTime() === minute.getTime();
}
