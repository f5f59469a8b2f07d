export { getNextRun, matchesCron, type ParsedCron, parseCron } from "./cron-parser";
export { Scheduler, type SchedulerOptions, type TickOutcome } from "./daemon";
