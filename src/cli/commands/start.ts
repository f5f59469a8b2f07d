import { parseArgs } from "node:util";
import { runBackup, Scheduler } from "../../core";
import { logger } from "../../utils/logger";
import { formatBytes } from "../../utils/naming";
import { COMMON_OPTIONS, type CommonValues, createBackupDeps, loadCliContext, reportFailure } from "../context";
import { color, ui } from "../ui";

/**
 * One scheduled run. The context is reloaded so edits to the install's
 * config files apply without restarting the daemon.
 */
async function scheduledBackup(values: CommonValues): Promise<void> {
  const ctx = await loadCliContext(values);
  const result = await runBackup(ctx, createBackupDeps(ctx));
  logger.info(
    `Scheduled backup finished: ${result.archive.fileName} (${formatBytes(result.archive.sizeBytes)}, ${result.issues.length} warning(s))`,
  );
}

export async function startCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      ...COMMON_OPTIONS,
      schedule: { type: "string", short: "s" },
    },
    allowPositionals: false,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  try {
    const ctx = await loadCliContext(values);
    const expression = values.schedule ?? ctx.config.backup.schedule;

    ui.banner("scheduler");

    const scheduler = new Scheduler(expression, () => scheduledBackup(values));
    const status = scheduler.getStatus();
    ui.step(`Schedule: ${color.cyan(status.cron)} ${color.dim("next:")} ${status.nextRun.toLocaleString()}`);

    const stopped = new Promise<void>((resolve) => {
      const shutdown = () => {
        ui.cancel("Shutting down...");
        scheduler.stop().then(resolve, (error: unknown) => {
          logger.error("Scheduler did not stop cleanly", error);
          resolve();
        });
      };
      process.once("SIGINT", shutdown);
      process.once("SIGTERM", shutdown);
    });

    scheduler.start();
    ui.success("Scheduler is running");
    ui.info("Press Ctrl+C to stop");

    await stopped;
    return 0;
  } catch (error) {
    return reportFailure("Scheduler", error, values.verbose);
  }
}

function printHelp(): void {
  console.log(`
${color.bold("n8n-backup start")} - Start the scheduler daemon

${color.dim("USAGE:")}
  n8n-backup start [OPTIONS]

${color.dim("OPTIONS:")}
  -s, --schedule <cron>       Override backup.schedule (default: "0 2 * * *")
  -c, --config <path>         Path to config file
  -d, --install-dir <path>    n8n install directory (default: /home/n8n)
  -v, --verbose               Verbose output
  -h, --help                  Show this help message

${color.dim("DESCRIPTION:")}
  Runs the backup pipeline whenever the cron expression fires. A trigger that
  arrives while a backup is still running is skipped.

${color.dim("SCHEDULE FORMAT:")}
  minute hour day-of-month month day-of-week

    "0 2 * * *"     - Every day at 2:00 AM
    "0 3 * * 0"     - Every Sunday at 3:00 AM
    "0 */6 * * *"   - Every six hours
`);
}
