import { parseArgs } from "node:util";
import { runRetention } from "../../core";
import { createRemoteStore } from "../../storage";
import { withLock } from "../../utils/lock";
import { logger } from "../../utils/logger";
import { COMMON_OPTIONS, loadCliContext, parsePositiveInt, reportFailure } from "../context";
import { color, formatSummary, ui } from "../ui";

export async function cleanupCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      ...COMMON_OPTIONS,
      "dry-run": { type: "boolean", default: false },
      "retention-count": { type: "string" },
    },
    allowPositionals: false,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  try {
    const ctx = await loadCliContext(values, {
      retentionCount: parsePositiveInt(values["retention-count"], "--retention-count"),
      quietConsole: true,
    });
    const dryRun = values["dry-run"];

    ui.banner(dryRun ? "cleanup (dry run)" : "cleanup");

    const s = ui.spinner();
    s.start("Applying retention policy...");
    const result = await withLock(ctx.paths.lockFile, () =>
      runRetention(ctx, { remote: createRemoteStore(ctx) }, { dryRun }),
    );
    s.stop("Retention applied");

    if (dryRun && result.candidates.length > 0) {
      ui.step("Would delete:");
      for (const name of result.candidates) {
        ui.message(`  ${color.dim("•")} ${name}`);
      }
    }

    ui.note(
      formatSummary([
        { label: "Kept", value: result.localKept.length },
        { label: dryRun ? "Would delete" : "Deleted", value: dryRun ? result.candidates.length : result.localDeleted.length },
        { label: "Remote pruned", value: ctx.config.remote.enabled ? (result.remotePruned ? "yes" : "no") : null },
      ]),
      "Cleanup Summary",
    );

    for (const issue of result.issues) {
      ui.warn(issue.message);
    }

    logger.info(
      `Cleanup ${dryRun ? "(dry run) " : ""}finished: kept ${result.localKept.length}, deleted ${result.localDeleted.length}`,
    );

    if (dryRun) {
      ui.warn("[DRY RUN] No changes were made.");
    }
    ui.outro("Cleanup complete!");
    return 0;
  } catch (error) {
    return reportFailure("Cleanup", error, values.verbose);
  }
}

function printHelp(): void {
  console.log(`
${color.bold("n8n-backup cleanup")} - Apply the retention policy

${color.dim("USAGE:")}
  n8n-backup cleanup [OPTIONS]

${color.dim("OPTIONS:")}
      --dry-run               Show what would be deleted without deleting
      --retention-count <n>   Number of local backups to keep (default: 30)
  -c, --config <path>         Path to config file
  -d, --install-dir <path>    n8n install directory (default: /home/n8n)
  -v, --verbose               Verbose output
  -h, --help                  Show this help message

${color.dim("DESCRIPTION:")}
  Keeps the newest N local archives and deletes remote archives older than
  retention.remoteMaxAgeDays. Files not named like our archives are never touched.
`);
}
