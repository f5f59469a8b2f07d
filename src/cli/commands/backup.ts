import { parseArgs } from "node:util";
import { runBackup } from "../../core";
import type { BackupRunResult, SinkOutcome } from "../../types";
import { formatBytes, formatDuration } from "../../utils/naming";
import { COMMON_OPTIONS, createBackupDeps, loadCliContext, parsePositiveInt, reportFailure } from "../context";
import { color, formatSummary, ui } from "../ui";

function describeSink(outcome: SinkOutcome): string {
  switch (outcome) {
    case "sent":
      return color.green("sent");
    case "failed":
      return color.red("failed");
    case "skipped":
      return color.yellow("skipped (too large)");
    case "disabled":
      return color.dim("not configured");
  }
}

function backupSummary(result: BackupRunResult): string {
  return formatSummary([
    { label: "Archive", value: result.archive.fileName },
    { label: "Database", value: result.archive.databaseKind },
    { label: "Size", value: formatBytes(result.archive.sizeBytes) },
    { label: "Checksum", value: result.archive.checksum },
    { label: "Duration", value: formatDuration(result.durationMs) },
    { label: "Local path", value: result.archive.path },
    { label: "Old backups removed", value: result.retention.localDeleted.length },
    { label: "Remote upload", value: describeSink(result.transport.remoteUpload) },
    { label: "Telegram file", value: describeSink(result.transport.telegramFile) },
    { label: "Telegram status", value: describeSink(result.transport.telegramStatus) },
  ]);
}

export async function backupCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      ...COMMON_OPTIONS,
      "retention-count": { type: "string" },
    },
    allowPositionals: false,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  const s = ui.spinner();
  let spinning = false;

  try {
    const ctx = await loadCliContext(values, {
      retentionCount: parsePositiveInt(values["retention-count"], "--retention-count"),
      quietConsole: true,
    });

    ui.banner("backup");

    s.start("Creating backup...");
    spinning = true;
    const result = await runBackup(ctx, createBackupDeps(ctx));
    s.stop("Backup created");
    spinning = false;

    ui.note(backupSummary(result), "Backup Summary");

    for (const issue of result.issues) {
      ui.warn(`${issue.kind}: ${issue.message}`);
    }

    ui.outro(result.issues.length > 0 ? "Backup complete with warnings" : "Backup complete!");
    return 0;
  } catch (error) {
    if (spinning) {
      s.stop("Backup aborted", 1);
    }
    return reportFailure("Backup", error, values.verbose);
  }
}

function printHelp(): void {
  console.log(`
${color.bold("n8n-backup backup")} - Create a backup

${color.dim("USAGE:")}
  n8n-backup backup [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>         Path to config file (default: ./n8n-backup.config.yaml)
  -d, --install-dir <path>    n8n install directory (default: /home/n8n)
      --retention-count <n>   Number of local backups to keep (default: 30)
  -v, --verbose               Verbose output
  -h, --help                  Show this help message

${color.dim("DESCRIPTION:")}
  Captures the database (SQLite file copy or pg_dump), the encryption key and
  the install's configuration files into a single verified .tar.gz archive,
  prunes old archives, then uploads to the configured remote and Telegram.

${color.dim("EXAMPLES:")}
  n8n-backup backup
  n8n-backup backup -d /opt/n8n --retention-count 14
`);
}
