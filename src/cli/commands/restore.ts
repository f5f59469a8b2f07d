import { parseArgs } from "node:util";
import { ConfigError } from "../../config";
import { type ChooseArchive, parseRestoreSource, runRestore, TarArchiver } from "../../core";
import { RcloneRemoteStore } from "../../storage/rclone";
import type { RestoreResult, RestoreStep } from "../../types";
import { formatDuration } from "../../utils/naming";
import { COMMON_OPTIONS, createServices, loadCliContext, parsePositiveInt, reportFailure } from "../context";
import { color, formatSummary, ui } from "../ui";

const STEP_LABELS: Record<RestoreStep, string> = {
  select: "Selecting backup",
  validate: "Validating archive",
  extract: "Extracting archive",
  classify: "Inspecting backup contents",
  apply: "Applying backup to install",
  done: "Finishing up",
};

function restoreSummary(result: RestoreResult): string {
  return formatSummary([
    { label: "Archive", value: result.archiveName },
    { label: "Database", value: result.databaseKind },
    { label: "Config files", value: result.restoredConfigFiles.join(", ") || "none" },
    { label: "Previous files kept", value: result.backedUpFiles.length },
    { label: "Duration", value: formatDuration(result.durationMs) },
  ]);
}

const chooseInteractively: ChooseArchive = async (names) => {
  const selected = await ui.select<{ value: string; label: string }[], string>({
    message: "Select a backup to restore",
    options: names.map((name, i) => ({ value: name, label: `${i + 1}. ${name}` })),
  });
  return ui.isCancel(selected) ? null : selected;
};

export async function restoreCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      ...COMMON_OPTIONS,
      source: { type: "string", short: "s" },
      select: { type: "string", short: "n" },
      "no-start": { type: "boolean", default: false },
      yes: { type: "boolean", short: "y", default: false },
    },
    allowPositionals: false,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  const interactive = process.stdin.isTTY === true;

  try {
    if (!values.source) {
      throw new ConfigError("--source is required (a file path, remote:folder, or 'remote')");
    }
    const select = parsePositiveInt(values.select, "--select");

    const ctx = await loadCliContext(values, { quietConsole: true });
    const source = parseRestoreSource(values.source, ctx.config.remote);

    ui.banner("restore");

    if (!values.yes) {
      if (!interactive) {
        throw new ConfigError("Refusing to restore without confirmation: pass --yes when not running interactively");
      }
      const confirmed = await ui.confirm({
        message: `Restore into ${ctx.paths.installDir}? Current files are kept as .bak copies.`,
        initialValue: false,
      });
      if (ui.isCancel(confirmed) || !confirmed) {
        ui.cancel("Restore cancelled");
        return 1;
      }
    }

    const result = await runRestore(
      ctx,
      {
        source,
        select,
        targetInstallDir: ctx.paths.installDir,
        startServices: !values["no-start"],
      },
      {
        archiver: new TarArchiver(),
        services: createServices(ctx),
        remoteFor: (remoteName, folder) => new RcloneRemoteStore(remoteName, folder),
        choose: interactive ? chooseInteractively : undefined,
        onStep: (step) => ui.step(STEP_LABELS[step]),
      },
    );

    ui.note(restoreSummary(result), "Restore Summary");
    for (const warning of result.warnings) {
      ui.warn(warning);
    }

    ui.outro(values["no-start"] ? "Restore complete (services not started)" : "Restore complete!");
    return 0;
  } catch (error) {
    return reportFailure("Restore", error, values.verbose);
  }
}

function printHelp(): void {
  console.log(`
${color.bold("n8n-backup restore")} - Restore an n8n install from a backup

${color.dim("USAGE:")}
  n8n-backup restore --source <path|remote:folder|remote> [OPTIONS]

${color.dim("OPTIONS:")}
  -s, --source <src>          Archive file, an rclone "remote:folder", or
                              "remote" for the configured remote
  -n, --select <n>            Pick the n-th newest remote backup (1 = newest)
      --no-start              Don't run "docker compose up -d" afterwards
  -y, --yes                   Skip the confirmation prompt
  -c, --config <path>         Path to config file
  -d, --install-dir <path>    n8n install directory (default: /home/n8n)
  -v, --verbose               Verbose output
  -h, --help                  Show this help message

${color.dim("EXAMPLES:")}
  n8n-backup restore -s /home/n8n/files/backup_full/n8n_backup_20260101_020000.tar.gz
  n8n-backup restore -s remote --select 1 --yes
  n8n-backup restore -s gdrive_n8n:n8n_backups
`);
}
