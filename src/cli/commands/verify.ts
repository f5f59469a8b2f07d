import { parseArgs } from "node:util";
import * as path from "node:path";
import { type ArchiveInspection, inspectArchive, TarArchiver } from "../../core";
import { createLocalStore } from "../../storage";
import { computeFileChecksum } from "../../utils/crypto";
import { formatBytes } from "../../utils/naming";
import { COMMON_OPTIONS, loadCliContext, reportFailure } from "../context";
import { color, formatSummary, ui } from "../ui";

export async function verifyCommand(args: string[]): Promise<number> {
  const { values, positionals } = parseArgs({
    args,
    options: {
      ...COMMON_OPTIONS,
      all: { type: "boolean", default: false },
    },
    allowPositionals: true,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  try {
    const ctx = await loadCliContext(values, { quietConsole: true });

    let paths: string[];
    if (positionals.length > 0) {
      paths = positionals.map((p) => (path.isAbsolute(p) || p.includes("/") ? path.resolve(p) : path.join(ctx.paths.backupDir, p)));
    } else if (values.all) {
      paths = (await createLocalStore(ctx).list()).map((entry) => entry.path);
    } else {
      ui.error("Specify archive files or use --all to verify every local backup");
      return 1;
    }

    ui.banner("verify");

    if (paths.length === 0) {
      ui.success("No backups to verify");
      ui.outro("Done");
      return 0;
    }

    const archiver = new TarArchiver();
    const s = ui.spinner();
    s.start(`Verifying ${paths.length} backup(s)...`);

    const results: ArchiveInspection[] = [];
    for (const archivePath of paths) {
      results.push(await inspectArchive(archivePath, archiver));
    }

    s.stop("Verification complete");

    for (const result of results) {
      const name = path.basename(result.path);
      if (result.valid) {
        const checksum = await computeFileChecksum(result.path);
        ui.success(
          `${name} ${color.dim(`${result.databaseKind} · ${formatBytes(result.sizeBytes)} · sha256 ${checksum.slice(0, 12)}`)}`,
        );
      } else {
        ui.error(`${name}`);
        ui.message(`  ${color.dim("•")} ${result.error ?? "invalid"}`);
      }
    }

    const broken = results.filter((r) => !r.valid).length;
    ui.note(
      formatSummary([
        { label: "Verified", value: results.length },
        { label: "Healthy", value: results.length - broken },
        { label: "With issues", value: broken },
      ]),
      "Summary",
    );

    if (broken > 0) {
      ui.outro(color.yellow(`${broken} backup(s) failed verification`));
      return 1;
    }

    ui.outro("All backups verified");
    return 0;
  } catch (error) {
    return reportFailure("Verify", error, values.verbose);
  }
}

function printHelp(): void {
  console.log(`
${color.bold("n8n-backup verify")} - Verify backup archives

${color.dim("USAGE:")}
  n8n-backup verify [archive...] [OPTIONS]

${color.dim("OPTIONS:")}
      --all                   Verify every archive in the backup directory
  -c, --config <path>         Path to config file
  -d, --install-dir <path>    n8n install directory (default: /home/n8n)
  -v, --verbose               Verbose output
  -h, --help                  Show this help message

${color.dim("DESCRIPTION:")}
  Lists each archive and checks it carries exactly one database payload
  (database.sqlite or database.sql).

${color.dim("EXAMPLES:")}
  n8n-backup verify --all
  n8n-backup verify n8n_backup_20260101_020000.tar.gz
`);
}
