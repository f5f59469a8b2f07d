import { parseArgs } from "node:util";
import { createLocalStore, createRemoteStore } from "../../storage";
import type { LocalArchiveEntry } from "../../types";
import { formatBytes, parseArchiveName, sortNewestFirst } from "../../utils/naming";
import { COMMON_OPTIONS, loadCliContext, reportFailure } from "../context";
import { color, formatDateTime, formatTableRow, formatTableSeparator, TABLE_WIDTHS, ui } from "../ui";

export async function listCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      ...COMMON_OPTIONS,
      remote: { type: "boolean", short: "r", default: false },
      format: { type: "string", default: "table" },
    },
    allowPositionals: false,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  try {
    const ctx = await loadCliContext(values);

    if (values.remote) {
      const store = createRemoteStore(ctx);
      if (!store) {
        ui.error("No remote configured (set RCLONE_REMOTE_NAME or remote.enabled)");
        return 1;
      }
      const names = sortNewestFirst((await store.list()).map((e) => e.name));

      if (values.format === "json") {
        console.log(JSON.stringify(names, null, 2));
        return 0;
      }

      ui.intro(`Remote backups on ${store.location}`);
      if (names.length === 0) {
        ui.info("No backups found");
      } else {
        names.forEach((name, i) => {
          const parsed = parseArchiveName(name, ctx.config.backup.prefix);
          const created = parsed ? formatDateTime(parsed.createdAt) : color.dim("unknown");
          ui.message(`${color.cyan(String(i + 1).padStart(3))}  ${name}  ${color.dim(created)}`);
        });
      }
      ui.outro(`${names.length} backup(s) total`);
      return 0;
    }

    const archives = await createLocalStore(ctx).list();

    switch (values.format) {
      case "json":
        console.log(JSON.stringify(archives, null, 2));
        return 0;
      case "csv":
        printCsv(archives);
        return 0;
      default:
        ui.intro(`Local backups in ${ctx.paths.backupDir}`);
        if (archives.length === 0) {
          ui.info("No backups found");
        } else {
          printTable(archives);
        }
        ui.outro(`${archives.length} backup(s) total`);
        return 0;
    }
  } catch (error) {
    return reportFailure("List", error, values.verbose);
  }
}

function printTable(archives: LocalArchiveEntry[]): void {
  const widths = [TABLE_WIDTHS.index, TABLE_WIDTHS.archiveName, TABLE_WIDTHS.created, TABLE_WIDTHS.size];

  console.log(formatTableRow(["#", "Archive", "Created", "Size"], widths));
  console.log(formatTableSeparator(widths));

  archives.forEach((archive, i) => {
    console.log(
      formatTableRow(
        [String(i + 1), archive.fileName, formatDateTime(archive.createdAt), formatBytes(archive.sizeBytes)],
        widths,
      ),
    );
  });
}

function printCsv(archives: LocalArchiveEntry[]): void {
  console.log("file_name,created_at,size_bytes,path");
  for (const archive of archives) {
    console.log(
      [archive.fileName, archive.createdAt.toISOString(), archive.sizeBytes, archive.path]
        .map((field) => `"${String(field).replace(/"/g, '""')}"`)
        .join(","),
    );
  }
}

function printHelp(): void {
  console.log(`
${color.bold("n8n-backup list")} - List backups

${color.dim("USAGE:")}
  n8n-backup list [OPTIONS]

${color.dim("OPTIONS:")}
  -r, --remote                List the configured remote instead of the local dir
      --format <fmt>          table (default), json or csv (local only)
  -c, --config <path>         Path to config file
  -d, --install-dir <path>    n8n install directory (default: /home/n8n)
  -v, --verbose               Verbose output
  -h, --help                  Show this help message

${color.dim("EXAMPLES:")}
  n8n-backup list
  n8n-backup list --remote          # numbers match restore --select
  n8n-backup list --format json
`);
}
