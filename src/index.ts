#!/usr/bin/env node

import * as p from "@clack/prompts";
import color from "picocolors";
import { backupCommand } from "./cli/commands/backup";
import { cleanupCommand } from "./cli/commands/cleanup";
import { listCommand } from "./cli/commands/list";
import { restoreCommand } from "./cli/commands/restore";
import { startCommand } from "./cli/commands/start";
import { verifyCommand } from "./cli/commands/verify";
import { TOOL_NAME, VERSION } from "./version";

function printHelp(): void {
  p.intro(`${color.cyan(TOOL_NAME)} ${color.dim(`v${VERSION}`)} - Backup and restore for self-hosted n8n`);

  p.note(
    `${color.cyan("backup")}      Create a backup now
${color.cyan("restore")}     Restore from a local or remote backup
${color.cyan("cleanup")}     Apply the retention policy
${color.cyan("list")}        List local or remote backups
${color.cyan("verify")}      Verify backup archives
${color.cyan("start")}       Start the scheduler daemon`,
    "Commands",
  );

  p.note(
    `-h, --help      Show this help message
-V, --version   Show version`,
    "Options",
  );

  p.note(
    `n8n-backup backup                         ${color.dim("# Back up /home/n8n")}
n8n-backup backup -d /opt/n8n             ${color.dim("# Back up another install")}
n8n-backup restore -s remote --select 1   ${color.dim("# Restore newest remote backup")}
n8n-backup cleanup --dry-run              ${color.dim("# Preview retention")}
n8n-backup verify --all                   ${color.dim("# Verify all local backups")}
n8n-backup start                          ${color.dim("# Daily backups at 02:00")}`,
    "Examples",
  );

  p.outro(`Run ${color.cyan("n8n-backup <command> --help")} for command details`);
}

async function main(): Promise<number> {
  const args = process.argv.slice(2);

  if (args.length === 0) {
    printHelp();
    return 0;
  }

  const command = args[0];
  const commandArgs = args.slice(1);

  switch (command) {
    case "start":
      return startCommand(commandArgs);

    case "backup":
      return backupCommand(commandArgs);

    case "restore":
      return restoreCommand(commandArgs);

    case "cleanup":
      return cleanupCommand(commandArgs);

    case "list":
      return listCommand(commandArgs);

    case "verify":
      return verifyCommand(commandArgs);

    case "-h":
    case "--help":
    case "help":
      printHelp();
      return 0;

    case "-V":
    case "--version":
    case "version":
      console.log(VERSION);
      return 0;

    default:
      console.error(`${color.red("Error:")} Unknown command: ${command}`);
      console.error(`Run ${color.cyan("n8n-backup --help")} for usage information.`);
      return 1;
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(`${color.red("Fatal error:")}`, error);
    process.exitCode = 1;
  });
