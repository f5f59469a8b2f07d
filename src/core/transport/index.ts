/**
 * Archive distribution to the remote store and Telegram
 */

import type { BackupArchive, RemoteStore, RunContext, RunIssue, SinkOutcome, TransportResult } from "../../types";
import { logger } from "../../utils/logger";
import { formatBytes } from "../../utils/naming";
import { errorMessage, TransportError } from "../errors";
import { fitsTelegramLimit, type FetchLike, TelegramNotifier } from "./telegram";

export {
  type FetchLike,
  fitsTelegramLimit,
  TelegramApiError,
  TelegramNotifier,
  type TelegramNotifierOptions,
} from "./telegram";

export interface TransportSinks {
  remote: RemoteStore | null;
  telegram: TelegramNotifier | null;
}

export interface DistributionResult {
  transport: TransportResult;
  issues: RunIssue[];
}

/**
 * Telegram notifier from config, or null when not configured
 */
export function createTelegramNotifier(ctx: RunContext, fetchImpl?: FetchLike): TelegramNotifier | null {
  const { telegram } = ctx.config;
  if (!telegram.enabled || !telegram.botToken || !telegram.chatId) {
    return null;
  }
  return new TelegramNotifier({
    botToken: telegram.botToken,
    chatId: telegram.chatId,
    apiBaseUrl: telegram.apiBaseUrl,
    fetch: fetchImpl,
  });
}

function formatTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

function describeOutcome(outcome: SinkOutcome): string {
  switch (outcome) {
    case "sent":
      return "✅ Uploaded";
    case "failed":
      return "❌ Failed";
    case "skipped":
      return "⚠️ Skipped";
    case "disabled":
      return "Not configured";
  }
}

export function formatStatusMessage(
  archive: BackupArchive,
  outcomes: Pick<TransportResult, "remoteUpload" | "telegramFile">,
): string {
  const lines = [
    "🔄 *N8N Backup Completed*",
    `📅 Date: ${formatTimestamp(archive.createdAt)}`,
    `📦 File: \`${archive.fileName}\``,
    `💾 Size: ${formatBytes(archive.sizeBytes)}`,
    `🗄 Database: ${archive.databaseKind}`,
    "📊 Status: ✅ Success",
    `☁️ Remote: ${describeOutcome(outcomes.remoteUpload)}`,
  ];

  if (outcomes.telegramFile === "skipped") {
    lines.push("📎 File too large for Telegram (20 MB limit), not attached");
  } else if (outcomes.telegramFile === "failed") {
    lines.push("📎 Attaching the file to Telegram failed");
  }

  return lines.join("\n");
}

export function formatFailureMessage(error: unknown, when: Date = new Date()): string {
  return [
    "🚨 *N8N Backup Failed*",
    `📅 Date: ${formatTimestamp(when)}`,
    `❗ Error: \`${errorMessage(error).replace(/`/g, "'")}\``,
  ].join("\n");
}

function transportIssue(error: TransportError): RunIssue {
  logger.warn(error.message);
  return { kind: "transport", message: error.message };
}

/**
 * Remote upload first, then the Telegram document, then the Telegram status
 * message (sent even when everything else failed). Failures become issues.
 */
export async function distributeArchive(
  archive: BackupArchive,
  sinks: TransportSinks,
): Promise<DistributionResult> {
  const issues: RunIssue[] = [];
  const transport: TransportResult = {
    remoteUpload: "disabled",
    telegramFile: "disabled",
    telegramStatus: "disabled",
  };

  if (sinks.remote) {
    try {
      await sinks.remote.upload(archive.path);
      transport.remoteUpload = "sent";
      logger.info(`Uploaded ${archive.fileName} to ${sinks.remote.location}`);
    } catch (error) {
      transport.remoteUpload = "failed";
      issues.push(
        transportIssue(
          new TransportError("remote", `Upload to ${sinks.remote.location} failed: ${errorMessage(error)}`, {
            cause: error,
          }),
        ),
      );
    }
  }

  const telegram = sinks.telegram;
  if (!telegram) {
    return { transport, issues };
  }

  if (fitsTelegramLimit(archive.sizeBytes)) {
    try {
      await telegram.sendDocument(archive.path, `📦 ${archive.fileName}`);
      transport.telegramFile = "sent";
    } catch (error) {
      transport.telegramFile = "failed";
      issues.push(
        transportIssue(
          new TransportError("telegram", `Sending archive to Telegram failed: ${errorMessage(error)}`, { cause: error }),
        ),
      );
    }
  } else {
    transport.telegramFile = "skipped";
    logger.info(`Archive is ${formatBytes(archive.sizeBytes)}, too large to send to Telegram`);
  }

  try {
    await telegram.sendMessage(formatStatusMessage(archive, transport));
    transport.telegramStatus = "sent";
  } catch (error) {
    transport.telegramStatus = "failed";
    issues.push(
      transportIssue(
        new TransportError("telegram", `Sending Telegram status failed: ${errorMessage(error)}`, { cause: error }),
      ),
    );
  }

  return { transport, issues };
}

/**
 * Best-effort notice that a backup aborted. Never throws.
 */
export async function notifyFailure(error: unknown, sinks: Pick<TransportSinks, "telegram">): Promise<boolean> {
  if (!sinks.telegram) return false;

  try {
    await sinks.telegram.sendMessage(formatFailureMessage(error));
    return true;
  } catch (sendError) {
    logger.warn(`Could not send failure notification: ${errorMessage(sendError)}`);
    return false;
  }
}
