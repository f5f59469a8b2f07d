/**
 * Telegram Bot API client: status messages and archive uploads
 */

import { openAsBlob } from "node:fs";
import * as path from "node:path";
import { TELEGRAM_FILE_LIMIT_BYTES } from "../../config/defaults";
import { logger } from "../../utils/logger";

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface TelegramNotifierOptions {
  botToken: string;
  chatId: string;
  apiBaseUrl?: string;
  fetch?: FetchLike;
}

interface TelegramResponse {
  ok?: boolean;
  description?: string;
}

export class TelegramApiError extends Error {
  constructor(
    readonly method: string,
    readonly status: number,
    description: string,
  ) {
    super(`Telegram ${method} failed (${status}): ${description}`);
    this.name = "TelegramApiError";
  }
}

/**
 * Bot API rejects documents at or above this size
 */
export function fitsTelegramLimit(sizeBytes: number): boolean {
  return sizeBytes < TELEGRAM_FILE_LIMIT_BYTES;
}

export class TelegramNotifier {
  private readonly fetch: FetchLike;
  private readonly baseUrl: string;

  constructor(private readonly options: TelegramNotifierOptions) {
    this.fetch = options.fetch ?? ((input, init) => fetch(input, init));
    this.baseUrl = (options.apiBaseUrl ?? "https://api.telegram.org").replace(/\/+$/, "");
  }

  private endpoint(method: string): string {
    return `${this.baseUrl}/bot${this.options.botToken}/${method}`;
  }

  private async call(method: string, init: RequestInit): Promise<void> {
    const response = await this.fetch(this.endpoint(method), { method: "POST", ...init });

    const body: TelegramResponse = {};
    try {
      const parsed: unknown = await response.json();
      if (typeof parsed === "object" && parsed !== null) {
        if ("ok" in parsed && typeof parsed.ok === "boolean") body.ok = parsed.ok;
        if ("description" in parsed && typeof parsed.description === "string") {
          body.description = parsed.description;
        }
      }
    } catch {
      logger.debug(`Telegram ${method} returned a non-JSON body`);
    }

    if (!response.ok || body.ok === false) {
      throw new TelegramApiError(method, response.status, body.description ?? response.statusText);
    }
  }

  async sendMessage(text: string): Promise<void> {
    await this.call("sendMessage", {
      headers: { "content-type": "application/json" },
      body: JSON.stringify({
        chat_id: this.options.chatId,
        text,
        parse_mode: "Markdown",
      }),
    });
  }

  async sendDocument(filePath: string, caption?: string): Promise<void> {
    const form = new FormData();
    form.append("chat_id", this.options.chatId);
    if (caption) {
      form.append("caption", caption);
    }
    form.append("document", await openAsBlob(filePath), path.basename(filePath));

    await this.call("sendDocument", { body: form });
  }
}
