/**
 * Reader for the installer's KEY="value" files (.env, telegram_config.txt,
 * gdrive_config.txt)
 */

import { readFile } from "node:fs/promises";

export type EnvMap = Record<string, string>;

const LINE_PATTERN = /^(?:export\s+)?([A-Za-z_][A-Za-z0-9_]*)\s*=\s*(.*)$/;

function unquote(raw: string): string {
  const value = raw.trim();

  if (value.length >= 2) {
    const first = value[0];
    const last = value[value.length - 1];
    if ((first === '"' || first === "'") && first === last) {
      const inner = value.slice(1, -1);
      return first === '"' ? inner.replace(/\\(["\\$`])/g, "$1") : inner;
    }
  }

  // Unquoted values may carry a trailing comment
  const hash = value.indexOf(" #");
  return hash >= 0 ? value.slice(0, hash).trimEnd() : value;
}

export function parseEnvFile(content: string): EnvMap {
  const result: EnvMap = {};

  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith("#")) continue;

    const match = line.match(LINE_PATTERN);
    if (!match) continue;

    const [, key = "", value = ""] = match;
    result[key] = unquote(value);
  }

  return result;
}

/**
 * Read and parse an env file; a missing file yields an empty map
 */
export async function readEnvFile(filePath: string): Promise<EnvMap> {
  try {
    return parseEnvFile(await readFile(filePath, "utf8"));
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") return {};
    throw err;
  }
}
