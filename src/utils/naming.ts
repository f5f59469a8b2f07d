/**
 * Archive naming utilities
 *
 * Archive names embed their creation time with one-second granularity:
 *   n8n_backup_20260101_020000.tar.gz
 * so lexicographic order on the name is chronological order.
 */

export { formatBytes, formatDuration } from "./format";

export const DEFAULT_ARCHIVE_PREFIX = "n8n_backup";
export const ARCHIVE_EXTENSION = ".tar.gz";

export interface ParsedArchiveName {
  prefix: string;
  /** Name without extension */
  name: string;
  date: string;
  time: string;
  createdAt: Date;
}

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

/**
 * Format a date as YYYYMMDD_HHMMSS in local time
 */
export function formatArchiveTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

export function generateArchiveName(
  date: Date = new Date(),
  prefix: string = DEFAULT_ARCHIVE_PREFIX,
): string {
  return `${prefix}_${formatArchiveTimestamp(date)}`;
}

export function archiveFileName(name: string): string {
  return `${name}${ARCHIVE_EXTENSION}`;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function namePattern(prefix: string): RegExp {
  return new RegExp(`^(${escapeRegExp(prefix)})_(\\d{8})_(\\d{6})(?:\\.tar\\.gz)?$`);
}

/**
 * Parse an archive name (with or without .tar.gz)
 */
export function parseArchiveName(
  archiveName: string,
  prefix: string = DEFAULT_ARCHIVE_PREFIX,
): ParsedArchiveName | null {
  const match = archiveName.match(namePattern(prefix));
  if (!match) return null;

  const [, matchedPrefix = "", date = "", time = ""] = match;
  const createdAt = new Date(
    Number(date.slice(0, 4)),
    Number(date.slice(4, 6)) - 1,
    Number(date.slice(6, 8)),
    Number(time.slice(0, 2)),
    Number(time.slice(2, 4)),
    Number(time.slice(4, 6)),
  );

  if (Number.isNaN(createdAt.getTime())) return null;

  return {
    prefix: matchedPrefix,
    name: `${matchedPrefix}_${date}_${time}`,
    date,
    time,
    createdAt,
  };
}

/**
 * Check a file name is one of our archives (extension required)
 */
export function isValidArchiveName(
  fileName: string,
  expectedPrefix: string = DEFAULT_ARCHIVE_PREFIX,
): boolean {
  return fileName.endsWith(ARCHIVE_EXTENSION) && parseArchiveName(fileName, expectedPrefix) !== null;
}

/**
 * Glob handed to remote tools so they only touch our archives
 */
export function archiveGlob(prefix: string = DEFAULT_ARCHIVE_PREFIX): string {
  return `${prefix}_*${ARCHIVE_EXTENSION}`;
}

/**
 * Sort newest first by embedded timestamp
 */
export function sortNewestFirst(names: string[]): string[] {
  return [...names].sort((a, b) => (a < b ? 1 : a > b ? -1 : 0));
}
