/**
 * Retention policy logic
 */

import { DEFAULT_ARCHIVE_PREFIX, parseArchiveName } from "../../utils/naming";

export interface RetentionSelection {
  /** Newest first */
  keep: string[];
  remove: string[];
}

/**
 * Keep the newest maxCount archives by embedded timestamp. Names that are
 * not archives of ours are neither kept nor removed.
 */
export function selectLocalRetention(
  names: string[],
  maxCount: number,
  prefix: string = DEFAULT_ARCHIVE_PREFIX,
): RetentionSelection {
  const archives = names
    .map((name) => ({ name, parsed: parseArchiveName(name, prefix) }))
    .filter((entry) => entry.parsed !== null && entry.name.endsWith(".tar.gz"))
    .map((entry) => entry.name);

  // Lexicographic order on the timestamped name is chronological
  const sorted = [...new Set(archives)].sort((a, b) => (a < b ? 1 : a > b ? -1 : 0));
  const limit = Math.max(0, maxCount);

  return {
    keep: sorted.slice(0, limit),
    remove: sorted.slice(limit),
  };
}
