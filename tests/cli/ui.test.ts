import { describe, expect, test } from "vitest";
import { ConfigError } from "../../src/config";
import { parsePositiveInt } from "../../src/cli/context";
import { formatDateTime, formatSummary, formatTableRow, formatTableSeparator } from "../../src/cli/ui/formatters";

function plain(text: string): string {
  return text.replace(/\x1b\[[0-9;]*m/g, "");
}

describe("formatters", () => {
  test("formatSummary aligns labels and drops empty values", () => {
    const summary = formatSummary([
      { label: "Archive", value: "n8n_backup_20260101_020000.tar.gz" },
      { label: "Size", value: "1.50 MB" },
      { label: "Remote", value: undefined },
      { label: "Files", value: 5 },
    ]);

    expect(plain(summary)).toBe(
      ["Archive  n8n_backup_20260101_020000.tar.gz", "Size     1.50 MB", "Files    5"].join("\n"),
    );
  });

  test("formatTableRow pads each column", () => {
    expect(plain(formatTableRow(["1", "name"], [3, 6]))).toBe("1   │ name  ");
  });

  test("formatTableSeparator spans the columns", () => {
    expect(plain(formatTableSeparator([3, 2]))).toBe("────┼───");
  });

  test("formatDateTime uses local time", () => {
    expect(formatDateTime(new Date(2026, 0, 2, 3, 4, 5))).toBe("2026-01-02 03:04:05");
  });
});

describe("parsePositiveInt", () => {
  test("parses flag values", () => {
    expect(parsePositiveInt("7", "--retention-count")).toBe(7);
    expect(parsePositiveInt(undefined, "--retention-count")).toBeUndefined();
  });

  test("rejects zero and garbage as config errors", () => {
    expect(() => parsePositiveInt("0", "--retention-count")).toThrow(ConfigError);
    expect(() => parsePositiveInt("x", "--select")).toThrow('--select must be a positive integer, got "x"');
  });
});
