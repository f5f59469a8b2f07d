import { mkdir, writeFile } from "node:fs/promises";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { LocalArchiveStore } from "../../src/storage/local";
import { pathExists } from "../../src/utils/fs";
import { setLogLevel } from "../../src/utils/logger";
import { makeTempDir, removeTempDir } from "../helpers";

describe("LocalArchiveStore", () => {
  let root: string;
  let backupDir: string;
  let store: LocalArchiveStore;

  beforeEach(async () => {
    setLogLevel("error");
    root = await makeTempDir("local");
    backupDir = path.join(root, "backup_full");
    store = new LocalArchiveStore(backupDir);
  });

  afterEach(async () => {
    await removeTempDir(root);
  });

  test("lists nothing when the directory does not exist", async () => {
    expect(await store.list()).toEqual([]);
  });

  test("lists only archives, newest first", async () => {
    await mkdir(backupDir, { recursive: true });
    await writeFile(path.join(backupDir, "n8n_backup_20260101_020000.tar.gz"), "a");
    await writeFile(path.join(backupDir, "n8n_backup_20260103_020000.tar.gz"), "abc");
    await writeFile(path.join(backupDir, "n8n_backup_20260102_020000.tar.gz"), "ab");
    await writeFile(path.join(backupDir, "notes.txt"), "keep me");
    await writeFile(path.join(backupDir, "other_20260104_020000.tar.gz"), "x");
    await mkdir(path.join(backupDir, "n8n_backup_20260105_020000.tar.gz"));

    const entries = await store.list();

    expect(entries.map((e) => e.fileName)).toEqual([
      "n8n_backup_20260103_020000.tar.gz",
      "n8n_backup_20260102_020000.tar.gz",
      "n8n_backup_20260101_020000.tar.gz",
    ]);
    expect(entries[0]?.sizeBytes).toBe(3);
    expect(entries[0]?.path).toBe(path.join(backupDir, "n8n_backup_20260103_020000.tar.gz"));
    expect(entries[0]?.createdAt.getTime()).toBe(new Date(2026, 0, 3, 2, 0, 0).getTime());
  });

  test("delete refuses paths outside the directory", async () => {
    const outside = path.join(root, "outside.tar.gz");
    await writeFile(outside, "x");

    await expect(store.delete(outside)).rejects.toThrow("Refusing to delete path outside backup directory");
    await expect(store.delete(backupDir)).rejects.toThrow("Refusing to delete path outside backup directory");
    expect(await pathExists(outside)).toBe(true);
  });

  test("delete tolerates a file that is already gone", async () => {
    await expect(store.delete(path.join(backupDir, "n8n_backup_20260101_020000.tar.gz"))).resolves.toBeUndefined();
  });
});
