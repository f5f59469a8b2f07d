import { mkdir, readdir, readFile, rm, writeFile } from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { createSnapshot, detectN8nVersion, runBackup, TarArchiver } from "../../src/core/backup";
import { createDatabaseBackend } from "../../src/core/database";
import { ArchiveExistsError, exitCodeFor, LockError, MissingDatabaseError } from "../../src/core/errors";
import { type FetchLike, TelegramNotifier } from "../../src/core/transport";
import type { BackupMetadata, RunContext } from "../../src/types";
import { pathExists, tempPrefixFor } from "../../src/utils/fs";
import { setLogLevel } from "../../src/utils/logger";
import {
  ENCRYPTION_KEY,
  fail,
  FakeRemoteStore,
  FakeServices,
  makeContext,
  makeInstall,
  makeTempDir,
  ok,
  removeTempDir,
} from "../helpers";

const NOW = new Date(2026, 0, 1, 2, 0, 0);
const NAME = "n8n_backup_20260101_020000";

function appServices(): FakeServices {
  const services = new FakeServices();
  services.execHandler = async (_service, command, options) => {
    if (command[0] === "n8n") return ok("1.50.0");
    if (command[0] === "pg_dump" && options.stdoutFile) {
      await writeFile(options.stdoutFile, "CREATE TABLE workflow_entity ();\n");
      return ok();
    }
    return fail("unexpected command");
  };
  return services;
}

async function leftoverTempDirs(installDir: string): Promise<string[]> {
  const prefix = tempPrefixFor(installDir);
  return (await readdir(os.tmpdir())).filter((entry) => entry.startsWith(prefix));
}

describe("detectN8nVersion", () => {
  test("falls back to unknown", async () => {
    const services = new FakeServices();
    expect(await detectN8nVersion(services, "n8n")).toBe("unknown");
    expect(await detectN8nVersion(undefined, "n8n")).toBe("unknown");
  });
});

describe("createSnapshot", () => {
  let root: string;

  beforeEach(async () => {
    setLogLevel("error");
    root = await makeTempDir("snapshot");
  });

  afterEach(async () => {
    await removeTempDir(root);
  });

  test("stages database, key, config files and metadata", async () => {
    const installDir = await makeInstall(root, "sqlite");
    const ctx = await makeContext(installDir);
    const services = appServices();
    const backend = createDatabaseBackend(ctx, "sqlite", { services });

    const snapshot = await createSnapshot(ctx, { backend, services, now: () => NOW });

    try {
      expect(snapshot.name).toBe(NAME);
      expect(path.basename(snapshot.contentDir)).toBe(NAME);
      expect(snapshot.payloadFile).toBe(path.join(snapshot.contentDir, "credentials", "database.sqlite"));
      expect(await readFile(path.join(snapshot.contentDir, "credentials", "encryptionKey"), "utf8")).toBe(
        ENCRYPTION_KEY,
      );
      expect((await readdir(path.join(snapshot.contentDir, "config"))).sort()).toEqual([
        ".env",
        "Caddyfile",
        "docker-compose.yml",
      ]);

      const metadata: BackupMetadata = JSON.parse(
        await readFile(path.join(snapshot.contentDir, "backup_metadata.json"), "utf8"),
      );
      expect(metadata).toMatchObject({
        backup_date: NOW.toISOString(),
        backup_name: NAME,
        database_kind: "sqlite",
        n8n_version: "1.50.0",
        backup_type: "full",
        files_included: 5,
      });
    } finally {
      await removeTempDir(snapshot.stagingRoot);
    }
  });

  test("a missing database fails without leaving staging behind", async () => {
    const installDir = await makeInstall(root, "sqlite");
    await rm(path.join(installDir, "files", "database.sqlite"));
    const ctx = await makeContext(installDir);
    const backend = createDatabaseBackend(ctx, "sqlite", { services: new FakeServices() });

    await expect(createSnapshot(ctx, { backend, now: () => NOW })).rejects.toBeInstanceOf(MissingDatabaseError);
    expect(await leftoverTempDirs(installDir)).toEqual([]);
  });
});

describe("runBackup", () => {
  let root: string;

  beforeEach(async () => {
    setLogLevel("error");
    root = await makeTempDir("backup");
  });

  afterEach(async () => {
    await removeTempDir(root);
  });

  function depsFor(ctx: RunContext, services: FakeServices) {
    return {
      backend: createDatabaseBackend(ctx, ctx.databaseKind, { services }),
      archiver: new TarArchiver(),
      services,
      remote: null,
      telegram: null,
      now: () => NOW,
    };
  }

  test("produces a verified sqlite archive in the backup directory", async () => {
    const installDir = await makeInstall(root, "sqlite");
    const ctx = await makeContext(installDir);

    const result = await runBackup(ctx, depsFor(ctx, appServices()));

    expect(result.archive.path).toBe(path.join(installDir, "files", "backup_full", `${NAME}.tar.gz`));
    expect(result.archive.databaseKind).toBe("sqlite");
    expect(result.archive.contentsManifest).toEqual(
      expect.arrayContaining([
        `${NAME}/credentials/database.sqlite`,
        `${NAME}/credentials/encryptionKey`,
        `${NAME}/config/.env`,
        `${NAME}/backup_metadata.json`,
      ]),
    );
    expect(result.archive.contentsManifest).not.toContain(`${NAME}/credentials/database.sql`);
    expect(result.retention).toEqual({ localKept: [`${NAME}.tar.gz`], localDeleted: [], remotePruned: false });
    expect(result.transport).toEqual({ remoteUpload: "disabled", telegramFile: "disabled", telegramStatus: "disabled" });
    expect(result.issues).toEqual([]);
    expect(await pathExists(ctx.paths.lockFile)).toBe(false);
    expect(await leftoverTempDirs(installDir)).toEqual([]);
  });

  test("keeps the newest 30 archives including the new one", async () => {
    const installDir = await makeInstall(root, "sqlite");
    const ctx = await makeContext(installDir);
    await mkdir(ctx.paths.backupDir, { recursive: true });
    const existing = Array.from(
      { length: 35 },
      (_, i) => `n8n_backup_20251231_02${String(i).padStart(2, "0")}00.tar.gz`,
    );
    for (const fileName of existing) {
      await writeFile(path.join(ctx.paths.backupDir, fileName), "older");
    }

    const result = await runBackup(ctx, depsFor(ctx, appServices()));

    expect([...result.retention.localDeleted].sort()).toEqual(existing.slice(0, 6));
    expect(result.retention.localKept).toHaveLength(30);
    expect(result.retention.localKept).toContain(`${NAME}.tar.gz`);
    expect((await readdir(ctx.paths.backupDir)).sort()).toEqual([...existing.slice(6), `${NAME}.tar.gz`]);
  });

  test("a second run in the same second leaves the first archive intact", async () => {
    const installDir = await makeInstall(root, "sqlite");
    const ctx = await makeContext(installDir);
    const first = await runBackup(ctx, depsFor(ctx, appServices()));
    const firstBytes = await readFile(first.archive.path);

    const failingArchiver = {
      create: async (_baseDir: string, _entry: string, destFile: string) => {
        await writeFile(destFile, "partial");
      },
      list: async (): Promise<string[]> => {
        throw new Error("disk error");
      },
      extract: async () => {},
    };
    const error = await runBackup(ctx, { ...depsFor(ctx, appServices()), archiver: failingArchiver }).catch(
      (e: unknown) => e,
    );

    expect(error).toBeInstanceOf(ArchiveExistsError);
    expect(await readdir(ctx.paths.backupDir)).toEqual([`${NAME}.tar.gz`]);
    expect((await readFile(first.archive.path)).equals(firstBytes)).toBe(true);
    expect(await pathExists(ctx.paths.lockFile)).toBe(false);
  });

  test("postgres installs archive a pg_dump payload", async () => {
    const installDir = await makeInstall(root, "postgres");
    const ctx = await makeContext(installDir);
    const services = appServices();

    const result = await runBackup(ctx, depsFor(ctx, services));

    expect(result.archive.databaseKind).toBe("postgres");
    expect(result.archive.contentsManifest).toContain(`${NAME}/credentials/database.sql`);
    expect(result.archive.contentsManifest).not.toContain(`${NAME}/credentials/database.sqlite`);
    expect(services.execCommands()).toEqual(["pg_dump", "n8n"]);
  });

  test("transport failures do not fail the run", async () => {
    const installDir = await makeInstall(root, "sqlite");
    const ctx = await makeContext(installDir);
    const remote = new FakeRemoteStore();
    remote.uploadError = new Error("rate limited");

    const result = await runBackup(ctx, { ...depsFor(ctx, appServices()), remote });

    expect(await pathExists(result.archive.path)).toBe(true);
    expect(result.transport.remoteUpload).toBe("failed");
    expect(result.retention.remotePruned).toBe(true);
    expect(result.issues).toEqual([{ kind: "transport", message: "Upload to fake:n8n_backups failed: rate limited" }]);
  });

  test("a fatal failure sends a failure notice and rethrows", async () => {
    const installDir = await makeInstall(root, "sqlite");
    await rm(path.join(installDir, "files", "database.sqlite"));
    const ctx = await makeContext(installDir);
    const bodies: string[] = [];
    const fetchImpl = vi.fn<FetchLike>(async (_input, init) => {
      bodies.push(String(init?.body));
      return Response.json({ ok: true });
    });
    const telegram = new TelegramNotifier({ botToken: "test-token", chatId: "42", fetch: fetchImpl });

    const error = await runBackup(ctx, { ...depsFor(ctx, appServices()), telegram }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(MissingDatabaseError);
    expect(exitCodeFor(error)).toBe(10);
    expect(fetchImpl).toHaveBeenCalledTimes(1);
    expect(bodies[0]).toContain("N8N Backup Failed");
    expect(await readdir(ctx.paths.backupDir).catch(() => [])).toEqual([]);
    expect(await pathExists(ctx.paths.lockFile)).toBe(false);
  });

  test("refuses to run while another process holds the lock", async () => {
    const installDir = await makeInstall(root, "sqlite");
    const ctx = await makeContext(installDir);
    await writeFile(ctx.paths.lockFile, `${process.ppid}\n1700000000000\n`);
    const services = appServices();

    const error = await runBackup(ctx, depsFor(ctx, services)).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(LockError);
    expect(exitCodeFor(error)).toBe(3);
    expect(services.calls).toEqual([]);
  });
});
