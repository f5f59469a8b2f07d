import { mkdir, readFile, writeFile } from "node:fs/promises";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { PostgresBackend, SqliteBackend } from "../../src/core/database";
import {
  CredentialMismatchError,
  DatabaseNotReadyError,
  exitCodeFor,
  MissingDatabaseError,
  RestoreError,
} from "../../src/core/errors";
import { PostgresClient } from "../../src/docker/postgres";
import { pathExists } from "../../src/utils/fs";
import { setLogLevel } from "../../src/utils/logger";
import { fail, FakeServices, makeTempDir, ok, removeTempDir, SQLITE_CONTENT } from "../helpers";

const OWNER = { uid: process.getuid?.() ?? 0, gid: process.getgid?.() ?? 0 };

describe("SqliteBackend", () => {
  let root: string;
  let dataDir: string;

  beforeEach(async () => {
    setLogLevel("error");
    root = await makeTempDir("sqlite");
    dataDir = path.join(root, "files");
    await mkdir(dataDir);
  });

  afterEach(async () => {
    await removeTempDir(root);
  });

  test("captures the configured file", async () => {
    await writeFile(path.join(dataDir, "database.sqlite"), SQLITE_CONTENT);
    const backend = new SqliteBackend({ file: path.join(dataDir, "database.sqlite"), dataDir, owner: OWNER });

    const payload = await backend.capture(path.join(root, "credentials"));

    expect(payload).toBe(path.join(root, "credentials", "database.sqlite"));
    expect(await readFile(payload, "utf8")).toBe(SQLITE_CONTENT);
  });

  test("finds the database below the data dir, skipping excluded dirs", async () => {
    const backupDir = path.join(dataDir, "backup_full");
    await mkdir(path.join(backupDir, "old"), { recursive: true });
    await writeFile(path.join(backupDir, "old", "database.sqlite"), "stale");
    await mkdir(path.join(dataDir, "n8n"));
    await writeFile(path.join(dataDir, "n8n", "database.sqlite"), SQLITE_CONTENT);
    const backend = new SqliteBackend({
      file: path.join(dataDir, "database.sqlite"),
      dataDir,
      exclude: [backupDir],
      owner: OWNER,
    });

    expect(await backend.locate()).toBe(path.join(dataDir, "n8n", "database.sqlite"));
  });

  test("a missing database is fatal", async () => {
    const backend = new SqliteBackend({ file: path.join(dataDir, "database.sqlite"), dataDir, owner: OWNER });

    await expect(backend.capture(path.join(root, "credentials"))).rejects.toBeInstanceOf(MissingDatabaseError);
  });

  test("restore keeps the previous database as .bak", async () => {
    const live = path.join(dataDir, "database.sqlite");
    await writeFile(live, "previous");
    const payload = path.join(root, "payload.sqlite");
    await writeFile(payload, SQLITE_CONTENT);
    const backend = new SqliteBackend({ file: live, dataDir, owner: OWNER });

    const outcome = await backend.restore(payload);

    expect(await readFile(live, "utf8")).toBe(SQLITE_CONTENT);
    expect(await readFile(`${live}.bak`, "utf8")).toBe("previous");
    expect(outcome).toEqual({ backedUpFiles: [`${live}.bak`], warnings: [] });
  });

  test("a later restore keeps earlier .bak copies", async () => {
    const live = path.join(dataDir, "database.sqlite");
    await writeFile(live, "original");
    const payload = path.join(root, "payload.sqlite");
    await writeFile(payload, SQLITE_CONTENT);
    const backend = new SqliteBackend({ file: live, dataDir, owner: OWNER });

    await backend.restore(payload);
    await writeFile(live, "edited after first restore");
    const outcome = await backend.restore(payload);

    expect(await readFile(`${live}.bak`, "utf8")).toBe("original");
    expect(await readFile(`${live}.bak.1`, "utf8")).toBe("edited after first restore");
    expect(outcome.backedUpFiles).toEqual([`${live}.bak.1`]);
  });
});

describe("PostgresBackend", () => {
  const credentials = {
    kind: "postgres" as const,
    service: "postgres",
    user: "n8n",
    password: "test-secret",
    database: "n8n",
    host: "postgres",
    port: 5432,
  };
  const readiness = { maxAttempts: 24, intervalMs: 5000 };
  const noSleep = async () => {};

  let root: string;

  beforeEach(async () => {
    setLogLevel("error");
    root = await makeTempDir("postgres");
  });

  afterEach(async () => {
    await removeTempDir(root);
  });

  function backendWith(services: FakeServices): PostgresBackend {
    return new PostgresBackend({
      client: new PostgresClient(services, credentials),
      services,
      readiness,
      sleep: noSleep,
    });
  }

  test("capture writes database.sql via pg_dump", async () => {
    const services = new FakeServices();
    services.execHandler = async (_service, _command, options) => {
      if (options.stdoutFile) await writeFile(options.stdoutFile, "CREATE TABLE workflow_entity ();\n");
      return ok();
    };

    const payload = await backendWith(services).capture(path.join(root, "credentials"));

    expect(payload).toBe(path.join(root, "credentials", "database.sql"));
    expect(await readFile(payload, "utf8")).toBe("CREATE TABLE workflow_entity ();\n");
  });

  test("a failed dump leaves no payload behind", async () => {
    const services = new FakeServices();
    services.execHandler = async (_service, _command, options) => {
      if (options.stdoutFile) await writeFile(options.stdoutFile, "partial");
      return fail('pg_dump: error: connection to server failed');
    };

    await expect(backendWith(services).capture(path.join(root, "credentials"))).rejects.toThrow(
      'pg_dump failed in service "postgres": pg_dump: error: connection to server failed',
    );
    expect(await pathExists(path.join(root, "credentials", "database.sql"))).toBe(false);
  });

  test("restore waits for readiness then replays the dump", async () => {
    const services = new FakeServices();
    let readyChecks = 0;
    services.execHandler = async (_service, command) => {
      if (command[0] === "pg_isready") return ++readyChecks >= 3 ? ok() : fail("no response", 2);
      return ok();
    };

    const outcome = await backendWith(services).restore("/tmp/database.sql");

    expect(outcome).toEqual({ backedUpFiles: [], warnings: [] });
    expect(services.calls[0]).toEqual({ op: "up", args: ["postgres"] });
    expect(services.execCommands()).toEqual(["pg_isready", "pg_isready", "pg_isready", "psql"]);
  });

  test("never ready fails after maxAttempts without touching data", async () => {
    const services = new FakeServices();
    services.execHandler = async () => fail("no response", 2);

    const error = await backendWith(services).restore("/tmp/database.sql").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(DatabaseNotReadyError);
    expect(error).toHaveProperty("attempts", 24);
    expect(exitCodeFor(error)).toBe(15);
    expect(services.execCommands().filter((c) => c === "pg_isready")).toHaveLength(24);
    expect(services.execCommands()).not.toContain("psql");
  });

  test("rejected credentials stop the service and raise CredentialMismatchError", async () => {
    const services = new FakeServices();
    services.execHandler = async (_service, command) =>
      command[0] === "psql" ? fail('FATAL:  password authentication failed for user "n8n"') : ok();

    await expect(backendWith(services).restore("/tmp/database.sql")).rejects.toBeInstanceOf(CredentialMismatchError);
    expect(services.calls[services.calls.length - 1]).toEqual({ op: "stop", args: ["postgres"] });
  });

  test("other replay errors are restore errors", async () => {
    const services = new FakeServices();
    services.execHandler = async (_service, command) =>
      command[0] === "psql" ? fail('ERROR:  relation "x" already exists') : ok();

    const error = await backendWith(services).restore("/tmp/database.sql").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RestoreError);
    expect(error).not.toBeInstanceOf(CredentialMismatchError);
    expect(error).toHaveProperty("step", "apply");
  });
});
