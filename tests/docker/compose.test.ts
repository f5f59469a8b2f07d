import { writeFile } from "node:fs/promises";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { ComposeProject, detectComposeCommand, listComposeServices } from "../../src/docker/compose";
import { isCredentialFailure, PostgresClient } from "../../src/docker/postgres";
import type { CommandRunner } from "../../src/utils/exec";
import { setLogLevel } from "../../src/utils/logger";
import { COMPOSE_FILE, fail, FakeServices, makeTempDir, ok, removeTempDir } from "../helpers";

describe("detectComposeCommand", () => {
  beforeEach(() => {
    setLogLevel("error");
  });

  test("prefers the compose plugin", async () => {
    const runner = vi.fn<CommandRunner>(async () => ok("Docker Compose version v2.27.0"));
    expect(await detectComposeCommand(runner)).toEqual(["docker", "compose"]);
    expect(runner).toHaveBeenCalledTimes(1);
  });

  test("falls back to docker-compose", async () => {
    const runner = vi.fn<CommandRunner>(async (command) =>
      command === "docker" ? fail("unknown command: compose") : ok("docker-compose version 1.29.2"),
    );
    expect(await detectComposeCommand(runner)).toEqual(["docker-compose"]);
  });

  test("fails when neither is installed", async () => {
    const runner = vi.fn<CommandRunner>(async () => fail("not found", 127));
    await expect(detectComposeCommand(runner)).rejects.toThrow(
      "Neither 'docker compose' nor 'docker-compose' is available",
    );
  });
});

describe("ComposeProject", () => {
  test("runs against the compose file from its directory", async () => {
    const runner = vi.fn<CommandRunner>(async () => ok());
    const project = new ComposeProject("/home/n8n/docker-compose.yml", runner);

    await project.up();
    await project.stop(["n8n"]);

    expect(runner).toHaveBeenNthCalledWith(2, "docker", ["compose", "-f", "/home/n8n/docker-compose.yml", "up", "-d"], {
      cwd: "/home/n8n",
    });
    expect(runner).toHaveBeenNthCalledWith(3, "docker", ["compose", "-f", "/home/n8n/docker-compose.yml", "stop", "n8n"], {
      cwd: "/home/n8n",
    });
  });

  test("exec passes env names on the command line and values through the environment", async () => {
    const runner = vi.fn<CommandRunner>(async () => ok());
    const project = new ComposeProject("/home/n8n/docker-compose.yml", runner);

    await project.exec("postgres", ["pg_isready"], { env: { PGPASSWORD: "test-secret" }, stdoutFile: "/tmp/out" });

    expect(runner).toHaveBeenLastCalledWith(
      "docker",
      ["compose", "-f", "/home/n8n/docker-compose.yml", "exec", "-T", "-e", "PGPASSWORD", "postgres", "pg_isready"],
      { env: { PGPASSWORD: "test-secret" }, stdinFile: undefined, stdoutFile: "/tmp/out", cwd: "/home/n8n" },
    );
  });
});

describe("listComposeServices", () => {
  let dir: string;

  beforeEach(async () => {
    setLogLevel("error");
    dir = await makeTempDir("compose");
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  test("returns declared service names", async () => {
    const file = path.join(dir, "docker-compose.yml");
    await writeFile(file, COMPOSE_FILE);
    expect(await listComposeServices(file)).toEqual(["n8n", "postgres"]);
  });

  test("returns null without a services section", async () => {
    const file = path.join(dir, "docker-compose.yml");
    await writeFile(file, "version: '3'\n");
    expect(await listComposeServices(file)).toBeNull();
    expect(await listComposeServices(path.join(dir, "missing.yml"))).toBeNull();
  });
});

describe("PostgresClient", () => {
  const credentials = {
    kind: "postgres" as const,
    service: "postgres",
    user: "n8n",
    password: "test-secret",
    database: "n8n",
    host: "postgres",
    port: 5432,
  };

  test("dump streams pg_dump output with the password in the environment", async () => {
    const services = new FakeServices();
    services.execHandler = async () => ok();
    const client = new PostgresClient(services, credentials);

    await client.dump("/tmp/database.sql");

    expect(services.calls).toEqual([
      {
        op: "exec",
        service: "postgres",
        args: ["pg_dump", "-U", "n8n", "-d", "n8n", "--clean", "--if-exists", "--no-owner"],
        options: { env: { PGPASSWORD: "test-secret" }, stdoutFile: "/tmp/database.sql" },
      },
    ]);
  });

  test("load feeds the file to psql with ON_ERROR_STOP", async () => {
    const services = new FakeServices();
    services.execHandler = async () => ok();
    const client = new PostgresClient(services, credentials);

    await client.load("/tmp/database.sql");

    expect(services.calls[0]?.args).toEqual(["psql", "-v", "ON_ERROR_STOP=1", "-q", "-U", "n8n", "-d", "n8n"]);
    expect(services.calls[0]?.options).toEqual({ env: { PGPASSWORD: "test-secret" }, stdinFile: "/tmp/database.sql" });
  });

  test("isReady reflects pg_isready", async () => {
    const services = new FakeServices();
    services.execHandler = async () => fail("no response", 2);
    expect(await new PostgresClient(services, credentials).isReady()).toBe(false);
  });

  test("recognizes credential failures", () => {
    expect(isCredentialFailure('FATAL:  password authentication failed for user "n8n"')).toBe(true);
    expect(isCredentialFailure('FATAL:  role "n8n" does not exist')).toBe(true);
    expect(isCredentialFailure('ERROR:  syntax error at or near "CREAT"')).toBe(false);
  });
});
