import { copyFile, mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { loadRunContext } from "../src/config/loader";
import type { ExecOptions, ServiceController } from "../src/docker/compose";
import type { RemoteEntry, RemoteStore, RunContext } from "../src/types";
import type { CommandResult } from "../src/utils/exec";

export function ok(stdout = ""): CommandResult {
  return { success: true, stdout, stderr: "", exitCode: 0 };
}

export function fail(stderr: string, exitCode = 1): CommandResult {
  return { success: false, stdout: "", stderr, exitCode };
}

export async function makeTempDir(label: string): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), `n8n-backup-test-${label}-`));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export const COMPOSE_FILE = `services:
  n8n:
    image: n8nio/n8n
  postgres:
    image: postgres:16
`;

export const SQLITE_CONTENT = "SQLite format 3\u0000test-workflows";
export const ENCRYPTION_KEY = "test-encryption-key";

/**
 * A minimal install tree as the installer lays it out
 */
export async function makeInstall(
  root: string,
  kind: "sqlite" | "postgres" = "sqlite",
): Promise<string> {
  const installDir = path.join(root, "install");
  const dataDir = path.join(installDir, "files");
  await mkdir(dataDir, { recursive: true });

  await writeFile(path.join(installDir, "docker-compose.yml"), COMPOSE_FILE);
  await writeFile(path.join(installDir, "Caddyfile"), "example.test {\n  reverse_proxy n8n:5678\n}\n");
  await writeFile(
    path.join(installDir, ".env"),
    kind === "postgres"
      ? "POSTGRES_USER=n8n\nPOSTGRES_PASSWORD=test-secret\nPOSTGRES_DB=n8n\n"
      : "N8N_HOST=example.test\n",
  );
  await writeFile(path.join(dataDir, "encryptionKey"), ENCRYPTION_KEY);

  if (kind === "sqlite") {
    await writeFile(path.join(dataDir, "database.sqlite"), SQLITE_CONTENT);
  }

  return installDir;
}

export function makeContext(installDir: string, env: NodeJS.ProcessEnv = {}): Promise<RunContext> {
  return loadRunContext({ installDir, env, cwd: installDir });
}

export interface ServiceCall {
  op: "up" | "stop" | "exec";
  service?: string;
  args: string[];
  options?: ExecOptions;
}

type ExecHandler = (service: string, command: string[], options: ExecOptions) => Promise<CommandResult>;

/**
 * In-process stand-in for docker compose
 */
export class FakeServices implements ServiceController {
  readonly calls: ServiceCall[] = [];
  upResult: CommandResult = ok();
  stopResult: CommandResult = ok();
  execHandler: ExecHandler = async () => fail("not implemented", 127);

  async up(services: string[] = []): Promise<CommandResult> {
    this.calls.push({ op: "up", args: services });
    return this.upResult;
  }

  async stop(services: string[]): Promise<CommandResult> {
    this.calls.push({ op: "stop", args: services });
    return this.stopResult;
  }

  async exec(service: string, command: string[], options: ExecOptions = {}): Promise<CommandResult> {
    this.calls.push({ op: "exec", service, args: command, options });
    return this.execHandler(service, command, options);
  }

  execCommands(): string[] {
    return this.calls.filter((c) => c.op === "exec").map((c) => c.args[0] ?? "");
  }
}

/**
 * In-process stand-in for an rclone remote
 */
export class FakeRemoteStore implements RemoteStore {
  readonly location = "fake:n8n_backups";
  readonly objects = new Map<string, string>();
  readonly uploads: string[] = [];
  readonly deletions: { maxAgeDays: number; include: string }[] = [];
  uploadError: Error | null = null;
  deleteError: Error | null = null;

  async list(): Promise<RemoteEntry[]> {
    return [...this.objects.keys()].map((name) => ({ name }));
  }

  async download(name: string, destDir: string): Promise<string> {
    const source = this.objects.get(name);
    if (!source) {
      throw new Error(`object not found: ${name}`);
    }
    const target = path.join(destDir, name);
    await copyFile(source, target);
    return target;
  }

  async upload(localPath: string): Promise<void> {
    if (this.uploadError) throw this.uploadError;
    this.uploads.push(localPath);
    this.objects.set(path.basename(localPath), localPath);
  }

  async deleteOlderThan(maxAgeDays: number, include: string): Promise<void> {
    if (this.deleteError) throw this.deleteError;
    this.deletions.push({ maxAgeDays, include });
  }
}
