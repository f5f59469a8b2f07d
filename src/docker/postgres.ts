/**
 * pg_dump / pg_isready / psql run inside the database service
 */

import type { PostgresCredentials } from "../types";
import type { CommandResult } from "../utils/exec";
import type { ServiceController } from "./compose";

export class PostgresClient {
  constructor(
    private readonly services: ServiceController,
    private readonly credentials: PostgresCredentials,
  ) {}

  get service(): string {
    return this.credentials.service;
  }

  private get env(): Record<string, string> {
    return { PGPASSWORD: this.credentials.password };
  }

  /**
   * Plain-SQL dump streamed to outFile. --clean/--if-exists make the dump
   * replayable over an existing schema.
   */
  dump(outFile: string): Promise<CommandResult> {
    const { user, database } = this.credentials;
    return this.services.exec(
      this.service,
      ["pg_dump", "-U", user, "-d", database, "--clean", "--if-exists", "--no-owner"],
      { env: this.env, stdoutFile: outFile },
    );
  }

  async isReady(): Promise<boolean> {
    const { user, database } = this.credentials;
    const result = await this.services.exec(this.service, [
      "pg_isready",
      "-U",
      user,
      "-d",
      database,
    ]);
    return result.success;
  }

  load(sqlFile: string): Promise<CommandResult> {
    const { user, database } = this.credentials;
    return this.services.exec(
      this.service,
      ["psql", "-v", "ON_ERROR_STOP=1", "-q", "-U", user, "-d", database],
      { env: this.env, stdinFile: sqlFile },
    );
  }
}

const AUTH_FAILURE_PATTERNS = [
  /password authentication failed/i,
  /role "[^"]*" does not exist/i,
  /database "[^"]*" does not exist/i,
  /permission denied/i,
  /no pg_hba\.conf entry/i,
];

/**
 * True when psql output says the credentials don't fit the server
 */
export function isCredentialFailure(stderr: string): boolean {
  return AUTH_FAILURE_PATTERNS.some((pattern) => pattern.test(stderr));
}
