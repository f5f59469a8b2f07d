/**
 * Database backend seam: one implementation per supported kind
 */

import type { DatabaseKind } from "../../types";

export interface DatabaseBackend {
  readonly kind: DatabaseKind;
  /** File name of the payload under credentials/ */
  readonly payloadName: string;

  /** Write the payload into credentialsDir, returns its path */
  capture(credentialsDir: string): Promise<string>;

  /** Put the payload back into the live install */
  restore(payloadFile: string): Promise<DatabaseRestoreOutcome>;
}

export interface DatabaseRestoreOutcome {
  /** Files that were copied aside before being replaced */
  backedUpFiles: string[];
  warnings: string[];
}
