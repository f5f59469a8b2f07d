/**
 * Backup deletion validation
 */

import * as path from "node:path";
import { isValidArchiveName } from "../../utils/naming";
import { isPathWithinDir } from "../../utils/path";

export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

/**
 * Safety checks run before any local archive is deleted
 */
export function validateDeletionCandidate(
  filePath: string,
  backupDir: string,
  prefix: string,
): ValidationResult {
  const errors: string[] = [];
  const fileName = path.basename(filePath);

  if (!isValidArchiveName(fileName, prefix)) {
    errors.push(`Archive name "${fileName}" doesn't match ${prefix} pattern - REFUSING TO DELETE`);
    return { valid: false, errors };
  }

  const resolvedDir = path.resolve(backupDir);
  if (!isPathWithinDir(filePath, resolvedDir) || path.dirname(path.resolve(filePath)) !== resolvedDir) {
    errors.push(
      `Path "${filePath}" is outside backup directory "${backupDir}" - REFUSING TO DELETE`,
    );
    return { valid: false, errors };
  }

  return { valid: true, errors };
}
