// Locates the student's registration file

import * as fs from 'fs/promises';
import * as path from 'path';
import { type CheckOutcome, emptyOutcome } from '../../models/check.js';
import { isNotFound } from '../../core/fs-errors.js';

/**
 * Path of the registration file relative to the repository root,
 * with forward slashes as git reports it
 */
export function registrationPath(acceptsDir: string, author: string): string {
  return path.posix.join(acceptsDir.replace(/\\/g, '/'), `${author}.yaml`);
}

export interface LocatedFile {
  outcome: CheckOutcome;
  /** Absolute path when the file exists */
  filePath?: string;
  relativePath: string;
}

export async function locateRegistrationFile(
  rootDir: string,
  acceptsDir: string,
  author: string
): Promise<LocatedFile> {
  const outcome = emptyOutcome();
  const relativePath = registrationPath(acceptsDir, author);
  const filePath = path.resolve(rootDir, relativePath);

  let isFile = false;
  try {
    isFile = (await fs.stat(filePath)).isFile();
  } catch (error) {
    if (!isNotFound(error)) {
      throw error;
    }
  }

  if (!isFile) {
    outcome.errors.push(
      `!!  File not found.\n` +
        `    Expected path: '${relativePath}'\n` +
        `    Make sure the file is created in the right folder and has the right name.`
    );
    return { outcome, relativePath };
  }

  outcome.passed.push(`....File found: ${relativePath}`);
  return { outcome, filePath, relativePath };
}
