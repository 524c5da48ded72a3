/**
 * Archive writer.
 *
 * Persists matched attachment bytes under the run's archive folder. The
 * folder is created by the archive path provider, never here.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { WriteError, describeError } from "../types/errors.js";

/** Characters not allowed in archived filenames */
const ILLEGAL_FILENAME_CHARS = /[<>:"/\\|?*]/g;

export const DEFAULT_SUBSTITUTE = "_";

/**
 * Replace each illegal filename character with the substitute.
 */
export function sanitizeSaveName(name: string, substitute: string = DEFAULT_SUBSTITUTE): string {
  return name.replace(ILLEGAL_FILENAME_CHARS, substitute);
}

function assertWritableDirectory(dir: string, targetPath: string): void {
  let stat: fs.Stats;
  try {
    stat = fs.statSync(dir);
  } catch (err) {
    throw new WriteError(targetPath, `Archive directory does not exist: ${dir}`, { cause: err });
  }
  if (!stat.isDirectory()) {
    throw new WriteError(targetPath, `Archive path is not a directory: ${dir}`);
  }
  try {
    fs.accessSync(dir, fs.constants.W_OK);
  } catch (err) {
    throw new WriteError(targetPath, `Archive directory is not writable: ${dir}`, { cause: err });
  }
}

/**
 * Write attachment bytes to `dir/<sanitized saveName>`, replacing any
 * existing file of that name.
 *
 * @returns The path written
 * @throws WriteError when the directory is missing or the write fails
 */
export function writeArchivedAttachment(
  dir: string,
  saveName: string,
  content: Uint8Array
): string {
  const targetPath = path.join(dir, sanitizeSaveName(saveName));
  assertWritableDirectory(dir, targetPath);

  try {
    fs.writeFileSync(targetPath, content);
  } catch (err) {
    throw new WriteError(
      targetPath,
      `Failed to write ${targetPath}: ${describeError(err)}`,
      { cause: err }
    );
  }
  return targetPath;
}

/**
 * Signature the evaluator writes through; swapped out in tests.
 */
export type AttachmentWriter = (dir: string, saveName: string, content: Uint8Array) => string;
