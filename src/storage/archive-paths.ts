/**
 * Archive folder layout.
 *
 * One folder per calendar day: `<base>/<yyyy>/<MonthName>/COB MM.dd.yyyy`.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { format } from "date-fns";

export function archivePathFor(baseDir: string, referenceDate: Date): string {
  return path.join(
    baseDir,
    format(referenceDate, "yyyy"),
    format(referenceDate, "MMMM"),
    `COB ${format(referenceDate, "MM.dd.yyyy")}`
  );
}

/**
 * Resolve the day's archive folder and make sure it exists.
 */
export function makeArchivePath(baseDir: string, referenceDate: Date): string {
  const dir = archivePathFor(baseDir, referenceDate);
  fs.mkdirSync(dir, { recursive: true });
  return dir;
}
