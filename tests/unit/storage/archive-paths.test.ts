import { afterEach, beforeEach, describe, expect, it } from "vitest";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { archivePathFor, makeArchivePath } from "../../../src/storage/archive-paths.js";

describe("Archive paths", () => {
  let baseDir: string;

  beforeEach(() => {
    baseDir = fs.mkdtempSync(path.join(os.tmpdir(), "archive-paths-"));
  });

  afterEach(() => {
    fs.rmSync(baseDir, { recursive: true, force: true });
  });

  it("lays out year, month name and close-of-business day", () => {
    expect(archivePathFor("/statements", new Date(2026, 2, 6))).toBe(
      path.join("/statements", "2026", "March", "COB 03.06.2026")
    );
  });

  it("creates the folder and is safe to call again", () => {
    const first = makeArchivePath(baseDir, new Date(2026, 0, 5));
    const second = makeArchivePath(baseDir, new Date(2026, 0, 5, 18, 0));

    expect(first).toBe(path.join(baseDir, "2026", "January", "COB 01.05.2026"));
    expect(second).toBe(first);
    expect(fs.statSync(first).isDirectory()).toBe(true);
  });
});
