import { afterEach, beforeEach, describe, expect, it } from "vitest";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { sanitizeSaveName, writeArchivedAttachment } from "../../../src/storage/archive-writer.js";
import { WriteError } from "../../../src/types/errors.js";

describe("sanitizeSaveName", () => {
  it("replaces each illegal character", () => {
    expect(sanitizeSaveName("Q1/Q2:Report?.xlsx")).toBe("Q1_Q2_Report_.xlsx");
    expect(sanitizeSaveName('<>:"/\\|?*')).toBe("_________");
  });

  it("leaves legal names alone", () => {
    expect(sanitizeSaveName("COB 01.05.2026 - Daily.csv")).toBe("COB 01.05.2026 - Daily.csv");
  });

  it("accepts another substitute", () => {
    expect(sanitizeSaveName("a/b", "-")).toBe("a-b");
  });

  it("is stable when applied again", () => {
    const once = sanitizeSaveName("a*b?c");
    expect(sanitizeSaveName(once)).toBe(once);
  });
});

describe("writeArchivedAttachment", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "archive-writer-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("writes the exact bytes under the sanitized name", () => {
    const content = new Uint8Array([0, 1, 2, 255]);
    const written = writeArchivedAttachment(dir, "a:b.bin", content);

    expect(written).toBe(path.join(dir, "a_b.bin"));
    expect(new Uint8Array(fs.readFileSync(written))).toEqual(content);
  });

  it("overwrites an existing file of the same name", () => {
    writeArchivedAttachment(dir, "daily.csv", Buffer.from("first"));
    writeArchivedAttachment(dir, "daily.csv", Buffer.from("second"));

    expect(fs.readFileSync(path.join(dir, "daily.csv"), "utf-8")).toBe("second");
  });

  it("fails when the directory does not exist", () => {
    const missing = path.join(dir, "missing");
    let caught: unknown;
    try {
      writeArchivedAttachment(missing, "daily.csv", Buffer.from("x"));
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(WriteError);
    expect(caught instanceof WriteError ? caught.targetPath : null).toBe(path.join(missing, "daily.csv"));
    expect(fs.existsSync(missing)).toBe(false);
  });

  it("fails when the destination is a file", () => {
    const file = path.join(dir, "plain-file");
    fs.writeFileSync(file, "x");

    expect(() => writeArchivedAttachment(file, "daily.csv", Buffer.from("x"))).toThrow(
      `Archive path is not a directory: ${file}`
    );
  });
});
