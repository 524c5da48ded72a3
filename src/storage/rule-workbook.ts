/**
 * Rule workbook storage.
 *
 * Reads the rules sheet from an .xlsx workbook and writes statuses and run
 * metadata back. Run metadata lives in workbook-level defined names
 * (CBD, PBD, P2BD, Start_Time, End_Time, Execution_Time) so its location
 * does not depend on the rule count.
 */

import ExcelJS from "exceljs";
import type { CellValue as ExcelCellValue, Workbook, Worksheet } from "exceljs";
import type { CellValue, RawTable, RuleTable } from "../types/rule.js";
import { ConnectionError, describeError } from "../types/errors.js";
import { resolveColumns, normalizeKey } from "../services/rule-table.js";
import { formatBusinessDate, type BusinessDates } from "../services/business-dates.js";
import { formatTimestamp, type RunMetadata } from "../services/result-sync.js";
import { createLogger, type Logger } from "../services/logger.js";

export const NAMED_CELLS = {
  cbd: "CBD",
  pbd: "PBD",
  p2bd: "P2BD",
  startTime: "Start_Time",
  endTime: "End_Time",
  executionTime: "Execution_Time",
} as const;

/** Optional free-text column cleared together with the status column */
const COMMENTS_COLUMN = "comments";

/** Sheet row of the first rule (row 1 holds headers) */
const FIRST_DATA_ROW = 2;

/**
 * Flatten an ExcelJS cell value (rich text, formulas, hyperlinks) to a
 * plain value.
 */
export function toCellValue(value: ExcelCellValue): CellValue {
  if (value === null || value === undefined) return null;
  if (
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean" ||
    value instanceof Date
  ) {
    return value;
  }
  if ("richText" in value) {
    return value.richText.map((part) => part.text).join("");
  }
  if ("hyperlink" in value) {
    return value.text;
  }
  if ("formula" in value || "sharedFormula" in value) {
    const result = value.result;
    if (result instanceof Date) return result;
    if (result === undefined || typeof result === "object") return null;
    return result;
  }
  return null;
}

/**
 * Split a defined-name range such as `'Run Info'!$B$2` into sheet name and
 * cell address.
 */
export function parseRangeReference(reference: string): { sheet: string; address: string } | null {
  const bang = reference.lastIndexOf("!");
  if (bang <= 0) return null;
  let sheet = reference.slice(0, bang);
  if (sheet.startsWith("'") && sheet.endsWith("'")) {
    sheet = sheet.slice(1, -1).replace(/''/g, "'");
  }
  const address = reference.slice(bang + 1).replace(/\$/g, "");
  if (!/^[A-Z]+[0-9]+$/i.test(address)) return null;
  return { sheet, address };
}

/**
 * Handle on an opened rules workbook.
 */
export class RuleWorkbook {
  private constructor(
    private readonly workbook: Workbook,
    private readonly sheet: Worksheet,
    readonly filePath: string,
    private readonly logger: Logger
  ) {}

  /**
   * Open a workbook and select its rules sheet.
   *
   * @throws ConnectionError when the file or sheet cannot be opened
   */
  static async open(
    filePath: string,
    sheetName: string,
    logger: Logger = createLogger("Workbook")
  ): Promise<RuleWorkbook> {
    const workbook = new ExcelJS.Workbook();
    try {
      await workbook.xlsx.readFile(filePath);
    } catch (err) {
      throw new ConnectionError(`Cannot load workbook ${filePath}: ${describeError(err)}`, {
        cause: err,
      });
    }

    const sheet = workbook.getWorksheet(sheetName);
    if (!sheet) {
      throw new ConnectionError(`Rules sheet not found: ${sheetName}`);
    }

    logger.info(`Workbook loaded: ${filePath}`);
    return new RuleWorkbook(workbook, sheet, filePath, logger);
  }

  private headers(): string[] {
    const header = this.sheet.getRow(1);
    const headers: string[] = [];
    for (let col = 1; col <= header.cellCount; col++) {
      const value = toCellValue(header.getCell(col).value);
      headers.push(value === null || value === undefined ? "" : String(value));
    }
    // Drop trailing blank header cells
    while (headers.length > 0 && headers[headers.length - 1]!.trim() === "") {
      headers.pop();
    }
    return headers;
  }

  private readRow(rowNumber: number, width: number): CellValue[] {
    const row = this.sheet.getRow(rowNumber);
    const cells: CellValue[] = [];
    for (let col = 1; col <= width; col++) {
      cells.push(toCellValue(row.getCell(col).value));
    }
    return cells;
  }

  private static isBlank(cells: CellValue[]): boolean {
    return cells.every((cell) => cell === null || cell === undefined || String(cell).trim() === "");
  }

  /**
   * Rows from the second sheet row through the last non-blank one. Blank
   * rows in between are kept so that row `rowIndex + 2` is always the
   * rule's sheet row.
   */
  readTable(): RawTable {
    const headers = this.headers();
    const rows: CellValue[][] = [];
    for (let rowNumber = FIRST_DATA_ROW; rowNumber <= this.sheet.rowCount; rowNumber++) {
      rows.push(this.readRow(rowNumber, headers.length));
    }
    while (rows.length > 0 && RuleWorkbook.isBlank(rows[rows.length - 1] ?? [])) {
      rows.pop();
    }
    return { headers, rows };
  }

  private columnNumber(name: string): number | null {
    const index = this.headers().findIndex((h) => normalizeKey(h) === name);
    return index === -1 ? null : index + 1;
  }

  /**
   * Clear statuses (and comments) for every rule row and stamp the business
   * dates and start time.
   *
   * @returns Number of rows that held a status before the reset
   */
  resetTemplate(dates: BusinessDates, startTime: Date): number {
    const headers = this.headers();
    const statusColumn = resolveColumns(headers).status + 1;
    const commentsColumn = this.columnNumber(COMMENTS_COLUMN);
    const dataRows = this.readTable().rows.length;

    let cleared = 0;
    for (let offset = 0; offset < dataRows; offset++) {
      const row = this.sheet.getRow(FIRST_DATA_ROW + offset);
      const status = toCellValue(row.getCell(statusColumn).value);
      if (status !== null && status !== undefined && String(status).trim() !== "") {
        cleared += 1;
      }
      row.getCell(statusColumn).value = null;
      if (commentsColumn !== null) {
        row.getCell(commentsColumn).value = null;
      }
    }

    this.setNamedCell(NAMED_CELLS.cbd, formatBusinessDate(dates.cbd));
    this.setNamedCell(NAMED_CELLS.pbd, formatBusinessDate(dates.pbd));
    this.setNamedCell(NAMED_CELLS.p2bd, formatBusinessDate(dates.p2bd));
    this.setNamedCell(NAMED_CELLS.startTime, formatTimestamp(startTime));

    this.logger.info(`Status reset completed. Cleared rows: ${cleared}`);
    return cleared;
  }

  /**
   * Write every rule's status to sheet row rowIndex + 2.
   */
  writeStatuses(table: RuleTable): void {
    const statusColumn = resolveColumns(this.headers()).status + 1;
    for (const rule of table.rules) {
      this.sheet.getCell(rule.rowIndex + FIRST_DATA_ROW, statusColumn).value = rule.status ?? null;
    }
    this.logger.info("Workbook statuses updated.");
  }

  writeRunMetadata(metadata: RunMetadata): void {
    this.setNamedCell(NAMED_CELLS.startTime, metadata.startTime);
    this.setNamedCell(NAMED_CELLS.endTime, metadata.endTime);
    this.setNamedCell(NAMED_CELLS.executionTime, metadata.executionTime);
  }

  private resolveNamedCell(name: string) {
    const { ranges } = this.workbook.definedNames.getRanges(name);
    const first = ranges[0];
    const ref = first ? parseRangeReference(first) : null;
    const sheet = ref ? this.workbook.getWorksheet(ref.sheet) : undefined;
    if (!ref || !sheet) return null;
    return sheet.getCell(ref.address);
  }

  /**
   * Set a named cell. A missing name is logged and skipped.
   *
   * @returns Whether the name resolved
   */
  setNamedCell(name: string, value: string): boolean {
    const cell = this.resolveNamedCell(name);
    if (!cell) {
      this.logger.warn(`Named range '${name}' not found.`);
      return false;
    }
    cell.value = value;
    return true;
  }

  getNamedCell(name: string): CellValue {
    const cell = this.resolveNamedCell(name);
    return cell ? toCellValue(cell.value) : null;
  }

  async save(): Promise<void> {
    await this.workbook.xlsx.writeFile(this.filePath);
    this.logger.info(`Workbook saved successfully to ${this.filePath}.`);
  }
}
