/**
 * Rule table definitions.
 *
 * One rule per row of the rules sheet. Rules sharing a sender/subject pair
 * fan out to different attachment expectations.
 */

/** Terminal status written to a row once one of its attachments is archived. */
export const SAVED_STATUS = "Saved";

/** Columns every rules sheet must carry (compared lower-cased). */
export const REQUIRED_COLUMNS = [
  "sender",
  "subject",
  "attachment",
  "savename",
  "status",
] as const;

export type RequiredColumn = (typeof REQUIRED_COLUMNS)[number];

export type CellValue = string | number | boolean | Date | null | undefined;

/**
 * Raw tabular data as read from a sheet: header row plus data rows.
 */
export interface RawTable {
  headers: string[];
  rows: CellValue[][];
}

export interface Rule {
  /** Zero-based position in the source table; the only writeback key */
  readonly rowIndex: number;

  /** Normalized grouping key parts */
  readonly senderKey: string;
  readonly subjectKey: string;

  /** Lower-cased wildcard pattern matched against attachment filenames */
  readonly attachmentPattern: string;

  /** Desired output filename, unsanitized */
  readonly saveName: string;

  readonly status: string | undefined;
}

export interface RuleTable {
  /** Normalized header names in sheet order */
  readonly columns: readonly string[];
  readonly rules: readonly Rule[];
}

/** Rules grouped by normalized (sender, subject), in table order. */
export type RuleIndex = ReadonlyMap<string, readonly Rule[]>;
