/**
 * Rule table loading and indexing.
 *
 * Turns raw sheet rows into frozen Rule records and groups them by
 * normalized sender/subject for lookup during message evaluation.
 */

import {
  REQUIRED_COLUMNS,
  type CellValue,
  type RawTable,
  type RequiredColumn,
  type Rule,
  type RuleIndex,
  type RuleTable,
} from "../types/rule.js";
import { SchemaError } from "../types/errors.js";

/**
 * Render a cell as text. Absent and NaN cells become "".
 */
export function cellText(value: CellValue | unknown): string {
  if (value === null || value === undefined) return "";
  if (typeof value === "number" && Number.isNaN(value)) return "";
  if (value instanceof Date) return value.toISOString();
  return String(value);
}

/**
 * Key normalization shared by the loader and the evaluator.
 */
export function normalizeKey(value: CellValue | unknown): string {
  return cellText(value).toLowerCase().trim();
}

/**
 * Index key for an already-normalized sender/subject pair.
 */
export function ruleKey(senderKey: string, subjectKey: string): string {
  // NUL cannot appear in either part, so the join is unambiguous
  return `${senderKey}\u0000${subjectKey}`;
}

function normalizeStatus(value: CellValue): string | undefined {
  const text = cellText(value).trim();
  return text === "" ? undefined : text;
}

/**
 * Locate required columns by trimmed, lower-cased header name.
 *
 * @throws SchemaError listing every missing column
 */
export function resolveColumns(headers: readonly string[]): Record<RequiredColumn, number> {
  const normalized = headers.map((h) => normalizeKey(h));
  const missing = REQUIRED_COLUMNS.filter((col) => !normalized.includes(col));
  if (missing.length > 0) {
    throw new SchemaError([...missing]);
  }

  return {
    sender: normalized.indexOf("sender"),
    subject: normalized.indexOf("subject"),
    attachment: normalized.indexOf("attachment"),
    savename: normalized.indexOf("savename"),
    status: normalized.indexOf("status"),
  };
}

/**
 * Build a frozen rule table from raw sheet data.
 * rowIndex is each row's original zero-based position.
 */
export function loadRuleTable(raw: RawTable): RuleTable {
  const columns = resolveColumns(raw.headers);

  const rules = raw.rows.map((row, rowIndex): Rule =>
    Object.freeze({
      rowIndex,
      senderKey: normalizeKey(row[columns.sender]),
      subjectKey: normalizeKey(row[columns.subject]),
      attachmentPattern: normalizeKey(row[columns.attachment]),
      saveName: cellText(row[columns.savename]).trim(),
      status: normalizeStatus(row[columns.status]),
    })
  );

  return Object.freeze({
    columns: Object.freeze(raw.headers.map((h) => normalizeKey(h))),
    rules: Object.freeze(rules),
  });
}

/**
 * Group rules by (sender, subject), preserving table order within a group.
 */
export function buildRuleIndex(table: RuleTable): RuleIndex {
  const index = new Map<string, Rule[]>();
  for (const rule of table.rules) {
    const key = ruleKey(rule.senderKey, rule.subjectKey);
    const group = index.get(key);
    if (group) {
      group.push(rule);
    } else {
      index.set(key, [rule]);
    }
  }
  return index;
}

/**
 * Candidate rules for a sender/subject as they appear on a message.
 * An unknown pair yields no candidates.
 */
export function lookupCandidates(
  index: RuleIndex,
  sender: string,
  subject: string
): readonly Rule[] {
  return index.get(ruleKey(normalizeKey(sender), normalizeKey(subject))) ?? [];
}

/**
 * Re-sorted copy of the table for display. Row identity is untouched.
 */
export function sortRulesForDisplay(
  table: RuleTable,
  compare: (a: Rule, b: Rule) => number
): RuleTable {
  return Object.freeze({
    columns: table.columns,
    rules: Object.freeze([...table.rules].sort(compare)),
  });
}

