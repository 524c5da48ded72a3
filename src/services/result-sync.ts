/**
 * Result synchronizer.
 *
 * Folds match outcomes back into the rule table by row identity and builds
 * the run metadata stamped into the workbook. Every function here returns a
 * new table; inputs are never mutated.
 */

import { format } from "date-fns";
import type { Rule, RuleTable } from "../types/rule.js";
import type { MatchOutcome } from "../types/message.js";
import { createLogger, type Logger } from "./logger.js";
import { formatElapsed } from "./timing.js";

export interface RunMetadata {
  startTime: string;
  endTime: string;
  executionTime: string;
}

export interface SynchronizedResult {
  table: RuleTable;
  metadata: RunMetadata;
}

const defaultLogger = createLogger("Sync");

export const TIMESTAMP_FORMAT = "yyyy-MM-dd HH:mm:ss";

function withRules(table: RuleTable, rules: Rule[]): RuleTable {
  return Object.freeze({ columns: table.columns, rules: Object.freeze(rules) });
}

/**
 * Clear every status. Runs before evaluation so no row carries a status
 * from an earlier run.
 */
export function resetStatuses(table: RuleTable): RuleTable {
  return withRules(
    table,
    table.rules.map((rule) =>
      rule.status === undefined ? rule : Object.freeze({ ...rule, status: undefined })
    )
  );
}

/**
 * Set each outcome's status on the row with the same rowIndex. When several
 * outcomes target one row the last one wins. Rows without an outcome keep
 * their status.
 */
export function applyOutcomes(
  table: RuleTable,
  outcomes: readonly MatchOutcome[],
  logger: Logger = defaultLogger
): RuleTable {
  const statusByRow = new Map<number, string>();
  for (const outcome of outcomes) {
    statusByRow.set(outcome.rowIndex, outcome.resolvedStatus);
  }

  const known = new Set(table.rules.map((rule) => rule.rowIndex));
  for (const rowIndex of statusByRow.keys()) {
    if (!known.has(rowIndex)) {
      logger.warn(`Outcome for unknown row ${rowIndex} ignored`);
    }
  }

  return withRules(
    table,
    table.rules.map((rule) => {
      const status = statusByRow.get(rule.rowIndex);
      if (status === undefined || status === rule.status) return rule;
      return Object.freeze({ ...rule, status });
    })
  );
}

export function formatTimestamp(date: Date): string {
  return format(date, TIMESTAMP_FORMAT);
}

export function buildRunMetadata(startTime: Date, endTime: Date): RunMetadata {
  return {
    startTime: formatTimestamp(startTime),
    endTime: formatTimestamp(endTime),
    executionTime: formatElapsed(endTime.getTime() - startTime.getTime()),
  };
}

export function synchronizeResults(
  table: RuleTable,
  outcomes: readonly MatchOutcome[],
  startTime: Date,
  endTime: Date,
  logger: Logger = defaultLogger
): SynchronizedResult {
  const updated = applyOutcomes(table, outcomes, logger);
  logger.info(`Statuses updated for ${new Set(outcomes.map((o) => o.rowIndex)).size} rows`);
  return { table: updated, metadata: buildRunMetadata(startTime, endTime) };
}
