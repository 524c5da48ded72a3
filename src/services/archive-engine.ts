/**
 * Archive engine.
 *
 * One pass over an inbox snapshot: index the rule table, evaluate every
 * message, then fold the outcomes into a new table with run metadata.
 */

import type { RuleTable } from "../types/rule.js";
import type {
  AttachmentDisposition,
  InboundMessage,
  MatchOutcome,
  RunFailure,
} from "../types/message.js";
import { buildRuleIndex } from "./rule-table.js";
import { evaluateMessages } from "./evaluator.js";
import { synchronizeResults, type RunMetadata } from "./result-sync.js";
import { TimingCollector, type RunMetrics } from "./timing.js";
import type { AttachmentWriter } from "../storage/archive-writer.js";
import { createLogger, type Logger } from "./logger.js";

export interface RunOptions {
  writer?: AttachmentWriter;
  logger?: Logger;
  /** Clock used for the end time when none is given */
  now?: () => Date;
}

export interface RunResult {
  table: RuleTable;
  metadata: RunMetadata;
  outcomes: MatchOutcome[];
  dispositions: AttachmentDisposition[];
  failures: RunFailure[];
  messagesProcessed: number;
  /** Distinct rows marked saved during the run */
  attachmentsSaved: number;
  metrics: RunMetrics;
}

const defaultLogger = createLogger("Engine");

/**
 * Run the engine over one snapshot of messages.
 *
 * Messages are processed in the order given. `endTime` defaults to the
 * clock reading taken once evaluation has finished.
 */
export function run(
  ruleTable: RuleTable,
  messages: readonly InboundMessage[],
  archiveDir: string,
  startTime: Date,
  endTime?: Date,
  options: RunOptions = {}
): RunResult {
  const logger = options.logger ?? defaultLogger;
  const timing = new TimingCollector(startTime);

  const index = timing.timeSync("buildIndex", () => buildRuleIndex(ruleTable));
  logger.info(`Rule index built: ${index.size} unique keys`);

  const evaluation = evaluateMessages(messages, index, {
    archiveDir,
    logger,
    timing,
    ...(options.writer ? { writer: options.writer } : {}),
  });

  const finishedAt = endTime ?? (options.now ?? (() => new Date()))();
  const { table, metadata } = synchronizeResults(
    ruleTable,
    evaluation.outcomes,
    startTime,
    finishedAt,
    logger
  );

  const attachmentsSaved = new Set(evaluation.outcomes.map((o) => o.rowIndex)).size;
  logger.info(
    `Emails processed: ${messages.length}, total attachments saved: ${attachmentsSaved}` +
      (evaluation.failures.length > 0 ? `, failures: ${evaluation.failures.length}` : "")
  );

  return {
    table,
    metadata,
    outcomes: evaluation.outcomes,
    dispositions: evaluation.dispositions,
    failures: evaluation.failures,
    messagesProcessed: messages.length,
    attachmentsSaved,
    metrics: timing.finalize(messages.length, attachmentsSaved, finishedAt),
  };
}
