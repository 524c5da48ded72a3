/**
 * Message evaluator.
 *
 * Matches each attachment of each inbound message against the candidate
 * rules for the message's sender/subject. Every satisfied rule gets its own
 * archive write and outcome.
 */

import type { RuleIndex } from "../types/rule.js";
import { SAVED_STATUS } from "../types/rule.js";
import type {
  AttachmentDisposition,
  InboundMessage,
  MatchOutcome,
  RunFailure,
} from "../types/message.js";
import { MessageProcessingError, WriteError } from "../types/errors.js";
import { lookupCandidates, normalizeKey } from "./rule-table.js";
import { matchesWildcard } from "./wildcard.js";
import { writeArchivedAttachment, type AttachmentWriter } from "../storage/archive-writer.js";
import { createLogger, type Logger } from "./logger.js";
import type { TimingCollector } from "./timing.js";

export interface EvaluationOptions {
  /** Destination folder for archived attachments */
  archiveDir: string;
  /** Archive writer (default: filesystem writer) */
  writer?: AttachmentWriter;
  logger?: Logger;
  /** Records per-message evaluation time when provided */
  timing?: TimingCollector;
}

export interface MessageEvaluation {
  outcomes: MatchOutcome[];
  dispositions: AttachmentDisposition[];
  failures: RunFailure[];
}

const defaultLogger = createLogger("Evaluator");

function emptyEvaluation(): MessageEvaluation {
  return { outcomes: [], dispositions: [], failures: [] };
}

/**
 * Evaluate one message, appending results to `acc` as they are produced so
 * that work done before a failure is kept.
 */
function evaluateInto(
  acc: MessageEvaluation,
  message: InboundMessage,
  messageIndex: number,
  index: RuleIndex,
  options: EvaluationOptions
): void {
  const logger = options.logger ?? defaultLogger;
  const writer = options.writer ?? writeArchivedAttachment;

  if (message.attachments.length === 0) return;

  const sender = normalizeKey(message.sender);
  const subject = normalizeKey(message.subject);
  const candidates = lookupCandidates(index, sender, subject);

  logger.info(`Processing message ${messageIndex}: ${sender} - ${subject}`);

  for (const attachment of message.attachments) {
    const attachmentName = normalizeKey(attachment.filename);
    // Rows whose pattern matched, and the subset whose write succeeded
    let patternMatches = 0;
    const matchedRows: number[] = [];

    for (const rule of candidates) {
      if (!matchesWildcard(attachmentName, rule.attachmentPattern)) continue;
      patternMatches += 1;

      let savedPath: string;
      try {
        savedPath = writer(options.archiveDir, rule.saveName, attachment.content);
      } catch (err) {
        if (!(err instanceof WriteError)) throw err;
        logger.error(`Failed to save row ${rule.rowIndex} (${attachment.filename})`, err);
        acc.failures.push({
          kind: "write",
          messageIndex,
          attachmentName: attachment.filename,
          rowIndex: rule.rowIndex,
          message: err.message,
        });
        continue;
      }

      logger.info(`Saved: ${savedPath}`);
      matchedRows.push(rule.rowIndex);
      acc.outcomes.push({
        rowIndex: rule.rowIndex,
        resolvedStatus: SAVED_STATUS,
        messageIndex,
        attachmentName: attachment.filename,
        savedPath,
      });
    }

    if (patternMatches === 0) {
      logger.info(`No match for: ${sender}, ${subject}, ${attachmentName}`);
    }

    acc.dispositions.push({
      messageIndex,
      attachmentName: attachment.filename,
      status: patternMatches > 0 ? "matched" : "unmatched",
      matchedRows,
    });
  }
}

/**
 * Evaluate a single message against the rule index.
 *
 * Write failures are recorded in `failures`; any other error propagates.
 */
export function evaluateMessage(
  message: InboundMessage,
  messageIndex: number,
  index: RuleIndex,
  options: EvaluationOptions
): MessageEvaluation {
  const acc = emptyEvaluation();
  evaluateInto(acc, message, messageIndex, index, options);
  return acc;
}

/**
 * Evaluate messages in delivery order. A failure inside one message is
 * logged with its context and recorded; the remaining messages still run.
 */
export function evaluateMessages(
  messages: readonly InboundMessage[],
  index: RuleIndex,
  options: EvaluationOptions
): MessageEvaluation {
  const logger = options.logger ?? defaultLogger;
  const acc = emptyEvaluation();

  messages.forEach((message, messageIndex) => {
    const evaluate = () => evaluateInto(acc, message, messageIndex, index, options);
    try {
      if (options.timing) {
        options.timing.timeSync("evaluateMessage", evaluate, { messageIndex });
      } else {
        evaluate();
      }
    } catch (err) {
      const wrapped = new MessageProcessingError(
        messageIndex,
        String(message.sender),
        String(message.subject),
        { cause: err }
      );
      logger.error(wrapped.message);
      acc.failures.push({ kind: "message", messageIndex, message: wrapped.message });
    }
  });

  return acc;
}
