/**
 * Daily statement archiving run.
 *
 * Resets the rules workbook, pulls messages received since the prior
 * business day's cutoff, archives matching attachments into that day's
 * folder and writes statuses and run timing back to the workbook.
 *
 * Usage: npm run archive   (settings from the environment or .env)
 */

import * as path from "node:path";
import { loadConfigFromEnvironment } from "../config.js";
import { businessDates, cutoffTime, formatBusinessDate } from "../services/business-dates.js";
import { loadRuleTable } from "../services/rule-table.js";
import { resetStatuses, formatTimestamp } from "../services/result-sync.js";
import { run } from "../services/archive-engine.js";
import { formatRunMetrics } from "../services/timing.js";
import { createFileSink, createLogger, setLogSink } from "../services/logger.js";
import { makeArchivePath } from "../storage/archive-paths.js";
import { RuleWorkbook } from "../storage/rule-workbook.js";
import { withMailSource } from "../storage/mail-source.js";
import { ArchiverError } from "../types/index.js";

const logger = createLogger("Archive");

async function main(): Promise<number> {
  const startTime = new Date();

  try {
    const config = loadConfigFromEnvironment();
    const dates = businessDates(startTime);

    const archiveDir = makeArchivePath(config.archiveBaseDir, dates.pbd);
    setLogSink(createFileSink(path.join(archiveDir, "script.log")));
    logger.info("Script execution started.");
    logger.info(
      `Business dates calculated: CBD=${formatBusinessDate(dates.cbd)}, ` +
        `PBD=${formatBusinessDate(dates.pbd)}, P2BD=${formatBusinessDate(dates.p2bd)}`
    );

    const workbook = await RuleWorkbook.open(config.workbookPath, config.rulesSheet);
    workbook.resetTemplate(dates, startTime);
    const table = resetStatuses(loadRuleTable(workbook.readTable()));
    logger.info(`Rule table loaded: ${table.rules.length} rows`);

    const since = cutoffTime(
      dates.pbd,
      config.cutoff.hour,
      config.cutoff.minute,
      config.cutoff.timeZone
    );
    const messages = await withMailSource(config.mailbox, (source) =>
      source.fetchMessagesSince(since)
    );

    const result = run(table, messages, archiveDir, startTime);
    logger.info(`Script duration: ${result.metadata.executionTime}`);

    workbook.writeStatuses(result.table);
    workbook.writeRunMetadata(result.metadata);
    await workbook.save();

    logger.info(formatRunMetrics(result.metrics));
    logger.info(`Processed ${result.messagesProcessed} messages.`);
    logger.info(`Saved ${result.attachmentsSaved} attachments.`);
    console.log(
      `Processed ${result.messagesProcessed} messages. Saved ${result.attachmentsSaved} attachments.`
    );
    return 0;
  } catch (err) {
    const name =
      err instanceof ArchiverError ? `${err.name} (${err.kind})` : err instanceof Error ? err.name : "Error";
    logger.error(
      `Unhandled exception occurred at ${formatTimestamp(new Date())}: ${name}`,
      err
    );
    return 1;
  } finally {
    logger.info("Run finished, releasing log file.");
    setLogSink(null);
  }
}

void main().then((code) => {
  process.exitCode = code;
});
