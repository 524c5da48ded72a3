/**
 * Statement Archiver Type Definitions
 *
 * Rule table, inbound mail and run result types shared by the engine
 * and its workbook/mailbox adapters.
 */

// Rule table types
export type {
  Rule,
  RuleTable,
  RuleIndex,
  RawTable,
  CellValue,
  RequiredColumn,
} from "./rule.js";
export { SAVED_STATUS, REQUIRED_COLUMNS } from "./rule.js";

// Inbound mail and match results
export type {
  InboundMessage,
  InboundAttachment,
  MatchOutcome,
  AttachmentDisposition,
  AttachmentDispositionStatus,
  RunFailure,
} from "./message.js";

// Errors
export type { ArchiverErrorKind } from "./errors.js";
export {
  ArchiverError,
  SchemaError,
  ConnectionError,
  WriteError,
  MessageProcessingError,
  ConfigError,
  describeError,
} from "./errors.js";
