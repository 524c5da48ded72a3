/**
 * Error taxonomy.
 *
 * Schema, connection and config errors abort a run. Write and message
 * processing errors are recorded per item and the run continues.
 */

export type ArchiverErrorKind =
  | "schema"
  | "connection"
  | "write"
  | "message_processing"
  | "config";

export class ArchiverError extends Error {
  readonly kind: ArchiverErrorKind;

  constructor(kind: ArchiverErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.kind = kind;
    this.name = "ArchiverError";
  }
}

export class SchemaError extends ArchiverError {
  readonly missingColumns: string[];

  constructor(missingColumns: string[]) {
    super(
      "schema",
      `Missing required columns in rule table: ${missingColumns.join(", ")}`
    );
    this.name = "SchemaError";
    this.missingColumns = missingColumns;
  }
}

export class ConnectionError extends ArchiverError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("connection", message, options);
    this.name = "ConnectionError";
  }
}

export class WriteError extends ArchiverError {
  readonly targetPath: string;

  constructor(targetPath: string, message: string, options?: { cause?: unknown }) {
    super("write", message, options);
    this.name = "WriteError";
    this.targetPath = targetPath;
  }
}

export class MessageProcessingError extends ArchiverError {
  readonly messageIndex: number;
  readonly sender: string;
  readonly subject: string;

  constructor(
    messageIndex: number,
    sender: string,
    subject: string,
    options?: { cause?: unknown }
  ) {
    super(
      "message_processing",
      `Error processing message ${messageIndex} (${sender} - ${subject}): ${describeError(options?.cause)}`,
      options
    );
    this.name = "MessageProcessingError";
    this.messageIndex = messageIndex;
    this.sender = sender;
    this.subject = subject;
  }
}

export class ConfigError extends ArchiverError {
  constructor(message: string) {
    super("config", message);
    this.name = "ConfigError";
  }
}

/**
 * Best-effort message text for an unknown thrown value.
 */
export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
