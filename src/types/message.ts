/**
 * Inbound mail and match results.
 */

export interface InboundAttachment {
  filename: string;
  content: Uint8Array;
}

/**
 * One message from the mail source. Supplied per run, never persisted.
 */
export interface InboundMessage {
  sender: string;
  subject: string;
  receivedAt?: Date;
  attachments: InboundAttachment[];
}

/**
 * A successful pairing of one rule with one attachment.
 */
export interface MatchOutcome {
  rowIndex: number;
  resolvedStatus: string;
  messageIndex: number;
  attachmentName: string;
  savedPath: string;
}

export type AttachmentDispositionStatus = "matched" | "unmatched";

export interface AttachmentDisposition {
  messageIndex: number;
  attachmentName: string;
  status: AttachmentDispositionStatus;
  /** Rows whose archive write succeeded for this attachment */
  matchedRows: number[];
}

/**
 * A recovered per-item failure.
 */
export interface RunFailure {
  kind: "write" | "message";
  messageIndex: number;
  message: string;
  attachmentName?: string;
  rowIndex?: number;
}
