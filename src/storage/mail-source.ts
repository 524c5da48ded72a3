/**
 * IMAP mail source.
 *
 * Opens one IMAP session per run, lists the configured folder's messages
 * received since the cutoff and hands them to the engine newest first.
 */

import { ImapFlow } from "imapflow";
import { simpleParser, type ParsedMail } from "mailparser";
import type { InboundMessage } from "../types/message.js";
import type { MailboxConfig } from "../config.js";
import { ConnectionError, describeError } from "../types/errors.js";
import { createLogger, type Logger } from "../services/logger.js";

export interface MailSource {
  /** Messages received at or after `since`, newest first */
  fetchMessagesSince(since: Date): Promise<InboundMessage[]>;
}

/**
 * Map a parsed message to the engine's inbound shape.
 */
export function toInboundMessage(parsed: ParsedMail, receivedAt: Date): InboundMessage {
  const from = parsed.from?.value[0]?.address ?? parsed.from?.text ?? "";
  return {
    sender: from,
    subject: parsed.subject ?? "",
    receivedAt,
    attachments: parsed.attachments.map((attachment) => ({
      filename: attachment.filename ?? "",
      content: attachment.content,
    })),
  };
}

/**
 * Keep messages received at or after `since`, newest first.
 */
export function selectSince(messages: InboundMessage[], since: Date): InboundMessage[] {
  return messages
    .filter((m) => m.receivedAt === undefined || m.receivedAt.getTime() >= since.getTime())
    .sort((a, b) => (b.receivedAt?.getTime() ?? 0) - (a.receivedAt?.getTime() ?? 0));
}

function createImapClient(config: MailboxConfig): ImapFlow {
  return new ImapFlow({
    host: config.host,
    port: config.port,
    secure: config.secure,
    auth: {
      user: config.user,
      pass: config.pass,
    },
    logger: false,
  });
}

class ImapMailSource implements MailSource {
  constructor(
    private readonly client: ImapFlow,
    private readonly folder: string,
    private readonly logger: Logger
  ) {}

  async fetchMessagesSince(since: Date): Promise<InboundMessage[]> {
    let lock: Awaited<ReturnType<ImapFlow["getMailboxLock"]>>;
    try {
      lock = await this.client.getMailboxLock(this.folder);
    } catch (err) {
      throw new ConnectionError(`Could not access folder '${this.folder}': ${describeError(err)}`, {
        cause: err,
      });
    }
    const messages: InboundMessage[] = [];

    try {
      // SINCE has day granularity; the exact cutoff is applied below
      const uids = (await this.client.search({ since }, { uid: true })) || [];
      if (uids.length === 0) {
        this.logger.info(`No messages in ${this.folder} since ${since.toISOString()}`);
        return [];
      }

      for await (const message of this.client.fetch(
        uids,
        { uid: true, source: true, internalDate: true },
        { uid: true }
      )) {
        if (!message.source) continue;
        const receivedAt = message.internalDate ? new Date(message.internalDate) : new Date(0);
        try {
          const parsed = await simpleParser(message.source);
          messages.push(toInboundMessage(parsed, receivedAt));
        } catch (err) {
          this.logger.error(`Skipping unparseable message uid ${message.uid}`, err);
        }
      }
    } finally {
      lock.release();
    }

    const selected = selectSince(messages, since);
    this.logger.info(`Retrieved ${selected.length} messages from folder: ${this.folder}`);
    return selected;
  }
}

/**
 * Run `fn` with a connected mail source. The session is logged out on
 * every exit path.
 *
 * @throws ConnectionError when the server cannot be reached or login fails
 */
export async function withMailSource<T>(
  config: MailboxConfig,
  fn: (source: MailSource) => Promise<T>,
  logger: Logger = createLogger("Mail")
): Promise<T> {
  const client = createImapClient(config);

  try {
    logger.info(`Connecting to mailbox: ${config.user}@${config.host}`);
    await client.connect();
  } catch (err) {
    throw new ConnectionError(`Could not connect to mailbox ${config.host}: ${describeError(err)}`, {
      cause: err,
    });
  }

  try {
    return await fn(new ImapMailSource(client, config.folder, logger));
  } finally {
    try {
      await client.logout();
    } catch (err) {
      logger.warn(`Logout failed: ${describeError(err)}`);
    }
  }
}
