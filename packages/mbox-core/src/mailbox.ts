import * as fs from 'fs';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { formatFileSize, type MailboxSummary } from '@mailspool/shared';
import { toMailboxError } from './errors';
import { parseEnvelope, parseHeaders, splitRecord } from './header-parser';
import { Message } from './message';
import {
  extractPlainText,
  hasEncodedWords,
  needsPlainTextExtraction,
  type PlainTextParts,
} from './plain-text';
import { splitMessages, type RawRecord } from './splitter';

export interface Logger {
  log(message: string): void;
  warn(message: string): void;
}

export interface MailboxLoadOptions {
  logger?: Logger;
}

const UTF8 = new TextDecoder('utf-8', { fatal: true });

/**
 * Text of one record's bytes: UTF-8 when they are valid UTF-8, otherwise
 * ISO-8859-1, the usual charset of raw 8-bit mail in old spools.
 */
function decodeRecord(bytes: Buffer): string {
  try {
    return UTF8.decode(bytes);
  } catch {
    return bytes.toString('latin1');
  }
}

/** The record without its envelope line, as an RFC 2822 message. */
function stripEnvelope(source: string | Buffer, envelope: string): string | Buffer {
  if (!envelope) return source;
  if (typeof source === 'string') {
    const eol = source.indexOf('\n');
    return eol === -1 ? '' : source.slice(eol + 1);
  }
  const eol = source.indexOf(0x0a);
  return eol === -1 ? Buffer.alloc(0) : source.subarray(eol + 1);
}

/**
 * Parse one record. With `binary` set, the record text holds the file's
 * bytes one per character (latin1) and is decoded here, record by record.
 */
async function parseRecord(record: RawRecord, logger: Logger, binary: boolean): Promise<Message> {
  const bytes = binary ? Buffer.from(record.text, 'latin1') : null;
  const parts = splitRecord(bytes ? decodeRecord(bytes) : record.text);
  const headers = parseHeaders(parts.headerLines);

  let decoded: PlainTextParts = {};
  if (needsPlainTextExtraction(headers)) {
    try {
      decoded = await extractPlainText(stripEnvelope(bytes ?? record.text, parts.envelope));
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      logger.warn(`[MBOX] Message ${record.index + 1}: plain-text extraction failed (${reason}), showing raw body`);
    }
  }

  return new Message({
    index: record.index,
    headers,
    body: parts.bodyLines,
    envelope: parseEnvelope(parts.envelope),
    text: decoded.text,
    // raw 8-bit headers are decoded with the record; take postal-mime's reading only for encoded words
    displaySender: hasEncodedWords(headers.get('from')) ? decoded.sender : undefined,
    displaySubject: hasEncodedWords(headers.get('subject')) ? decoded.subject : undefined,
  });
}

/**
 * All messages of one mbox file, in file order. A Mailbox is only ever
 * handed out fully populated.
 */
export class Mailbox {
  /** Identifies this load in log lines */
  readonly id: string;
  readonly path: string;
  readonly messages: readonly Message[];
  /** Size of the source content in bytes */
  readonly size: number;

  private constructor(id: string, filePath: string, messages: Message[], size: number) {
    this.id = id;
    this.path = filePath;
    this.messages = Object.freeze(messages);
    this.size = size;
    Object.freeze(this);
  }

  /**
   * Read and parse the mailbox at `filePath`. The file is opened read-only.
   *
   * Throws MailboxNotFoundError when nothing readable exists at the path and
   * MailboxReadError for any other read failure.
   */
  static async load(filePath: string, options: MailboxLoadOptions = {}): Promise<Mailbox> {
    let content: Buffer;
    try {
      content = await fs.promises.readFile(filePath, { flag: 'r' });
    } catch (err) {
      throw toMailboxError(filePath, err);
    }
    return Mailbox.fromContent(filePath, content, options);
  }

  /**
   * Parse mailbox content that has already been read. Raw bytes are decoded
   * per message (UTF-8, else ISO-8859-1); a string is taken as already decoded.
   */
  static async fromContent(
    filePath: string,
    content: string | Buffer,
    options: MailboxLoadOptions = {}
  ): Promise<Mailbox> {
    const logger = options.logger ?? console;
    const startTime = Date.now();
    const binary = typeof content !== 'string';
    const size = binary ? content.length : Buffer.byteLength(content, 'utf-8');
    // latin1 maps each byte to one character, so "From " lines split the same as in the bytes
    const text = binary ? content.toString('latin1') : content;

    const messages: Message[] = [];
    for (const record of splitMessages(text)) {
      messages.push(await parseRecord(record, logger, binary));
    }

    const elapsed = ((Date.now() - startTime) / 1000).toFixed(1);
    logger.log(
      `[MBOX] Indexed ${messages.length} messages (${formatFileSize(size)}) from ${filePath} in ${elapsed}s`
    );

    return new Mailbox(uuidv4(), filePath, messages, size);
  }

  get name(): string {
    return path.basename(this.path);
  }

  get isEmpty(): boolean {
    return this.messages.length === 0;
  }

  summary(): MailboxSummary {
    return {
      id: this.id,
      path: this.path,
      name: this.name,
      messageCount: this.messages.length,
      size: this.size,
    };
  }
}
