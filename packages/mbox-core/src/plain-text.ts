import PostalMime from 'postal-mime';
import type { HeaderMap } from './header-map';
import { toLines } from './splitter';

/** Decoded display parts recovered from a MIME message. */
export interface PlainTextParts {
  text?: string[];
  sender?: string;
  subject?: string;
}

const ENCODED_WORD = /=\?[^?\s]+\?[bq]\?[^?\s]*\?=/i;
const ENCODED_TRANSFERS = new Set(['base64', 'quoted-printable']);
const NATIVE_CHARSETS = new Set(['us-ascii', 'utf-8', 'utf8']);
const CHARSET_PARAM = /;\s*charset\s*=\s*"?([^";\s]+)/i;

/** Whether a header value carries RFC 2047 encoded words. */
export function hasEncodedWords(value: string | undefined): boolean {
  return ENCODED_WORD.test(value ?? '');
}

function formatAddress(
  addr: { name?: string; address?: string } | undefined
): { name: string; email: string; display: string } {
  if (!addr) return { name: '', email: '', display: '' };
  const name = addr.name || '';
  const email = addr.address || '';
  const display = name && email ? `${name} <${email}>` : name || email;
  return { name, email, display };
}

/**
 * Whether the raw lines of a message are unlikely to read well as-is:
 * multipart bodies, encoded transfers, a declared charset other than
 * ASCII or UTF-8, or RFC 2047 encoded headers.
 */
export function needsPlainTextExtraction(headers: HeaderMap): boolean {
  const contentType = (headers.get('content-type') ?? '').toLowerCase();
  const encoding = (headers.get('content-transfer-encoding') ?? '').trim().toLowerCase();
  const charset = CHARSET_PARAM.exec(contentType)?.[1];
  return (
    contentType.startsWith('multipart/') ||
    ENCODED_TRANSFERS.has(encoding) ||
    (charset !== undefined && !NATIVE_CHARSETS.has(charset)) ||
    hasEncodedWords(headers.get('subject')) ||
    hasEncodedWords(headers.get('from'))
  );
}

/**
 * Best-effort plain-text extraction of an RFC 2822 message (headers and
 * body, without the mbox envelope line). Pass the original bytes where they
 * exist so declared charsets decode. Only the text part is kept; HTML and
 * attachments are ignored.
 */
export async function extractPlainText(raw: string | Uint8Array): Promise<PlainTextParts> {
  const parser = new PostalMime();
  const parsed = await parser.parse(raw);
  const from = formatAddress(parsed.from);

  const text = parsed.text !== undefined ? toLines(parsed.text.replace(/\s+$/, '')) : undefined;

  return {
    text,
    sender: from.display || undefined,
    subject: parsed.subject || undefined,
  };
}
