import { HeaderMap } from './header-map';
import { ENVELOPE_PREFIX, toLines } from './splitter';

/** Sender and timestamp taken from an mbox "From " separator line. */
export interface Envelope {
  sender: string;
  timestamp: string;
}

export interface RecordParts {
  /** The "From " separator line, or '' when the record has none */
  envelope: string;
  headerLines: string[];
  bodyLines: string[];
}

const FIELD_NAME = /^[^\s:]+$/;

function isContinuation(line: string): boolean {
  return line.startsWith(' ') || line.startsWith('\t');
}

/**
 * Parse a header block into a HeaderMap.
 *
 * Continuation lines (leading space or tab) are unfolded into the preceding
 * field with a single space. Lines that are neither a `Name: value` field
 * nor a continuation of one are skipped.
 */
export function parseHeaders(lines: readonly string[]): HeaderMap {
  const fields: [string, string][] = [];
  let current: [string, string] | null = null;

  for (const line of lines) {
    if (isContinuation(line)) {
      if (!current) continue;
      const extra = line.trim();
      if (extra) current[1] = current[1] ? `${current[1]} ${extra}` : extra;
      continue;
    }

    const colon = line.indexOf(':');
    // obsolete syntax allows whitespace before the colon
    const name = colon > 0 ? line.slice(0, colon).trimEnd() : '';
    if (!FIELD_NAME.test(name)) {
      current = null;
      continue;
    }

    current = [name, line.slice(colon + 1).trim()];
    fields.push(current);
  }

  return new HeaderMap(fields);
}

/**
 * Separate a raw record into its envelope line, header lines and body lines.
 *
 * The first empty line ends the headers and belongs to neither part. One
 * trailing empty body line, the blank line mbox writers put before the next
 * envelope, is dropped.
 */
export function splitRecord(text: string): RecordParts {
  const lines = toLines(text);
  let start = 0;
  let envelope = '';
  if (lines.length > 0 && lines[0].startsWith(ENVELOPE_PREFIX)) {
    envelope = lines[0];
    start = 1;
  }

  const blank = lines.indexOf('', start);
  if (blank === -1) {
    return { envelope, headerLines: lines.slice(start), bodyLines: [] };
  }

  const bodyLines = lines.slice(blank + 1);
  if (bodyLines.length > 0 && bodyLines[bodyLines.length - 1] === '') bodyLines.pop();
  return { envelope, headerLines: lines.slice(start, blank), bodyLines };
}

export function parseEnvelope(line: string): Envelope {
  if (!line.startsWith(ENVELOPE_PREFIX)) return { sender: '', timestamp: '' };
  const rest = line.slice(ENVELOPE_PREFIX.length).trim();
  const gap = rest.search(/\s/);
  if (gap === -1) return { sender: rest, timestamp: '' };
  return { sender: rest.slice(0, gap), timestamp: rest.slice(gap).trim() };
}
