/**
 * One message span inside an mbox file: from its "From " envelope line
 * (inclusive) up to the next envelope line or the end of the file.
 */
export interface RawRecord {
  /** Position in file order, starting at 0 */
  index: number;
  /** Character offset of the envelope line within the mailbox content */
  offset: number;
  text: string;
}

export const ENVELOPE_PREFIX = 'From ';

const LINE_MARKER = '\nFrom ';

/**
 * Find the next envelope line starting at or after `from`.
 *
 * Every line that begins with "From " counts, including body lines that
 * were never quoted as ">From ".
 */
function nextEnvelope(content: string, from: number): number {
  if (from === 0 && content.startsWith(ENVELOPE_PREFIX)) return 0;
  const idx = content.indexOf(LINE_MARKER, Math.max(0, from - 1));
  return idx === -1 ? -1 : idx + 1;
}

function* scanRecords(content: string): Generator<RawRecord> {
  let start = nextEnvelope(content, 0);
  let index = 0;

  while (start !== -1) {
    const next = nextEnvelope(content, start + 1);
    const end = next === -1 ? content.length : next;
    yield { index, offset: start, text: content.slice(start, end) };
    index++;
    start = next;
  }
}

/**
 * Split raw mailbox content into message records, in file order.
 *
 * The result is lazy and can be iterated more than once; each pass rescans
 * the content. Anything before the first envelope line is preamble and is
 * not part of any record.
 */
export function splitMessages(content: string): Iterable<RawRecord> {
  return {
    [Symbol.iterator]: () => scanRecords(content),
  };
}

export function countMessages(content: string): number {
  let count = 0;
  for (let start = nextEnvelope(content, 0); start !== -1; start = nextEnvelope(content, start + 1)) {
    count++;
  }
  return count;
}

/** Split text into lines, dropping CR before LF and the empty tail after a final newline. */
export function toLines(text: string): string[] {
  if (!text) return [];
  const lines = text.split('\n').map((line) => (line.endsWith('\r') ? line.slice(0, -1) : line));
  if (lines[lines.length - 1] === '') lines.pop();
  return lines;
}
