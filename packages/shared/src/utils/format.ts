export function formatFileSize(bytes: number): string {
  if (bytes === 0) return '0 B';
  const units = ['B', 'KB', 'MB', 'GB'];
  const i = Math.min(Math.floor(Math.log(bytes) / Math.log(1024)), units.length - 1);
  return `${(bytes / Math.pow(1024, i)).toFixed(i === 0 ? 0 : 1)} ${units[i]}`;
}

/**
 * Shorten a Date header to its first six words, e.g.
 * "Mon, 1 Jan 2024 10:00:00 +0000 (UTC)" → "Mon, 1 Jan 2024 10:00:00 +0000".
 */
export function formatHeaderDate(raw: string): string {
  const words = raw.trim().split(/\s+/).filter(Boolean);
  if (words.length === 0) return 'Unknown';
  return words.slice(0, 6).join(' ');
}

export function truncate(str: string, maxLen: number): string {
  if (!str) return '';
  if (maxLen <= 0) return '';
  if (str.length <= maxLen) return str;
  return str.slice(0, maxLen - 1) + '…';
}

const TAB_STOP = 8;
const CONTROL_CHARS = /[\u0000-\u001f\u007f-\u009f]/g;

/**
 * Make mailbox text safe to put on a terminal: tabs expand to the next
 * eight-column stop and every other C0/C1 control character, ESC included,
 * becomes U+FFFD.
 */
export function toDisplayText(line: string): string {
  let out = '';
  line.split('\t').forEach((part, i) => {
    if (i > 0) out += ' '.repeat(TAB_STOP - (out.length % TAB_STOP));
    out += part.replace(CONTROL_CHARS, '\uFFFD');
  });
  return out;
}
