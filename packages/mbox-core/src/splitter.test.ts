import { describe, it, expect } from 'vitest';
import { countMessages, splitMessages, toLines } from './splitter';

const MAILBOX = [
  'From alice@example.com Mon Jan 1 00:00:00 2024',
  'Subject: one',
  '',
  'first body',
  '',
  'From bob@example.com Tue Jan 2 00:00:00 2024',
  'Subject: two',
  '',
  'second body',
  '',
].join('\n');

describe('splitMessages', () => {
  it('yields nothing for empty content', () => {
    expect([...splitMessages('')]).toEqual([]);
    expect(countMessages('')).toBe(0);
  });

  it('yields one record per envelope line, in file order', () => {
    const records = [...splitMessages(MAILBOX)];
    expect(records).toHaveLength(2);
    expect(records.map((r) => r.index)).toEqual([0, 1]);
    expect(records[0].offset).toBe(0);
    expect(records[0].text.startsWith('From alice@example.com')).toBe(true);
    expect(records[1].text.startsWith('From bob@example.com')).toBe(true);
    expect(countMessages(MAILBOX)).toBe(2);
  });

  it('loses no characters between records', () => {
    const joined = [...splitMessages(MAILBOX)].map((r) => r.text).join('');
    expect(joined).toBe(MAILBOX);
  });

  it('discards preamble before the first envelope line', () => {
    const content = `garbage before\nmore garbage\n${MAILBOX}`;
    const records = [...splitMessages(content)];
    expect(records).toHaveLength(2);
    expect(records[0].offset).toBe('garbage before\nmore garbage\n'.length);
    expect(records.map((r) => r.text).join('')).toBe(MAILBOX);
  });

  it('yields nothing when there is no envelope line at all', () => {
    expect([...splitMessages('Subject: lost\n\nbody\n')]).toEqual([]);
  });

  it('treats a body line starting with "From " as a new message', () => {
    const content = 'From a@b Mon Jan 1 00:00:00 2024\n\nFrom here on, things change\n';
    const records = [...splitMessages(content)];
    expect(records).toHaveLength(2);
    expect(records[1].text).toBe('From here on, things change\n');
  });

  it('does not split on From: headers or indented From', () => {
    const content = 'From a@b Mon Jan 1 00:00:00 2024\nFrom: a@b\n\n From the top\n>From quoted\n';
    expect(countMessages(content)).toBe(1);
  });

  it('can be iterated more than once', () => {
    const records = splitMessages(MAILBOX);
    expect([...records]).toHaveLength(2);
    expect([...records]).toHaveLength(2);
  });

  it('handles CRLF line endings', () => {
    const content = 'From a@b Mon\r\nSubject: x\r\n\r\nbody\r\nFrom c@d Tue\r\n';
    const records = [...splitMessages(content)];
    expect(records).toHaveLength(2);
    expect(records[1].text).toBe('From c@d Tue\r\n');
  });
});

describe('toLines', () => {
  it('drops the empty tail after a final newline', () => {
    expect(toLines('a\nb\n')).toEqual(['a', 'b']);
  });

  it('strips carriage returns', () => {
    expect(toLines('a\r\nb')).toEqual(['a', 'b']);
  });

  it('returns no lines for empty text', () => {
    expect(toLines('')).toEqual([]);
  });
});
