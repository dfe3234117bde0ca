import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import type { RenderedPage } from '@mailspool/shared';
import { EXIT_FAILURE, EXIT_NOT_FOUND, EXIT_OK, errorMessage, run, type AppIo } from './app';
import type { KeyPress } from './keys';

const ALICE = [
  'From user@host Mon Jan 1 00:00:00 2024',
  'From: a@b.com',
  'Subject: Hi',
  'Date: Mon, 1 Jan 2024 10:00:00 +0000',
  '',
  'Hello',
  '',
  'From user@host Mon Jan 1 00:00:00 2024',
  'From: c@d.com',
  'Subject: Again',
  '',
  'Bye',
  '',
].join('\n');

const BOB = ['From bob@host Tue Jan 2 00:00:00 2024', 'Subject: Note', '', 'hi bob', ''].join('\n');

interface CapturedIo extends AppIo {
  stdout: string[];
  stderr: string[];
}

function captureIo(openTerminal: AppIo['openTerminal'] = null): CapturedIo {
  const stdout: string[] = [];
  const stderr: string[] = [];
  return {
    stdout,
    stderr,
    out: (line) => stdout.push(line),
    err: (line) => stderr.push(line),
    openTerminal,
  };
}

async function* keysOf(...keys: KeyPress[]): AsyncGenerator<KeyPress> {
  for (const key of keys) yield key;
}

describe('run', () => {
  let root: string;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'mailspool-app-'));
    fs.writeFileSync(path.join(root, 'alice'), ALICE);
    fs.writeFileSync(path.join(root, 'bob'), BOB);
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it('prints help', async () => {
    const io = captureIo();
    expect(await run(['--help'], {}, io)).toBe(EXIT_OK);
    expect(io.stdout[0].startsWith('Usage: mailspool [user] [options]')).toBe(true);
  });

  it('fails on bad arguments', async () => {
    const io = captureIo();
    expect(await run(['--bogus'], {}, io)).toBe(EXIT_FAILURE);
    expect(io.stderr[0]).toBe('Error: Unknown option: --bogus');
  });

  it('lists every mailbox when there is no terminal', async () => {
    const io = captureIo();
    expect(await run([], { MAIL_SPOOL: root }, io)).toBe(EXIT_OK);
    expect(io.stdout).toEqual([
      `alice: 2 messages (${Buffer.byteLength(ALICE)} B)`,
      '     1  Mon, 1 Jan 2024 10:00:00 +0000  a@b.com  Hi',
      '     2  Unknown  c@d.com  Again',
      `bob: 1 message (${Buffer.byteLength(BOB)} B)`,
      '     1  Unknown  (Unknown sender)  Note',
    ]);
  });

  it('honours excludes', async () => {
    const io = captureIo();
    await run(['--root', root, '--exclude', 'alice'], {}, io);
    expect(io.stdout[0].startsWith('bob:')).toBe(true);
    expect(io.stdout).toHaveLength(2);
  });

  it('opens only the requested user', async () => {
    const io = captureIo();
    expect(await run(['bob', '--root', root], {}, io)).toBe(EXIT_OK);
    expect(io.stdout[0].startsWith('bob:')).toBe(true);
  });

  it('exits with the not-found status for a missing user', async () => {
    const io = captureIo();
    expect(await run(['dave', '--root', root], {}, io)).toBe(EXIT_NOT_FOUND);
    const reported = io.stderr.find((line) => line.startsWith('Error: '));
    expect(reported?.startsWith(`Error: Mailbox not found: ${path.join(root, 'dave')} (ENOENT`)).toBe(true);
  });

  it('exits with the not-found status for a missing spool root', async () => {
    const io = captureIo();
    const missing = path.join(root, 'nowhere');
    expect(await run(['--root', missing], {}, io)).toBe(EXIT_NOT_FOUND);
    expect(io.stderr[0].startsWith(`Error: Mailbox not found: ${missing}`)).toBe(true);
  });

  it('exits with the not-found status when the spool is empty', async () => {
    const empty = path.join(root, 'empty');
    fs.mkdirSync(empty);
    const io = captureIo();
    expect(await run(['--root', empty], {}, io)).toBe(EXIT_NOT_FOUND);
    expect(io.stderr).toEqual([`Error: no readable mailboxes under ${empty}`]);
  });

  it('runs an interactive session and closes the terminal', async () => {
    const pages: RenderedPage[] = [];
    let closed = false;
    const io = captureIo(() => ({
      screen: { viewport: { width: 200, height: 24 }, paint: (page) => pages.push(page) },
      keys: keysOf({ name: 'pagedown' }, { sequence: 'q' }),
      close: () => {
        closed = true;
      },
    }));

    expect(await run(['alice', '--root', root], {}, io)).toBe(EXIT_OK);
    expect(pages.map((page) => page.headerLines[1])).toEqual(['Subject: Hi', 'Subject: Again']);
    expect(closed).toBe(true);
  });

  it('logs loading to stderr', async () => {
    const io = captureIo();
    await run(['bob', '--root', root], {}, io);
    expect(io.stderr).toHaveLength(1);
    expect(io.stderr[0].startsWith('[MBOX] Indexed 1 messages')).toBe(true);
  });
});

describe('errorMessage', () => {
  it('includes the cause', () => {
    const error = new Error('outer', { cause: new Error('inner') });
    expect(errorMessage(error)).toBe('outer (inner)');
  });

  it('stringifies non-errors', () => {
    expect(errorMessage('plain')).toBe('plain');
  });
});
