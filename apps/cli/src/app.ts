import {
  Mailbox,
  NavigationState,
  isMailboxError,
  selectMailboxes,
  type Logger,
} from '@mailspool/mbox-core';
import type { KeyPress } from './keys';
import { formatListing } from './listing';
import { USAGE, UsageError, parseArgs, type CliOptions } from './options';
import { runSession, type Screen } from './session';
import { listSpool } from './spool';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_NOT_FOUND = 2;

export interface TerminalSession {
  screen: Screen;
  keys: AsyncIterable<KeyPress>;
  close: () => void;
}

export interface AppIo {
  out: (line: string) => void;
  err: (line: string) => void;
  /** Null when there is no interactive terminal; mailboxes are listed instead */
  openTerminal: (() => TerminalSession) | null;
}

/** Extract a useful error message, including the cause if present */
export function errorMessage(error: unknown): string {
  if (!(error instanceof Error)) return String(error);
  const cause = error.cause instanceof Error ? error.cause.message : undefined;
  return cause && cause !== error.message ? `${error.message} (${cause})` : error.message;
}

async function loadMailboxes(paths: string[], options: CliOptions, io: AppIo): Promise<Mailbox[]> {
  const logger: Logger = { log: io.err, warn: io.err };
  const mailboxes: Mailbox[] = [];

  for (const filePath of paths) {
    try {
      mailboxes.push(await Mailbox.load(filePath, { logger }));
    } catch (err) {
      if (!isMailboxError(err)) throw err;
      io.err(options.user ? `Error: ${errorMessage(err)}` : `Skipping ${filePath}: ${errorMessage(err)}`);
    }
  }
  return mailboxes;
}

/** Run the program and resolve with its exit status. */
export async function run(
  argv: readonly string[],
  env: Record<string, string | undefined>,
  io: AppIo
): Promise<number> {
  let options: CliOptions;
  try {
    options = parseArgs(argv, env);
  } catch (err) {
    if (!(err instanceof UsageError)) throw err;
    io.err(`Error: ${err.message}`);
    io.err(USAGE);
    return EXIT_FAILURE;
  }

  if (options.help) {
    io.out(USAGE);
    return EXIT_OK;
  }

  let names: string[] = [];
  if (!options.user) {
    try {
      names = await listSpool(options.root);
    } catch (err) {
      if (!isMailboxError(err)) throw err;
      io.err(`Error: ${errorMessage(err)}`);
      return EXIT_NOT_FOUND;
    }
  }

  const paths = selectMailboxes(options.root, names, options);
  const mailboxes = await loadMailboxes(paths, options, io);
  if (mailboxes.length === 0) {
    if (!options.user) io.err(`Error: no readable mailboxes under ${options.root}`);
    return EXIT_NOT_FOUND;
  }

  if (!io.openTerminal) {
    for (const mailbox of mailboxes) {
      for (const line of formatListing(mailbox)) io.out(line);
    }
    return EXIT_OK;
  }

  const terminal = io.openTerminal();
  try {
    await runSession(
      mailboxes.map((mailbox) => new NavigationState(mailbox)),
      terminal.keys,
      terminal.screen
    );
  } finally {
    terminal.close();
  }
  return EXIT_OK;
}
