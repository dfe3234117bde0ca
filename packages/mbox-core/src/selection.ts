import * as path from 'path';

export interface MailboxSelection {
  /** Open only this user's mailbox */
  user?: string;
  /** User names to leave out when no user is given */
  exclude?: readonly string[];
}

/**
 * Pick the mailbox paths to open from the file names found under the spool
 * root. A requested user is returned even when it was not listed, so that
 * loading it reports the missing file.
 */
export function selectMailboxes(
  root: string,
  names: readonly string[],
  selection: MailboxSelection = {}
): string[] {
  if (selection.user) return [path.join(root, selection.user)];

  const excluded = new Set(selection.exclude ?? []);
  return names
    .filter((name) => !name.startsWith('.') && !excluded.has(name))
    .sort((a, b) => a.localeCompare(b))
    .map((name) => path.join(root, name));
}
