import * as fs from 'fs';
import { toMailboxError } from '@mailspool/mbox-core';

/** File names directly under the spool root; each is one user's mailbox. */
export async function listSpool(root: string): Promise<string[]> {
  try {
    const entries = await fs.promises.readdir(root, { withFileTypes: true });
    return entries.filter((entry) => entry.isFile()).map((entry) => entry.name);
  } catch (err) {
    throw toMailboxError(root, err);
  }
}
