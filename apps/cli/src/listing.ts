import type { Mailbox } from '@mailspool/mbox-core';
import { formatFileSize, formatHeaderDate, toDisplayText, truncate } from '@mailspool/shared';

/** Plain-text table of a mailbox, for when there is no terminal to browse in. */
export function formatListing(mailbox: Mailbox): string[] {
  const count = mailbox.messages.length;
  const lines = [
    `${toDisplayText(mailbox.name)}: ${count} ${count === 1 ? 'message' : 'messages'} (${formatFileSize(mailbox.size)})`,
  ];
  for (const message of mailbox.messages) {
    const sender = truncate(toDisplayText(message.displaySender || '(Unknown sender)'), 30);
    const subject = truncate(toDisplayText(message.displaySubject || '(No Subject)'), 60);
    lines.push(
      `  ${String(message.index + 1).padStart(4)}  ${toDisplayText(formatHeaderDate(message.date))}  ${sender}  ${subject}`
    );
  }
  return lines;
}
