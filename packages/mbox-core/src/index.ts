export { splitMessages, countMessages, toLines, ENVELOPE_PREFIX, type RawRecord } from './splitter';
export { HeaderMap, normalizeHeaderName } from './header-map';
export {
  parseHeaders,
  splitRecord,
  parseEnvelope,
  type Envelope,
  type RecordParts,
} from './header-parser';
export { extractPlainText, needsPlainTextExtraction, type PlainTextParts } from './plain-text';
export { Message, type MessageInit } from './message';
export { Mailbox, type Logger, type MailboxLoadOptions } from './mailbox';
export {
  NavigationState,
  type NavigationCommand,
  type Position,
} from './navigation';
export { renderPage, bodyRowsFor, headerRowsFor, KEY_LEGEND } from './render';
export { selectMailboxes, type MailboxSelection } from './selection';
export {
  MailboxError,
  MailboxNotFoundError,
  MailboxReadError,
  isMailboxError,
  toMailboxError,
  type MailboxErrorKind,
} from './errors';
