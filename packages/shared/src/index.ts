export type {
  MessageView,
  MailboxSummary,
  Viewport,
  RenderedPage,
} from './types/email';
export { formatFileSize, formatHeaderDate, toDisplayText, truncate } from './utils/format';
