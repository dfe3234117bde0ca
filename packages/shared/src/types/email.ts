/** Render-ready view of one message, handed to whatever paints the screen. */
export interface MessageView {
  /** Zero-based position of the message in its mailbox */
  index: number;
  sender: string;
  subject: string;
  /** Raw Date header value; empty when the header is absent */
  date: string;
  body: readonly string[];
}

/** Compact mailbox description used in listings and log lines. */
export interface MailboxSummary {
  id: string;
  path: string;
  name: string;
  messageCount: number;
  size: number;
}

/** Visible terminal area, in character cells. */
export interface Viewport {
  width: number;
  height: number;
}

/** One screenful of text, top to bottom: status, headers, then body. */
export interface RenderedPage {
  statusLine: string;
  headerLines: string[];
  bodyLines: string[];
}
