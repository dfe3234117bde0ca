import { formatHeaderDate, toDisplayText, truncate, type RenderedPage, type Viewport } from '@mailspool/shared';
import type { NavigationState } from './navigation';

export const KEY_LEGEND = 'PgUp/Down=prev/next mail  ↑/↓=prev/next line  q/esc=quit';

const NO_SENDER = '(Unknown sender)';
const NO_SUBJECT = '(No Subject)';

/** Three header rows and one blank separator row. */
const HEADER_ROWS = 4;

/** Header rows shown in `viewport`: what is left after the status row and one body row. */
export function headerRowsFor(viewport: Viewport): number {
  return Math.min(HEADER_ROWS, Math.max(0, viewport.height - 2));
}

/** Body rows that fit in `viewport`; never less than one. */
export function bodyRowsFor(viewport: Viewport): number {
  return Math.max(1, viewport.height - 1 - headerRowsFor(viewport));
}

export function renderPage(state: NavigationState, viewport: Viewport): RenderedPage {
  const width = Math.max(1, viewport.width);
  const clip = (line: string): string => truncate(toDisplayText(line), width);
  const name = state.mailbox.name;
  const message = state.current();
  const position = state.position();

  if (!message || !position) {
    return {
      statusLine: clip(`[${name}] No messages    q/esc=quit`),
      headerLines: [],
      bodyLines: [],
    };
  }

  const view = message.toView();
  const rows = bodyRowsFor(viewport);

  return {
    statusLine: clip(
      `[${name}] Reading mail ${position.index + 1}/${position.total}    ${formatHeaderDate(view.date)}    ${KEY_LEGEND}`
    ),
    headerLines: [
      clip(`From: ${view.sender || NO_SENDER}`),
      clip(`Subject: ${view.subject || NO_SUBJECT}`),
      clip(`Date: ${view.date || 'Unknown'}`),
      '',
    ].slice(0, headerRowsFor(viewport)),
    bodyLines: view.body.slice(state.lineOffset, state.lineOffset + rows).map(clip),
  };
}
