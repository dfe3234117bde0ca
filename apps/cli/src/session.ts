import { bodyRowsFor, renderPage, type NavigationState } from '@mailspool/mbox-core';
import { truncate, type RenderedPage, type Viewport } from '@mailspool/shared';
import { KeyDecoder, type KeyPress } from './keys';

export interface Screen {
  readonly viewport: Viewport;
  paint(page: RenderedPage): void;
}

/**
 * The interactive loop: wait for one key, apply it to the active mailbox,
 * repaint, repeat. Ends on quit or when the key stream ends.
 */
export async function runSession(
  states: readonly NavigationState[],
  keys: AsyncIterable<KeyPress>,
  screen: Screen
): Promise<void> {
  if (states.length === 0) return;

  const decoder = new KeyDecoder();
  let active = 0;
  let prompt = '';

  const draw = (): void => {
    const page = renderPage(states[active], screen.viewport);
    screen.paint(prompt ? { ...page, statusLine: truncate(prompt, screen.viewport.width) } : page);
  };

  draw();
  for await (const key of keys) {
    const action = decoder.decode(key, bodyRowsFor(screen.viewport));
    if (action.type === 'quit') break;
    if (action.type === 'none') continue;

    prompt = '';
    switch (action.type) {
      case 'navigate':
        states[active].apply(action.command);
        break;
      case 'switchMailbox':
        active = (active + action.delta + states.length) % states.length;
        break;
      case 'pending':
        prompt = `Jump to mail: ${action.digits}`;
        break;
    }
    draw();
  }
}
