import type { NavigationCommand } from '@mailspool/mbox-core';

/** The shape readline reports for a keypress. */
export interface KeyPress {
  name?: string;
  sequence?: string;
  ctrl?: boolean;
  meta?: boolean;
  shift?: boolean;
}

export type SessionAction =
  | { type: 'navigate'; command: NavigationCommand }
  | { type: 'switchMailbox'; delta: 1 | -1 }
  | { type: 'pending'; digits: string }
  | { type: 'quit' }
  | { type: 'none' };

export function isKeyPress(value: unknown): value is KeyPress {
  return typeof value === 'object' && value !== null;
}

const navigate = (command: NavigationCommand): SessionAction => ({ type: 'navigate', command });

/**
 * Turns keypresses into session actions. Digits accumulate until Enter
 * jumps to that (1-based) message number; any other key drops them.
 */
export class KeyDecoder {
  private digits = '';

  decode(key: KeyPress, pageSize: number): SessionAction {
    const name = key.name ?? '';
    const sequence = key.sequence ?? '';

    if (key.ctrl && name === 'c') return { type: 'quit' };

    if (/^[0-9]$/.test(sequence)) {
      this.digits += sequence;
      return { type: 'pending', digits: this.digits };
    }

    const digits = this.digits;
    this.digits = '';
    if (digits && (name === 'return' || name === 'enter')) {
      return navigate({ type: 'jumpTo', index: Number(digits) - 1 });
    }

    switch (name) {
      case 'escape':
        return { type: 'quit' };
      case 'pagedown':
        return navigate({ type: 'next' });
      case 'pageup':
        return navigate({ type: 'previous' });
      case 'home':
        return navigate({ type: 'first' });
      case 'end':
        return navigate({ type: 'last' });
      case 'down':
        return navigate({ type: 'scrollDown' });
      case 'up':
        return navigate({ type: 'scrollUp' });
      case 'space':
        return navigate({ type: 'pageDown', lines: pageSize });
      case 'tab':
        return { type: 'switchMailbox', delta: key.shift ? -1 : 1 };
    }

    switch (sequence) {
      case 'q':
        return { type: 'quit' };
      case 'n':
        return navigate({ type: 'next' });
      case 'p':
        return navigate({ type: 'previous' });
      case 'g':
        return navigate({ type: 'first' });
      case 'G':
        return navigate({ type: 'last' });
      case 'j':
        return navigate({ type: 'scrollDown' });
      case 'k':
        return navigate({ type: 'scrollUp' });
      case 'b':
        return navigate({ type: 'pageUp', lines: pageSize });
      case ']':
        return { type: 'switchMailbox', delta: 1 };
      case '[':
        return { type: 'switchMailbox', delta: -1 };
    }

    return { type: 'none' };
  }
}
