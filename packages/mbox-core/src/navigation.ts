import type { Mailbox } from './mailbox';
import type { Message } from './message';

export type NavigationCommand =
  | { type: 'next' }
  | { type: 'previous' }
  | { type: 'first' }
  | { type: 'last' }
  | { type: 'jumpTo'; index: number }
  | { type: 'scrollDown' }
  | { type: 'scrollUp' }
  | { type: 'pageDown'; lines: number }
  | { type: 'pageUp'; lines: number };

export interface Position {
  index: number;
  total: number;
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

/**
 * Which message of a mailbox is on screen, and how far its body is scrolled.
 *
 * Movement saturates at both ends, never wraps. On an empty mailbox every
 * command is a no-op and current() is null.
 */
export class NavigationState {
  readonly mailbox: Mailbox;
  private index: number | null;
  private offset = 0;

  constructor(mailbox: Mailbox) {
    this.mailbox = mailbox;
    this.index = mailbox.messages.length > 0 ? 0 : null;
  }

  get currentIndex(): number | null {
    return this.index;
  }

  /** First visible line of the current message's text */
  get lineOffset(): number {
    return this.offset;
  }

  current(): Message | null {
    return this.index === null ? null : this.mailbox.messages[this.index];
  }

  position(): Position | null {
    return this.index === null ? null : { index: this.index, total: this.mailbox.messages.length };
  }

  next(): boolean {
    return this.index === null ? false : this.moveTo(this.index + 1);
  }

  previous(): boolean {
    return this.index === null ? false : this.moveTo(this.index - 1);
  }

  first(): boolean {
    return this.moveTo(0);
  }

  last(): boolean {
    return this.moveTo(this.mailbox.messages.length - 1);
  }

  /** Out-of-range targets, infinities included, are clamped; fractions are truncated toward zero. */
  jumpTo(index: number): boolean {
    if (Number.isNaN(index)) return false;
    return this.moveTo(Math.trunc(index));
  }

  scrollBy(lines: number): boolean {
    const message = this.current();
    if (!message || !Number.isFinite(lines)) return false;
    const target = clamp(this.offset + Math.trunc(lines), 0, Math.max(0, message.text.length - 1));
    if (target === this.offset) return false;
    this.offset = target;
    return true;
  }

  /** Run one command. Returns whether anything on screen changed. */
  apply(command: NavigationCommand): boolean {
    switch (command.type) {
      case 'next':
        return this.next();
      case 'previous':
        return this.previous();
      case 'first':
        return this.first();
      case 'last':
        return this.last();
      case 'jumpTo':
        return this.jumpTo(command.index);
      case 'scrollDown':
        return this.scrollBy(1);
      case 'scrollUp':
        return this.scrollBy(-1);
      case 'pageDown':
        return this.scrollBy(Math.max(1, command.lines));
      case 'pageUp':
        return this.scrollBy(-Math.max(1, command.lines));
    }
  }

  private moveTo(target: number): boolean {
    if (this.index === null) return false;
    const next = clamp(target, 0, this.mailbox.messages.length - 1);
    if (next === this.index) return false;
    this.index = next;
    this.offset = 0;
    return true;
  }
}
