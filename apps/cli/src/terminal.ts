import { on } from 'events';
import * as readline from 'readline';
import type { RenderedPage, Viewport } from '@mailspool/shared';
import { isKeyPress, type KeyPress } from './keys';
import type { Screen } from './session';

const CSI = '\x1b[';

export const ansi = {
  alternateScreen: `${CSI}?1049h`,
  mainScreen: `${CSI}?1049l`,
  hideCursor: `${CSI}?25l`,
  showCursor: `${CSI}?25h`,
  clear: `${CSI}2J`,
  home: `${CSI}H`,
  underline: `${CSI}4m`,
  noUnderline: `${CSI}24m`,
};

/** Full-screen repaint of one page: underlined status row, then headers and body. */
export function paintPage(page: RenderedPage): string {
  const rows = [
    `${ansi.underline}${page.statusLine}${ansi.noUnderline}`,
    ...page.headerLines,
    ...page.bodyLines,
  ];
  return `${ansi.clear}${ansi.home}${rows.join('\r\n')}`;
}

export class TerminalScreen implements Screen {
  private readonly output: NodeJS.WriteStream;
  private readonly input: NodeJS.ReadStream;

  constructor(output: NodeJS.WriteStream, input: NodeJS.ReadStream) {
    this.output = output;
    this.input = input;
  }

  get viewport(): Viewport {
    return { width: this.output.columns || 80, height: this.output.rows || 24 };
  }

  enter(): void {
    if (this.input.isTTY) this.input.setRawMode(true);
    this.output.write(`${ansi.alternateScreen}${ansi.hideCursor}`);
  }

  leave(): void {
    this.output.write(`${ansi.showCursor}${ansi.mainScreen}`);
    if (this.input.isTTY) this.input.setRawMode(false);
    this.input.pause();
  }

  paint(page: RenderedPage): void {
    this.output.write(paintPage(page));
  }
}

/** Keypresses from a raw-mode input stream, one at a time. */
export async function* keyEvents(input: NodeJS.ReadStream): AsyncGenerator<KeyPress> {
  readline.emitKeypressEvents(input);
  input.resume();
  for await (const args of on(input, 'keypress')) {
    const key: unknown = Array.isArray(args) ? args[1] : undefined;
    if (isKeyPress(key)) yield key;
  }
}
