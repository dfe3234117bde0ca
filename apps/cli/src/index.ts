#!/usr/bin/env tsx
import { EXIT_FAILURE, errorMessage, run, type AppIo } from './app';
import { TerminalScreen, keyEvents } from './terminal';

const io: AppIo = {
  out: (line) => {
    process.stdout.write(`${line}\n`);
  },
  err: (line) => {
    process.stderr.write(`${line}\n`);
  },
  openTerminal:
    process.stdin.isTTY && process.stdout.isTTY
      ? () => {
          const screen = new TerminalScreen(process.stdout, process.stdin);
          screen.enter();
          return { screen, keys: keyEvents(process.stdin), close: () => screen.leave() };
        }
      : null,
};

run(process.argv.slice(2), process.env, io)
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error(`Error: ${errorMessage(err)}`);
    process.exitCode = EXIT_FAILURE;
  });
