/**
 * CLI entry point for blockfall
 *
 * Runs the game directly in the current terminal emulator through the
 * Node terminal adapter.
 */

import * as p from '@clack/prompts';
import { runBlockfallGame } from './games/blockfall';
import { parseCliArgs } from './cliArgs';
import { createNodeTerminal, stdinKeyEventSource } from './nodeTerminal';

function printHelp() {
  console.log(`
  blockfall — Falling-block puzzle for the terminal

  Usage:
    blockfall                    Start a game
    blockfall --tick <ms>        Delay between engine ticks (default 10)
    blockfall --help             Show this help

  Controls:
    Left / Right    Move
    Up              Rotate
    Down            Drop faster
    Enter           Play again after game over
    Q / ESC         Quit
`);
}

function main() {
  const args = parseCliArgs(process.argv.slice(2));

  if (args.kind === 'help') {
    printHelp();
    process.exit(0);
  }

  if (args.kind === 'error') {
    p.log.error(args.message);
    p.log.info('Run `blockfall --help` for usage.');
    process.exit(1);
  }

  if (!process.stdin.isTTY || !process.stdout.isTTY) {
    p.cancel('blockfall needs an interactive terminal (stdin and stdout must be a TTY).');
    process.exit(1);
  }

  const terminal = createNodeTerminal();
  const keys = stdinKeyEventSource(process.stdin);

  const quit = () => {
    terminal.dispose();
    process.exit(0);
  };

  // Raw mode swallows SIGINT; Ctrl-C arrives as a byte
  process.stdin.on('data', (data: string | Buffer) => {
    if (data.toString() === '\x03') quit();
  });
  process.on('exit', () => terminal.dispose());
  process.on('SIGINT', quit);
  process.on('SIGTERM', quit);

  runBlockfallGame(terminal, keys, { tickMs: args.tickMs, onQuit: quit });
}

main();
