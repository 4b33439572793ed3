/**
 * Command-line argument parsing for the blockfall CLI
 */

import { TICK_MS } from './games/blockfall/constants';

export type CliArgs =
  | { kind: 'help' }
  | { kind: 'play'; tickMs: number }
  | { kind: 'error'; message: string };

export function parseCliArgs(argv: readonly string[]): CliArgs {
  if (argv.includes('--help') || argv.includes('-h')) {
    return { kind: 'help' };
  }

  let tickMs = TICK_MS;
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--tick') {
      const raw = argv[i + 1];
      const value = Number(raw);
      if (raw === undefined || !Number.isInteger(value) || value <= 0) {
        return { kind: 'error', message: `--tick needs a positive whole number of milliseconds, got: ${raw ?? '(nothing)'}` };
      }
      tickMs = value;
      i++;
    } else {
      return { kind: 'error', message: `Unknown option: ${arg}` };
    }
  }

  return { kind: 'play', tickMs };
}
