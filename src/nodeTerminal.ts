/**
 * Node Terminal Adapter
 *
 * Maps stdin/stdout to the subset of the xterm.js Terminal interface the
 * game draws through, and turns raw stdin bytes into key events.
 */

import type { GameTerminal } from './games/utils';
import type { KeyEventSource, KeyInputEvent } from './games/blockfall/input';

// Raw stdin never reports a key release; a key counts as held until this
// long after its last (auto-repeated) press.
export const KEY_RELEASE_MS = 120;

// Synchronized output: wrap writes with DEC sync sequences so the
// terminal batches clear + redraw into a single atomic paint.
const SYNC_START = '\x1b[?2026h';
const SYNC_END = '\x1b[?2026l';

export interface NodeTerminal extends GameTerminal {
  dispose: () => void;
}

/** Minimal readable the key source listens on (process.stdin in the CLI) */
export interface KeyInputStream {
  on: (event: 'data', listener: (data: string | Buffer) => void) => unknown;
  off: (event: 'data', listener: (data: string | Buffer) => void) => unknown;
}

const ESCAPE_SEQUENCES: Record<string, string> = {
  '\x1b[A': 'ArrowUp',
  '\x1bOA': 'ArrowUp',
  '\x1b[B': 'ArrowDown',
  '\x1bOB': 'ArrowDown',
  '\x1b[C': 'ArrowRight',
  '\x1bOC': 'ArrowRight',
  '\x1b[D': 'ArrowLeft',
  '\x1bOD': 'ArrowLeft',
};

/**
 * Map one key token to a KeyboardEvent.code value, or null when the
 * token has no physical key equivalent
 */
function toCode(token: string): string | null {
  const mapped = ESCAPE_SEQUENCES[token];
  if (mapped) return mapped;
  if (token === '\r' || token === '\n') return 'Enter';
  if (token === '\x1b') return 'Escape';
  if (token === ' ') return 'Space';
  if (token === '\t') return 'Tab';
  if (token === '\x7f' || token === '\b') return 'Backspace';
  if (/^[a-z]$/i.test(token)) return `Key${token.toUpperCase()}`;
  if (/^[0-9]$/.test(token)) return `Digit${token}`;
  return null;
}

/**
 * Split a stdin chunk into key codes. Auto-repeat can deliver several
 * keys in one chunk.
 */
export function parseKeyCodes(data: string): string[] {
  const tokens = data.match(/\x1b\[[A-D]|\x1bO[A-D]|[\s\S]/g) ?? [];
  const codes: string[] = [];
  for (const token of tokens) {
    const code = toCode(token);
    if (code) codes.push(code);
  }
  return codes;
}

/**
 * Key events from a raw-mode stream. Every press emits keydown; keyup is
 * synthesized `releaseMs` after the last press of the same key.
 */
export function stdinKeyEventSource(input: KeyInputStream, releaseMs: number = KEY_RELEASE_MS): KeyEventSource {
  return {
    subscribe: (listener) => {
      const releaseTimers = new Map<string, ReturnType<typeof setTimeout>>();

      const emit = (type: KeyInputEvent['type'], code: string) => listener({ type, code });

      const onData = (data: string | Buffer) => {
        const text = typeof data === 'string' ? data : data.toString('utf8');
        for (const code of parseKeyCodes(text)) {
          emit('keydown', code);

          const pending = releaseTimers.get(code);
          if (pending) clearTimeout(pending);
          releaseTimers.set(code, setTimeout(() => {
            releaseTimers.delete(code);
            emit('keyup', code);
          }, releaseMs));
        }
      };

      input.on('data', onData);
      return () => {
        input.off('data', onData);
        for (const timer of releaseTimers.values()) clearTimeout(timer);
        releaseTimers.clear();
      };
    },
  };
}

/**
 * stdout-backed terminal. Puts stdin in raw mode; dispose() restores it.
 */
export function createNodeTerminal(): NodeTerminal {
  if (process.stdin.isTTY) {
    process.stdin.setRawMode(true);
  }
  process.stdin.resume();
  process.stdin.setEncoding('utf8');

  let disposed = false;

  return {
    write: (data: string | Uint8Array) => {
      process.stdout.write(SYNC_START);
      process.stdout.write(data);
      process.stdout.write(SYNC_END);
    },
    get cols() { return process.stdout.columns || 80; },
    get rows() { return process.stdout.rows || 24; },
    dispose: () => {
      if (disposed) return;
      disposed = true;
      if (process.stdin.isTTY) {
        process.stdin.setRawMode(false);
      }
      process.stdin.pause();
      process.stdout.write('\x1b[?1049l');
      process.stdout.write('\x1b[?25h');
      process.stdout.write('\x1b[0m');
    },
  };
}
