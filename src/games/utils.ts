/**
 * Shared terminal utilities for games
 */

import type { Terminal } from '@xterm/xterm';

/**
 * The part of an xterm.js Terminal a game draws through. The CLI's Node
 * adapter provides the same members over stdout.
 */
export type GameTerminal = Pick<Terminal, 'write' | 'cols' | 'rows'>;

// ============================================================================
// Alternate Buffer Management
// ============================================================================

/**
 * Track which terminals are currently in alternate buffer.
 * This prevents double-entry/exit issues and provides debugging info.
 */
const alternateBufferState = new WeakMap<GameTerminal, { reason: string; enteredAt: number }>();

/**
 * Enter alternate screen buffer with state tracking.
 * Safe to call multiple times - will log warning but not double-enter.
 *
 * @param reason - Description of why we're entering (for debugging)
 * @returns true if buffer was entered, false if already in buffer
 */
export function enterAlternateBuffer(terminal: GameTerminal, reason: string): boolean {
  const existing = alternateBufferState.get(terminal);
  if (existing) {
    console.warn(`[AlternateBuffer] Already in buffer (entered by: ${existing.reason}), requested by: ${reason}`);
    return false;
  }

  terminal.write('\x1b[?1049h'); // Enter alternate screen buffer
  terminal.write('\x1b[?25l');   // Hide cursor
  terminal.write('\x1b[2J\x1b[H'); // Clear screen

  alternateBufferState.set(terminal, { reason, enteredAt: Date.now() });
  return true;
}

/**
 * Exit alternate screen buffer with state tracking.
 *
 * @returns true if buffer was exited, false if not in buffer
 */
export function exitAlternateBuffer(terminal: GameTerminal, reason: string): boolean {
  if (!alternateBufferState.has(terminal)) {
    console.warn(`[AlternateBuffer] Not in alternate buffer, exit requested by: ${reason}`);
    return false;
  }

  terminal.write('\x1b[0m');
  terminal.write('\x1b[?1049l'); // Exit alternate screen buffer
  terminal.write('\x1b[?25h');   // Show cursor

  alternateBufferState.delete(terminal);
  return true;
}

export function isInAlternateBuffer(terminal: GameTerminal): boolean {
  return alternateBufferState.has(terminal);
}

// ============================================================================
// Layout Utilities
// ============================================================================

/**
 * Top-left (0-based) that centers a content box in the terminal, clamped
 * to the screen
 */
export function getCenteredOrigin(
  terminal: Pick<GameTerminal, 'cols' | 'rows'>,
  contentCols: number,
  contentRows: number
): { col: number; row: number } {
  return {
    col: Math.max(0, Math.floor((terminal.cols - contentCols) / 2)),
    row: Math.max(0, Math.floor((terminal.rows - contentRows) / 2)),
  };
}

/**
 * "Terminal too small" notice, centered
 */
export function renderTooSmall(terminal: GameTerminal, minCols: number, minRows: number): void {
  const { cols, rows } = terminal;
  const msg1 = 'Terminal too small!';
  const msg2 = `Need: ${minCols}×${minRows}  Have: ${cols}×${rows}`;
  let hint = 'Make pane larger';
  if (cols >= minCols) hint = 'Make pane taller ↓';
  else if (rows >= minRows) hint = 'Make pane wider →';

  const centerX = Math.floor(cols / 2);
  const centerY = Math.floor(rows / 2);
  const at = (row: number, text: string) =>
    `\x1b[${Math.max(1, row)};${Math.max(1, centerX - Math.floor(text.length / 2))}H`;

  let output = '\x1b[0m\x1b[2J\x1b[H';
  output += `${at(centerY - 1, msg1)}\x1b[1m${msg1}\x1b[0m`;
  output += `${at(centerY + 1, msg2)}\x1b[2m${msg2}\x1b[0m`;
  output += `${at(centerY + 3, hint)}${hint}\x1b[0m`;
  terminal.write(output);
}
