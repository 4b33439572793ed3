/**
 * Blockfall
 *
 * Falling-block puzzle on a walled 10×20 grid. The engine ticks on a fixed
 * interval; the shell forwards key events and draws each tick.
 */

import {
  enterAlternateBuffer,
  exitAlternateBuffer,
  getCenteredOrigin,
  renderTooSmall,
  type GameTerminal,
} from '../utils';
import { GameEngine } from './engine';
import { KEYS, type KeyEventSource } from './input';
import { TerminalSurface } from './terminalSurface';
import { TICK_MS } from './constants';

/**
 * Blockfall Game Controller
 */
export interface BlockfallController {
  stop: () => void;
  isRunning: boolean;
}

export interface BlockfallOptions {
  tickMs?: number;
  engine?: GameEngine;
  /** Called after Q/ESC stops the game */
  onQuit?: () => void;
}

export function runBlockfallGame(
  terminal: GameTerminal,
  keys: KeyEventSource,
  options: BlockfallOptions = {}
): BlockfallController {
  const engine = options.engine ?? new GameEngine();
  const surface = new TerminalSurface(terminal);
  const tickMs = options.tickMs ?? TICK_MS;

  let running = true;

  enterAlternateBuffer(terminal, 'blockfall');

  function render() {
    if (terminal.cols < surface.columns || terminal.rows < surface.lines) {
      renderTooSmall(terminal, surface.columns, surface.lines);
      return;
    }
    const origin = getCenteredOrigin(terminal, surface.columns, surface.lines);
    surface.setOrigin(origin.col, origin.row);
    engine.draw(surface);
  }

  const unsubscribe = keys.subscribe((event) => {
    if (!running) return;

    if (event.type === 'keydown' && (event.code === KEYS.QUIT || event.code === KEYS.ESCAPE)) {
      controller.stop();
      options.onQuit?.();
      return;
    }

    engine.handleInput(event);
  });

  const gameInterval = setInterval(() => {
    engine.update();
    render();
  }, tickMs);

  const controller: BlockfallController = {
    stop: () => {
      if (!running) return;
      running = false;
      clearInterval(gameInterval);
      unsubscribe();
      engine.input.releaseAll();
      exitAlternateBuffer(terminal, 'blockfall');
    },
    get isRunning() { return running; }
  };

  render();

  return controller;
}
