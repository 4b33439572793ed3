/**
 * blockfall
 *
 * Falling-block puzzle for xterm.js and the CLI.
 *
 * Library usage (xterm.js):
 *   import { runBlockfallGame, windowKeyEventSource } from 'blockfall';
 *   const controller = runBlockfallGame(terminal, windowKeyEventSource());
 *
 * CLI usage:
 *   npx blockfall
 */

export {
  // Game runner
  runBlockfallGame,
  type BlockfallController,
  type BlockfallOptions,
} from './games/blockfall';

export {
  // Engine
  GameEngine,
  type GamePhase,
  type TickCounters,
  type EngineOptions,
} from './games/blockfall/engine';

export { Grid, type CellState } from './games/blockfall/grid';
export { Piece, PIECE_KINDS, getCanonicalShape, type PieceKind, type Shape } from './games/blockfall/piece';
export { createPieceSelector, mathRandomInt, type PieceSelector, type RandomInt } from './games/blockfall/selector';
export { scoreForRows } from './games/blockfall/scoring';

export {
  // Input
  InputState,
  KEYS,
  windowKeyEventSource,
  type KeyEventSource,
  type KeyEventListener,
  type KeyInputEvent,
} from './games/blockfall/input';

export {
  // Drawing
  drawGame,
  RESTART_PROMPT,
  type GameView,
} from './games/blockfall/render';
export { PALETTE, type Rect, type Rgb, type Surface } from './games/blockfall/surface';
export { TerminalSurface, type TerminalCell } from './games/blockfall/terminalSurface';

export { DEFAULT_ENGINE_CONFIG, type EngineConfig } from './games/blockfall/constants';

export {
  // Terminal buffer management
  enterAlternateBuffer,
  exitAlternateBuffer,
  isInAlternateBuffer,
  type GameTerminal,
} from './games/utils';
