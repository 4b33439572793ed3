/**
 * Blockfall constants
 *
 * Window, grid and timing values. Tick thresholds count engine ticks,
 * not milliseconds; the runner ticks every TICK_MS.
 */

// Window (pixels)
export const SCREEN_WIDTH = 600;
export const SCREEN_HEIGHT = 480;

// Square size in pixels
export const SQUARE_SIZE = 20;

// Grid (interior cells, walls excluded)
export const GRID_COLS = 10;
export const GRID_ROWS = 20;

// Grid origin on screen
export const GRID_POS_X = 120;
export const GRID_POS_Y = 30;

// Gap between grid and the next-piece preview
export const NEXT_PREVIEW_DISTANCE = 50;

// Text sizes
export const TITLE_TEXT_SIZE = 24;
export const LABEL_TEXT_SIZE = 12;

// Delay between ticks
export const TICK_MS = 10;

/**
 * Tick thresholds (lower is faster)
 */
export interface EngineConfig {
  gravitySpeed: number;
  lateralSpeed: number;
  rotatingSpeed: number;
  fadingTime: number;
  speedyGravityDelay: number;
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  gravitySpeed: 30,
  lateralSpeed: 8,
  rotatingSpeed: 8,
  fadingTime: 50,
  speedyGravityDelay: 40,
};
