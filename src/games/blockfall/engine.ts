/**
 * Blockfall Engine — Pure Game Logic
 *
 * Owns the grid, the falling and next pieces, score and the tick
 * counters. One update() call is one tick. Each action channel (gravity,
 * lateral move, rotation, fast drop, row fading) counts ticks since it
 * last fired and acts once its threshold is reached.
 */

import { Grid } from './grid';
import { Piece, type Shape } from './piece';
import { createPieceSelector, type PieceSelector } from './selector';
import { scoreForRows } from './scoring';
import { InputState, KEYS, type KeyInputEvent } from './input';
import { drawGame, type GameView } from './render';
import type { Surface } from './surface';
import { DEFAULT_ENGINE_CONFIG, GRID_COLS, GRID_ROWS, type EngineConfig } from './constants';

// ============================================================================
// Types
// ============================================================================

export type GamePhase = 'playing' | 'rowsFading' | 'gameOver';

export interface TickCounters {
  gravity: number;
  lateral: number;
  rotating: number;
  speedyGravity: number;
  fading: number;
}

export interface EngineOptions {
  cols?: number;
  rows?: number;
  config?: Partial<EngineConfig>;
  selectPiece?: PieceSelector;
}

function zeroCounters(): TickCounters {
  return { gravity: 0, lateral: 0, rotating: 0, speedyGravity: 0, fading: 0 };
}

// ============================================================================
// Engine
// ============================================================================

export class GameEngine implements GameView {
  readonly cols: number;
  readonly rows: number;
  readonly config: EngineConfig;
  readonly input = new InputState();

  private readonly selectPiece: PieceSelector;
  private currentGrid: Grid;
  private activePiece: Piece | null = null;
  private next: Piece;
  private currentScore = 0;
  private gameOver = false;
  private rowsToDelete: number[] = [];
  private counters: TickCounters = zeroCounters();

  constructor(options: EngineOptions = {}) {
    this.cols = options.cols ?? GRID_COLS;
    this.rows = options.rows ?? GRID_ROWS;
    this.config = { ...DEFAULT_ENGINE_CONFIG, ...options.config };
    this.selectPiece = options.selectPiece ?? createPieceSelector();
    this.currentGrid = new Grid(this.cols, this.rows);
    this.next = new Piece(this.selectPiece());
    this.initialize();
  }

  // --------------------------------------------------------------------------
  // State access
  // --------------------------------------------------------------------------

  get phase(): GamePhase {
    if (this.gameOver) return 'gameOver';
    if (this.rowsToDelete.length > 0) return 'rowsFading';
    return 'playing';
  }

  get isGameOver(): boolean {
    return this.gameOver;
  }

  get score(): number {
    return this.currentScore;
  }

  get grid(): Grid {
    return this.currentGrid;
  }

  /** null between a settle and the next spawn */
  get active(): Piece | null {
    return this.activePiece;
  }

  get nextPiece(): Piece {
    return this.next;
  }

  get pendingRows(): readonly number[] {
    return this.rowsToDelete;
  }

  get tickCounters(): Readonly<TickCounters> {
    return { ...this.counters };
  }

  // --------------------------------------------------------------------------
  // Shell interface
  // --------------------------------------------------------------------------

  handleInput(event: KeyInputEvent): void {
    this.input.handleInput(event);
  }

  draw(surface: Surface): void {
    drawGame(this, surface);
  }

  /**
   * Advance one tick
   */
  update(): void {
    if (this.gameOver) {
      if (!this.input.isPressed(KEYS.RESTART)) return;
      this.initialize();
    }

    if (this.rowsToDelete.length > 0) {
      this.counters.fading++;
      if (this.counters.fading >= this.config.fadingTime) {
        this.currentGrid.removeRows(this.rowsToDelete);
        this.counters.fading = 0;
        this.rowsToDelete = [];
      }
      return;
    }

    const piece = this.activePiece ?? this.spawnPiece();
    const { gravitySpeed, lateralSpeed, rotatingSpeed, speedyGravityDelay } = this.config;

    this.counters.gravity++;
    this.counters.speedyGravity++;

    if (this.input.isPressed(KEYS.LEFT) || this.input.isPressed(KEYS.RIGHT)) {
      this.counters.lateral++;
    }
    if (this.input.isPressed(KEYS.UP)) {
      this.counters.rotating++;
    }
    if (this.input.isPressed(KEYS.DOWN) && this.counters.speedyGravity >= speedyGravityDelay) {
      this.counters.gravity += gravitySpeed;
    }

    let settled = false;

    if (this.counters.gravity >= gravitySpeed) {
      settled = this.solveVerticalCollision(piece);
      this.checkCompletedRows();
      this.counters.gravity = 0;
    }

    if (this.counters.lateral >= lateralSpeed) {
      this.solveHorizontalCollision(piece);
      this.counters.lateral = 0;
    }

    if (this.counters.rotating >= rotatingSpeed) {
      this.solveRotationCollision(piece);
      this.counters.rotating = 0;
    }

    this.currentGrid.reset();
    this.currentGrid.overlayPiece(piece, settled);

    if (settled) this.activePiece = null;

    if (this.currentGrid.hasTopCollision()) this.gameOver = true;
  }

  /**
   * Start over: fresh grid, zero score and counters, new falling piece
   */
  initialize(): void {
    this.currentGrid = new Grid(this.cols, this.rows);
    this.rowsToDelete = [];
    this.spawnPiece();
    this.currentScore = 0;
    this.gameOver = false;
    this.counters = zeroCounters();
  }

  // --------------------------------------------------------------------------
  // Internals
  // --------------------------------------------------------------------------

  private spawnPiece(): Piece {
    const piece = this.next;
    piece.setPosition(Math.floor(this.cols / 2) - 2, 0);
    this.activePiece = piece;
    this.next = new Piece(this.selectPiece());
    this.counters.speedyGravity = 0;
    return piece;
  }

  private collides(piece: Piece, shape: Shape, dx: number, dy: number): boolean {
    return piece.cells(shape).some(({ row, col }) => this.currentGrid.isBlocked(row + dy, col + dx));
  }

  /**
   * Move down one row unless blocked. Returns true when the piece settles.
   */
  private solveVerticalCollision(piece: Piece): boolean {
    if (this.collides(piece, piece.shape, 0, 1)) return true;
    piece.moveDown();
    return false;
  }

  private solveHorizontalCollision(piece: Piece): void {
    let dx = 0;
    if (this.input.isPressed(KEYS.LEFT)) dx = -1;
    else if (this.input.isPressed(KEYS.RIGHT)) dx = 1;
    if (dx === 0 || this.collides(piece, piece.shape, dx, 0)) return;

    if (dx < 0) piece.moveLeft();
    else piece.moveRight();
  }

  private solveRotationCollision(piece: Piece): void {
    if (!this.collides(piece, piece.rotationPreview(), 0, 0)) {
      piece.rotate();
    }
  }

  private checkCompletedRows(): void {
    const completed = this.currentGrid.scanCompletedRows();
    if (completed.length === 0) return;

    this.rowsToDelete.push(...completed);
    this.currentScore += scoreForRows(completed.length);
  }
}
