/**
 * Grid — the board, with a wall border on the left, right and bottom.
 *
 * Cells are addressed as (row, col) over the walled matrix: the interior
 * spans rows 0..rows-1 and cols 1..cols; column 0, column cols+1 and row
 * `rows` are walls.
 */

import type { Piece } from './piece';

export type CellState = 'empty' | 'moving' | 'settled' | 'wall' | 'fading';

export class Grid {
  readonly cols: number;
  readonly rows: number;
  private cells: CellState[][];

  constructor(cols: number, rows: number) {
    this.cols = cols;
    this.rows = rows;
    // +1 for the floor, +2 for the side walls
    this.cells = Array.from({ length: rows + 1 }, () => this.emptyRow());
    this.reset(true);
  }

  /** Row count including the floor */
  get height(): number {
    return this.cells.length;
  }

  /** Column count including both walls */
  get width(): number {
    return this.cols + 2;
  }

  isInside(row: number, col: number): boolean {
    return row >= 0 && row < this.height && col >= 0 && col < this.width;
  }

  /**
   * Cell state; anything outside the matrix reads as wall
   */
  get(row: number, col: number): CellState {
    if (!this.isInside(row, col)) return 'wall';
    return this.cells[row][col];
  }

  set(row: number, col: number, state: CellState): void {
    if (!this.isInside(row, col)) return;
    this.cells[row][col] = state;
  }

  /**
   * True when a piece cell cannot occupy (row, col)
   */
  isBlocked(row: number, col: number): boolean {
    const cell = this.get(row, col);
    return cell === 'settled' || cell === 'wall';
  }

  row(index: number): readonly CellState[] {
    return this.cells[index];
  }

  /**
   * Copy of the whole matrix
   */
  snapshot(): CellState[][] {
    return this.cells.map(row => [...row]);
  }

  /**
   * Clear moving cells (or everything when `fullClean`), then restamp the
   * walls.
   */
  reset(fullClean = false): void {
    for (const row of this.cells) {
      for (let j = 0; j < row.length; j++) {
        if (fullClean || row[j] === 'moving') row[j] = 'empty';
      }
      row[0] = 'wall';
      row[this.cols + 1] = 'wall';
    }

    const floor = this.cells[this.rows];
    for (let j = 1; j <= this.cols; j++) {
      floor[j] = 'wall';
    }
  }

  /**
   * Write the piece's occupied cells into the grid, as settled blocks or as
   * the moving overlay. Stops at the first shape row below the grid.
   */
  overlayPiece(piece: Piece, commitAsSettled: boolean): void {
    for (let i = 0; i < piece.shape.length; i++) {
      const row = piece.y + i;
      if (row >= this.height) return;

      for (let j = 0; j < piece.shape[i].length; j++) {
        if (piece.shape[i][j] !== 1) continue;
        const col = piece.x + j;

        if (commitAsSettled) {
          this.set(row, col, 'settled');
        } else if (this.get(row, col) === 'empty') {
          this.set(row, col, 'moving');
        }
      }
    }
  }

  /**
   * Mark every full interior row as fading and return their indices, top
   * to bottom
   */
  scanCompletedRows(): number[] {
    const completed: number[] = [];

    for (let i = 0; i < this.rows; i++) {
      let settled = 0;
      for (let j = 1; j <= this.cols; j++) {
        if (this.cells[i][j] === 'settled') settled++;
      }

      if (settled === this.cols) {
        completed.push(i);
        for (let j = 1; j <= this.cols; j++) {
          this.cells[i][j] = 'fading';
        }
      }
    }

    return completed;
  }

  /**
   * Remove rows one index at a time: everything above each index shifts
   * down one row and a fresh walled row enters at the top. Indices are not
   * adjusted for earlier removals in the same call.
   */
  removeRows(rowIndices: readonly number[]): void {
    for (const rowIndex of rowIndices) {
      if (rowIndex < 0 || rowIndex >= this.rows) continue;

      for (let k = rowIndex; k > 0; k--) {
        this.cells[k] = [...this.cells[k - 1]];
      }
      this.cells[0] = this.emptyRow();
    }
  }

  /**
   * True when a settled block sits in either of the top two rows
   */
  hasTopCollision(): boolean {
    for (let i = 0; i < Math.min(2, this.rows); i++) {
      for (let j = 1; j <= this.cols; j++) {
        if (this.cells[i][j] === 'settled') return true;
      }
    }
    return false;
  }

  private emptyRow(): CellState[] {
    const row = new Array<CellState>(this.cols + 2).fill('empty');
    row[0] = 'wall';
    row[this.cols + 1] = 'wall';
    return row;
  }
}
