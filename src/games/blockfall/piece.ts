/**
 * Pieces — the seven tetrominoes on a fixed 4×4 matrix.
 */

export type PieceKind = 'I' | 'O' | 'T' | 'S' | 'Z' | 'J' | 'L';

/** 4×4 bitmask, 1 = occupied. */
export type Shape = number[][];

export const PIECE_KINDS: readonly PieceKind[] = ['I', 'O', 'T', 'S', 'Z', 'J', 'L'];

export const SHAPE_SIZE = 4;

const PIECE_SHAPES: Record<PieceKind, Shape> = {
  I: [
    [0, 0, 0, 0],
    [1, 1, 1, 1],
    [0, 0, 0, 0],
    [0, 0, 0, 0],
  ],
  O: [
    [0, 0, 0, 0],
    [0, 1, 1, 0],
    [0, 1, 1, 0],
    [0, 0, 0, 0],
  ],
  T: [
    [0, 0, 0, 0],
    [0, 1, 1, 1],
    [0, 0, 1, 0],
    [0, 0, 0, 0],
  ],
  S: [
    [0, 0, 0, 0],
    [0, 0, 1, 1],
    [0, 1, 1, 0],
    [0, 0, 0, 0],
  ],
  Z: [
    [0, 0, 0, 0],
    [0, 1, 1, 0],
    [0, 0, 1, 1],
    [0, 0, 0, 0],
  ],
  J: [
    [0, 0, 0, 0],
    [0, 1, 1, 1],
    [0, 1, 0, 0],
    [0, 0, 0, 0],
  ],
  L: [
    [0, 0, 0, 0],
    [0, 1, 1, 1],
    [0, 0, 0, 1],
    [0, 0, 0, 0],
  ],
};

/**
 * Canonical spawn shape for a kind (fresh copy)
 */
export function getCanonicalShape(kind: PieceKind): Shape {
  return PIECE_SHAPES[kind].map(row => [...row]);
}

/**
 * A falling piece. Position is the top-left corner of the shape matrix in
 * grid coordinates. Movement methods do no collision checking; callers
 * validate against the grid first.
 */
export class Piece {
  readonly kind: PieceKind;
  shape: Shape;
  x = 0;
  y = 0;

  constructor(kind: PieceKind) {
    this.kind = kind;
    this.shape = getCanonicalShape(kind);
  }

  setPosition(x: number, y: number): void {
    this.x = x;
    this.y = y;
  }

  moveLeft(): void {
    this.x--;
  }

  moveRight(): void {
    this.x++;
  }

  moveDown(): void {
    this.y++;
  }

  /**
   * Shape after a clockwise quarter turn, without committing it.
   * O is returned unchanged.
   */
  rotationPreview(): Shape {
    if (this.kind === 'O') return this.shape;

    const n = this.shape.length;
    const rotated: Shape = Array.from({ length: n }, () => new Array<number>(n).fill(0));
    for (let i = 0; i < n; i++) {
      for (let j = 0; j < n; j++) {
        rotated[j][n - 1 - i] = this.shape[i][j];
      }
    }
    return rotated;
  }

  rotate(): void {
    this.shape = this.rotationPreview();
  }

  /**
   * Grid coordinates of every occupied cell of `shape` (defaults to the
   * current shape) at the current position
   */
  cells(shape: Shape = this.shape): { row: number; col: number }[] {
    const result: { row: number; col: number }[] = [];
    for (let i = 0; i < shape.length; i++) {
      for (let j = 0; j < shape[i].length; j++) {
        if (shape[i][j] === 1) {
          result.push({ row: this.y + i, col: this.x + j });
        }
      }
    }
    return result;
  }
}
