import { describe, it, expect } from 'vitest';
import { GameEngine, type EngineOptions } from './engine';
import { getCanonicalShape, type PieceKind } from './piece';
import type { EngineConfig } from './constants';
import type { Grid } from './grid';

// Every tick is a gravity/lateral/rotate step; fast drop never kicks in
const FAST: EngineConfig = {
  gravitySpeed: 1,
  lateralSpeed: 1,
  rotatingSpeed: 1,
  fadingTime: 3,
  speedyGravityDelay: 1000,
};

function createEngine(kind: PieceKind = 'O', options: EngineOptions = {}): GameEngine {
  return new GameEngine({ selectPiece: () => kind, ...options });
}

function tick(engine: GameEngine, times: number) {
  for (let i = 0; i < times; i++) engine.update();
}

function press(engine: GameEngine, code: string) {
  engine.handleInput({ type: 'keydown', code });
}

function fillRow(grid: Grid, row: number, skipCols: number[]) {
  for (let col = 1; col <= grid.cols; col++) {
    if (!skipCols.includes(col)) grid.set(row, col, 'settled');
  }
}

function activePiece(engine: GameEngine) {
  const piece = engine.active;
  if (!piece) throw new Error('expected a falling piece');
  return piece;
}

describe('GameEngine', () => {
  describe('initial state', () => {
    it('spawns the first piece at the horizontal center of the top row', () => {
      const engine = createEngine('T');
      const piece = activePiece(engine);
      expect(piece.kind).toBe('T');
      expect(piece.x).toBe(3);
      expect(piece.y).toBe(0);
      expect(engine.nextPiece.kind).toBe('T');
      expect(engine.nextPiece).not.toBe(piece);
    });

    it('starts playing with zero score and counters', () => {
      const engine = createEngine();
      expect(engine.phase).toBe('playing');
      expect(engine.score).toBe(0);
      expect(engine.pendingRows).toEqual([]);
      expect(engine.tickCounters).toEqual({
        gravity: 0, lateral: 0, rotating: 0, speedyGravity: 0, fading: 0,
      });
    });

    it('uses a 10x20 grid by default', () => {
      const engine = createEngine();
      expect(engine.grid.cols).toBe(10);
      expect(engine.grid.rows).toBe(20);
      expect(engine.grid.height).toBe(21);
      expect(engine.grid.width).toBe(12);
    });

    it('draws the next piece from the selector in order', () => {
      const kinds: PieceKind[] = ['I', 'S', 'Z'];
      let i = 0;
      const engine = new GameEngine({ selectPiece: () => kinds[i++] });
      expect(activePiece(engine).kind).toBe('I');
      expect(engine.nextPiece.kind).toBe('S');
    });
  });

  describe('gravity', () => {
    it('moves down exactly one row after gravitySpeed ticks', () => {
      const engine = createEngine('O');
      const piece = activePiece(engine);

      tick(engine, 29);
      expect(piece.y).toBe(0);

      tick(engine, 1);
      expect(piece.y).toBe(1);
      expect(engine.active).toBe(piece);
      expect(engine.phase).toBe('playing');
      expect(engine.tickCounters.gravity).toBe(0);
    });

    it('overlays the falling piece as moving cells', () => {
      const engine = createEngine('O');
      tick(engine, 30);
      expect(engine.grid.get(2, 4)).toBe('moving');
      expect(engine.grid.get(2, 5)).toBe('moving');
      expect(engine.grid.get(3, 4)).toBe('moving');
      expect(engine.grid.get(3, 5)).toBe('moving');
      expect(engine.grid.get(1, 4)).toBe('empty');
    });

    it('settles on the floor and spawns the next piece on the following tick', () => {
      const engine = createEngine('O', { config: FAST });
      const first = activePiece(engine);

      tick(engine, 17);
      expect(first.y).toBe(17);

      tick(engine, 1);
      expect(engine.active).toBeNull();
      expect(engine.grid.get(18, 4)).toBe('settled');
      expect(engine.grid.get(19, 5)).toBe('settled');

      tick(engine, 1);
      const second = activePiece(engine);
      expect(second).not.toBe(first);
      // Spawned and moved down in the same tick
      expect(second.y).toBe(1);
    });
  });

  describe('fast drop', () => {
    it('adds a gravity step every tick once the delay has passed', () => {
      const engine = createEngine('O');
      const piece = activePiece(engine);
      press(engine, 'ArrowDown');

      tick(engine, 39);
      expect(piece.y).toBe(1);

      tick(engine, 1);
      expect(piece.y).toBe(2);

      tick(engine, 1);
      expect(piece.y).toBe(3);
    });

    it('has no effect before the delay', () => {
      const engine = createEngine('O');
      press(engine, 'ArrowDown');
      tick(engine, 29);
      expect(activePiece(engine).y).toBe(0);
    });
  });

  describe('lateral movement', () => {
    const config: EngineConfig = { ...FAST, gravitySpeed: 1000 };

    it('does not count without a held key', () => {
      const engine = createEngine('O', { config });
      tick(engine, 5);
      expect(engine.tickCounters.lateral).toBe(0);
      expect(activePiece(engine).x).toBe(3);
    });

    it('moves left until the wall', () => {
      const engine = createEngine('O', { config });
      press(engine, 'ArrowLeft');

      tick(engine, 1);
      expect(activePiece(engine).x).toBe(2);

      tick(engine, 9);
      expect(activePiece(engine).x).toBe(0);
      expect(engine.grid.get(1, 1)).toBe('moving');
    });

    it('moves right until the wall', () => {
      const engine = createEngine('O', { config });
      press(engine, 'ArrowRight');
      tick(engine, 10);
      expect(activePiece(engine).x).toBe(8);
      expect(engine.grid.get(1, 10)).toBe('moving');
    });

    it('prefers left when both directions are held', () => {
      const engine = createEngine('O', { config });
      press(engine, 'ArrowRight');
      press(engine, 'ArrowLeft');
      tick(engine, 1);
      expect(activePiece(engine).x).toBe(2);
    });

    it('stops at settled blocks', () => {
      const engine = createEngine('O', { config });
      engine.grid.set(2, 3, 'settled');
      press(engine, 'ArrowLeft');
      tick(engine, 3);
      expect(activePiece(engine).x).toBe(3);
    });

    it('waits lateralSpeed ticks between moves', () => {
      const engine = createEngine('O', { config: { ...config, lateralSpeed: 8 } });
      press(engine, 'ArrowRight');
      tick(engine, 7);
      expect(activePiece(engine).x).toBe(3);
      tick(engine, 1);
      expect(activePiece(engine).x).toBe(4);
    });

    it('stops moving when the key is released', () => {
      const engine = createEngine('O', { config });
      press(engine, 'ArrowRight');
      tick(engine, 1);
      engine.handleInput({ type: 'keyup', code: 'ArrowRight' });
      tick(engine, 3);
      expect(activePiece(engine).x).toBe(4);
    });
  });

  describe('rotation', () => {
    const config: EngineConfig = { ...FAST, gravitySpeed: 1000 };

    it('rotates while up is held', () => {
      const engine = createEngine('T', { config });
      press(engine, 'ArrowUp');
      tick(engine, 1);
      expect(activePiece(engine).shape).toEqual([
        [0, 0, 0, 0],
        [0, 0, 1, 0],
        [0, 1, 1, 0],
        [0, 0, 1, 0],
      ]);
    });

    it('keeps the shape when the rotated cells collide', () => {
      const engine = createEngine('T', { config });
      // The rotated T reaches row 3, col 5; the spawn shape does not
      engine.grid.set(3, 5, 'settled');
      press(engine, 'ArrowUp');
      tick(engine, 1);
      expect(activePiece(engine).shape).toEqual(getCanonicalShape('T'));
    });
  });

  describe('row clearing', () => {
    it('finds a completed row at the next gravity step, fades it, then removes it', () => {
      const engine = createEngine('O', { config: FAST });
      // Bottom row full except where the O lands
      fillRow(engine.grid, 19, [4, 5]);

      tick(engine, 18);
      expect(engine.active).toBeNull();
      expect(engine.grid.get(19, 4)).toBe('settled');
      expect(engine.pendingRows).toEqual([]);
      expect(engine.score).toBe(0);

      tick(engine, 1);
      expect(engine.pendingRows).toEqual([19]);
      expect(engine.phase).toBe('rowsFading');
      expect(engine.score).toBe(40);
      expect(engine.grid.row(19).slice(1, 11).every(cell => cell === 'fading')).toBe(true);

      const falling = activePiece(engine);
      tick(engine, 2);
      expect(engine.phase).toBe('rowsFading');
      // The piece is frozen while rows fade
      expect(falling.y).toBe(1);

      tick(engine, 1);
      expect(engine.phase).toBe('playing');
      expect(engine.pendingRows).toEqual([]);
      expect(engine.tickCounters.fading).toBe(0);
      // The O's top half dropped into the cleared row
      expect(engine.grid.get(19, 4)).toBe('settled');
      expect(engine.grid.get(19, 5)).toBe('settled');
      expect(engine.grid.get(19, 1)).toBe('empty');
      expect(engine.grid.get(18, 4)).toBe('empty');
    });

    it('scores two rows cleared together as 100', () => {
      const engine = createEngine('O', { config: FAST });
      fillRow(engine.grid, 18, [4, 5]);
      fillRow(engine.grid, 19, [4, 5]);

      tick(engine, 19);
      expect(engine.pendingRows).toEqual([18, 19]);
      expect(engine.score).toBe(100);

      tick(engine, 3);
      expect(engine.phase).toBe('playing');
      expect(engine.grid.row(19).slice(1, 11).every(cell => cell === 'empty')).toBe(true);
      expect(engine.grid.row(18).slice(1, 11).every(cell => cell === 'empty')).toBe(true);
    });
  });

  describe('game over', () => {
    it('triggers exactly when a settled cell reaches the top two rows', () => {
      const engine = createEngine('O', { config: FAST });

      let ticks = 0;
      while (engine.phase !== 'gameOver' && ticks < 1000) {
        engine.update();
        ticks++;
        expect(engine.isGameOver).toBe(engine.grid.hasTopCollision());
      }

      expect(engine.phase).toBe('gameOver');
      expect(engine.grid.get(1, 4)).toBe('settled');
    });

    it('ignores updates until restart is pressed', () => {
      const engine = createEngine('O', { config: FAST });
      engine.grid.set(1, 1, 'settled');
      engine.update();
      expect(engine.phase).toBe('gameOver');

      const before = engine.grid.snapshot();
      tick(engine, 5);
      expect(engine.grid.snapshot()).toEqual(before);
      expect(engine.phase).toBe('gameOver');
    });

    it('restarts with a fresh game on Enter', () => {
      const engine = createEngine('O', { config: FAST });
      fillRow(engine.grid, 19, [4, 5]);
      tick(engine, 19);
      expect(engine.score).toBe(40);
      tick(engine, 3);

      engine.grid.set(1, 1, 'settled');
      engine.update();
      expect(engine.phase).toBe('gameOver');

      press(engine, 'Enter');
      engine.update();

      expect(engine.phase).toBe('playing');
      expect(engine.score).toBe(0);
      expect(engine.grid.snapshot().flat()).not.toContain('settled');
      expect(activePiece(engine).y).toBe(1);
    });
  });
});
