/**
 * Projects game state onto a Surface. Reads only.
 */

import type { CellState, Grid } from './grid';
import type { Piece } from './piece';
import { PALETTE, type Rgb, type Surface } from './surface';
import {
  GRID_POS_X,
  GRID_POS_Y,
  LABEL_TEXT_SIZE,
  NEXT_PREVIEW_DISTANCE,
  SQUARE_SIZE,
  TITLE_TEXT_SIZE,
} from './constants';

export interface GameView {
  readonly isGameOver: boolean;
  readonly score: number;
  readonly grid: Grid;
  readonly nextPiece: Piece;
}

export const RESTART_PROMPT = 'Press [enter] to play again';

function fillColor(cell: CellState): Rgb {
  switch (cell) {
    case 'wall': return PALETTE.wall;
    case 'fading': return PALETTE.fading;
    default: return PALETTE.block;
  }
}

function square(x: number, y: number) {
  return { x, y, w: SQUARE_SIZE, h: SQUARE_SIZE };
}

export function drawGame(view: GameView, surface: Surface): void {
  surface.clear(PALETTE.background);

  if (view.isGameOver) {
    surface.drawText(RESTART_PROMPT, 100, 100, PALETTE.text, TITLE_TEXT_SIZE);
    surface.drawText(`SCORE: ${view.score}`, 250, 150, PALETTE.text, LABEL_TEXT_SIZE);
    surface.present();
    return;
  }

  const { grid } = view;
  for (let i = 0; i < grid.height; i++) {
    for (let j = 0; j < grid.width; j++) {
      const rect = square(GRID_POS_X + SQUARE_SIZE * j, GRID_POS_Y + SQUARE_SIZE * i);
      const cell = grid.get(i, j);
      if (cell === 'empty') {
        surface.strokeRect(rect, PALETTE.empty);
      } else {
        surface.fillRect(rect, fillColor(cell));
      }
    }
  }

  // Next piece preview
  const panelX = GRID_POS_X + NEXT_PREVIEW_DISTANCE + SQUARE_SIZE * grid.width;
  const shape = view.nextPiece.shape;
  for (let i = 0; i < shape.length; i++) {
    for (let j = 0; j < shape[i].length; j++) {
      const rect = square(panelX + SQUARE_SIZE * j, GRID_POS_Y + 30 + SQUARE_SIZE * i);
      if (shape[i][j] === 1) {
        surface.fillRect(rect, PALETTE.block);
      } else {
        surface.strokeRect(rect, PALETTE.empty);
      }
    }
  }
  surface.drawText('NEXT BLOCK', panelX, GRID_POS_Y, PALETTE.text, LABEL_TEXT_SIZE);

  const previewHeight = SQUARE_SIZE * shape.length;
  surface.drawText(
    `SCORE: ${view.score}`,
    panelX,
    GRID_POS_Y + 30 + previewHeight + 30,
    PALETTE.text,
    LABEL_TEXT_SIZE,
  );

  surface.present();
}
