/**
 * Terminal Surface
 *
 * Rasterizes the pixel-space Surface calls onto a character grid and
 * writes whole frames to an xterm-compatible terminal. One character is
 * CHAR_WIDTH_PX wide and CHAR_HEIGHT_PX tall, so a grid square is two
 * characters on one line.
 */

import type { GameTerminal } from '../utils';
import type { Rect, Rgb, Surface } from './surface';
import { SCREEN_HEIGHT, SCREEN_WIDTH, TITLE_TEXT_SIZE } from './constants';

export const CHAR_WIDTH_PX = 10;
export const CHAR_HEIGHT_PX = 20;

export const OUTLINE_CHAR = '·';

export interface TerminalCell {
  char: string;
  fg: Rgb;
  bg: Rgb;
  bold: boolean;
}

export interface TerminalSurfaceOptions {
  width?: number;
  height?: number;
}

function sgr(cell: TerminalCell): string {
  const { fg, bg } = cell;
  return (cell.bold ? '\x1b[0;1m' : '\x1b[0m') +
    `\x1b[38;2;${fg.r};${fg.g};${fg.b}m` +
    `\x1b[48;2;${bg.r};${bg.g};${bg.b}m`;
}

export class TerminalSurface implements Surface {
  /** Frame size in characters */
  readonly columns: number;
  readonly lines: number;

  private cells: TerminalCell[][];
  private originCol = 0;
  private originRow = 0;

  constructor(
    private readonly terminal: Pick<GameTerminal, 'write'>,
    options: TerminalSurfaceOptions = {},
  ) {
    this.columns = Math.ceil((options.width ?? SCREEN_WIDTH) / CHAR_WIDTH_PX);
    this.lines = Math.ceil((options.height ?? SCREEN_HEIGHT) / CHAR_HEIGHT_PX);
    const black = { r: 0, g: 0, b: 0 };
    this.cells = this.blankCells(black);
  }

  /**
   * Place the frame's top-left corner at a 0-based terminal position
   */
  setOrigin(col: number, row: number): void {
    this.originCol = Math.max(0, col);
    this.originRow = Math.max(0, row);
  }

  clear(color: Rgb): void {
    this.cells = this.blankCells(color);
  }

  fillRect(rect: Rect, color: Rgb): void {
    this.eachCell(rect, cell => {
      cell.char = ' ';
      cell.bg = color;
    });
  }

  strokeRect(rect: Rect, color: Rgb): void {
    this.eachCell(rect, cell => {
      cell.char = OUTLINE_CHAR;
      cell.fg = color;
    });
  }

  drawText(text: string, x: number, y: number, color: Rgb, size: number): void {
    const row = this.cells[Math.floor(y / CHAR_HEIGHT_PX)];
    if (!row) return;

    const startCol = Math.floor(x / CHAR_WIDTH_PX);
    [...text].forEach((char, k) => {
      const cell = row[startCol + k];
      if (!cell) return;
      cell.char = char;
      cell.fg = color;
      cell.bold = size >= TITLE_TEXT_SIZE;
    });
  }

  present(): void {
    this.terminal.write(this.frame());
  }

  cellAt(col: number, row: number): Readonly<TerminalCell> | undefined {
    return this.cells[row]?.[col];
  }

  /** Plain characters of one line, without colors */
  lineText(row: number): string {
    return (this.cells[row] ?? []).map(cell => cell.char).join('');
  }

  /**
   * ANSI for the whole frame: each line positioned explicitly, SGR emitted
   * only where the style changes
   */
  frame(): string {
    let output = '';
    this.cells.forEach((row, r) => {
      output += `\x1b[${this.originRow + r + 1};${this.originCol + 1}H`;
      let style = '';
      for (const cell of row) {
        const next = sgr(cell);
        if (next !== style) {
          output += next;
          style = next;
        }
        output += cell.char;
      }
      output += '\x1b[0m';
    });
    return output;
  }

  private blankCells(color: Rgb): TerminalCell[][] {
    return Array.from({ length: this.lines }, () =>
      Array.from({ length: this.columns }, () => ({ char: ' ', fg: color, bg: color, bold: false })),
    );
  }

  private eachCell(rect: Rect, paint: (cell: TerminalCell) => void): void {
    const col0 = Math.floor(rect.x / CHAR_WIDTH_PX);
    const col1 = Math.max(col0 + 1, Math.floor((rect.x + rect.w) / CHAR_WIDTH_PX));
    const row0 = Math.floor(rect.y / CHAR_HEIGHT_PX);
    const row1 = Math.max(row0 + 1, Math.floor((rect.y + rect.h) / CHAR_HEIGHT_PX));

    for (let r = row0; r < row1; r++) {
      for (let c = col0; c < col1; c++) {
        const cell = this.cells[r]?.[c];
        if (cell) paint(cell);
      }
    }
  }
}
