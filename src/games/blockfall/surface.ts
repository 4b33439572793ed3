/**
 * Drawing surface — what the engine draws into. Coordinates are pixels in
 * the SCREEN_WIDTH × SCREEN_HEIGHT window.
 */

export interface Rgb {
  r: number;
  g: number;
  b: number;
}

export interface Rect {
  x: number;
  y: number;
  w: number;
  h: number;
}

export interface Surface {
  clear: (color: Rgb) => void;
  fillRect: (rect: Rect, color: Rgb) => void;
  strokeRect: (rect: Rect, color: Rgb) => void;
  drawText: (text: string, x: number, y: number, color: Rgb, size: number) => void;
  present: () => void;
}

export const PALETTE = {
  background: { r: 255, g: 255, b: 255 },
  empty: { r: 245, g: 245, b: 245 },
  wall: { r: 200, g: 200, b: 200 },
  fading: { r: 0, g: 150, b: 0 },
  block: { r: 150, g: 150, b: 150 },
  text: { r: 0, g: 0, b: 0 },
} satisfies Record<string, Rgb>;
