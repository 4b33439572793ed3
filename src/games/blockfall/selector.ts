/**
 * Random piece selection
 */

import { PIECE_KINDS, type PieceKind } from './piece';

/** Uniform integer in [min, max] */
export type RandomInt = (min: number, max: number) => number;

export type PieceSelector = () => PieceKind;

export const mathRandomInt: RandomInt = (min, max) =>
  min + Math.floor(Math.random() * (max - min + 1));

/**
 * Uniform choice among the seven kinds
 */
export function createPieceSelector(randomInt: RandomInt = mathRandomInt): PieceSelector {
  return () => PIECE_KINDS[randomInt(0, PIECE_KINDS.length - 1)];
}
