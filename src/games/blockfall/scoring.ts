/**
 * Line clear scoring
 */

const ROW_CLEAR_POINTS: Record<number, number> = {
  1: 40,
  2: 100,
  3: 300,
  4: 1200,
};

/**
 * Points for clearing `count` rows in one scan. Counts outside 1-4 earn
 * nothing.
 */
export function scoreForRows(count: number): number {
  return ROW_CLEAR_POINTS[count] ?? 0;
}
