import { Grid, SearchStats } from './sudoku.types';
import { CELL_COUNT, DIGITS, fromCellIndex } from './sudoku.constants';
import { isValid, getCandidates } from './sudoku.utils';
import { Rng, shuffleInPlace } from './sudoku.random';

/**
 * How the backtracker walks the board.
 * - shuffled: all nine digits in random order, each checked with isValid (generation)
 * - ascending: only the legal candidates, smallest first (solving)
 * respectClues skips cells that are already filled instead of searching them.
 */
export type SearchPolicy =
  | { order: 'shuffled'; rng: Rng; respectClues: boolean }
  | { order: 'ascending'; respectClues: boolean };

export const GENERATE_POLICY = (rng: Rng): SearchPolicy => ({ order: 'shuffled', rng, respectClues: false });
export const SOLVE_POLICY: SearchPolicy = { order: 'ascending', respectClues: true };

export type SearchOutcome =
  | { status: 'solved'; grid: Grid; stats: SearchStats }
  | { status: 'exhausted'; stats: SearchStats };

/**
 * Depth-first search over cells 0..80 in row-major order.
 * Mutates `grid` in place; on 'solved' the returned grid is that same array.
 * On 'exhausted' every cell the search touched has been cleared again.
 */
export function backtrack(grid: Grid, policy: SearchPolicy): SearchOutcome {
  const stats: SearchStats = { nodes: 0, backtracks: 0 };

  const valuesAt = (r: number, c: number): number[] =>
    policy.order === 'ascending' ? getCandidates(grid, r, c) : shuffleInPlace(DIGITS.slice(), policy.rng);

  function step(i: number): boolean {
    if (i === CELL_COUNT) return true;
    const { r, c } = fromCellIndex(i);
    if (grid[r][c] !== 0) {
      if (policy.respectClues) return step(i + 1);
      // the cell's own value must not count against it
      grid[r][c] = 0;
    }

    for (const v of valuesAt(r, c)) {
      // candidates are already legal; shuffled digits are not
      if (policy.order === 'shuffled' && !isValid(grid, r, c, v)) continue;
      grid[r][c] = v;
      stats.nodes++;
      if (step(i + 1)) return true;
      grid[r][c] = 0;
      stats.backtracks++;
    }
    return false;
  }

  return step(0) ? { status: 'solved', grid, stats } : { status: 'exhausted', stats };
}
