import { SolveResult } from './sudoku.types';
import { assertGrid, detectConflicts } from './sudoku.utils';
import { backtrack, SOLVE_POLICY } from './sudoku.search';

/**
 * Returns a completed copy of `puzzle`, or 'unsolvable' if no completion
 * agrees with its clues. Candidates are tried in ascending order, so the same
 * puzzle always yields the same grid. The input is never mutated.
 */
export function solveSudoku(puzzle: unknown): SolveResult {
  // Working copy; clues are left untouched by the search
  const work = assertGrid(puzzle);
  // clashing clues would otherwise pass through untouched on a full board
  if (detectConflicts(work).cells.size) return { status: 'unsolvable', stats: { nodes: 0, backtracks: 0 } };

  const res = backtrack(work, SOLVE_POLICY);
  return res.status === 'solved'
    ? { status: 'solved', grid: res.grid, stats: res.stats }
    : { status: 'unsolvable', stats: res.stats };
}
