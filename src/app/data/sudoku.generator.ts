import { Coord, Grid, ReadonlyGrid } from './sudoku.types';
import { SIZE, DEFAULT_REMOVAL_COUNT, MAX_REMOVAL_COUNT } from './sudoku.constants';
import { createEmptyGrid, assertGrid, isComplete } from './sudoku.utils';
import { backtrack, GENERATE_POLICY } from './sudoku.search';
import { Rng, createRng, randomInt } from './sudoku.random';
import { SudokuConfigError, SudokuError } from './sudoku.errors';

export interface GenerateOptions {
  rng?: Rng;
  seed?: number | string;  // ignored when rng is given
  removalCount?: number;   // draws with replacement, default 75
}

export interface CarvedPuzzle {
  puzzle: Grid;
  targets: Coord[];        // every draw, in order, duplicates included
}

export interface GeneratedPuzzle extends CarvedPuzzle {
  solution: Grid;
  seed?: number | string;
}

// Public API
export function generatePuzzle(opts: GenerateOptions = {}): GeneratedPuzzle {
  const rng = opts.rng ?? (opts.seed !== undefined ? createRng(opts.seed) : Math.random);
  const removalCount = opts.removalCount ?? DEFAULT_REMOVAL_COUNT;

  // 1) Make a random solved grid
  const solution = generateSolution(rng);

  // 2) Clear cells; the puzzle is not checked for uniqueness
  const { puzzle, targets } = carvePuzzle(solution, rng, removalCount);

  return { puzzle, solution, targets, seed: opts.rng ? undefined : opts.seed };
}

/** Fills an empty grid by backtracking over shuffled digits. */
export function generateSolution(rng: Rng): Grid {
  const res = backtrack(createEmptyGrid(), GENERATE_POLICY(rng));
  // an empty board always has a completion
  if (res.status !== 'solved') throw new SudokuError('Failed to create solved grid');
  return res.grid;
}

/**
 * Copies `solution` and zeroes `removalCount` cells drawn uniformly with replacement,
 * so fewer distinct cells may end up empty.
 */
export function carvePuzzle(solution: ReadonlyGrid, rng: Rng, removalCount = DEFAULT_REMOVAL_COUNT): CarvedPuzzle {
  if (!Number.isInteger(removalCount) || removalCount < 0 || removalCount > MAX_REMOVAL_COUNT) {
    throw new SudokuConfigError(`Removal count must be an integer in 0..${MAX_REMOVAL_COUNT}, got ${removalCount}.`);
  }
  const puzzle = assertGrid(solution);
  if (!isComplete(puzzle)) throw new SudokuError('Only a complete solution can be carved.');

  const targets: Coord[] = [];
  for (let count = 0; count < removalCount; count++) {
    const r = randomInt(rng, SIZE);
    const c = randomInt(rng, SIZE);
    puzzle[r][c] = 0;
    targets.push({ r, c });
  }
  return { puzzle, targets };
}
