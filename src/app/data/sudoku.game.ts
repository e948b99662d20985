import { ReadonlyGrid, SolveResult } from './sudoku.types';
import { assertGrid, countEmpty } from './sudoku.utils';
import { generatePuzzle, GenerateOptions } from './sudoku.generator';
import { solveSudoku } from './sudoku.solver';
import { DEFAULT_REMOVAL_COUNT } from './sudoku.constants';
import { log } from '../logger';

export interface GameOptions extends GenerateOptions {
  puzzle?: unknown; // clue grid to use instead of generating one
}

/**
 * A puzzle and, when generated here, the full grid it was carved from.
 * Construction does all generation work up front.
 */
export class SudokuGame {
  readonly puzzle: ReadonlyGrid;
  readonly solution: ReadonlyGrid | null;
  readonly removalCount: number;
  readonly seed?: number | string;

  #solved: SolveResult | null = null;

  constructor(opts: GameOptions = {}) {
    if (opts.puzzle !== undefined) {
      this.puzzle = assertGrid(opts.puzzle);
      this.solution = null;
      this.removalCount = 0;
      log.debug('[Gen]', `external puzzle, empty=${countEmpty(this.puzzle)}`);
      return;
    }

    const t0 = Date.now();
    const gen = generatePuzzle(opts);
    this.puzzle = gen.puzzle;
    this.solution = gen.solution;
    this.removalCount = opts.removalCount ?? DEFAULT_REMOVAL_COUNT;
    this.seed = gen.seed;
    log.debug('[Gen]', `seed=${String(this.seed ?? 'none')} draws=${this.removalCount} empty=${countEmpty(this.puzzle)} in ${Date.now() - t0}ms`);
  }

  static fromPuzzle(grid: unknown): SudokuGame {
    return new SudokuGame({ puzzle: grid });
  }

  // last solve() result
  get solved(): SolveResult | null {
    return this.#solved;
  }

  solve(): SolveResult {
    const t0 = Date.now();
    const res = solveSudoku(this.puzzle);
    log.debug('[Solve]', `${res.status} nodes=${res.stats.nodes} backtracks=${res.stats.backtracks} in ${Date.now() - t0}ms`);
    this.#solved = res;
    return res;
  }
}
