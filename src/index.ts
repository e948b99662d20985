export type { Grid, ReadonlyGrid, Coord, ConflictMap, SearchStats, SolveResult } from './app/data/sudoku.types';
export * from './app/data/sudoku.constants';
export * from './app/data/sudoku.errors';
export * from './app/data/sudoku.utils';
export * from './app/data/sudoku.random';
export { backtrack, GENERATE_POLICY, SOLVE_POLICY } from './app/data/sudoku.search';
export type { SearchPolicy, SearchOutcome } from './app/data/sudoku.search';
export * from './app/data/sudoku.generator';
export { solveSudoku } from './app/data/sudoku.solver';
export { SudokuGame } from './app/data/sudoku.game';
export type { GameOptions } from './app/data/sudoku.game';
export { renderBoard } from './app/components/board/board';
