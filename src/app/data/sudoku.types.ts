export type Grid = number[][];                         // 9x9, 0 = empty
export type ReadonlyGrid = ReadonlyArray<ReadonlyArray<number>>;

export interface Coord { r: number; c: number; }

export interface ConflictMap {
  rows: Set<number>;
  cols: Set<number>;
  boxes: Set<number>;
  cells: Set<string>; // "r,c"
}

export interface SearchStats {
  nodes: number;       // values placed
  backtracks: number;  // values taken back
}

export type SolveResult =
  | { status: 'solved'; grid: Grid; stats: SearchStats }
  | { status: 'unsolvable'; stats: SearchStats };
