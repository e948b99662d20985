import { ConflictMap, Grid, ReadonlyGrid } from './sudoku.types';
import { SIZE, CELL_COUNT, DIGITS, toBoxIndex, boxOrigin, keyOf } from './sudoku.constants';
import { GridShapeError } from './sudoku.errors';

export function createEmptyGrid(): Grid {
  return Array.from({ length: SIZE }, () => Array.from({ length: SIZE }, () => 0));
}

export function cloneGrid(grid: ReadonlyGrid): Grid {
  return grid.map(row => row.slice());
}

/**
 * Checks that `value` is 9 rows of 9 integers in 0..9 and returns a fresh copy.
 * Throws GridShapeError otherwise.
 */
export function assertGrid(value: unknown): Grid {
  if (!Array.isArray(value) || value.length !== SIZE) {
    throw new GridShapeError(`Grid must have ${SIZE} rows.`);
  }
  const grid: Grid = [];
  for (let r = 0; r < SIZE; r++) {
    const row: unknown = value[r];
    if (!Array.isArray(row) || row.length !== SIZE) {
      throw new GridShapeError(`Row ${r + 1} must have ${SIZE} columns.`);
    }
    const out: number[] = [];
    for (let c = 0; c < SIZE; c++) {
      const v: unknown = row[c];
      if (typeof v !== 'number' || !Number.isInteger(v) || v < 0 || v > 9) {
        throw new GridShapeError(`Invalid digit at row ${r + 1}, column ${c + 1}.`);
      }
      out.push(v);
    }
    grid.push(out);
  }
  return grid;
}

// Parse 81-char string into Grid (digits 1-9 = clues, 0/. = empty)
export function parseGridString(str: string): Grid {
  const s = str.replace(/\s+/g, '');
  if (s.length !== CELL_COUNT) throw new GridShapeError('Board string must be 81 characters.');
  const grid = createEmptyGrid();
  for (let i = 0; i < CELL_COUNT; i++) {
    const ch = s[i];
    if (ch === '0' || ch === '.') continue;
    const v = Number(ch);
    if (!Number.isInteger(v) || v < 1 || v > 9) throw new GridShapeError(`Invalid digit '${ch}'.`);
    grid[Math.floor(i / SIZE)][i % SIZE] = v;
  }
  return grid;
}

export function gridToString(grid: ReadonlyGrid): string {
  return grid.map(row => row.join('')).join('');
}

export function countEmpty(grid: ReadonlyGrid): number {
  let n = 0;
  for (let r = 0; r < SIZE; r++) for (let c = 0; c < SIZE; c++) if (!grid[r][c]) n++;
  return n;
}

export function isComplete(grid: ReadonlyGrid): boolean {
  return countEmpty(grid) === 0;
}

// --- Constraints ---

/**
 * True when `value` is absent from the row, the column and the 3x3 box of (row, col).
 * The cell itself is scanned too, so it must not already hold `value`.
 */
export function isValid(grid: ReadonlyGrid, row: number, col: number, value: number): boolean {
  for (let i = 0; i < SIZE; i++) {
    if (grid[row][i] === value || grid[i][col] === value) return false;
  }
  const { r: br, c: bc } = boxOrigin(toBoxIndex(row, col));
  for (let r = br; r < br + 3; r++) for (let c = bc; c < bc + 3; c++) {
    if (grid[r][c] === value) return false;
  }
  return true;
}

// Ascending list of digits legal at (row, col)
export function getCandidates(grid: ReadonlyGrid, row: number, col: number): number[] {
  return DIGITS.filter(d => isValid(grid, row, col, d));
}

export function detectConflicts(grid: ReadonlyGrid): ConflictMap {
  const rows = new Set<number>(),
    cols = new Set<number>(),
    boxes = new Set<number>(),
    cells = new Set<string>();
  for (let r = 0; r < SIZE; r++) for (let c = 0; c < SIZE; c++) {
    const v = grid[r][c];
    if (!v) continue;
    for (let cc = 0; cc < SIZE; cc++) if (cc !== c && grid[r][cc] === v) { rows.add(r); cells.add(keyOf(r, c)); cells.add(keyOf(r, cc)); }
    for (let rr = 0; rr < SIZE; rr++) if (rr !== r && grid[rr][c] === v) { cols.add(c); cells.add(keyOf(r, c)); cells.add(keyOf(rr, c)); }
    const { r: br, c: bc } = boxOrigin(toBoxIndex(r, c));
    for (let rr = br; rr < br + 3; rr++) for (let cc = bc; cc < bc + 3; cc++) if ((rr !== r || cc !== c) && grid[rr][cc] === v) {
      boxes.add(toBoxIndex(r, c));
      cells.add(keyOf(r, c));
      cells.add(keyOf(rr, cc));
    }
  }
  return { rows, cols, boxes, cells };
}

// Complete and every row, column and box holds 1..9 once
export function isValidSolution(grid: ReadonlyGrid): boolean {
  return isComplete(grid) && detectConflicts(grid).cells.size === 0;
}
