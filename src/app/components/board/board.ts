import { ReadonlyGrid } from '../../data/sudoku.types';
import { SIZE } from '../../data/sudoku.constants';

const HORIZ_BAR = '+-------+-------+-------+';

/**
 * Text rendering of a grid with a bar around every 3x3 box. Blanks print as
 * two spaces so columns stay aligned.
 */
export function renderBoard(grid: ReadonlyGrid): string {
  const lines = [HORIZ_BAR];
  for (let r = 0; r < SIZE; r++) {
    let line = '| ';
    for (let c = 0; c < SIZE; c++) {
      const v = grid[r][c];
      line += v ? `${v} ` : '  ';
      if (c % 3 === 2) line += '| ';
    }
    lines.push(line);
    if (r % 3 === 2) lines.push(HORIZ_BAR);
  }
  return lines.join('\n');
}
