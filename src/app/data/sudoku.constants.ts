export const SIZE = 9 as const;
export const BOX = 3 as const;
export const CELL_COUNT = SIZE * SIZE;
export const DIGITS: ReadonlyArray<number> = [1, 2, 3, 4, 5, 6, 7, 8, 9];

// cells cleared by the carver unless configured otherwise
export const DEFAULT_REMOVAL_COUNT = 75;
// every draw is kept in the carver's target list
export const MAX_REMOVAL_COUNT = 10_000;

export const toBoxIndex = (r: number, c: number) =>
  Math.floor(r / BOX) * BOX + Math.floor(c / BOX);

export const boxOrigin = (box: number) => ({
  r: Math.floor(box / BOX) * BOX,
  c: (box % BOX) * BOX
});

export const fromCellIndex = (i: number) => ({ r: Math.floor(i / SIZE), c: i % SIZE });

export const keyOf = (r: number, c: number) => `${r},${c}`;
