export class SudokuError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Grid or board string that is not a 9x9 matrix of digits 0..9. */
export class GridShapeError extends SudokuError {}

/** Option value outside what the generator or CLI accepts. */
export class SudokuConfigError extends SudokuError {}
