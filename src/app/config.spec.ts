import { resolveConfig } from './config';
import { SudokuConfigError, GridShapeError } from './data/sudoku.errors';
import { MAX_REMOVAL_COUNT } from './data/sudoku.constants';

describe('resolveConfig', () => {
  it('falls back to defaults', () => {
    expect(resolveConfig([], {})).toEqual({
      seed: undefined,
      removalCount: 75,
      puzzle: undefined,
      logLevel: 'warn',
      help: false
    });
  });

  it('reads flags', () => {
    const cfg = resolveConfig(['--seed', 'abc', '--remove', '10', '--verbose'], {});
    expect(cfg.seed).toBe('abc');
    expect(cfg.removalCount).toBe(10);
    expect(cfg.logLevel).toBe('debug');
  });

  it('reads the environment', () => {
    const cfg = resolveConfig([], { SUDOKU_SEED: 'env', SUDOKU_REMOVE: '5', SUDOKU_LOG_LEVEL: 'silent' });
    expect(cfg.seed).toBe('env');
    expect(cfg.removalCount).toBe(5);
    expect(cfg.logLevel).toBe('silent');
  });

  it('prefers flags over the environment', () => {
    const cfg = resolveConfig(['--seed=flag', '--remove=0'], { SUDOKU_SEED: 'env', SUDOKU_REMOVE: '5' });
    expect(cfg.seed).toBe('flag');
    expect(cfg.removalCount).toBe(0);
  });

  it('turns digit-only seeds into numbers', () => {
    expect(resolveConfig(['--seed', '42'], {}).seed).toBe(42);
    expect(resolveConfig([], { SUDOKU_SEED: '7' }).seed).toBe(7);
    expect(resolveConfig(['--seed', '42a'], {}).seed).toBe('42a');
    expect(resolveConfig(['--seed', '99999999999999999999'], {}).seed).toBe('99999999999999999999');
  });

  it('treats an empty seed variable as unset', () => {
    expect(resolveConfig([], { SUDOKU_SEED: '' }).seed).toBeUndefined();
  });

  it('parses a puzzle argument', () => {
    const cfg = resolveConfig(['--puzzle', '3' + '.'.repeat(80)], {});
    expect(cfg.puzzle?.[0][0]).toBe(3);
    expect(cfg.puzzle?.[8][8]).toBe(0);
  });

  it('sets the help flag', () => {
    expect(resolveConfig(['--help'], {}).help).toBe(true);
  });

  it('rejects bad values', () => {
    expect(() => resolveConfig(['--remove=-1'], {})).toThrowError(SudokuConfigError);
    expect(() => resolveConfig(['--remove=ten'], {})).toThrowError("--remove must be a non-negative integer, got 'ten'.");
    expect(() => resolveConfig([], { SUDOKU_REMOVE: '1.5' })).toThrowError(SudokuConfigError);
    expect(() => resolveConfig(['--remove', '9007199254740991'], {})).toThrowError(
      `--remove must be at most ${MAX_REMOVAL_COUNT}, got '9007199254740991'.`
    );
    expect(resolveConfig(['--remove', String(MAX_REMOVAL_COUNT)], {}).removalCount).toBe(MAX_REMOVAL_COUNT);
    expect(() => resolveConfig([], { SUDOKU_LOG_LEVEL: 'loud' })).toThrowError("Unknown log level 'loud'.");
    expect(() => resolveConfig(['--puzzle', '123'], {})).toThrowError(GridShapeError);
  });

  it('rejects unknown flags and stray arguments', () => {
    expect(() => resolveConfig(['--bogus'], {})).toThrowError(SudokuConfigError);
    expect(() => resolveConfig(['extra'], {})).toThrowError(SudokuConfigError);
  });
});
