import { parseArgs } from 'node:util';
import { DEFAULT_REMOVAL_COUNT, MAX_REMOVAL_COUNT } from './data/sudoku.constants';
import { SudokuConfigError } from './data/sudoku.errors';
import { parseGridString } from './data/sudoku.utils';
import { Grid } from './data/sudoku.types';
import { LogLevel, isLogLevel } from './logger';

export interface AppConfig {
  seed?: number | string;  // all-digit seeds become numbers, as in the library
  removalCount: number;
  puzzle?: Grid;
  logLevel: LogLevel;
  help: boolean;
}

export const USAGE = `Usage: sudoku [options]

  --seed <s>        seed for a reproducible board; digits-only seeds match seed: <number> (env SUDOKU_SEED)
  --remove <n>      cells to clear, drawn with replacement, at most ${MAX_REMOVAL_COUNT} (env SUDOKU_REMOVE, default ${DEFAULT_REMOVAL_COUNT})
  --puzzle <grid>   81 chars, 1-9 or 0/. for blanks; solve it instead of generating
  --verbose         debug logging (env SUDOKU_LOG_LEVEL)
  --help            show this text`;

// flags win over env, env over defaults
export function resolveConfig(argv: string[], env: NodeJS.ProcessEnv = {}): AppConfig {
  const values = parseFlags(argv);

  const seedRaw = values.seed ?? (env['SUDOKU_SEED'] || undefined);
  const removeRaw = values.remove ?? env['SUDOKU_REMOVE'];
  const levelRaw = values.verbose === true ? 'debug' : env['SUDOKU_LOG_LEVEL'] ?? 'warn';
  if (!isLogLevel(levelRaw)) throw new SudokuConfigError(`Unknown log level '${levelRaw}'.`);

  return {
    seed: seedRaw === undefined ? undefined : parseSeed(seedRaw),
    removalCount: removeRaw === undefined ? DEFAULT_REMOVAL_COUNT : parseRemovalCount(removeRaw),
    puzzle: values.puzzle === undefined ? undefined : parseGridString(values.puzzle),
    logLevel: levelRaw,
    help: values.help === true
  };
}

function parseFlags(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      options: {
        seed: { type: 'string' },
        remove: { type: 'string' },
        puzzle: { type: 'string' },
        verbose: { type: 'boolean' },
        help: { type: 'boolean' }
      },
      strict: true,
      allowPositionals: false
    }).values;
  } catch (err) {
    // unknown flag or missing value
    throw new SudokuConfigError(err instanceof Error ? err.message : String(err));
  }
}

function parseRemovalCount(raw: string): number {
  const n = Number(raw.trim());
  if (!/^\d+$/.test(raw.trim()) || !Number.isSafeInteger(n)) {
    throw new SudokuConfigError(`--remove must be a non-negative integer, got '${raw}'.`);
  }
  if (n > MAX_REMOVAL_COUNT) {
    throw new SudokuConfigError(`--remove must be at most ${MAX_REMOVAL_COUNT}, got '${raw}'.`);
  }
  return n;
}

function parseSeed(raw: string): number | string {
  const n = Number(raw);
  return /^\d+$/.test(raw) && Number.isSafeInteger(n) ? n : raw;
}
