import { SudokuGame } from './data/sudoku.game';
import { SudokuError } from './data/sudoku.errors';
import { renderBoard } from './components/board/board';
import { resolveConfig, USAGE } from './config';
import { log, setLogLevel } from './logger';

export type Writer = (text: string) => void;

export const EXIT_OK = 0;
export const EXIT_UNSOLVABLE = 1;
export const EXIT_USAGE = 2;

/**
 * Command-line flow: build a game, print the puzzle, solve it, print the result.
 * Returns the process exit code.
 */
export function runApp(argv: string[], env: NodeJS.ProcessEnv, out: Writer): number {
  try {
    const config = resolveConfig(argv, env);
    setLogLevel(config.logLevel);
    if (config.help) {
      out(USAGE);
      return EXIT_OK;
    }

    const game = config.puzzle
      ? SudokuGame.fromPuzzle(config.puzzle)
      : new SudokuGame({ seed: config.seed, removalCount: config.removalCount });

    out('ORIGINAL BOARD');
    out(renderBoard(game.puzzle));
    out('');

    const res = game.solve();
    if (res.status === 'unsolvable') {
      out('NO SOLUTION');
      return EXIT_UNSOLVABLE;
    }
    out('SOLVED BOARD');
    out(renderBoard(res.grid));
    return EXIT_OK;
  } catch (err) {
    if (!(err instanceof SudokuError)) throw err;
    log.error('[CLI]', err.message);
    return EXIT_USAGE;
  }
}
