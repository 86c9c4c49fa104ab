/**
 * Command-line autoplayer: plays seeded games with the inference engine and
 * prints the boards and a summary.
 */

import { parseArgs } from "node:util";
import {
  Game,
  GameStatus,
  InferenceEngine,
  ConfigurationError,
  autoplay,
  describeKnowledge,
  formatBoard,
  formatMinefield,
  validateConfig,
} from "./engine/index";
import type { GameConfig, MoveRecord } from "./engine/index";

export interface CliArgs {
  rows: number;
  cols: number;
  mines: number;
  seed: number;
  games: number;
  saturate: boolean;
  verbose: boolean;
  help: boolean;
}

export interface CliOutput {
  log(line: string): void;
  error(line: string): void;
}

export const USAGE = `Usage: minesweeper-autoplay [options]

Options:
  --rows <n>     board height (default 8)
  --cols <n>     board width (default 8)
  --mines <n>    number of mines (default 8)
  --seed <n>     seed of the first game (default: current time)
  --games <n>    number of games to play (default 1)
  --saturate     derive to a fixed point after every revealed cell
  --verbose      print every move and the knowledge base
  --help         show this message`;

function parseInteger(name: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined) return fallback;
  const n = Number(raw);
  if (!Number.isInteger(n)) {
    throw new ConfigurationError(`--${name} expects an integer, got "${raw}"`);
  }
  return n;
}

function parseFlags(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      options: {
        rows: { type: "string" },
        cols: { type: "string" },
        mines: { type: "string" },
        seed: { type: "string" },
        games: { type: "string" },
        saturate: { type: "boolean", default: false },
        verbose: { type: "boolean", default: false },
        help: { type: "boolean", short: "h", default: false },
      },
      strict: true,
      allowPositionals: false,
    });
  } catch (err) {
    // parseArgs reports unknown flags and missing values as TypeError
    throw new ConfigurationError(err instanceof Error ? err.message : String(err));
  }
}

export function parseCliArgs(argv: string[]): CliArgs {
  const { values } = parseFlags(argv);

  const games = parseInteger("games", values.games, 1);
  if (games < 1) throw new ConfigurationError(`--games must be at least 1, got ${games}`);

  return {
    rows: parseInteger("rows", values.rows, 8),
    cols: parseInteger("cols", values.cols, 8),
    mines: parseInteger("mines", values.mines, 8),
    seed: parseInteger("seed", values.seed, Date.now()),
    games,
    saturate: values.saturate ?? false,
    verbose: values.verbose ?? false,
    help: values.help ?? false,
  };
}

function describeMove(index: number, move: MoveRecord): string {
  const kind = move.guessed ? "guess" : "safe";
  const mines = move.learned.reduce((n, u) => n + u.mines.length, 0);
  return `#${index} ${kind} (${move.pos.row},${move.pos.col}): opened ${move.opened.length}, new mines ${mines}`;
}

/** Runs the CLI and returns the process exit code. */
export function run(argv: string[], out: CliOutput = console): number {
  let args: CliArgs;
  try {
    args = parseCliArgs(argv);
  } catch (err) {
    if (err instanceof ConfigurationError) {
      out.error(err.message);
      out.error(USAGE);
      return 2;
    }
    throw err;
  }

  if (args.help) {
    out.log(USAGE);
    return 0;
  }

  const base: GameConfig = {
    rows: args.rows,
    cols: args.cols,
    minesTotal: args.mines,
    seed: args.seed,
    safeFirstClick: false,
  };
  try {
    validateConfig(base);
  } catch (err) {
    if (err instanceof ConfigurationError) {
      out.error(err.message);
      return 2;
    }
    throw err;
  }

  let wins = 0;
  let losses = 0;
  let guesses = 0;
  for (let i = 0; i < args.games; i++) {
    const seed = args.seed + i;
    const game = new Game({ ...base, seed });
    const engine = new InferenceEngine({
      rows: game.rows,
      cols: game.cols,
      seed,
      saturate: args.saturate,
    });

    out.log(`Game ${i + 1} (seed ${seed})`);
    if (args.verbose) out.log(formatMinefield(game));

    let moveNumber = 0;
    const result = autoplay(game, engine, {
      onMove: args.verbose
        ? (move, _game, eng) => {
            moveNumber++;
            out.log(describeMove(moveNumber, move));
            for (const line of describeKnowledge(eng)) out.log(`  ${line}`);
          }
        : undefined,
    });

    if (result.status === GameStatus.Won) wins++;
    if (result.status === GameStatus.Lost) losses++;
    guesses += result.guesses;
    out.log(formatBoard(game));
    out.log(`${result.status} after ${result.moves} moves (${result.guesses} guesses)`);
    out.log("");
  }

  out.log(`Played ${args.games}: ${wins} won, ${losses} lost, ${guesses} guesses`);
  return 0;
}
