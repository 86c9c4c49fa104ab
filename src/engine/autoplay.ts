import { GameStatus, Pos } from "./types";
import { Game } from "./game";
import { InferenceEngine, KnowledgeUpdate } from "./inference";

export interface MoveRecord {
  pos: Pos;
  guessed: boolean; // no known-safe cell was available
  opened: Pos[];
  learned: KnowledgeUpdate[];
}

export interface AutoplayOptions {
  maxMoves?: number;
  onMove?: (move: MoveRecord, game: Game, engine: InferenceEngine) => void;
}

export interface AutoplayResult {
  status: GameStatus;
  moves: number;
  guesses: number;
  flagged: number;
  log: MoveRecord[];
}

/**
 * Plays `game` with `engine` until the game is decided, no move is left or
 * `maxMoves` is reached. Known-safe moves come first; otherwise the engine
 * picks any cell not known to be a mine.
 */
export function autoplay(
  game: Game,
  engine: InferenceEngine,
  options: AutoplayOptions = {},
): AutoplayResult {
  const maxMoves = options.maxMoves ?? game.rows * game.cols;
  const log: MoveRecord[] = [];
  let guesses = 0;
  let flagged = 0;

  while (game.status === GameStatus.Playing && log.length < maxMoves) {
    const safe = engine.makeSafeMove();
    const pos = safe ?? engine.makeRandomMove();
    if (pos === null) break;
    if (safe === null) guesses++;

    const opened = game.open(pos.row, pos.col);
    const learned: KnowledgeUpdate[] = [];
    if (game.status !== GameStatus.Lost) {
      for (const p of opened) {
        if (engine.hasMoved(p)) continue;
        learned.push(engine.addKnowledge(p, game.nearbyMines(p)));
      }
      for (const mine of engine.mines) {
        if (game.status !== GameStatus.Playing) break;
        if (game.cell(mine.row, mine.col).flagged) continue;
        game.toggleFlag(mine.row, mine.col);
        if (game.cell(mine.row, mine.col).flagged) flagged++;
      }
    }

    const record: MoveRecord = { pos, guessed: safe === null, opened, learned };
    log.push(record);
    options.onMove?.(record, game, engine);
  }

  return { status: game.status, moves: log.length, guesses, flagged, log };
}
