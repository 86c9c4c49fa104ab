export interface GameConfig {
  rows: number;
  cols: number;
  minesTotal: number;
  seed: number;
  // place mines lazily, away from the first opened cell and its neighbours
  safeFirstClick: boolean;
}

export interface Cell {
  mine: boolean;
  opened: boolean;
  flagged: boolean;
  hint: number; // number of neighbouring mines
}

export enum GameStatus {
  Playing = "playing",
  Won = "won",
  Lost = "lost",
}

// Read-only cell snapshot for rendering
export interface CellView {
  row: number;
  col: number;
  opened: boolean;
  flagged: boolean;
  hint: number | null;  // visible when opened
  mine: boolean | null; // visible when opened or game over
  exploded: boolean;    // the cell the player opened to lose
  wrongFlag: boolean;   // flag on a safe cell, shown on game-over
}

export interface Pos {
  row: number;
  col: number;
}

/**
 * Board contract consumed by the game loop. The inference engine never
 * sees it; it only receives `(cell, count)` pairs.
 */
export interface Minefield {
  readonly rows: number;
  readonly cols: number;
  isMine(pos: Pos): boolean;
  nearbyMines(pos: Pos): number;
}

/** Default config */
export const DEFAULT_CONFIG: GameConfig = {
  rows: 8,
  cols: 8,
  minesTotal: 8,
  seed: Date.now(),
  safeFirstClick: false,
};

export function posKey(pos: Pos): string {
  return `${pos.row},${pos.col}`;
}

