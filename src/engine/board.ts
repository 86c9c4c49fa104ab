import { Cell, GameConfig, Pos, posKey } from "./types";
import { createRng, shuffle } from "./rng";
import { ConfigurationError } from "./errors";

export function neighbours(row: number, col: number, rows: number, cols: number): Pos[] {
  const result: Pos[] = [];
  for (let dr = -1; dr <= 1; dr++) {
    for (let dc = -1; dc <= 1; dc++) {
      if (dr === 0 && dc === 0) continue;
      const r = row + dr;
      const c = col + dc;
      if (r >= 0 && r < rows && c >= 0 && c < cols) {
        result.push({ row: r, col: c });
      }
    }
  }
  return result;
}

export function validateConfig(config: GameConfig): void {
  const { rows, cols, minesTotal } = config;
  if (!Number.isInteger(rows) || rows <= 0 || !Number.isInteger(cols) || cols <= 0) {
    throw new ConfigurationError(`Board must be at least 1x1, got ${rows}x${cols}`);
  }
  if (!Number.isInteger(minesTotal) || minesTotal < 0) {
    throw new ConfigurationError(`Mine count must be a non-negative integer, got ${minesTotal}`);
  }
  if (minesTotal > rows * cols) {
    throw new ConfigurationError(`Cannot place ${minesTotal} mines on ${rows * cols} cells`);
  }
}

export function createEmptyGrid(rows: number, cols: number): Cell[][] {
  const grid: Cell[][] = [];
  for (let r = 0; r < rows; r++) {
    const row: Cell[] = [];
    for (let c = 0; c < cols; c++) {
      row.push({ mine: false, opened: false, flagged: false, hint: 0 });
    }
    grid.push(row);
  }
  return grid;
}

// Place mines on distinct cells drawn from the seeded generator.
// Excluded positions never receive a mine; when exclusions leave fewer
// eligible cells than requested, every eligible cell gets one.
export function placeMines(
  grid: Cell[][],
  config: GameConfig,
  excludePositions: Pos[] = [],
): Pos[] {
  const { rows, cols, minesTotal, seed } = config;
  const rng = createRng(seed);
  const excludeSet = new Set(excludePositions.map((p) => posKey(p)));

  const eligible: Pos[] = [];
  for (let r = 0; r < rows; r++) {
    for (let c = 0; c < cols; c++) {
      const p = { row: r, col: c };
      if (!excludeSet.has(posKey(p))) eligible.push(p);
    }
  }

  const placed = shuffle(eligible, rng).slice(0, Math.min(minesTotal, eligible.length));
  for (const p of placed) grid[p.row][p.col].mine = true;
  return placed;
}

// hint = number of mines among the 8 neighbours
export function computeHints(grid: Cell[][], rows: number, cols: number): void {
  for (let r = 0; r < rows; r++) {
    for (let c = 0; c < cols; c++) {
      let count = 0;
      for (const n of neighbours(r, c, rows, cols)) {
        if (grid[n.row][n.col].mine) count++;
      }
      grid[r][c].hint = count;
    }
  }
}
