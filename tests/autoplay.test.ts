// ─── Autoplay tests ────────────────────────────────────────────────────────

import { describe, it, expect } from "vitest";
import { Game, GameStatus, InferenceEngine, autoplay } from "../src/engine/index";
import type { MoveRecord } from "../src/engine/index";

function setup(rows: number, cols: number, minesTotal: number, seed: number, saturate = false) {
  const game = new Game({ rows, cols, minesTotal, seed });
  const engine = new InferenceEngine({ rows, cols, seed, saturate, checkInvariants: true });
  return { game, engine };
}

describe("autoplay", () => {
  it("wins an empty board with one guess", () => {
    const { game, engine } = setup(3, 3, 0, 1);
    const result = autoplay(game, engine);
    expect(result.status).toBe(GameStatus.Won);
    expect(result.moves).toBe(1);
    expect(result.guesses).toBe(1);
    expect(engine.movesMade.size).toBe(9);
  });

  it("stops at the move limit", () => {
    const { game, engine } = setup(4, 4, 3, 2);
    const result = autoplay(game, engine, { maxMoves: 0 });
    expect(result.moves).toBe(0);
    expect(result.status).toBe(GameStatus.Playing);
  });

  it("reports every move to the observer", () => {
    const { game, engine } = setup(6, 6, 5, 3);
    const seen: MoveRecord[] = [];
    const result = autoplay(game, engine, { onMove: (move) => seen.push(move) });
    expect(seen).toEqual(result.log);
    expect(result.moves).toBe(seen.length);
    expect(result.guesses).toBe(seen.filter((m) => m.guessed).length);
  });

  it.each([false, true])("never contradicts the board (saturate=%s)", (saturate) => {
    for (let seed = 1; seed <= 25; seed++) {
      const { game, engine } = setup(8, 8, 10, seed, saturate);
      const result = autoplay(game, engine);

      expect(result.status).not.toBe(GameStatus.Playing);
      for (const pos of engine.mines) {
        expect(game.isMine(pos)).toBe(true);
        expect(engine.isKnownSafe(pos)).toBe(false);
      }
      for (const pos of engine.safes) {
        expect(game.isMine(pos)).toBe(false);
      }
      for (const constraint of engine.knowledge) {
        expect(constraint.count).toBeGreaterThanOrEqual(0);
        expect(constraint.count).toBeLessThanOrEqual(constraint.cells.size);
      }
      // only a guess can hit a mine
      if (result.status === GameStatus.Lost) {
        expect(result.log[result.log.length - 1].guessed).toBe(true);
      }
    }
  });

  it("counts only the flags it placed", () => {
    for (let seed = 1; seed <= 200; seed++) {
      const { game, engine } = setup(8, 8, 10, seed);
      const result = autoplay(game, engine);
      let onBoard = 0;
      for (const row of game.grid) {
        for (const cell of row) {
          if (!cell.flagged) continue;
          onBoard++;
          expect(cell.mine).toBe(true);
        }
      }
      expect(result.flagged).toBe(onBoard);
    }
  });

  it("feeds every opened cell to the engine", () => {
    const { game, engine } = setup(8, 8, 10, 4);
    autoplay(game, engine);
    for (let r = 0; r < game.rows; r++) {
      for (let c = 0; c < game.cols; c++) {
        const cell = game.cell(r, c);
        if (cell.opened && !cell.mine) {
          expect(engine.hasMoved({ row: r, col: c })).toBe(true);
        }
      }
    }
  });
});
