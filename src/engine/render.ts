import { CellView } from "./types";
import { Game } from "./game";

// Mine layout in the classic text form:
// -----
// |X| |
// -----
export function formatMinefield(game: Game): string {
  const rule = "--".repeat(game.cols) + "-";
  const lines: string[] = [];
  for (let r = 0; r < game.rows; r++) {
    lines.push(rule);
    let line = "";
    for (let c = 0; c < game.cols; c++) {
      line += game.cell(r, c).mine ? "|X" : "| ";
    }
    lines.push(line + "|");
  }
  lines.push(rule);
  return lines.join("\n");
}

function cellGlyph(view: CellView): string {
  if (view.exploded) return "!";
  if (view.wrongFlag) return "x";
  if (view.flagged) return "F";
  if (view.mine === true) return "*";
  if (view.hint === null) return "#";
  return view.hint === 0 ? "." : String(view.hint);
}

// Player's view, one character per cell separated by spaces.
export function formatBoard(game: Game): string {
  return game
    .visibleCells()
    .map((row) => row.map(cellGlyph).join(" "))
    .join("\n");
}
