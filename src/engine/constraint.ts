import { Pos } from "./types";
import { CellSet, ReadonlyCellSet } from "./cellset";
import { InvariantError } from "./errors";

/**
 * "Exactly `count` of `cells` are mines."
 *
 * Cells whose status becomes known are removed in place through
 * {@link reduceAsMine} and {@link reduceAsSafe}; the bound
 * `0 <= count <= cells.size` holds after every mutation.
 */
export class Constraint {
  private readonly _cells: CellSet;
  private _count: number;

  constructor(cells: Iterable<Pos>, count: number) {
    this._cells = new CellSet(cells);
    this._count = count;
    this.assertBounds();
  }

  get cells(): ReadonlyCellSet {
    return this._cells;
  }

  get count(): number {
    return this._count;
  }

  get isEmpty(): boolean {
    return this._cells.size === 0;
  }

  /** Every remaining cell is a mine, or null when that cannot be concluded. */
  knownMines(): Pos[] | null {
    if (this._count > 0 && this._cells.size === this._count) {
      return this._cells.values();
    }
    return null;
  }

  /** Every remaining cell is safe, or null when that cannot be concluded. */
  knownSafes(): Pos[] | null {
    if (this._count === 0 && this._cells.size > 0) {
      return this._cells.values();
    }
    return null;
  }

  reduceAsMine(cell: Pos): void {
    if (!this._cells.has(cell)) return;
    if (this._count === 0) {
      throw new InvariantError(
        `Cell (${cell.row},${cell.col}) marked as mine inside ${this.toString()}`,
      );
    }
    this._cells.delete(cell);
    this._count--;
  }

  reduceAsSafe(cell: Pos): void {
    if (!this._cells.delete(cell)) return;
    this.assertBounds();
  }

  isSubsetOf(other: Constraint): boolean {
    return this._cells.isSubsetOf(other._cells);
  }

  equals(other: Constraint): boolean {
    return this._count === other._count && this._cells.equals(other._cells);
  }

  // Canonical form: sorted cell keys plus count. Equal constraints share a key.
  key(): string {
    const cells = this._cells
      .values()
      .sort((a, b) => a.row - b.row || a.col - b.col)
      .map((p) => `${p.row},${p.col}`);
    return `${cells.join(";")}=${this._count}`;
  }

  toString(): string {
    const cells = this._cells
      .values()
      .sort((a, b) => a.row - b.row || a.col - b.col)
      .map((p) => `(${p.row},${p.col})`);
    return `{${cells.join(", ")}} = ${this._count}`;
  }

  private assertBounds(): void {
    if (this._count < 0 || this._count > this._cells.size) {
      throw new InvariantError(`Mine count out of bounds in ${this.toString()}`);
    }
  }
}
