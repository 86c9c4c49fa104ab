import { Pos, posKey } from "./types";

export interface ReadonlyCellSet extends Iterable<Pos> {
  readonly size: number;
  has(pos: Pos): boolean;
  values(): Pos[];
}

// Set of positions with structural identity, keyed by "row,col".
// Iteration follows insertion order so replays are deterministic.
export class CellSet implements ReadonlyCellSet {
  private byKey = new Map<string, Pos>();

  constructor(cells: Iterable<Pos> = []) {
    for (const pos of cells) this.add(pos);
  }

  get size(): number {
    return this.byKey.size;
  }

  has(pos: Pos): boolean {
    return this.byKey.has(posKey(pos));
  }

  add(pos: Pos): boolean {
    const key = posKey(pos);
    if (this.byKey.has(key)) return false;
    this.byKey.set(key, { row: pos.row, col: pos.col });
    return true;
  }

  delete(pos: Pos): boolean {
    return this.byKey.delete(posKey(pos));
  }

  values(): Pos[] {
    return Array.from(this.byKey.values());
  }

  [Symbol.iterator](): Iterator<Pos> {
    return this.byKey.values();
  }

  isSubsetOf(other: ReadonlyCellSet): boolean {
    if (this.size > other.size) return false;
    for (const pos of this.byKey.values()) {
      if (!other.has(pos)) return false;
    }
    return true;
  }

  equals(other: ReadonlyCellSet): boolean {
    return this.size === other.size && this.isSubsetOf(other);
  }

  addAll(cells: Iterable<Pos>): void {
    for (const pos of cells) this.add(pos);
  }
}
