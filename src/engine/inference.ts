import { Pos } from "./types";
import { CellSet, ReadonlyCellSet } from "./cellset";
import { Constraint } from "./constraint";
import { InvariantError } from "./errors";
import { neighbours } from "./board";
import { createRng, pickRandom, Rng } from "./rng";

export interface EngineConfig {
  rows: number;
  cols: number;
  seed: number;
  // repeat derivation and propagation until nothing changes
  saturate: boolean;
  // verify knowledge-base invariants after every update (slow)
  checkInvariants: boolean;
  rng?: Rng; // overrides the seeded generator
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  rows: 8,
  cols: 8,
  seed: Date.now(),
  saturate: false,
  checkInvariants: false,
};

/** What a single {@link InferenceEngine.addKnowledge} call learned. */
export interface KnowledgeUpdate {
  added: Constraint[];
  mines: Pos[];
  safes: Pos[];
}

interface RoundResult {
  derived: Constraint[];
  mines: Pos[];
  safes: Pos[];
}

/**
 * Knowledge-based player. Keeps a list of constraints about the board and
 * the cells known to be safe or mines, and derives new facts by subset
 * elimination each time a revealed cell is reported.
 */
export class InferenceEngine {
  readonly rows: number;
  readonly cols: number;
  private readonly config: EngineConfig;
  private readonly rng: Rng;

  private readonly _movesMade = new CellSet();
  private readonly _safes = new CellSet();
  private readonly _mines = new CellSet();
  private _knowledge: Constraint[] = [];

  constructor(config: Partial<EngineConfig> = {}) {
    // seed per engine, not once at import
    this.config = { ...DEFAULT_ENGINE_CONFIG, seed: Date.now(), ...config };
    this.rows = this.config.rows;
    this.cols = this.config.cols;
    this.rng = this.config.rng ?? createRng(this.config.seed);
  }

  get movesMade(): ReadonlyCellSet {
    return this._movesMade;
  }

  get safes(): ReadonlyCellSet {
    return this._safes;
  }

  get mines(): ReadonlyCellSet {
    return this._mines;
  }

  get knowledge(): readonly Constraint[] {
    return this._knowledge;
  }

  hasMoved(pos: Pos): boolean {
    return this._movesMade.has(pos);
  }

  isKnownSafe(pos: Pos): boolean {
    return this._safes.has(pos);
  }

  isKnownMine(pos: Pos): boolean {
    return this._mines.has(pos);
  }

  /** Records `cell` as a mine and removes it from every constraint. */
  markMine(cell: Pos): boolean {
    if (this._safes.has(cell)) {
      throw new InvariantError(`Cell (${cell.row},${cell.col}) is already known safe`);
    }
    const added = this._mines.add(cell);
    for (const constraint of this._knowledge) constraint.reduceAsMine(cell);
    return added;
  }

  /** Records `cell` as safe and removes it from every constraint. */
  markSafe(cell: Pos): boolean {
    if (this._mines.has(cell)) {
      throw new InvariantError(`Cell (${cell.row},${cell.col}) is already known to be a mine`);
    }
    const added = this._safes.add(cell);
    for (const constraint of this._knowledge) constraint.reduceAsSafe(cell);
    return added;
  }

  /**
   * Called once per revealed cell with the number of mines among its
   * neighbours.
   */
  addKnowledge(cell: Pos, count: number): KnowledgeUpdate {
    if (!this.inBounds(cell)) {
      throw new InvariantError(`Cell (${cell.row},${cell.col}) is outside the board`);
    }

    this._movesMade.add(cell);
    const safes: Pos[] = [];
    if (this.markSafe(cell)) safes.push(cell);

    const added: Constraint[] = [];
    const unexplored = neighbours(cell.row, cell.col, this.rows, this.cols)
      .filter((n) => !this._movesMade.has(n));
    if (unexplored.length > 0) {
      const observed = new Constraint(unexplored, count);
      for (const n of unexplored) {
        if (this._mines.has(n)) observed.reduceAsMine(n);
        else if (this._safes.has(n)) observed.reduceAsSafe(n);
      }
      this._knowledge.push(observed);
      added.push(observed);
    }

    const mines: Pos[] = [];
    for (;;) {
      const round = this.inferRound();
      added.push(...round.derived);
      mines.push(...round.mines);
      safes.push(...round.safes);
      const changed = round.derived.length > 0 || round.mines.length > 0 || round.safes.length > 0;
      if (!this.config.saturate || !changed) break;
    }

    if (this.config.checkInvariants) this.assertInvariants();
    return { added, mines, safes };
  }

  /** A known-safe cell not yet played, or null. */
  makeSafeMove(): Pos | null {
    const candidates = this._safes.values().filter((p) => !this._movesMade.has(p));
    return pickRandom(candidates, this.rng);
  }

  /** Any cell not yet played and not known to be a mine, or null. */
  makeRandomMove(): Pos | null {
    const candidates: Pos[] = [];
    for (let r = 0; r < this.rows; r++) {
      for (let c = 0; c < this.cols; c++) {
        const p = { row: r, col: c };
        if (!this._movesMade.has(p) && !this._mines.has(p)) candidates.push(p);
      }
    }
    return pickRandom(candidates, this.rng);
  }

  /** Throws if any knowledge-base invariant is broken. */
  assertInvariants(): void {
    for (const pos of this._safes) {
      if (this._mines.has(pos)) {
        throw new InvariantError(`Cell (${pos.row},${pos.col}) is both safe and a mine`);
      }
    }
    for (const constraint of this._knowledge) {
      if (constraint.count < 0 || constraint.count > constraint.cells.size) {
        throw new InvariantError(`Mine count out of bounds in ${constraint.toString()}`);
      }
      for (const pos of constraint.cells) {
        if (this._safes.has(pos) || this._mines.has(pos)) {
          throw new InvariantError(
            `Resolved cell (${pos.row},${pos.col}) still in ${constraint.toString()}`,
          );
        }
      }
    }
  }

  // One round of subset elimination followed by propagation of the
  // constraints that pin down every one of their cells.
  private inferRound(): RoundResult {
    const derived = this.deriveFromSubsets();
    this._knowledge.push(...derived);

    const knownMines = new CellSet();
    const knownSafes = new CellSet();
    for (const constraint of this._knowledge) {
      knownMines.addAll(constraint.knownMines() ?? []);
      knownSafes.addAll(constraint.knownSafes() ?? []);
    }

    const mines: Pos[] = [];
    const safes: Pos[] = [];
    for (const pos of knownMines) {
      if (this.markMine(pos)) mines.push(pos);
    }
    for (const pos of knownSafes) {
      if (this.markSafe(pos)) safes.push(pos);
    }

    this.compact();
    return { derived, mines, safes };
  }

  // If A's cells are a subset of B's, the cells only in B hold exactly
  // B.count - A.count mines.
  private deriveFromSubsets(): Constraint[] {
    const seen = new Set(this._knowledge.map((k) => k.key()));
    const derived: Constraint[] = [];
    const knowledge = this._knowledge;

    for (let i = 0; i < knowledge.length; i++) {
      const a = knowledge[i];
      for (let j = 0; j < knowledge.length; j++) {
        if (i === j) continue;
        const b = knowledge[j];
        if (a.cells.size > b.cells.size) continue;
        if (a.equals(b) || !a.isSubsetOf(b)) continue;

        const diff = b.cells.values().filter((p) => !a.cells.has(p));
        const candidate = new Constraint(diff, b.count - a.count);
        const key = candidate.key();
        if (seen.has(key)) continue;
        seen.add(key);
        derived.push(candidate);
      }
    }
    return derived;
  }

  // Drops constraints with no cells left and all but the first copy of
  // identical ones.
  private compact(): void {
    const seen = new Set<string>();
    this._knowledge = this._knowledge.filter((k) => {
      if (k.isEmpty) return false;
      const key = k.key();
      if (seen.has(key)) return false;
      seen.add(key);
      return true;
    });
  }

  private inBounds(pos: Pos): boolean {
    return pos.row >= 0 && pos.row < this.rows && pos.col >= 0 && pos.col < this.cols;
  }
}

export function describeKnowledge(engine: InferenceEngine): string[] {
  return engine.knowledge.map((k) => k.toString());
}
