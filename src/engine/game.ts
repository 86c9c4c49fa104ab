import {
  Cell,
  CellView,
  GameConfig,
  GameStatus,
  Minefield,
  Pos,
  DEFAULT_CONFIG,
} from "./types";
import {
  createEmptyGrid,
  placeMines,
  computeHints,
  neighbours,
  validateConfig,
} from "./board";
import { CellSet } from "./cellset";

export class Game implements Minefield {
  readonly config: GameConfig;
  readonly rows: number;
  readonly cols: number;
  grid: Cell[][];
  status: GameStatus = GameStatus.Playing;
  explodedPos: Pos | null = null;
  private firstClick = true;
  private boardReady = false;
  private mines = new CellSet();
  private flags = new CellSet();
  private safeCellCount = 0;
  private openedCount = 0;

  constructor(config: Partial<GameConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    validateConfig(this.config);
    this.rows = this.config.rows;
    this.cols = this.config.cols;
    this.grid = createEmptyGrid(this.rows, this.cols);

    if (!this.config.safeFirstClick) {
      this.initBoard([]);
    }
  }

  // Lazily called on first open when safeFirstClick is on
  private initBoard(excludePositions: Pos[]): void {
    this.grid = createEmptyGrid(this.rows, this.cols);
    this.mines = new CellSet(placeMines(this.grid, this.config, excludePositions));
    computeHints(this.grid, this.rows, this.cols);
    this.safeCellCount = this.rows * this.cols - this.mines.size;
    this.boardReady = true;
  }

  private inBounds(row: number, col: number): boolean {
    return row >= 0 && row < this.rows && col >= 0 && col < this.cols;
  }

  cell(row: number, col: number): Cell {
    return this.grid[row][col];
  }

  isMine(pos: Pos): boolean {
    return this.grid[pos.row][pos.col].mine;
  }

  nearbyMines(pos: Pos): number {
    return this.grid[pos.row][pos.col].hint;
  }

  /** Positions of every placed mine (empty until the board is laid out). */
  minePositions(): Pos[] {
    return this.mines.values();
  }

  get minesPlaced(): number {
    return this.mines.size;
  }

  get remainingMines(): number {
    return this.mines.size - this.flags.size;
  }

  cellView(row: number, col: number): CellView {
    const c = this.grid[row][col];
    const lost = this.status === GameStatus.Lost;
    const gameOver = lost || this.status === GameStatus.Won;
    const exploded =
      lost &&
      this.explodedPos !== null &&
      this.explodedPos.row === row &&
      this.explodedPos.col === col;

    return {
      row,
      col,
      opened: c.opened,
      flagged: c.flagged,
      hint: c.opened ? c.hint : null,
      mine: gameOver || c.opened ? c.mine : null,
      exploded,
      wrongFlag: lost && c.flagged && !c.mine,
    };
  }

  open(row: number, col: number): Pos[] {
    if (this.status !== GameStatus.Playing) return [];
    if (!this.inBounds(row, col)) return [];

    if (this.firstClick && this.config.safeFirstClick) {
      const exclude = [
        { row, col },
        ...neighbours(row, col, this.rows, this.cols),
      ];
      this.initBoard(exclude);
    }
    this.firstClick = false;

    const cell = this.grid[row][col];
    if (cell.opened || cell.flagged) return [];

    cell.opened = true;
    this.openedCount++;
    const opened: Pos[] = [{ row, col }];

    if (cell.mine) {
      this.status = GameStatus.Lost;
      this.explodedPos = { row, col };
      return opened;
    }

    if (cell.hint === 0) {
      const queue: Pos[] = neighbours(row, col, this.rows, this.cols);
      for (let p = queue.pop(); p !== undefined; p = queue.pop()) {
        const nc = this.grid[p.row][p.col];
        if (nc.opened || nc.flagged || nc.mine) continue;
        nc.opened = true;
        this.openedCount++;
        opened.push(p);
        if (nc.hint === 0) {
          queue.push(...neighbours(p.row, p.col, this.rows, this.cols));
        }
      }
    }

    this.checkWin();
    return opened;
  }

  /** Flag or unflag a closed cell. */
  toggleFlag(row: number, col: number): void {
    if (this.status !== GameStatus.Playing || !this.boardReady) return;
    if (!this.inBounds(row, col)) return;
    const cell = this.grid[row][col];
    if (cell.opened) return;
    cell.flagged = !cell.flagged;
    if (cell.flagged) this.flags.add({ row, col });
    else this.flags.delete({ row, col });
    this.checkWin();
  }

  /** True once the flagged cells are exactly the mines. */
  won(): boolean {
    return this.boardReady && this.flags.equals(this.mines);
  }

  giveUp(): void {
    if (this.status !== GameStatus.Playing) return;
    this.status = GameStatus.Lost;
  }

  private checkWin(): void {
    if (!this.boardReady) return;
    if (this.openedCount === this.safeCellCount || this.won()) {
      this.status = GameStatus.Won;
    }
  }

  visibleCells(): CellView[][] {
    const out: CellView[][] = [];
    for (let r = 0; r < this.rows; r++) {
      const row: CellView[] = [];
      for (let c = 0; c < this.cols; c++) {
        row.push(this.cellView(r, c));
      }
      out.push(row);
    }
    return out;
  }
}
