import { GameStatus, DEFAULT_CONFIG } from "./types";
import type { Cell, GameConfig, Pos } from "./types";
import {
  createEmptyGrid,
  placeMines,
  computeHints,
  inBounds,
  posKey,
  validateConfig,
} from "./board";
import { ObservationError } from "./errors";

export class Game {
  readonly config: GameConfig;
  readonly height: number;
  readonly width: number;
  readonly grid: Cell[][];
  status: GameStatus = GameStatus.Playing;
  explodedPos: Pos | null = null;
  private readonly mineKeys: Set<string>;
  private readonly flaggedKeys = new Set<string>();

  constructor(config: Partial<GameConfig> = {}, minePositions?: Pos[]) {
    this.config = { ...DEFAULT_CONFIG, seed: Date.now(), ...config };
    this.height = this.config.height;
    this.width = this.config.width;
    if (minePositions) this.config.mines = new Set(minePositions.map(posKey)).size;
    validateConfig(this.config);

    this.grid = createEmptyGrid(this.height, this.width);
    if (minePositions) {
      for (const p of minePositions) {
        this.assertInBounds(p);
        this.grid[p.row][p.col].mine = true;
      }
    } else {
      placeMines(this.grid, this.config);
    }
    computeHints(this.grid, this.height, this.width);

    this.mineKeys = new Set<string>();
    for (let r = 0; r < this.height; r++) {
      for (let c = 0; c < this.width; c++) {
        if (this.grid[r][c].mine) this.mineKeys.add(posKey({ row: r, col: c }));
      }
    }
    this.checkWin();
  }

  get mines(): ReadonlySet<string> {
    return this.mineKeys;
  }

  get flagged(): ReadonlySet<string> {
    return this.flaggedKeys;
  }

  isMine(pos: Pos): boolean {
    this.assertInBounds(pos);
    return this.grid[pos.row][pos.col].mine;
  }

  /** Number of mines among the up-to-8 cells around `pos`. */
  nearbyMines(pos: Pos): number {
    this.assertInBounds(pos);
    return this.grid[pos.row][pos.col].hint;
  }

  /**
   * Opens a cell. Returns its hint, or `null` when the cell was a mine
   * (the game is then lost) or the game is already over.
   */
  open(pos: Pos): number | null {
    this.assertInBounds(pos);
    if (this.status !== GameStatus.Playing) return null;

    const cell = this.grid[pos.row][pos.col];
    cell.opened = true;
    if (cell.mine) {
      this.status = GameStatus.Lost;
      this.explodedPos = { row: pos.row, col: pos.col };
      return null;
    }
    return cell.hint;
  }

  flag(pos: Pos): void {
    this.assertInBounds(pos);
    if (this.status !== GameStatus.Playing) return;
    const cell = this.grid[pos.row][pos.col];
    if (cell.opened || cell.flagged) return;
    cell.flagged = true;
    this.flaggedKeys.add(posKey(pos));
    this.checkWin();
  }

  // Won once the flags match the mines exactly
  won(): boolean {
    if (this.flaggedKeys.size !== this.mineKeys.size) return false;
    for (const key of this.mineKeys) {
      if (!this.flaggedKeys.has(key)) return false;
    }
    return true;
  }

  private checkWin(): void {
    if (this.won()) this.status = GameStatus.Won;
  }

  private assertInBounds(pos: Pos): void {
    if (!inBounds(pos, this.height, this.width)) {
      throw new ObservationError(`Cell ${posKey(pos)} is off the ${this.height}x${this.width} board.`);
    }
  }
}
