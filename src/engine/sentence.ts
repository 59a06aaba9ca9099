import type { Pos } from "./types";
import { posKey } from "./board";
import { InvariantError } from "./errors";

/**
 * A logical statement about the board: exactly `count` of `cells` are mines.
 *
 * Cells are held by value (keyed on `row,col`), so two sentences built from
 * different `Pos` objects over the same squares compare equal.
 */
export class Sentence {
  private readonly cellMap = new Map<string, Pos>();
  private mineCount: number;

  constructor(cells: Iterable<Pos>, count: number) {
    for (const cell of cells) {
      this.cellMap.set(posKey(cell), { row: cell.row, col: cell.col });
    }
    if (!Number.isInteger(count) || count < 0 || count > this.cellMap.size) {
      throw new InvariantError(
        `Sentence count ${count} is impossible for ${this.cellMap.size} cell(s).`,
      );
    }
    this.mineCount = count;
  }

  get count(): number {
    return this.mineCount;
  }

  get size(): number {
    return this.cellMap.size;
  }

  cells(): Pos[] {
    return Array.from(this.cellMap.values(), (p) => ({ ...p }));
  }

  keys(): string[] {
    return Array.from(this.cellMap.keys());
  }

  has(cell: Pos): boolean {
    return this.cellMap.has(posKey(cell));
  }

  /** All cells when every one of them must be a mine, otherwise `null` (no conclusion). */
  knownMines(): Pos[] | null {
    return this.mineCount === this.cellMap.size ? this.cells() : null;
  }

  /** All cells when none of them can be a mine, otherwise `null` (no conclusion). */
  knownSafes(): Pos[] | null {
    return this.mineCount === 0 ? this.cells() : null;
  }

  markMine(cell: Pos): void {
    const key = posKey(cell);
    if (!this.cellMap.has(key)) return;
    if (this.mineCount === 0) {
      throw new InvariantError(`Marking ${key} as a mine drives ${this.toString()} below zero.`);
    }
    this.cellMap.delete(key);
    this.mineCount--;
  }

  markSafe(cell: Pos): void {
    const key = posKey(cell);
    if (!this.cellMap.has(key)) return;
    if (this.mineCount === this.cellMap.size) {
      throw new InvariantError(`Marking ${key} as safe leaves too few cells for ${this.toString()}.`);
    }
    this.cellMap.delete(key);
  }

  isSubsetOf(other: Sentence): boolean {
    if (this.cellMap.size > other.cellMap.size) return false;
    for (const key of this.cellMap.keys()) {
      if (!other.cellMap.has(key)) return false;
    }
    return true;
  }

  /**
   * Subset inference: when this sentence's cells contain all of `subset`'s,
   * the remaining cells hold exactly `this.count - subset.count` mines.
   */
  subtract(subset: Sentence): Sentence {
    if (!subset.isSubsetOf(this)) {
      throw new InvariantError(`${subset.toString()} is not a subset of ${this.toString()}.`);
    }
    const rest: Pos[] = [];
    for (const [key, pos] of this.cellMap) {
      if (!subset.cellMap.has(key)) rest.push(pos);
    }
    return new Sentence(rest, this.mineCount - subset.mineCount);
  }

  equals(other: Sentence): boolean {
    return this.mineCount === other.mineCount && this.size === other.size && this.isSubsetOf(other);
  }

  // Canonical form: sorted cell keys plus count
  key(): string {
    return `${this.sortedCells().map(posKey).join(";")}=${this.mineCount}`;
  }

  toString(): string {
    const cells = this.sortedCells().map((p) => `(${p.row}, ${p.col})`);
    return `{${cells.join(", ")}} = ${this.mineCount}`;
  }

  private sortedCells(): Pos[] {
    return this.cells().sort((a, b) => a.row - b.row || a.col - b.col);
  }
}
