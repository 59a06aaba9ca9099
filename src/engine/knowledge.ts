import { DEFAULT_ENGINE_OPTIONS } from "./types";
import type { EngineOptions, Pos } from "./types";
import { inBounds, neighbours, parsePosKey, posKey } from "./board";
import { createRng, pickRandom } from "./rng";
import { Sentence } from "./sentence";
import { ConfigurationError, InvariantError, ObservationError } from "./errors";

/**
 * Minesweeper player that keeps a knowledge base of sentences and deduces
 * safe cells and mines from the hints it is fed.
 *
 * Every public mutation runs to completion before returning; an engine must
 * not be shared between concurrently running games.
 */
export class MinesweeperAI {
  readonly height: number;
  readonly width: number;
  private readonly options: EngineOptions;
  private readonly rng: () => number;

  private readonly moves = new Set<string>();
  private readonly safeKeys = new Set<string>();
  private readonly mineKeys = new Set<string>();
  private sentences: Sentence[] = [];

  constructor(height: number, width: number, options: Partial<EngineOptions> = {}) {
    if (!Number.isInteger(height) || !Number.isInteger(width) || height < 1 || width < 1) {
      throw new ConfigurationError(`Board must be at least 1x1, got ${height}x${width}.`);
    }
    this.height = height;
    this.width = width;
    this.options = { ...DEFAULT_ENGINE_OPTIONS, ...options };
    this.rng = this.options.rng ?? createRng(this.options.seed ?? Date.now());
  }

  get movesMade(): ReadonlySet<string> {
    return this.moves;
  }

  get safes(): ReadonlySet<string> {
    return this.safeKeys;
  }

  get mines(): ReadonlySet<string> {
    return this.mineKeys;
  }

  // Copies: live sentences are only ever changed through the engine
  get knowledge(): readonly Sentence[] {
    return this.sentences.map((s) => new Sentence(s.cells(), s.count));
  }

  isSafe(cell: Pos): boolean {
    return this.safeKeys.has(posKey(cell));
  }

  isMine(cell: Pos): boolean {
    return this.mineKeys.has(posKey(cell));
  }

  markMine(cell: Pos): void {
    const key = posKey(cell);
    if (this.safeKeys.has(key)) {
      throw new InvariantError(`Cell ${key} is already known to be safe.`);
    }
    this.mineKeys.add(key);
    for (const sentence of this.sentences) sentence.markMine(cell);
  }

  markSafe(cell: Pos): void {
    const key = posKey(cell);
    if (this.mineKeys.has(key)) {
      throw new InvariantError(`Cell ${key} is already known to be a mine.`);
    }
    this.safeKeys.add(key);
    for (const sentence of this.sentences) sentence.markSafe(cell);
  }

  /**
   * Records that `cell` was opened safely and shows `count` neighbouring mines,
   * then infers everything that follows from the knowledge base.
   *
   * Neighbours already known to be safe or mined are left out of the new
   * sentence, and known mines are taken off `count`.
   */
  addKnowledge(cell: Pos, count: number): void {
    if (!inBounds(cell, this.height, this.width)) {
      throw new ObservationError(`Cell ${posKey(cell)} is off the ${this.height}x${this.width} board.`);
    }
    const around = neighbours(cell.row, cell.col, this.height, this.width);
    if (!Number.isInteger(count) || count < 0 || count > around.length) {
      throw new ObservationError(
        `Cell ${posKey(cell)} cannot have ${count} neighbouring mine(s); it has ${around.length} neighbour(s).`,
      );
    }

    this.markSafe(cell);
    this.moves.add(posKey(cell));
    this.addSentence(new Sentence(around, count));
  }

  /**
   * Adds a sentence to the knowledge base and runs inference to a fixpoint.
   * Cells already known to be safe or mined are stripped from a copy of the
   * sentence first; the caller's object is never stored.
   */
  addSentence(input: Sentence): void {
    const sentence = new Sentence(input.cells(), input.count);
    for (const cell of sentence.cells()) {
      if (!inBounds(cell, this.height, this.width)) {
        throw new ObservationError(`Cell ${posKey(cell)} is off the ${this.height}x${this.width} board.`);
      }
      if (this.isMine(cell)) sentence.markMine(cell);
      else if (this.isSafe(cell)) sentence.markSafe(cell);
    }

    this.log(`new sentence ${sentence.toString()}`);
    if (!this.resolve(sentence) && !this.contains(sentence)) {
      this.sentences.push(sentence);
    }

    let derived = true;
    while (derived) {
      this.resolveAll();
      derived = this.inferSubsets();
    }

    this.log(`mines ${Array.from(this.mineKeys).join(" ")}`);
  }

  makeSafeMove(): Pos | null {
    const candidates: string[] = [];
    for (const key of this.safeKeys) {
      if (!this.moves.has(key)) candidates.push(key);
    }
    const pick = pickRandom(candidates, this.rng);
    return pick === null ? null : parsePosKey(pick);
  }

  makeRandomMove(): Pos | null {
    const candidates: Pos[] = [];
    for (let r = 0; r < this.height; r++) {
      for (let c = 0; c < this.width; c++) {
        const key = posKey({ row: r, col: c });
        if (!this.moves.has(key) && !this.mineKeys.has(key)) {
          candidates.push({ row: r, col: c });
        }
      }
    }
    return pickRandom(candidates, this.rng);
  }

  // Applies a sentence whose cells are all safe or all mines; false if it says neither
  private resolve(sentence: Sentence): boolean {
    const safes = sentence.knownSafes();
    if (safes !== null) {
      for (const cell of safes) this.markSafe(cell);
      return true;
    }
    const mines = sentence.knownMines();
    if (mines !== null) {
      for (const cell of mines) this.markMine(cell);
      return true;
    }
    return false;
  }

  private resolveAll(): void {
    let changed = true;
    while (changed) {
      changed = false;
      // Marks mutate the live sentences, so scan a snapshot and drop each
      // resolved sentence before applying it
      for (const sentence of [...this.sentences]) {
        if (!this.sentences.includes(sentence)) continue;
        if (sentence.knownSafes() === null && sentence.knownMines() === null) continue;
        this.sentences = this.sentences.filter((s) => s !== sentence);
        this.resolve(sentence);
        changed = true;
      }
    }
    this.dropDuplicates();
  }

  private dropDuplicates(): void {
    const seen = new Set<string>();
    this.sentences = this.sentences.filter((s) => {
      const key = s.key();
      if (seen.has(key)) return false;
      seen.add(key);
      return true;
    });
  }

  private inferSubsets(): boolean {
    const snapshot = [...this.sentences];
    const known = new Set(snapshot.map((s) => s.key()));
    let added = false;

    for (const a of snapshot) {
      for (const b of snapshot) {
        if (a === b || a.size >= b.size) continue;
        if (!a.isSubsetOf(b)) continue;
        const inferred = b.subtract(a);
        const key = inferred.key();
        if (known.has(key)) continue;
        known.add(key);
        this.sentences.push(inferred);
        added = true;
      }
    }
    return added;
  }

  private contains(sentence: Sentence): boolean {
    return this.sentences.some((s) => s.equals(sentence));
  }

  private log(message: string): void {
    if (this.options.verbose) this.options.logger.debug(message);
  }
}
