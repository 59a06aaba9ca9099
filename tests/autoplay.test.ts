// ─── Autoplay tests ─────────────────────────────────────────────────────────

import { describe, it, expect } from "vitest";
import { Game, GameStatus, MinesweeperAI, autoplay, posKey } from "../src/engine/index";

describe("autoplay", () => {
  it("wins a small board after a single guess", () => {
    const game = new Game({ height: 3, width: 3 }, [{ row: 0, col: 0 }]);
    const ai = new MinesweeperAI(3, 3, { rng: () => 0.99 });
    const result = autoplay(game, { ai });

    expect(result.status).toBe(GameStatus.Won);
    expect(result.guesses).toBe(1);
    expect(result.flagged).toBe(1);
    expect(result.moves[0]).toEqual({ row: 2, col: 2 });
    expect(result.moves.some((m) => m.row === 0 && m.col === 0)).toBe(false);
  });

  it("loses when a guess lands on a mine", () => {
    const game = new Game({ height: 2, width: 2 }, [{ row: 0, col: 0 }]);
    const ai = new MinesweeperAI(2, 2, { rng: () => 0 });
    const result = autoplay(game, { ai });

    expect(result.status).toBe(GameStatus.Lost);
    expect(result.moves).toEqual([{ row: 0, col: 0 }]);
    expect(result.guesses).toBe(1);
  });

  it("stops after maxMoves", () => {
    const game = new Game({ height: 5, width: 5 }, [{ row: 0, col: 0 }]);
    const ai = new MinesweeperAI(5, 5, { rng: () => 0.99 });
    const result = autoplay(game, { ai, maxMoves: 1 });

    expect(result.moves).toEqual([{ row: 4, col: 4 }]);
    expect(result.status).toBe(GameStatus.Playing);
  });

  it("returns immediately on a board that is already won", () => {
    const game = new Game({ height: 2, width: 2 }, []);
    const result = autoplay(game);
    expect(result).toEqual({ status: GameStatus.Won, moves: [], guesses: 0, flagged: 0 });
  });

  for (const seed of [1, 8, 64]) {
    it(`only ever flags real mines (seed ${seed})`, () => {
      const game = new Game({ height: 8, width: 8, mines: 8, seed });
      const result = autoplay(game, { engine: { seed } });

      expect([GameStatus.Won, GameStatus.Lost]).toContain(result.status);
      for (const key of game.flagged) expect(game.mines.has(key)).toBe(true);
      const opened = result.moves.map(posKey);
      expect(new Set(opened).size).toBe(opened.length);
    });
  }
});
