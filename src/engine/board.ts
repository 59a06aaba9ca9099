import type { Cell, GameConfig, Pos } from "./types";
import { createRng, shuffle } from "./rng";
import { ConfigurationError } from "./errors";

export function posKey(pos: Pos): string {
  return `${pos.row},${pos.col}`;
}

export function parsePosKey(key: string): Pos {
  const [row, col] = key.split(",").map(Number);
  return { row, col };
}

export function inBounds(pos: Pos, rows: number, cols: number): boolean {
  return pos.row >= 0 && pos.row < rows && pos.col >= 0 && pos.col < cols;
}

// Chebyshev distance 1, clipped to the board, excluding the cell itself
export function neighbours(row: number, col: number, rows: number, cols: number): Pos[] {
  const result: Pos[] = [];
  for (let dr = -1; dr <= 1; dr++) {
    for (let dc = -1; dc <= 1; dc++) {
      if (dr === 0 && dc === 0) continue;
      const r = row + dr;
      const c = col + dc;
      if (r >= 0 && r < rows && c >= 0 && c < cols) {
        result.push({ row: r, col: c });
      }
    }
  }
  return result;
}

export function createEmptyGrid(rows: number, cols: number): Cell[][] {
  const grid: Cell[][] = [];
  for (let r = 0; r < rows; r++) {
    const row: Cell[] = [];
    for (let c = 0; c < cols; c++) {
      row.push({ mine: false, opened: false, flagged: false, hint: 0 });
    }
    grid.push(row);
  }
  return grid;
}

export function validateConfig(config: GameConfig): void {
  const { height, width, mines } = config;
  if (!Number.isInteger(height) || !Number.isInteger(width) || height < 1 || width < 1) {
    throw new ConfigurationError(`Board must be at least 1x1, got ${height}x${width}.`);
  }
  if (!Number.isInteger(mines) || mines < 0 || mines > height * width) {
    throw new ConfigurationError(
      `Mine count ${mines} does not fit a ${height}x${width} board.`,
    );
  }
}

// Places exactly config.mines mines on distinct cells
export function placeMines(grid: Cell[][], config: GameConfig): Pos[] {
  const { height, width, mines, seed } = config;
  const cells: Pos[] = [];
  for (let r = 0; r < height; r++) {
    for (let c = 0; c < width; c++) cells.push({ row: r, col: c });
  }

  const placed = shuffle(cells, createRng(seed)).slice(0, mines);
  for (const p of placed) grid[p.row][p.col].mine = true;
  return placed;
}

export function computeHints(grid: Cell[][], rows: number, cols: number): void {
  for (let r = 0; r < rows; r++) {
    for (let c = 0; c < cols; c++) {
      let sum = 0;
      for (const n of neighbours(r, c, rows, cols)) {
        if (grid[n.row][n.col].mine) sum++;
      }
      grid[r][c].hint = sum;
    }
  }
}
