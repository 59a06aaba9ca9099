export interface Pos {
  row: number;
  col: number;
}

export interface GameConfig {
  height: number;
  width: number;
  mines: number;
  seed: number;
}

export interface Cell {
  mine: boolean;
  opened: boolean;
  flagged: boolean;
  hint: number; // mines among the up-to-8 neighbours
}

export enum GameStatus {
  Playing = "playing",
  Won = "won",
  Lost = "lost",
}

export interface EngineLogger {
  debug(message: string): void;
}

export interface EngineOptions {
  // Read from the clock when the engine is created if omitted
  seed?: number;
  // Overrides the seeded generator, e.g. to script move choices in tests
  rng?: () => number;
  verbose: boolean;
  logger: EngineLogger;
}

// No default seed: each Game reads the clock when it is created
export const DEFAULT_CONFIG: Omit<GameConfig, "seed"> = {
  height: 8,
  width: 8,
  mines: 8,
};

export const DEFAULT_ENGINE_OPTIONS: EngineOptions = {
  verbose: false,
  logger: console,
};
