export { Game } from "./game";
export { Sentence } from "./sentence";
export { MinesweeperAI } from "./knowledge";
export { autoplay } from "./autoplay";
export type { AutoplayOptions, AutoplayResult } from "./autoplay";
export {
  createEmptyGrid,
  placeMines,
  computeHints,
  neighbours,
  inBounds,
  posKey,
  parsePosKey,
  validateConfig,
} from "./board";
export { createRng, shuffle, pickRandom } from "./rng";
export type {
  GameConfig,
  Cell,
  Pos,
  EngineOptions,
  EngineLogger,
} from "./types";
export { GameStatus, DEFAULT_CONFIG, DEFAULT_ENGINE_OPTIONS } from "./types";
export {
  MinesweeperError,
  ConfigurationError,
  ObservationError,
  InvariantError,
} from "./errors";
