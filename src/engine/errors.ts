/**
 * Base error class for the Minesweeper agent.
 */
export class MinesweeperError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "MinesweeperError";
  }
}

/**
 * Thrown when a board or engine is created with invalid dimensions or mine totals.
 */
export class ConfigurationError extends MinesweeperError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/**
 * Thrown when an observation breaks the `addKnowledge` contract
 * (cell off the board, impossible neighbour count).
 */
export class ObservationError extends MinesweeperError {
  constructor(message: string) {
    super(message);
    this.name = "ObservationError";
  }
}

/**
 * Thrown when the knowledge base would become inconsistent, e.g. a sentence
 * count dropping below zero or a cell proven both safe and mined.
 */
export class InvariantError extends MinesweeperError {
  constructor(message: string) {
    super(message);
    this.name = "InvariantError";
  }
}
