/**
 * Base error class for the minesweeper engine.
 */
export class MinesweeperError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "MinesweeperError";
  }
}

/**
 * Thrown when a game or CLI configuration is invalid (e.g. more mines than cells).
 */
export class ConfigurationError extends MinesweeperError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/**
 * Thrown when the knowledge base reaches a state that cannot exist for a
 * consistent board, such as a constraint counting more mines than cells.
 * This is a logic bug in the caller or the engine; nothing catches it.
 */
export class InvariantError extends MinesweeperError {
  constructor(message: string) {
    super(message);
    this.name = "InvariantError";
  }
}
