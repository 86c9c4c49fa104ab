export { Game } from "./game";
export {
  createEmptyGrid,
  placeMines,
  computeHints,
  neighbours,
  validateConfig,
} from "./board";
export { createRng, shuffle, pickRandom } from "./rng";
export type { Rng } from "./rng";
export type {
  GameConfig,
  Cell,
  CellView,
  Minefield,
  Pos,
} from "./types";
export { GameStatus, DEFAULT_CONFIG, posKey } from "./types";
export { CellSet } from "./cellset";
export type { ReadonlyCellSet } from "./cellset";
export { Constraint } from "./constraint";
export {
  InferenceEngine,
  DEFAULT_ENGINE_CONFIG,
  describeKnowledge,
} from "./inference";
export type { EngineConfig, KnowledgeUpdate } from "./inference";
export { autoplay } from "./autoplay";
export type { AutoplayOptions, AutoplayResult, MoveRecord } from "./autoplay";
export { formatMinefield, formatBoard } from "./render";
export { MinesweeperError, ConfigurationError, InvariantError } from "./errors";
