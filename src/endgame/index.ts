/**
 * Endgame Module
 *
 * King + rook vs. king move selection:
 * - chess.js adapter behind the RulesPosition interface
 * - Heuristic evaluator with White-rook and Black-rook profiles
 * - Minimax with alpha-beta pruning and probe-based move ordering
 * - Iterative deepening under a soft time budget
 * - Per-decision transposition cache
 *
 * @module endgame
 */

// Public entry point
export {
  EndgameAI,
  EndgameMatch,
  createEndgameAI,
  createEndgameMatch,
  scoreForSideToMove,
} from './EndgameAI.js';
export type { MatchMove, MatchPlayer, MatchRecord, MoveProvider } from './EndgameAI.js';

// Rules adapter and geometry
export {
  EndgamePosition,
  centerDistance,
  coordsToSquare,
  edgeDistance,
  fenFromPieces,
  isCaptureMove,
  isCastleMove,
  kingDistance,
  mirrorFen,
  opponent,
  sameFileOrRank,
  squareToCoords,
  withMove,
} from './EndgamePosition.js';
export type { RookEndgameSetup } from './EndgamePosition.js';

// Evaluation
export {
  BLACK_ROOK_PROFILE,
  EndgameEvaluator,
  EvaluatorWeightsSchema,
  WHITE_ROOK_PROFILE,
  createEndgameEvaluator,
  detectProfile,
  maxHeuristicMagnitude,
  quickEvaluate,
  validateProfile,
} from './EndgameEvaluator.js';

// Search
export { EndgameMoveOrderer, DEFAULT_ORDERING_WEIGHTS } from './EndgameMoveOrderer.js';
export type { OrderingWeights } from './EndgameMoveOrderer.js';
export { EndgameSearch, createEndgameSearch } from './EndgameSearch.js';
export type { EndgameSearchOptions } from './EndgameSearch.js';
export { EndgameDeepening } from './EndgameDeepening.js';
export type { IterationCallback } from './EndgameDeepening.js';
export { EndgameCache } from './EndgameCache.js';

// Configuration and errors
export { EndgameEnvSchema, loadEndgameConfig } from './config.js';
export type { EndgameEnv } from './config.js';
export {
  ConfigError,
  EndgameError,
  EngineInvariantError,
  IllegalMoveError,
  InvalidPositionError,
} from './errors.js';
export type { EndgameErrorCode } from './errors.js';

// Types
export type {
  CacheBound,
  CacheEntry,
  CacheStats,
  Color,
  EndgameAIConfig,
  EvaluationBreakdown,
  EvaluatorProfile,
  EvaluatorWeights,
  File,
  GameEndReason,
  IterationRecord,
  Move,
  MoveInput,
  NodeResult,
  Piece,
  PieceOnBoard,
  PieceType,
  ProfileChoice,
  Rank,
  RulesPosition,
  Score,
  SearchConfig,
  SearchResult,
  SearchStats,
  Square,
  TerminalKind,
} from './types.js';

// Constants
export {
  DEFAULT_ENDGAME_AI_CONFIG,
  DEFAULT_SEARCH_CONFIG,
  DRAW_SCORE,
  FILES,
  INFINITY,
  MATE_SCORE,
  RANKS,
} from './types.js';
