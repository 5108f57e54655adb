/**
 * Endgame Module Type Definitions
 *
 * Types for the king + rook vs. king search engine. Piece, square and move
 * shapes follow chess.js conventions so the rules adapter can pass values
 * through without translation.
 *
 * Score convention: every Score is from White's perspective (positive = good
 * for White) and White is always the maximizing side.
 */

// =============================================================================
// Core Chess Types
// =============================================================================

/** Chess piece colors */
export type Color = 'w' | 'b';

/** Chess piece types (lowercase) */
export type PieceType = 'p' | 'n' | 'b' | 'r' | 'q' | 'k';

/** File letter */
export type File = (typeof FILES)[number];

/** Rank digit */
export type Rank = (typeof RANKS)[number];

/** Square notation (a1-h8) */
export type Square = `${File}${Rank}`;

/** A piece on the board */
export interface Piece {
  type: PieceType;
  color: Color;
}

/** A piece with its position */
export interface PieceOnBoard extends Piece {
  square: Square;
}

/** Signed evaluation, White-relative */
export type Score = number;

// =============================================================================
// Move Representation
// =============================================================================

/** Input format for making moves */
export interface MoveInput {
  from: Square;
  to: Square;
  promotion?: PieceType;
}

/** Full move information (from chess.js verbose mode) */
export interface Move {
  /** Source square */
  from: Square;
  /** Target square */
  to: Square;
  /** Standard Algebraic Notation (e.g., "Rh8#") */
  san: string;
  /** Long Algebraic Notation (e.g., "h1h8") */
  lan: string;
  /** Piece type that moved */
  piece: PieceType;
  /** Piece type captured (if any) */
  captured?: PieceType;
  /** Piece type promoted to (if pawn promotion) */
  promotion?: PieceType;
  /** chess.js move flags: c/e capture, k/q castle, n normal, b double push, p promotion */
  flags: string;
  /** Color of the player who made the move */
  color: Color;
}

// =============================================================================
// Rules Collaborator
// =============================================================================

/** Game termination reasons */
export type GameEndReason =
  | 'checkmate'
  | 'stalemate'
  | 'insufficient_material'
  | 'threefold_repetition'
  | 'fifty_move_rule';

/**
 * The rules-engine surface the search consumes.
 *
 * Implementations must make `apply` followed by `undo` restore every piece of
 * state, including castling rights, en passant and repetition history.
 */
export interface RulesPosition {
  turn(): Color;
  legalMoves(): Move[];
  /** Throws IllegalMoveError when the move is not legal here */
  apply(move: MoveInput | Move): void;
  undo(): void;
  isCheck(): boolean;
  isCheckmate(): boolean;
  isStalemate(): boolean;
  isInsufficientMaterial(): boolean;
  /** Threefold repetition or fifty-move rule */
  isDrawClaimable(): boolean;
  isGameOver(): boolean;
  pieceAt(square: Square): Piece | null;
  kingSquare(color: Color): Square | null;
  pieces(color?: Color): PieceOnBoard[];
  /** Placement, side to move, castling rights and en passant */
  key(): string;
  fen(): string;
}

// =============================================================================
// Evaluation Types
// =============================================================================

/** Tunable weights; the set of terms is fixed */
export interface EvaluatorWeights {
  /** Per step of the defending king towards the edge */
  edge: number;
  /** Rook on the defending king's file or rank */
  rookAligned: number;
  /** Extra when the aligned rook is out of the defending king's reach */
  rookSafe: number;
  /** Penalty when the kings stand next to each other */
  kingsAdjacent: number;
  /** Kings two squares apart on a shared file or rank */
  opposition: number;
  /** Per unit of rook centrality (1..7) */
  rookCentrality: number;
  /** Side to move is in check */
  check: number;
}

/** Evaluator profile: which color owns the rook, and how terms are weighted */
export interface EvaluatorProfile {
  name: string;
  /** Color holding the rook (the side trying to mate) */
  attacker: Color;
  weights: EvaluatorWeights;
}

/** Profile selection for the AI controller */
export type ProfileChoice = 'white-rook' | 'black-rook' | 'auto';

/** Terminal classification used in breakdowns */
export type TerminalKind = 'checkmate' | 'stalemate' | 'draw';

/** Position evaluation breakdown (attacker-relative terms, White-relative total) */
export interface EvaluationBreakdown {
  edgeConfinement: number;
  rookAlignment: number;
  kingProximity: number;
  rookCentrality: number;
  checkBonus: number;
  /** White-relative total, equal to evaluate() */
  total: Score;
  terminal: TerminalKind | null;
}

// =============================================================================
// Search Types
// =============================================================================

/** How a cached score relates to the true value */
export type CacheBound = 'exact' | 'lower' | 'upper';

/** Transposition cache entry */
export interface CacheEntry {
  score: Score;
  depth: number;
  bound: CacheBound;
}

/** Cache counters */
export interface CacheStats {
  size: number;
  hits: number;
  misses: number;
  stores: number;
  evictions: number;
}

/** Search statistics */
export interface SearchStats {
  /** Interior and leaf nodes visited */
  nodes: number;
  /** Evaluator calls */
  evaluations: number;
  /** Sibling loops cut short by alpha-beta */
  betaCutoffs: number;
  /** Nodes answered from the transposition cache */
  cacheHits: number;
}

/** Result of one fixed-depth search call */
export interface NodeResult {
  score: Score;
  move: Move | null;
}

/** One completed iterative-deepening level */
export interface IterationRecord {
  depth: number;
  bestMove: Move | null;
  score: Score;
  nodes: number;
  time: number;
}

/** Search result returned to callers (diagnostics beyond bestMove) */
export interface SearchResult {
  bestMove: Move | null;
  score: Score;
  /** Deepest fully completed depth (0 for the mate fast path or no moves) */
  depth: number;
  nodes: number;
  evaluations: number;
  betaCutoffs: number;
  cacheHits: number;
  /** Elapsed wall-clock time in ms */
  time: number;
  /** Mate-in-one found without searching */
  fastPath: boolean;
  iterations: IterationRecord[];
  profile: string;
}

/** Chess search configuration */
export interface SearchConfig {
  /** Maximum iterative-deepening depth */
  maxDepth: number;
  /** Soft time budget in ms, checked between depths */
  timeBudgetMs: number;
  /** Order children with the one-ply probe */
  useMoveOrdering: boolean;
  /** Use a per-decision transposition cache */
  useTranspositionCache: boolean;
  /** Maximum cache entries before eviction */
  cacheCapacity: number;
  /** Return a mating move before searching */
  useMateFastPath: boolean;
}

// =============================================================================
// AI Types
// =============================================================================

/** AI controller configuration */
export interface EndgameAIConfig {
  /** AI name/identifier used in log lines */
  name: string;
  maxDepth: number;
  timeBudgetMs: number;
  profile: ProfileChoice;
  /** Replace preset weights (merged over the chosen preset) */
  weights?: Partial<EvaluatorWeights>;
  useTranspositionCache: boolean;
  cacheCapacity: number;
  verbose: boolean;
}

// =============================================================================
// Constants
// =============================================================================

/** Score of a delivered checkmate (White-relative sign applied by the evaluator) */
export const MATE_SCORE = 10000;

/** Score of any drawn position, stalemate included */
export const DRAW_SCORE = 0;

/** Search window bound, strictly beyond the mate sentinel */
export const INFINITY = 100000;

/** File letters */
export const FILES = ['a', 'b', 'c', 'd', 'e', 'f', 'g', 'h'] as const;

/** Rank numbers */
export const RANKS = ['1', '2', '3', '4', '5', '6', '7', '8'] as const;

/** Default search configuration */
export const DEFAULT_SEARCH_CONFIG: SearchConfig = {
  maxDepth: 3,
  timeBudgetMs: 2000,
  useMoveOrdering: true,
  useTranspositionCache: true,
  cacheCapacity: 200_000,
  useMateFastPath: true,
};

/** Default AI configuration */
export const DEFAULT_ENDGAME_AI_CONFIG: EndgameAIConfig = {
  name: 'RookEndgame',
  maxDepth: 3,
  timeBudgetMs: 2000,
  profile: 'auto',
  useTranspositionCache: true,
  cacheCapacity: 200_000,
  verbose: false,
};
