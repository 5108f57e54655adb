/**
 * EndgameAI - Public entry point for the game loop
 *
 * Chooses the evaluator profile (which side holds the rook), runs iterative
 * deepening with a fresh transposition cache per decision and checks that
 * the borrowed position comes back untouched.
 *
 * EndgameMatch plays a position out with an engine (or a caller-supplied
 * move function) on each side.
 */

import { EndgameDeepening } from './EndgameDeepening.js';
import {
  BLACK_ROOK_PROFILE,
  EndgameEvaluator,
  WHITE_ROOK_PROFILE,
  detectProfile,
  validateProfile,
} from './EndgameEvaluator.js';
import type { EndgamePosition } from './EndgamePosition.js';
import { EngineInvariantError } from './errors.js';
import {
  type Color,
  DEFAULT_ENDGAME_AI_CONFIG,
  type EndgameAIConfig,
  type EvaluatorProfile,
  type GameEndReason,
  type IterationRecord,
  type Move,
  type RulesPosition,
  type Score,
  type SearchResult,
} from './types.js';

/**
 * Convert a White-relative score to the side to move's point of view
 */
export function scoreForSideToMove(score: Score, turn: Color): Score {
  return (turn === 'w' ? score : -score) + 0;
}

function sameMove(a: Move, b: Move): boolean {
  return a.from === b.from && a.to === b.to && a.promotion === b.promotion;
}

// =============================================================================
// EndgameAI Class
// =============================================================================

export class EndgameAI {
  private config: EndgameAIConfig;
  private lastResult: SearchResult | null = null;

  constructor(config?: Partial<EndgameAIConfig>) {
    this.config = { ...DEFAULT_ENDGAME_AI_CONFIG, ...config };

    // Surface bad weights at construction rather than mid-game
    if (this.config.profile !== 'auto') {
      this.resolveProfile(null);
    }
  }

  /**
   * Choose a move, or null when the side to move has none
   * @param maxDepth - Deepest search iteration (default from config)
   * @param timeBudgetMs - Soft budget, checked between iterations
   */
  chooseMove(position: RulesPosition, maxDepth?: number, timeBudgetMs?: number): Move | null {
    return this.analyze(position, maxDepth, timeBudgetMs).bestMove;
  }

  /**
   * Like chooseMove, with the full search diagnostics
   * @throws EngineInvariantError when the search leaves the position changed
   * or settles on a move that is not legal
   */
  analyze(position: RulesPosition, maxDepth?: number, timeBudgetMs?: number): SearchResult {
    const keyBefore = position.key();
    const profile = this.resolveProfile(position);
    const depth = maxDepth ?? this.config.maxDepth;
    const budget = timeBudgetMs ?? this.config.timeBudgetMs;

    if (!position.pieces(profile.attacker).some(p => p.type === 'r')) {
      console.warn(
        `[Endgame] ${this.config.name}: no ${profile.attacker === 'w' ? 'white' : 'black'} rook for the ` +
          `${profile.name} profile, heuristic scores will be 0`
      );
    }

    const deepening = new EndgameDeepening(
      new EndgameEvaluator(profile),
      {
        maxDepth: depth,
        timeBudgetMs: budget,
        useTranspositionCache: this.config.useTranspositionCache,
        cacheCapacity: this.config.cacheCapacity,
      },
      this.config.verbose ? record => this.logIteration(record) : undefined
    );

    const result = deepening.chooseMove(position, depth, budget);

    if (position.key() !== keyBefore) {
      throw new EngineInvariantError(
        `Search did not restore the position: expected "${keyBefore}", found "${position.key()}"`
      );
    }

    const chosen = result.bestMove;
    if (chosen && !position.legalMoves().some(m => sameMove(m, chosen))) {
      throw new EngineInvariantError(`Search chose "${chosen.san}", which is not legal in ${keyBefore}`);
    }

    if (this.config.verbose) {
      const move = chosen ? chosen.san : 'none';
      console.log(
        `[Endgame] ${this.config.name} (${result.profile}): ${move} ` +
          `score=${result.score} depth=${result.depth} nodes=${result.nodes} ` +
          `cutoffs=${result.betaCutoffs} cacheHits=${result.cacheHits} ${result.time}ms` +
          (result.fastPath ? ' [mate-in-one]' : '')
      );
    }

    this.lastResult = result;
    return result;
  }

  /**
   * Profile used for a position; `auto` follows the rook
   */
  resolveProfile(position: RulesPosition | null): EvaluatorProfile {
    let base: EvaluatorProfile;
    if (this.config.profile === 'white-rook') {
      base = WHITE_ROOK_PROFILE;
    } else if (this.config.profile === 'black-rook') {
      base = BLACK_ROOK_PROFILE;
    } else {
      base = position ? detectProfile(position) : WHITE_ROOK_PROFILE;
    }

    if (!this.config.weights) return base;
    return validateProfile({ ...base, weights: { ...base.weights, ...this.config.weights } });
  }

  getLastResult(): SearchResult | null {
    return this.lastResult;
  }

  getConfig(): EndgameAIConfig {
    return { ...this.config };
  }

  setConfig(config: Partial<EndgameAIConfig>): void {
    this.config = { ...this.config, ...config };
  }

  private logIteration(record: IterationRecord): void {
    const move = record.bestMove ? record.bestMove.san : 'none';
    console.log(
      `[Endgame] ${this.config.name} depth ${record.depth}: ${move} score=${record.score} ` +
        `nodes=${record.nodes} ${record.time}ms`
    );
  }
}

/**
 * Create a new endgame AI instance
 */
export function createEndgameAI(config?: Partial<EndgameAIConfig>): EndgameAI {
  return new EndgameAI(config);
}

// =============================================================================
// EndgameMatch Class
// =============================================================================

/** Anything that can pick a move for the side to move */
export type MoveProvider = (position: EndgamePosition) => Move | null;

export type MatchPlayer = EndgameAI | MoveProvider;

export interface MatchMove {
  san: string;
  color: Color;
  /** White-relative engine score, null for providers */
  score: Score | null;
  time: number;
}

export interface MatchRecord {
  result: '1-0' | '0-1' | '1/2-1/2' | '*';
  reason: GameEndReason | 'max_plies' | 'no_move';
  plies: number;
  moves: MatchMove[];
  finalFen: string;
}

export class EndgameMatch {
  private position: EndgamePosition;
  private white: MatchPlayer;
  private black: MatchPlayer;
  private moveHistory: MatchMove[] = [];
  private onMove?: (move: MatchMove, position: EndgamePosition) => void;
  private onGameEnd?: (record: MatchRecord) => void;

  constructor(position: EndgamePosition, white: MatchPlayer, black: MatchPlayer) {
    this.position = position;
    this.white = white;
    this.black = black;
  }

  /**
   * Set move callback
   */
  onMoveCallback(callback: (move: MatchMove, position: EndgamePosition) => void): void {
    this.onMove = callback;
  }

  /**
   * Set game end callback
   */
  onGameEndCallback(callback: (record: MatchRecord) => void): void {
    this.onGameEnd = callback;
  }

  /**
   * Play a single move; null once the game is over or the player passes
   */
  playMove(): MatchMove | null {
    if (this.position.isGameOver()) return null;

    const startTime = Date.now();
    const color = this.position.turn();
    const player = color === 'w' ? this.white : this.black;

    let move: Move | null;
    let score: Score | null = null;
    if (player instanceof EndgameAI) {
      const result = player.analyze(this.position);
      move = result.bestMove;
      score = result.score;
    } else {
      move = player(this.position);
    }
    if (!move) return null;

    this.position.apply(move);

    const played: MatchMove = { san: move.san, color, score, time: Date.now() - startTime };
    this.moveHistory.push(played);
    this.onMove?.(played, this.position);
    return played;
  }

  /**
   * Play until the game ends, a player passes, or maxPlies is reached
   */
  playGame(maxPlies: number = 100): MatchRecord {
    let reason: MatchRecord['reason'] = 'max_plies';

    while (this.moveHistory.length < maxPlies) {
      const end = this.position.getEndReason();
      if (end) {
        reason = end;
        break;
      }
      if (!this.playMove()) {
        reason = 'no_move';
        break;
      }
    }

    // The last move may have ended the game exactly at the ply limit
    const end = this.position.getEndReason();
    if (end) reason = end;

    const record: MatchRecord = {
      result: this.resultFor(reason),
      reason,
      plies: this.moveHistory.length,
      moves: [...this.moveHistory],
      finalFen: this.position.fen(),
    };
    this.onGameEnd?.(record);
    return record;
  }

  getMoveHistory(): MatchMove[] {
    return [...this.moveHistory];
  }

  getPosition(): EndgamePosition {
    return this.position;
  }

  private resultFor(reason: MatchRecord['reason']): MatchRecord['result'] {
    if (reason === 'checkmate') {
      // The mated side is the one to move
      return this.position.turn() === 'b' ? '1-0' : '0-1';
    }
    if (reason === 'max_plies' || reason === 'no_move') return '*';
    return '1/2-1/2';
  }
}

/**
 * Create a match between two players
 */
export function createEndgameMatch(
  position: EndgamePosition,
  white: MatchPlayer,
  black: MatchPlayer
): EndgameMatch {
  return new EndgameMatch(position, white, black);
}
