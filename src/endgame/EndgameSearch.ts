/**
 * EndgameSearch - Depth-bounded minimax with alpha-beta pruning
 *
 * - White maximizes, Black minimizes; scores are White-relative
 * - Children ordered by the one-ply probe orderer
 * - Optional per-decision transposition cache with bound-aware probes
 * - Strict-improvement updates: the earliest of equally scored moves wins
 *
 * The position is borrowed, never copied. Every applied move is undone in a
 * `finally`, so the board comes back unchanged on cutoffs and on errors.
 */

import type { EndgameCache } from './EndgameCache.js';
import type { EndgameEvaluator } from './EndgameEvaluator.js';
import type { EndgameMoveOrderer } from './EndgameMoveOrderer.js';
import { withMove } from './EndgamePosition.js';
import {
  type CacheBound,
  INFINITY,
  type Move,
  type NodeResult,
  type RulesPosition,
  type Score,
  type SearchStats,
} from './types.js';

export interface EndgameSearchOptions {
  /** Child ordering; null searches in generation order */
  orderer?: EndgameMoveOrderer | null;
  /** Transposition cache; null disables caching */
  cache?: EndgameCache | null;
}

export class EndgameSearch {
  private evaluator: EndgameEvaluator;
  private orderer: EndgameMoveOrderer | null;
  private cache: EndgameCache | null;
  private stats: SearchStats = this.initStats();

  constructor(evaluator: EndgameEvaluator, options: EndgameSearchOptions = {}) {
    this.evaluator = evaluator;
    this.orderer = options.orderer ?? null;
    this.cache = options.cache ?? null;
  }

  /**
   * Search `depth` plies below `position`
   * @param maximizing - true when the side to move is White
   * @returns best score and the move reaching it (null at leaves and terminal nodes)
   */
  search(
    position: RulesPosition,
    depth: number,
    alpha: Score = -INFINITY,
    beta: Score = INFINITY,
    maximizing: boolean = position.turn() === 'w'
  ): NodeResult {
    return this.alphaBeta(position, depth, alpha, beta, maximizing, 0);
  }

  private alphaBeta(
    position: RulesPosition,
    depth: number,
    alpha: Score,
    beta: Score,
    maximizing: boolean,
    ply: number
  ): NodeResult {
    this.stats.nodes++;

    // The root always searches so that it can report a move
    const key = this.cache && ply > 0 && depth > 0 ? position.key() : null;
    if (key !== null && this.cache) {
      const cached = this.cache.lookup(key, depth, alpha, beta);
      if (cached !== null) {
        this.stats.cacheHits++;
        return { score: cached, move: null };
      }
    }

    // A root drawn by rule (repetition, fifty moves) still gets a move
    if (depth <= 0 || (ply > 0 && position.isGameOver())) {
      this.stats.evaluations++;
      return { score: this.evaluator.evaluate(position), move: null };
    }

    const legal = position.legalMoves();
    if (legal.length === 0) {
      this.stats.evaluations++;
      return { score: this.evaluator.evaluate(position), move: null };
    }

    const moves = this.orderer ? this.orderer.order(position, legal, maximizing) : legal;
    const origAlpha = alpha;
    const origBeta = beta;
    let bestScore = maximizing ? -INFINITY : INFINITY;
    let bestMove: Move | null = null;

    for (const move of moves) {
      const { score } = withMove(position, move, () =>
        this.alphaBeta(position, depth - 1, alpha, beta, !maximizing, ply + 1)
      );

      if (maximizing) {
        if (score > bestScore) {
          bestScore = score;
          bestMove = move;
        }
        alpha = Math.max(alpha, score);
      } else {
        if (score < bestScore) {
          bestScore = score;
          bestMove = move;
        }
        beta = Math.min(beta, score);
      }

      if (beta <= alpha) {
        this.stats.betaCutoffs++;
        break;
      }
    }

    if (key !== null && this.cache) {
      let bound: CacheBound;
      if (bestScore <= origAlpha) {
        bound = 'upper';
      } else if (bestScore >= origBeta) {
        bound = 'lower';
      } else {
        bound = 'exact';
      }
      this.cache.store(key, depth, bestScore, bound);
    }

    return { score: bestScore, move: bestMove };
  }

  /**
   * Initialize search statistics
   */
  private initStats(): SearchStats {
    return {
      nodes: 0,
      evaluations: 0,
      betaCutoffs: 0,
      cacheHits: 0,
    };
  }

  getStats(): SearchStats {
    return { ...this.stats };
  }

  resetStats(): void {
    this.stats = this.initStats();
  }

  /** Swap the cache (a fresh one per decision) */
  setCache(cache: EndgameCache | null): void {
    this.cache = cache;
  }

  getCache(): EndgameCache | null {
    return this.cache;
  }

  getEvaluator(): EndgameEvaluator {
    return this.evaluator;
  }
}

/**
 * Create a new search instance
 */
export function createEndgameSearch(
  evaluator: EndgameEvaluator,
  options?: EndgameSearchOptions
): EndgameSearch {
  return new EndgameSearch(evaluator, options);
}
