/**
 * EndgameDeepening - Iterative deepening under a soft time budget
 *
 * Searches depth 1, 2, ... maxDepth and keeps the last completed depth's
 * move. The clock is only read between depths: a depth that has started
 * always finishes, so the budget can be overrun by one iteration.
 */

import { EndgameCache } from './EndgameCache.js';
import type { EndgameEvaluator } from './EndgameEvaluator.js';
import { EndgameMoveOrderer } from './EndgameMoveOrderer.js';
import { withMove } from './EndgamePosition.js';
import { EndgameSearch } from './EndgameSearch.js';
import { ConfigError } from './errors.js';
import {
  DEFAULT_SEARCH_CONFIG,
  INFINITY,
  type IterationRecord,
  MATE_SCORE,
  type Move,
  type RulesPosition,
  type SearchConfig,
  type SearchResult,
} from './types.js';

export type IterationCallback = (record: IterationRecord) => void;

export class EndgameDeepening {
  private config: SearchConfig;
  private evaluator: EndgameEvaluator;
  private onIteration?: IterationCallback;

  constructor(evaluator: EndgameEvaluator, config?: Partial<SearchConfig>, onIteration?: IterationCallback) {
    this.evaluator = evaluator;
    this.config = { ...DEFAULT_SEARCH_CONFIG, ...config };
    this.onIteration = onIteration;
  }

  /**
   * Pick a move for the side to move
   * @param maxDepth - Deepest iteration (default from config)
   * @param timeBudgetMs - Soft budget checked after each completed depth
   * @throws ConfigError when maxDepth is not a positive integer
   */
  chooseMove(
    position: RulesPosition,
    maxDepth: number = this.config.maxDepth,
    timeBudgetMs: number = this.config.timeBudgetMs
  ): SearchResult {
    if (!Number.isInteger(maxDepth) || maxDepth < 1) {
      throw new ConfigError([`maxDepth: expected a positive integer, got ${maxDepth}`]);
    }

    const startTime = Date.now();
    const profile = this.evaluator.getProfile().name;
    const legalMoves = position.legalMoves();

    if (legalMoves.length === 0) {
      return {
        bestMove: null,
        score: this.evaluator.evaluate(position),
        depth: 0,
        nodes: 0,
        evaluations: 1,
        betaCutoffs: 0,
        cacheHits: 0,
        time: Date.now() - startTime,
        fastPath: false,
        iterations: [],
        profile,
      };
    }

    // Immediate mate needs no search
    if (this.config.useMateFastPath) {
      const mating = this.findMateInOne(position, legalMoves);
      if (mating) {
        const score = mating.color === 'w' ? MATE_SCORE : -MATE_SCORE;
        const time = Date.now() - startTime;
        return {
          bestMove: mating,
          score,
          depth: 1,
          nodes: legalMoves.length,
          evaluations: 0,
          betaCutoffs: 0,
          cacheHits: 0,
          time,
          fastPath: true,
          iterations: [{ depth: 1, bestMove: mating, score, nodes: legalMoves.length, time }],
          profile,
        };
      }
    }

    const search = new EndgameSearch(this.evaluator, {
      orderer: this.config.useMoveOrdering
        ? new EndgameMoveOrderer(this.evaluator.getProfile().attacker)
        : null,
      cache: this.config.useTranspositionCache ? new EndgameCache(this.config.cacheCapacity) : null,
    });
    const maximizing = position.turn() === 'w';
    const iterations: IterationRecord[] = [];

    for (let depth = 1; depth <= maxDepth; depth++) {
      const nodesBefore = search.getStats().nodes;
      const result = search.search(position, depth, -INFINITY, INFINITY, maximizing);

      const record: IterationRecord = {
        depth,
        bestMove: result.move,
        score: result.score,
        nodes: search.getStats().nodes - nodesBefore,
        time: Date.now() - startTime,
      };
      iterations.push(record);
      this.onIteration?.(record);

      if (position.isGameOver()) break;
      if (Math.abs(result.score) >= MATE_SCORE) break;
      if (Date.now() - startTime >= timeBudgetMs) break;
    }

    const last = iterations[iterations.length - 1];
    const stats = search.getStats();

    return {
      bestMove: last.bestMove,
      score: last.score,
      depth: last.depth,
      nodes: stats.nodes,
      evaluations: stats.evaluations,
      betaCutoffs: stats.betaCutoffs,
      cacheHits: stats.cacheHits,
      time: Date.now() - startTime,
      fastPath: false,
      iterations,
      profile,
    };
  }

  private findMateInOne(position: RulesPosition, moves: Move[]): Move | null {
    for (const move of moves) {
      if (withMove(position, move, () => position.isCheckmate())) {
        return move;
      }
    }
    return null;
  }

  getConfig(): SearchConfig {
    return { ...this.config };
  }

  setConfig(config: Partial<SearchConfig>): void {
    this.config = { ...this.config, ...config };
  }
}
