/**
 * EndgameMoveOrderer - One-ply probe ordering for alpha-beta
 *
 * Each candidate is played, classified (mate, check, capture, castle, and
 * centralization for the defending king) and taken back. Ordering never
 * changes a search value; it only decides how early cutoffs happen and which
 * of several equally scored moves is met first.
 */

import { centerDistance, isCaptureMove, isCastleMove, opponent, withMove } from './EndgamePosition.js';
import type { Color, Move, RulesPosition } from './types.js';

/** Probe scores */
export interface OrderingWeights {
  checkmate: number;
  check: number;
  capture: number;
  castle: number;
  /** Defending king: base bonus before the 3-per-step center distance penalty */
  defenderCentralization: number;
}

export const DEFAULT_ORDERING_WEIGHTS: OrderingWeights = {
  checkmate: 10000,
  check: 50,
  capture: 30,
  castle: 40,
  defenderCentralization: 15,
};

export class EndgameMoveOrderer {
  private defender: Color;
  private weights: OrderingWeights;
  private probes = 0;

  /**
   * @param attacker - Rook owner; the other king gets the centralization term
   */
  constructor(attacker: Color, weights: Partial<OrderingWeights> = {}) {
    this.defender = opponent(attacker);
    this.weights = { ...DEFAULT_ORDERING_WEIGHTS, ...weights };
  }

  /**
   * Probe score of a single move (position is restored before returning)
   */
  scoreMove(position: RulesPosition, move: Move): number {
    this.probes++;

    return withMove(position, move, () => {
      let score = 0;

      if (position.isCheckmate()) {
        score = this.weights.checkmate;
      } else if (position.isCheck()) {
        score = this.weights.check;
      } else if (isCaptureMove(move)) {
        score = this.weights.capture;
      }

      if (isCastleMove(move)) {
        score += this.weights.castle;
      }

      if (move.piece === 'k' && move.color === this.defender) {
        score += this.weights.defenderCentralization - centerDistance(move.to) * 3;
      }

      return score;
    });
  }

  /**
   * Order moves: descending probe score for the maximizing side,
   * ascending for the minimizing side. Equal scores keep generation order.
   */
  order(position: RulesPosition, moves: Move[], maximizing: boolean): Move[] {
    const scored = moves.map(move => ({ move, score: this.scoreMove(position, move) }));
    scored.sort((a, b) => (maximizing ? b.score - a.score : a.score - b.score));
    return scored.map(s => s.move);
  }

  /** Number of probes since construction or the last reset */
  getProbeCount(): number {
    return this.probes;
  }

  resetProbeCount(): void {
    this.probes = 0;
  }
}
