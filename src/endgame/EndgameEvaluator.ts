/**
 * EndgameEvaluator - Static scoring of king + rook vs. king positions
 *
 * Encodes the mating technique as a handful of weighted terms:
 * - Edge confinement of the defending king
 * - Rook on the defending king's file/rank, out of its reach
 * - King opposition (and a penalty for premature contact)
 * - Rook centrality
 * - Check
 *
 * Terms are measured from the attacker's side and the total is reported from
 * White's perspective (positive = White advantage), so a Black-rook profile
 * negates its sum. Terminal positions override everything.
 */

import { z } from 'zod';
import {
  edgeDistance,
  kingDistance,
  opponent,
  sameFileOrRank,
  squareToCoords,
} from './EndgamePosition.js';
import { ConfigError } from './errors.js';
import {
  type Color,
  DRAW_SCORE,
  type EvaluationBreakdown,
  type EvaluatorProfile,
  type EvaluatorWeights,
  MATE_SCORE,
  type RulesPosition,
  type Score,
  type TerminalKind,
} from './types.js';

// =============================================================================
// Profiles
// =============================================================================

/** White holds the rook and tries to mate */
export const WHITE_ROOK_PROFILE: EvaluatorProfile = {
  name: 'white-rook',
  attacker: 'w',
  weights: {
    edge: 10,
    rookAligned: 10,
    rookSafe: 15,
    kingsAdjacent: 20,
    opposition: 25,
    rookCentrality: 2,
    check: 15,
  },
};

/** Black holds the rook and tries to mate */
export const BLACK_ROOK_PROFILE: EvaluatorProfile = {
  name: 'black-rook',
  attacker: 'b',
  weights: {
    edge: 15,
    rookAligned: 20,
    rookSafe: 10,
    kingsAdjacent: 30,
    opposition: 25,
    rookCentrality: 1,
    check: 50,
  },
};

const weightSchema = z.number().int().nonnegative();

export const EvaluatorWeightsSchema = z.object({
  edge: weightSchema,
  rookAligned: weightSchema,
  rookSafe: weightSchema,
  kingsAdjacent: weightSchema,
  opposition: weightSchema,
  rookCentrality: weightSchema,
  check: weightSchema,
});

/**
 * Largest absolute heuristic total the weights can produce
 */
export function maxHeuristicMagnitude(weights: EvaluatorWeights): number {
  return (
    weights.edge * 4 +
    weights.rookAligned +
    weights.rookSafe +
    Math.max(weights.kingsAdjacent, weights.opposition) +
    weights.rookCentrality * 7 +
    weights.check
  );
}

/**
 * Validate a profile's weights
 * @throws ConfigError when a weight is not a non-negative integer or the
 * heuristic range reaches half the mate sentinel
 */
export function validateProfile(profile: EvaluatorProfile): EvaluatorProfile {
  const parsed = EvaluatorWeightsSchema.safeParse(profile.weights);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(issue => `weights.${issue.path.join('.')}: ${issue.message}`),
    );
  }

  const magnitude = maxHeuristicMagnitude(parsed.data);
  if (magnitude >= MATE_SCORE / 2) {
    throw new ConfigError([
      `weights: heuristic range ${magnitude} must stay below ${MATE_SCORE / 2}`,
    ]);
  }

  return { ...profile, weights: parsed.data };
}

/**
 * Preset matching the rook owner; White when nobody has a rook
 */
export function detectProfile(position: RulesPosition): EvaluatorProfile {
  const rook = position.pieces().find(p => p.type === 'r');
  return rook?.color === 'b' ? BLACK_ROOK_PROFILE : WHITE_ROOK_PROFILE;
}

// =============================================================================
// EndgameEvaluator Class
// =============================================================================

export class EndgameEvaluator {
  private profile: EvaluatorProfile;

  constructor(profile: EvaluatorProfile = WHITE_ROOK_PROFILE) {
    this.profile = validateProfile(profile);
  }

  /**
   * Evaluate a position, White-relative
   */
  evaluate(position: RulesPosition): Score {
    const terminal = this.classifyTerminal(position);
    if (terminal) {
      return this.terminalScore(terminal, position.turn());
    }

    const terms = this.computeTerms(position);
    if (!terms) return DRAW_SCORE;

    const sum =
      terms.edgeConfinement +
      terms.rookAlignment +
      terms.kingProximity +
      terms.rookCentrality +
      terms.checkBonus;
    return this.fromAttacker(sum);
  }

  /**
   * Evaluation with each term listed
   */
  evaluateBreakdown(position: RulesPosition): EvaluationBreakdown {
    const terminal = this.classifyTerminal(position);
    const terms = terminal ? null : this.computeTerms(position);

    return {
      edgeConfinement: terms?.edgeConfinement ?? 0,
      rookAlignment: terms?.rookAlignment ?? 0,
      kingProximity: terms?.kingProximity ?? 0,
      rookCentrality: terms?.rookCentrality ?? 0,
      checkBonus: terms?.checkBonus ?? 0,
      total: this.evaluate(position),
      terminal,
    };
  }

  getProfile(): EvaluatorProfile {
    return this.profile;
  }

  setProfile(profile: EvaluatorProfile): void {
    this.profile = validateProfile(profile);
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private classifyTerminal(position: RulesPosition): TerminalKind | null {
    if (position.isCheckmate()) return 'checkmate';
    if (position.isStalemate()) return 'stalemate';
    if (position.isInsufficientMaterial() || position.isDrawClaimable()) return 'draw';
    return null;
  }

  /** The mated side is the side to move */
  private terminalScore(kind: TerminalKind, turn: Color): Score {
    if (kind === 'checkmate') {
      return turn === 'b' ? MATE_SCORE : -MATE_SCORE;
    }
    return DRAW_SCORE;
  }

  private fromAttacker(score: number): Score {
    // `+ 0` keeps -0 out of results
    return (this.profile.attacker === 'w' ? score : -score) + 0;
  }

  private computeTerms(position: RulesPosition): Omit<EvaluationBreakdown, 'total' | 'terminal'> | null {
    const { attacker, weights } = this.profile;
    const defender = opponent(attacker);

    const attackerKing = position.kingSquare(attacker);
    const defenderKing = position.kingSquare(defender);
    const rook = position.pieces(attacker).find(p => p.type === 'r');
    if (!attackerKing || !defenderKing || !rook) return null;

    // 1. Drive the defending king to the edge
    const edgeConfinement = (4 - edgeDistance(defenderKing)) * weights.edge;

    // 2. Rook cutting the king off along a line, out of its reach
    let rookAlignment = 0;
    if (sameFileOrRank(rook.square, defenderKing)) {
      rookAlignment += weights.rookAligned;
      if (kingDistance(rook.square, defenderKing) > 1) {
        rookAlignment += weights.rookSafe;
      }
    }

    // 3. Opposition
    let kingProximity = 0;
    const kings = kingDistance(attackerKing, defenderKing);
    if (kings <= 1) {
      kingProximity -= weights.kingsAdjacent;
    } else if (kings === 2 && sameFileOrRank(attackerKing, defenderKing)) {
      kingProximity += weights.opposition;
    }

    // 4. Rook centrality (integer: the two half-steps always add up)
    const { file, rank } = squareToCoords(rook.square);
    const centrality = (3.5 - Math.abs(file - 3.5)) + (3.5 - Math.abs(rank - 3.5));
    const rookCentrality = centrality * weights.rookCentrality;

    // 5. Check
    const checkBonus = position.isCheck() ? weights.check : 0;

    return { edgeConfinement, rookAlignment, kingProximity, rookCentrality, checkBonus };
  }
}

/**
 * Create a new evaluator instance
 */
export function createEndgameEvaluator(profile?: EvaluatorProfile): EndgameEvaluator {
  return new EndgameEvaluator(profile);
}

/**
 * Quick evaluation without keeping an evaluator around
 */
export function quickEvaluate(position: RulesPosition, profile?: EvaluatorProfile): Score {
  return new EndgameEvaluator(profile ?? detectProfile(position)).evaluate(position);
}
