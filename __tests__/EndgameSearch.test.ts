/**
 * Alpha-beta search tests
 *
 * Pruned results are compared against a plain minimax over the same
 * evaluator and move order.
 */

import { describe, it, expect } from 'vitest';
import { EndgameCache } from '../src/endgame/EndgameCache.js';
import { BLACK_ROOK_PROFILE, EndgameEvaluator, WHITE_ROOK_PROFILE } from '../src/endgame/EndgameEvaluator.js';
import { EndgameMoveOrderer } from '../src/endgame/EndgameMoveOrderer.js';
import { EndgamePosition, mirrorFen, withMove } from '../src/endgame/EndgamePosition.js';
import { EndgameSearch } from '../src/endgame/EndgameSearch.js';
import { INFINITY, MATE_SCORE, type NodeResult, type RulesPosition } from '../src/endgame/types.js';

const MATE_IN_ONE = 'k7/8/1K6/8/8/8/8/7R w - - 0 1';

class CountingEvaluator extends EndgameEvaluator {
  calls = 0;

  override evaluate(position: RulesPosition): number {
    this.calls++;
    return super.evaluate(position);
  }
}

class FailingEvaluator extends EndgameEvaluator {
  private calls = 0;

  override evaluate(position: RulesPosition): number {
    this.calls++;
    if (this.calls > 5) throw new Error('evaluation failed');
    return super.evaluate(position);
  }
}

function minimax(
  position: RulesPosition,
  depth: number,
  maximizing: boolean,
  evaluator: EndgameEvaluator,
  orderer: EndgameMoveOrderer,
  ply: number = 0
): NodeResult {
  if (depth <= 0 || (ply > 0 && position.isGameOver())) {
    return { score: evaluator.evaluate(position), move: null };
  }
  const legal = position.legalMoves();
  if (legal.length === 0) {
    return { score: evaluator.evaluate(position), move: null };
  }

  let best: NodeResult = { score: maximizing ? -INFINITY : INFINITY, move: null };
  for (const move of orderer.order(position, legal, maximizing)) {
    const { score } = withMove(position, move, () =>
      minimax(position, depth - 1, !maximizing, evaluator, orderer, ply + 1)
    );
    if (maximizing ? score > best.score : score < best.score) {
      best = { score, move };
    }
  }
  return best;
}

describe('EndgameSearch', () => {
  const cases: Array<{ fen: string; depth: number }> = [
    { fen: '4k3/8/8/8/8/8/8/R3K3 w - - 0 1', depth: 1 },
    { fen: '4k3/8/8/8/8/8/8/R3K3 w - - 0 1', depth: 2 },
    { fen: '4k3/8/8/8/8/8/8/R3K3 w - - 0 1', depth: 3 },
    { fen: '4k3/8/4K3/8/8/8/8/R7 b - - 0 1', depth: 2 },
    { fen: '4k3/8/4K3/8/8/8/8/R7 b - - 0 1', depth: 3 },
    { fen: '3k4/8/3K4/8/8/8/8/7R w - - 0 1', depth: 3 },
  ];

  it.each(cases)('should match plain minimax on $fen at depth $depth', ({ fen, depth }) => {
    const evaluator = new EndgameEvaluator(WHITE_ROOK_PROFILE);
    const orderer = new EndgameMoveOrderer('w');
    const position = EndgamePosition.fromFen(fen);
    const maximizing = position.turn() === 'w';

    const expected = minimax(position, depth, maximizing, evaluator, orderer);
    const search = new EndgameSearch(evaluator, { orderer });
    const actual = search.search(position, depth);

    expect(actual.score).toBe(expected.score);
    expect(actual.move?.san).toBe(expected.move?.san);
    expect(position.fen()).toBe(fen);
  });

  it('should evaluate fewer leaves than plain minimax', () => {
    const fen = '4k3/8/8/8/8/8/8/R3K3 w - - 0 1';
    const reference = new CountingEvaluator(WHITE_ROOK_PROFILE);
    minimax(EndgamePosition.fromFen(fen), 3, true, reference, new EndgameMoveOrderer('w'));

    const search = new EndgameSearch(new EndgameEvaluator(WHITE_ROOK_PROFILE), {
      orderer: new EndgameMoveOrderer('w'),
    });
    search.search(EndgamePosition.fromFen(fen), 3);

    expect(search.getStats().evaluations).toBeLessThan(reference.calls);
    expect(search.getStats().betaCutoffs).toBeGreaterThan(0);
  });

  it('should find mate in one for White', () => {
    const search = new EndgameSearch(new EndgameEvaluator(WHITE_ROOK_PROFILE), {
      orderer: new EndgameMoveOrderer('w'),
    });
    const position = EndgamePosition.fromFen(MATE_IN_ONE);

    const shallow = search.search(position, 1);
    expect(shallow.score).toBe(MATE_SCORE);
    expect(shallow.move?.san).toBe('Rh8#');

    const deeper = search.search(position, 2);
    expect(deeper.score).toBe(MATE_SCORE);
    expect(deeper.move?.san).toBe('Rh8#');
  });

  it('should find mate in one for Black', () => {
    const search = new EndgameSearch(new EndgameEvaluator(BLACK_ROOK_PROFILE), {
      orderer: new EndgameMoveOrderer('b'),
    });
    const position = EndgamePosition.fromFen(mirrorFen(MATE_IN_ONE));

    const result = search.search(position, 1);
    expect(result.score).toBe(-MATE_SCORE);
    expect(result.move?.san).toBe('Rh1#');
  });

  it('should return no move at a leaf or a terminal root', () => {
    const search = new EndgameSearch(new EndgameEvaluator(WHITE_ROOK_PROFILE));
    expect(search.search(EndgamePosition.fromFen(MATE_IN_ONE), 0)).toEqual({ score: 40, move: null });
    expect(search.search(EndgamePosition.fromFen('k7/1RK5/8/8/8/8/8/8 b - - 0 1'), 2)).toEqual({
      score: 0,
      move: null,
    });
  });

  it('should fill the cache and still restore the position', () => {
    const cache = new EndgameCache();
    const search = new EndgameSearch(new EndgameEvaluator(WHITE_ROOK_PROFILE), {
      orderer: new EndgameMoveOrderer('w'),
      cache,
    });
    const position = EndgamePosition.fromFen('4k3/8/8/8/8/8/8/R3K3 w - - 0 1');
    const movesBefore = position.legalMoves().map(m => m.san);

    const result = search.search(position, 3);

    expect(result.move).not.toBeNull();
    expect(cache.size).toBeGreaterThan(0);
    expect(position.fen()).toBe('4k3/8/8/8/8/8/8/R3K3 w - - 0 1');
    expect(position.legalMoves().map(m => m.san)).toEqual(movesBefore);
  });

  it('should restore the position when evaluation throws', () => {
    const search = new EndgameSearch(new FailingEvaluator(WHITE_ROOK_PROFILE), {
      orderer: new EndgameMoveOrderer('w'),
    });
    const position = EndgamePosition.fromFen('4k3/8/8/8/8/8/8/R3K3 w - - 0 1');

    expect(() => search.search(position, 3)).toThrow('evaluation failed');
    expect(position.fen()).toBe('4k3/8/8/8/8/8/8/R3K3 w - - 0 1');
  });

  it('should reset statistics', () => {
    const search = new EndgameSearch(new EndgameEvaluator(WHITE_ROOK_PROFILE));
    search.search(EndgamePosition.fromFen('4k3/8/8/8/8/8/8/R3K3 w - - 0 1'), 1);
    expect(search.getStats().nodes).toBe(16);

    search.resetStats();
    expect(search.getStats()).toEqual({ nodes: 0, evaluations: 0, betaCutoffs: 0, cacheHits: 0 });
  });
});
