/**
 * EndgameAI and EndgameMatch tests
 */

import { afterEach, describe, it, expect, vi } from 'vitest';
import { EndgameAI, EndgameMatch, scoreForSideToMove } from '../src/endgame/EndgameAI.js';
import { EndgamePosition, mirrorFen, withMove } from '../src/endgame/EndgamePosition.js';
import { ConfigError, EngineInvariantError } from '../src/endgame/errors.js';
import type { Color, Move, MoveInput, Piece, PieceOnBoard, RulesPosition, Square } from '../src/endgame/types.js';

const CLASSIC = '4k3/8/8/8/8/8/8/R3K3 w - - 0 1';
const MATE_IN_ONE = 'k7/8/1K6/8/8/8/8/7R w - - 0 1';

/** Reports a different key after the first call */
class DriftingPosition implements RulesPosition {
  private inner: EndgamePosition;
  private keyCalls = 0;

  constructor(inner: EndgamePosition) {
    this.inner = inner;
  }

  turn(): Color { return this.inner.turn(); }
  legalMoves(): Move[] { return this.inner.legalMoves(); }
  apply(move: MoveInput | Move): void { this.inner.apply(move); }
  undo(): void { this.inner.undo(); }
  isCheck(): boolean { return this.inner.isCheck(); }
  isCheckmate(): boolean { return this.inner.isCheckmate(); }
  isStalemate(): boolean { return this.inner.isStalemate(); }
  isInsufficientMaterial(): boolean { return this.inner.isInsufficientMaterial(); }
  isDrawClaimable(): boolean { return this.inner.isDrawClaimable(); }
  isGameOver(): boolean { return this.inner.isGameOver(); }
  pieceAt(square: Square): Piece | null { return this.inner.pieceAt(square); }
  kingSquare(color: Color): Square | null { return this.inner.kingSquare(color); }
  pieces(color?: Color): PieceOnBoard[] { return this.inner.pieces(color); }
  fen(): string { return this.inner.fen(); }

  key(): string {
    this.keyCalls++;
    return this.keyCalls === 1 ? this.inner.key() : `${this.inner.key()} drifted`;
  }
}

function stalematingMoves(position: EndgamePosition): string[] {
  return position
    .legalMoves()
    .filter(move => withMove(position, move, () => position.isStalemate()))
    .map(move => move.san);
}

afterEach(() => {
  vi.restoreAllMocks();
});

// =============================================================================
// Move choice
// =============================================================================

describe('EndgameAI', () => {
  it('should play a legal, non-stalemating move from the classic setup', () => {
    const ai = new EndgameAI();
    const position = EndgamePosition.fromFen(CLASSIC);
    const forbidden = stalematingMoves(position);

    const move = ai.chooseMove(position, 3, 60_000);

    expect(move).not.toBeNull();
    expect(position.legalMoves().map(m => m.san)).toContain(move?.san);
    expect(forbidden).not.toContain(move?.san);
    expect(position.fen()).toBe(CLASSIC);
  });

  it('should mate instead of stalemating', () => {
    // Rb7 stalemates, Ra1 mates
    const position = EndgamePosition.fromFen('k7/2K5/8/8/8/8/8/1R6 w - - 0 1');
    expect(stalematingMoves(position)).toEqual(['Rb7']);
    expect(new EndgameAI().chooseMove(position, 2)?.san).toBe('Ra1#');
  });

  it('should mate in one at every depth', () => {
    const ai = new EndgameAI();
    for (const depth of [1, 2, 3]) {
      expect(ai.chooseMove(EndgamePosition.fromFen(MATE_IN_ONE), depth)?.san).toBe('Rh8#');
    }
  });

  it('should mate in one with the black rook', () => {
    const ai = new EndgameAI();
    const result = ai.analyze(EndgamePosition.fromFen(mirrorFen(MATE_IN_ONE)), 2);
    expect(result.bestMove?.san).toBe('Rh1#');
    expect(result.profile).toBe('black-rook');
    expect(result.score).toBe(-10000);
    expect(scoreForSideToMove(result.score, 'b')).toBe(10000);
  });

  it('should return null when the side to move has no moves', () => {
    const ai = new EndgameAI();
    expect(ai.chooseMove(EndgamePosition.fromFen('k7/1RK5/8/8/8/8/8/8 b - - 0 1'))).toBeNull();
  });

  it('should still move in a position drawn by repetition', () => {
    const position = EndgamePosition.fromFen(CLASSIC);
    for (let cycle = 0; cycle < 3; cycle++) {
      for (const san of ['Kd1', 'Kd8', 'Ke1', 'Ke8']) {
        position.applySan(san);
      }
    }
    expect(position.isDrawClaimable()).toBe(true);

    const result = new EndgameAI().analyze(position, 3, 60_000);
    expect(result.bestMove).not.toBeNull();
    expect(result.depth).toBe(1);
  });

  it('should keep the last result', () => {
    const ai = new EndgameAI();
    expect(ai.getLastResult()).toBeNull();
    const result = ai.analyze(EndgamePosition.fromFen(MATE_IN_ONE));
    expect(ai.getLastResult()).toBe(result);
  });

  it('should resolve profiles from config', () => {
    const blackRook = EndgamePosition.fromFen('4k2r/8/8/8/8/8/8/4K3 w - - 0 1');
    expect(new EndgameAI().resolveProfile(blackRook).name).toBe('black-rook');
    expect(new EndgameAI({ profile: 'white-rook' }).resolveProfile(blackRook).name).toBe('white-rook');

    const tuned = new EndgameAI({ profile: 'white-rook', weights: { check: 40 } }).resolveProfile(null);
    expect(tuned.weights.check).toBe(40);
    expect(tuned.weights.edge).toBe(10);
  });

  it('should reject bad weights at construction', () => {
    expect(() => new EndgameAI({ profile: 'white-rook', weights: { edge: -5 } })).toThrow(ConfigError);
  });

  it('should reject bad weights on first use with the auto profile', () => {
    const ai = new EndgameAI({ weights: { edge: -5 } });
    expect(() => ai.chooseMove(EndgamePosition.fromFen(CLASSIC))).toThrow(ConfigError);
  });

  it('should raise EngineInvariantError when the position does not come back unchanged', () => {
    const position = new DriftingPosition(EndgamePosition.fromFen(MATE_IN_ONE));
    expect(() => new EndgameAI().analyze(position)).toThrow(EngineInvariantError);
  });

  it('should log the decision when verbose', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    new EndgameAI({ verbose: true }).analyze(EndgamePosition.fromFen(MATE_IN_ONE));

    expect(log).toHaveBeenCalledTimes(1);
    expect(log).toHaveBeenCalledWith(
      expect.stringContaining('[Endgame] RookEndgame (white-rook): Rh8# score=10000 depth=1')
    );
  });

  it('should warn when a fixed profile has no rook to work with', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const position = EndgamePosition.fromFen('4k2r/8/8/8/8/8/8/4K3 w - - 0 1');
    new EndgameAI({ profile: 'white-rook' }).analyze(position, 1);

    expect(warn).toHaveBeenCalledWith(
      '[Endgame] RookEndgame: no white rook for the white-rook profile, heuristic scores will be 0'
    );
  });

  it('should log each iteration when verbose', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    new EndgameAI({ verbose: true }).analyze(EndgamePosition.fromFen(CLASSIC), 2, 60_000);

    // Two iterations and the final decision
    expect(log).toHaveBeenCalledTimes(3);
    expect(log.mock.calls[0][0]).toMatch(/^\[Endgame\] RookEndgame depth 1: /);
  });
});

// =============================================================================
// Matches
// =============================================================================

describe('EndgameMatch', () => {
  it('should end a match with checkmate', () => {
    const ai = new EndgameAI();
    const match = new EndgameMatch(EndgamePosition.fromFen(MATE_IN_ONE), ai, ai);
    const onGameEnd = vi.fn();
    match.onGameEndCallback(onGameEnd);

    const record = match.playGame(10);

    expect(record.result).toBe('1-0');
    expect(record.reason).toBe('checkmate');
    expect(record.plies).toBe(1);
    expect(record.moves[0]).toMatchObject({ san: 'Rh8#', color: 'w', score: 10000 });
    expect(onGameEnd).toHaveBeenCalledWith(record);
  });

  it('should report a stalemated start as a draw', () => {
    const ai = new EndgameAI();
    const record = new EndgameMatch(EndgamePosition.fromFen('k7/1RK5/8/8/8/8/8/8 b - - 0 1'), ai, ai).playGame();
    expect(record).toMatchObject({ result: '1/2-1/2', reason: 'stalemate', plies: 0 });
  });

  it('should stop at the ply limit', () => {
    const ai = new EndgameAI({ maxDepth: 1 });
    const firstLegal = (position: EndgamePosition) => position.legalMoves()[0] ?? null;
    const match = new EndgameMatch(EndgamePosition.fromFen(CLASSIC), ai, firstLegal);
    const onMove = vi.fn();
    match.onMoveCallback(onMove);

    const record = match.playGame(2);

    expect(record).toMatchObject({ result: '*', reason: 'max_plies', plies: 2 });
    expect(record.moves.map(m => m.color)).toEqual(['w', 'b']);
    expect(record.moves[1].score).toBeNull();
    expect(onMove).toHaveBeenCalledTimes(2);
    expect(match.getMoveHistory()).toEqual(record.moves);
    expect(record.finalFen).toBe(match.getPosition().fen());
  });

  it('should stop when a player has no move to offer', () => {
    const ai = new EndgameAI({ maxDepth: 1 });
    const match = new EndgameMatch(EndgamePosition.fromFen(CLASSIC), ai, () => null);
    const record = match.playGame();
    expect(record).toMatchObject({ result: '*', reason: 'no_move', plies: 1 });
  });
});
