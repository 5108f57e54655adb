/**
 * EndgamePosition - RulesPosition adapter around chess.js
 *
 * The search engine never owns board memory. It borrows one of these,
 * mutates it through paired apply/undo calls and hands it back unchanged.
 * Legal move generation, check and draw detection all come from chess.js.
 */

import { Chess, type Move as ChessJsMove } from 'chess.js';
import { IllegalMoveError, InvalidPositionError } from './errors.js';
import {
  type Color,
  FILES,
  type GameEndReason,
  type Move,
  type MoveInput,
  type Piece,
  type PieceOnBoard,
  RANKS,
  type RulesPosition,
  type Square,
} from './types.js';

/** Setup for a king + rook vs. king position */
export interface RookEndgameSetup {
  whiteKing: Square;
  blackKing: Square;
  rook: Square;
  /** Owner of the rook (default: white) */
  rookColor?: Color;
  /** Side to move (default: white) */
  turn?: Color;
}

/**
 * EndgamePosition wraps chess.js behind the RulesPosition surface
 */
export class EndgamePosition implements RulesPosition {
  private chess: Chess;

  private constructor(chess: Chess) {
    this.chess = chess;
  }

  // ===========================================================================
  // Construction
  // ===========================================================================

  /**
   * Load a position from FEN
   * @throws InvalidPositionError when chess.js rejects the FEN or a king is missing
   */
  static fromFen(fen: string): EndgamePosition {
    let chess: Chess;
    try {
      chess = new Chess(fen);
    } catch (err) {
      throw new InvalidPositionError(fen, err instanceof Error ? err.message : String(err));
    }

    const position = new EndgamePosition(chess);
    const white = position.kingSquare('w');
    const black = position.kingSquare('b');
    if (!white || !black) {
      throw new InvalidPositionError(fen, 'both kings are required');
    }

    // The side that just moved may not have left its own king in check
    const idle = chess.turn() === 'w' ? 'b' : 'w';
    const idleKing = idle === 'w' ? white : black;
    if (chess.isAttacked(idleKing, chess.turn())) {
      throw new InvalidPositionError(fen, 'side not to move is in check');
    }

    return position;
  }

  /** Like fromFen, but returns null for anything unloadable */
  static tryFromFen(fen: string): EndgamePosition | null {
    try {
      return EndgamePosition.fromFen(fen);
    } catch {
      return null;
    }
  }

  /**
   * Build a king + rook vs. king position
   * @example EndgamePosition.fromPieces({ whiteKing: 'e1', rook: 'a1', blackKing: 'e8' })
   */
  static fromPieces(setup: RookEndgameSetup): EndgamePosition {
    const rookColor = setup.rookColor ?? 'w';
    const fen = fenFromPieces(
      [
        { type: 'k', color: 'w', square: setup.whiteKing },
        { type: 'k', color: 'b', square: setup.blackKing },
        { type: 'r', color: rookColor, square: setup.rook },
      ],
      setup.turn ?? 'w',
    );
    return EndgamePosition.fromFen(fen);
  }

  // ===========================================================================
  // Moves
  // ===========================================================================

  /** Legal moves for the side to move */
  legalMoves(): Move[] {
    return this.chess.moves({ verbose: true }).map(m => convertMove(m));
  }

  /**
   * Make a move on the board
   * @throws IllegalMoveError when chess.js rejects it
   */
  apply(move: MoveInput | Move): void {
    try {
      this.chess.move({ from: move.from, to: move.to, promotion: move.promotion });
    } catch {
      throw new IllegalMoveError(`${move.from}${move.to}${move.promotion ?? ''}`, this.chess.fen());
    }
  }

  /** Take back the last applied move */
  undo(): void {
    if (!this.chess.undo()) {
      throw new IllegalMoveError('undo', this.chess.fen());
    }
  }

  /** Apply a SAN move (e.g. "Rh8#"), as typed by a person */
  applySan(san: string): Move {
    try {
      return convertMove(this.chess.move(san));
    } catch {
      throw new IllegalMoveError(san, this.chess.fen());
    }
  }

  // ===========================================================================
  // Game State Queries
  // ===========================================================================

  turn(): Color {
    return this.chess.turn();
  }

  fen(): string {
    return this.chess.fen();
  }

  /** Position part of FEN (ignore move counters) */
  key(): string {
    return this.chess.fen().split(' ').slice(0, 4).join(' ');
  }

  halfMoveClock(): number {
    const parts = this.chess.fen().split(' ');
    return parseInt(parts[4] || '0', 10);
  }

  ascii(): string {
    return this.chess.ascii();
  }

  isCheck(): boolean {
    return this.chess.isCheck();
  }

  isCheckmate(): boolean {
    return this.chess.isCheckmate();
  }

  isStalemate(): boolean {
    return this.chess.isStalemate();
  }

  isInsufficientMaterial(): boolean {
    return this.chess.isInsufficientMaterial();
  }

  isThreefoldRepetition(): boolean {
    return this.chess.isThreefoldRepetition();
  }

  isFiftyMoveRule(): boolean {
    return this.halfMoveClock() >= 100;
  }

  isDrawClaimable(): boolean {
    return this.isThreefoldRepetition() || this.isFiftyMoveRule();
  }

  isGameOver(): boolean {
    return this.isCheckmate() || this.isStalemate() || this.isInsufficientMaterial() || this.isDrawClaimable();
  }

  /** Why the game is over, or null while it continues */
  getEndReason(): GameEndReason | null {
    if (this.isCheckmate()) return 'checkmate';
    if (this.isStalemate()) return 'stalemate';
    if (this.isInsufficientMaterial()) return 'insufficient_material';
    if (this.isThreefoldRepetition()) return 'threefold_repetition';
    if (this.isFiftyMoveRule()) return 'fifty_move_rule';
    return null;
  }

  // ===========================================================================
  // Position Analysis
  // ===========================================================================

  pieceAt(square: Square): Piece | null {
    const piece = this.chess.get(square);
    return piece ? { type: piece.type, color: piece.color } : null;
  }

  /** All pieces, optionally for one color */
  pieces(color?: Color): PieceOnBoard[] {
    const pieces: PieceOnBoard[] = [];
    for (const row of this.chess.board()) {
      for (const piece of row) {
        if (piece && (!color || piece.color === color)) {
          pieces.push({ type: piece.type, color: piece.color, square: piece.square });
        }
      }
    }
    return pieces;
  }

  kingSquare(color: Color): Square | null {
    const king = this.pieces(color).find(p => p.type === 'k');
    return king ? king.square : null;
  }

  /** Independent copy (history is not carried over) */
  clone(): EndgamePosition {
    return new EndgamePosition(new Chess(this.chess.fen()));
  }
}

// =============================================================================
// Helpers
// =============================================================================

function convertMove(m: ChessJsMove): Move {
  return {
    from: m.from,
    to: m.to,
    san: m.san,
    lan: m.lan,
    piece: m.piece,
    captured: m.captured,
    promotion: m.promotion,
    flags: m.flags,
    color: m.color,
  };
}

/** chess.js flags 'c' and 'e' mark captures */
export function isCaptureMove(move: Move): boolean {
  return move.flags.includes('c') || move.flags.includes('e');
}

/** chess.js flags 'k' and 'q' mark castling */
export function isCastleMove(move: Move): boolean {
  return move.flags.includes('k') || move.flags.includes('q');
}

export function opponent(color: Color): Color {
  return color === 'w' ? 'b' : 'w';
}

/**
 * Run `fn` with `move` applied, undoing it on every exit path
 */
export function withMove<T>(position: RulesPosition, move: Move, fn: () => T): T {
  position.apply(move);
  try {
    return fn();
  } finally {
    position.undo();
  }
}

/**
 * Build a FEN with no castling rights and no en passant square
 */
export function fenFromPieces(pieces: PieceOnBoard[], turn: Color): string {
  const rows: string[] = [];
  for (let rank = 7; rank >= 0; rank--) {
    let row = '';
    let empty = 0;
    for (let file = 0; file < 8; file++) {
      const piece = pieces.find(p => {
        const c = squareToCoords(p.square);
        return c.file === file && c.rank === rank;
      });
      if (!piece) {
        empty++;
        continue;
      }
      if (empty > 0) {
        row += String(empty);
        empty = 0;
      }
      row += piece.color === 'w' ? piece.type.toUpperCase() : piece.type;
    }
    if (empty > 0) row += String(empty);
    rows.push(row);
  }
  return `${rows.join('/')} ${turn} - - 0 1`;
}

/**
 * Mirror a FEN across the middle of the board, swapping colors
 * (ranks reversed, piece case swapped, side to move flipped)
 */
export function mirrorFen(fen: string): string {
  const [placement, turn, castling = '-', enPassant = '-', halfMoves = '0', fullMoves = '1'] = fen.split(' ');
  const swapCase = (s: string) =>
    [...s].map(ch => (ch === ch.toUpperCase() ? ch.toLowerCase() : ch.toUpperCase())).join('');

  const mirroredPlacement = placement.split('/').reverse().map(swapCase).join('/');
  const mirroredCastling = castling === '-'
    ? '-'
    : [...swapCase(castling)].sort((a, b) => 'KQkq'.indexOf(a) - 'KQkq'.indexOf(b)).join('');
  const mirroredEnPassant = enPassant === '-'
    ? '-'
    : `${enPassant[0]}${9 - parseInt(enPassant[1], 10)}`;

  return [
    mirroredPlacement,
    turn === 'w' ? 'b' : 'w',
    mirroredCastling,
    mirroredEnPassant,
    halfMoves,
    fullMoves,
  ].join(' ');
}

/**
 * Convert algebraic notation to coordinates (0-7 each)
 */
export function squareToCoords(square: Square): { file: number; rank: number } {
  return {
    file: square.charCodeAt(0) - 97,
    rank: square.charCodeAt(1) - 49,
  };
}

/**
 * Convert coordinates to algebraic notation
 */
export function coordsToSquare(file: number, rank: number): Square | null {
  if (file < 0 || file > 7 || rank < 0 || rank > 7) return null;
  return `${FILES[file]}${RANKS[rank]}`;
}

/** Chebyshev ("king") distance between two squares */
export function kingDistance(a: Square, b: Square): number {
  const ca = squareToCoords(a);
  const cb = squareToCoords(b);
  return Math.max(Math.abs(ca.file - cb.file), Math.abs(ca.rank - cb.rank));
}

/** Steps from a square to the nearest board edge (0-3) */
export function edgeDistance(square: Square): number {
  const { file, rank } = squareToCoords(square);
  return Math.min(file, 7 - file, rank, 7 - rank);
}

/** King distance from a square to the central point (0.5-3.5) */
export function centerDistance(square: Square): number {
  const { file, rank } = squareToCoords(square);
  return Math.max(Math.abs(3.5 - file), Math.abs(3.5 - rank));
}

export function sameFileOrRank(a: Square, b: Square): boolean {
  return a[0] === b[0] || a[1] === b[1];
}
