/**
 * Error types raised by the endgame engine.
 *
 * Normal outcomes (no legal moves, missing rook) are values, not errors.
 * These classes cover broken preconditions and bad configuration.
 */

export type EndgameErrorCode =
  | 'ILLEGAL_MOVE'
  | 'INVALID_POSITION'
  | 'CONFIG'
  | 'ENGINE_INVARIANT';

export class EndgameError extends Error {
  readonly code: EndgameErrorCode;

  constructor(code: EndgameErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** The rules engine rejected a move the caller believed legal */
export class IllegalMoveError extends EndgameError {
  readonly fen: string;
  readonly move: string;

  constructor(move: string, fen: string) {
    super('ILLEGAL_MOVE', `Illegal move "${move}" in position ${fen}`);
    this.move = move;
    this.fen = fen;
  }
}

export class InvalidPositionError extends EndgameError {
  constructor(fen: string, reason: string) {
    super('INVALID_POSITION', `Invalid position "${fen}": ${reason}`);
  }
}

export class ConfigError extends EndgameError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('CONFIG', `Invalid endgame configuration: ${issues.join('; ')}`);
    this.issues = issues;
  }
}

/** Search left the position modified or produced an unplayable move */
export class EngineInvariantError extends EndgameError {
  constructor(message: string) {
    super('ENGINE_INVARIANT', message);
  }
}
