import type { PlayerMark } from '../types/game';

export type GameErrorKind =
  | 'DuplicateName'
  | 'NotFound'
  | 'GameFinished'
  | 'WrongTurn'
  | 'OutOfRange'
  | 'CellOccupied'
  | 'Conflict';

const HTTP_STATUS: Record<GameErrorKind, number> = {
  DuplicateName: 400,
  NotFound: 404,
  GameFinished: 400,
  WrongTurn: 400,
  OutOfRange: 400,
  CellOccupied: 400,
  Conflict: 409,
};

const DEFAULT_MESSAGE: Record<GameErrorKind, string> = {
  DuplicateName: 'Player name already exists',
  NotFound: 'Not found',
  GameFinished: 'Game already finished',
  WrongTurn: 'Not your turn',
  OutOfRange: 'Position must be between 0 and 8',
  CellOccupied: 'Position already occupied',
  Conflict: 'Game was updated concurrently, reload and try again',
};

export class GameError extends Error {
  readonly kind: GameErrorKind;

  constructor(kind: GameErrorKind, message: string = DEFAULT_MESSAGE[kind]) {
    super(message);
    this.name = 'GameError';
    this.kind = kind;
  }

  get status(): number {
    return HTTP_STATUS[this.kind];
  }

  static wrongTurn(expected: PlayerMark): GameError {
    return new GameError('WrongTurn', `It is ${expected}'s turn`);
  }

  static notFound(what: string): GameError {
    return new GameError('NotFound', `${what} not found`);
  }
}

/**
 * Raised by a repository when the stored game no longer matches the state a
 * transition was computed from. Never sent to clients as-is.
 */
export class StaleGameError extends Error {
  readonly gameId: string;

  constructor(gameId: string) {
    super(`Game ${gameId} changed before the move was saved`);
    this.name = 'StaleGameError';
    this.gameId = gameId;
  }
}

export function isGameError(err: unknown): err is GameError {
  return err instanceof GameError;
}
