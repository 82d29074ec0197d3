import { Difficulty, PlayerMark, PresentationHandle, Stage } from '../types/game';
import { Board, InvalidMoveError, otherMark } from './board';

export const MESSAGES = {
  hello: 'Hello!',
  ok: 'OK',
  occupied: 'You already played in this position, choose another',
  draw: 'Draw',
  won: 'You won!',
  lost: 'You lost!',
} as const;

export interface GameSession {
  playerId: string;
  board: Board;
  stage: Stage;
  difficulty: Difficulty | null; // null until chosen
  humanSymbol: PlayerMark;
  computerSymbol: PlayerMark;
  statusMessage: string;
  lastActivity: number; // ms timestamp
  presentationHandle: PresentationHandle | null;
}

export function createSession(playerId: string, now: number = Date.now()): GameSession {
  return {
    playerId,
    board: new Board(),
    stage: 'choosing_difficulty',
    difficulty: null,
    humanSymbol: 'X',
    computerSymbol: 'O',
    statusMessage: MESSAGES.hello,
    lastActivity: now,
    presentationHandle: null,
  };
}

export function assignSymbols(session: GameSession, human: PlayerMark): void {
  session.humanSymbol = human;
  session.computerSymbol = otherMark(human);
}

/**
 * Marks a cell for `mark`. An occupied cell leaves the board alone, sets the
 * occupancy prompt and returns false.
 */
export function markCell(session: GameSession, index: number, mark: PlayerMark, now: number = Date.now()): boolean {
  session.lastActivity = now;
  try {
    session.board.applyMove(index, mark);
  } catch (err) {
    if (err instanceof InvalidMoveError) {
      session.statusMessage = MESSAGES.occupied;
      return false;
    }
    throw err;
  }
  session.statusMessage = MESSAGES.ok;
  return true;
}

export function applyHumanMove(session: GameSession, index: number, now: number = Date.now()): boolean {
  return markCell(session, index, session.humanSymbol, now);
}
