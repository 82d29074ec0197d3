import type { GameSession } from '../services/gameSession';

export type PlayerMark = 'X' | 'O';

export type Cell = PlayerMark | null; // null = empty

export type Outcome = 'x_wins' | 'o_wins' | 'draw' | 'ongoing';

export type Difficulty = 'easy' | 'medium' | 'hard';

export type Stage = 'choosing_difficulty' | 'choosing_symbol' | 'playing' | 'finished';

export interface PlayerInfo {
  id: string;
  username: string;
}

/** Where a rendering was sent, so later renders edit it in place. */
export interface PresentationHandle {
  chatId: string;
  messageId: string;
  signature?: string; // last rendered text + keyboard
}

export type MenuShape = 'difficulty' | 'symbol' | 'board';

export interface RenderContent {
  text: string;
  menu: MenuShape;
}

export interface KeyboardButton {
  text: string;
  data: string;
}

export type Keyboard = KeyboardButton[][];

export type InputEvent =
  | { kind: 'message'; playerId: string; chatId: string }
  | { kind: 'choice'; playerId: string; chatId: string; choiceToken: string; queryId?: string };

export interface PresentationPort {
  /**
   * Sends `content` as a new message when the session has no handle yet,
   * otherwise edits the message at `session.presentationHandle`.
   */
  render(session: GameSession, content: RenderContent, chatId: string): Promise<void>;
  /** Transient notice answering a menu choice; leaves the rendered message untouched. */
  notify(chatId: string, text: string, queryId?: string): Promise<void>;
}
