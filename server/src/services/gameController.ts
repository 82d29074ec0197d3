import { Difficulty, InputEvent, PresentationPort, RenderContent } from '../types/game';
import { env } from '../config/env';
import { applyHumanMove, assignSymbols, GameSession, markCell, MESSAGES } from './gameSession';
import { chooseComputerMove, RandomSource } from './searchEngine';
import { SessionRegistry } from './sessionRegistry';

export const PROMPTS = {
  difficulty: 'Tic-tac-toe - choose the difficulty level',
  symbol: 'X always plays first. Do you want to play as X or O?',
} as const;

export const NOTICES = {
  occupied: 'Choose another position',
  finished: 'Game over. Choose Restart to play again.',
  unsupported: 'Unsupported input in this stage',
} as const;

const DIFFICULTY_TOKENS = new Map<string, Difficulty>([
  ['facil', 'easy'],
  ['medio', 'medium'],
  ['dificil', 'hard'],
  ['easy', 'easy'],
  ['medium', 'medium'],
  ['hard', 'hard'],
]);

const RESTART_TOKENS = new Set(['restart', 'recomecar']);

type Mover = 'human' | 'computer';

/** "1".."9" → 0..8; anything else → null. */
export function parseCell(token: string): number | null {
  return /^[1-9]$/.test(token) ? Number(token) - 1 : null;
}

export function contentFor(session: GameSession): RenderContent {
  switch (session.stage) {
    case 'choosing_difficulty':
      return { text: PROMPTS.difficulty, menu: 'difficulty' };
    case 'choosing_symbol':
      return { text: PROMPTS.symbol, menu: 'symbol' };
    case 'playing':
    case 'finished':
      return { text: `Velha: ${session.statusMessage}`, menu: 'board' };
  }
}

export interface GameControllerOptions {
  random?: RandomSource;
  now?: () => number;
}

export class GameController {
  private readonly random: RandomSource;
  private readonly now: () => number;

  constructor(
    private readonly registry: SessionRegistry,
    private readonly presenter: PresentationPort,
    options: GameControllerOptions = {}
  ) {
    this.random = options.random ?? Math.random;
    this.now = options.now ?? Date.now;
  }

  async handle(event: InputEvent): Promise<void> {
    await this.registry.withSession(event.playerId, (session) => {
      if (event.kind === 'message') return this.present(session, event.chatId);
      return this.handleChoice(session, event.chatId, event.choiceToken.trim(), event.queryId);
    });
  }

  private async handleChoice(session: GameSession, chatId: string, token: string, queryId?: string): Promise<void> {
    if (RESTART_TOKENS.has(token)) {
      const fresh = this.registry.replace(session.playerId);
      return this.present(fresh, chatId);
    }

    switch (session.stage) {
      case 'choosing_difficulty': {
        const difficulty = DIFFICULTY_TOKENS.get(token);
        if (!difficulty) return this.notify(chatId, NOTICES.unsupported, queryId);
        session.difficulty = difficulty;
        session.stage = 'choosing_symbol';
        session.lastActivity = this.now();
        return this.present(session, chatId);
      }
      case 'choosing_symbol': {
        if (token !== 'X' && token !== 'O') return this.notify(chatId, NOTICES.unsupported, queryId);
        assignSymbols(session, token);
        session.stage = 'playing';
        session.lastActivity = this.now();
        if (session.computerSymbol === 'X') this.computerTurn(session);
        return this.present(session, chatId);
      }
      case 'playing': {
        const index = parseCell(token);
        if (index === null) return this.notify(chatId, NOTICES.unsupported, queryId);
        if (!applyHumanMove(session, index, this.now())) {
          return this.notify(chatId, NOTICES.occupied, queryId);
        }
        this.checkOutcome(session, 'human');
        return this.present(session, chatId);
      }
      case 'finished':
        return this.notify(chatId, NOTICES.finished, queryId);
    }
  }

  private checkOutcome(session: GameSession, mover: Mover): void {
    const outcome = session.board.outcome();
    if (outcome === 'ongoing') {
      if (mover === 'human') this.computerTurn(session);
      return;
    }
    if (outcome === 'draw') {
      session.statusMessage = MESSAGES.draw;
    } else {
      const winner = outcome === 'x_wins' ? 'X' : 'O';
      session.statusMessage = winner === session.humanSymbol ? MESSAGES.won : MESSAGES.lost;
    }
    session.stage = 'finished';
    console.log(`[game] finished player=${session.playerId} result=${outcome}`);
  }

  private computerTurn(session: GameSession): void {
    const difficulty = session.difficulty ?? 'easy';
    const index = chooseComputerMove(session.board, session.computerSymbol, difficulty, this.random);
    markCell(session, index, session.computerSymbol, this.now());
    if (env.nodeEnv === 'development') {
      console.debug(`[game] computer difficulty=${difficulty} position=${index} player=${session.playerId}`);
    }
    this.checkOutcome(session, 'computer');
  }

  // The game state is authoritative; a failed render is logged and dropped.
  private async present(session: GameSession, chatId: string): Promise<void> {
    try {
      await this.presenter.render(session, contentFor(session), chatId);
    } catch (err) {
      console.warn('[presenter] render failed', err instanceof Error ? err.message : err);
    }
  }

  private async notify(chatId: string, text: string, queryId?: string): Promise<void> {
    try {
      await this.presenter.notify(chatId, text, queryId);
    } catch (err) {
      console.warn('[presenter] notice failed', err instanceof Error ? err.message : err);
    }
  }
}
