import { describe, test, expect, vi, beforeEach, afterEach } from 'vitest';
import type { Cell, PresentationPort, RenderContent } from '../types/game';
import { Board } from './board';
import { contentFor, GameController, NOTICES, parseCell, PROMPTS } from './gameController';
import { assignSymbols, createSession, MESSAGES } from './gameSession';
import { SessionRegistry } from './sessionRegistry';

function boardOf(layout: string): Board {
  const cells: Cell[] = layout.split('').map((c) => (c === 'X' || c === 'O' ? c : null));
  return new Board(cells);
}

interface Notice {
  chatId: string;
  text: string;
  queryId?: string;
}

function setup(random: () => number = () => 0) {
  const renders: RenderContent[] = [];
  const notices: Notice[] = [];
  const presenter: PresentationPort = {
    render: async (_session, content) => {
      renders.push(content);
    },
    notify: async (chatId, text, queryId) => {
      notices.push({ chatId, text, queryId });
    },
  };
  const registry = new SessionRegistry({ timeoutMs: 15 * 60 * 1000 });
  const controller = new GameController(registry, presenter, { random, now: () => 42 });
  const choose = (choiceToken: string) =>
    controller.handle({ kind: 'choice', playerId: 'p1', chatId: 'c1', choiceToken, queryId: 'q1' });
  const session = () => registry.getOrCreate('p1');
  return { renders, notices, presenter, registry, controller, choose, session };
}

// Puts p1 straight into play with the given board.
function playing(ctx: ReturnType<typeof setup>, layout: string, human: 'X' | 'O', difficulty: 'easy' | 'medium' | 'hard') {
  const s = ctx.session();
  s.stage = 'playing';
  s.difficulty = difficulty;
  assignSymbols(s, human);
  s.board = boardOf(layout);
  return s;
}

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => undefined);
  vi.spyOn(console, 'warn').mockImplementation(() => undefined);
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('parseCell', () => {
  test('maps 1-indexed digits to board indices', () => {
    expect(parseCell('1')).toBe(0);
    expect(parseCell('9')).toBe(8);
  });

  test('rejects anything else', () => {
    expect(parseCell('0')).toBeNull();
    expect(parseCell('10')).toBeNull();
    expect(parseCell('x')).toBeNull();
  });
});

describe('contentFor', () => {
  test('follows the stage', () => {
    const s = createSession('p1');
    expect(contentFor(s)).toEqual({ text: PROMPTS.difficulty, menu: 'difficulty' });
    s.stage = 'choosing_symbol';
    expect(contentFor(s)).toEqual({ text: PROMPTS.symbol, menu: 'symbol' });
    s.stage = 'finished';
    s.statusMessage = MESSAGES.draw;
    expect(contentFor(s)).toEqual({ text: 'Velha: Draw', menu: 'board' });
  });
});

describe('GameController', () => {
  test('a chat message renders the current menu', async () => {
    const ctx = setup();
    await ctx.controller.handle({ kind: 'message', playerId: 'p1', chatId: 'c1' });
    expect(ctx.renders).toEqual([{ text: PROMPTS.difficulty, menu: 'difficulty' }]);
    expect(ctx.registry.size).toBe(1);
  });

  test('full setup with the computer opening as X', async () => {
    const ctx = setup(() => 0);

    await ctx.choose('dificil');
    expect(ctx.session().stage).toBe('choosing_symbol');
    expect(ctx.session().difficulty).toBe('hard');
    expect(ctx.renders.at(-1)).toEqual({ text: PROMPTS.symbol, menu: 'symbol' });

    await ctx.choose('O');
    const s = ctx.session();
    expect(s.humanSymbol).toBe('O');
    expect(s.computerSymbol).toBe('X');
    expect(s.stage).toBe('playing');
    expect(Array.from(s.board.occupiedBy('X'))).toEqual([0]);
    expect(s.board.legalMoves()).toHaveLength(8);
    expect(ctx.renders.at(-1)).toEqual({ text: 'Velha: OK', menu: 'board' });

    await ctx.choose('1');
    expect(s.statusMessage).toBe(MESSAGES.occupied);
    expect(s.stage).toBe('playing');
    expect(ctx.notices).toEqual([{ chatId: 'c1', text: NOTICES.occupied, queryId: 'q1' }]);
    expect(ctx.renders).toHaveLength(2);
  });

  test('choosing X leaves the board empty for the human', async () => {
    const ctx = setup();
    await ctx.choose('facil');
    await ctx.choose('X');
    expect(ctx.session().board.isEmpty()).toBe(true);
    expect(ctx.session().difficulty).toBe('easy');
  });

  test('a human move is answered by the computer', async () => {
    const ctx = setup();
    await ctx.choose('medio');
    await ctx.choose('X');
    await ctx.choose('5');
    const s = ctx.session();
    expect(s.board.cellAt(4)).toBe('X');
    expect(s.board.occupiedBy('O').size).toBe(1);
    expect(s.lastActivity).toBe(42);
    expect(ctx.renders.at(-1)).toEqual({ text: 'Velha: OK', menu: 'board' });
  });

  test('winning move ends the game without a computer reply', async () => {
    const ctx = setup();
    const s = playing(ctx, 'XX_OO____', 'X', 'easy');
    await ctx.choose('3');
    expect(s.stage).toBe('finished');
    expect(s.statusMessage).toBe(MESSAGES.won);
    expect(s.board.occupiedBy('O').size).toBe(2);
    expect(ctx.renders.at(-1)).toEqual({ text: 'Velha: You won!', menu: 'board' });
  });

  test('computer completing a line is a loss for the human', async () => {
    const ctx = setup();
    const s = playing(ctx, 'X__OO___X', 'X', 'medium');
    await ctx.choose('2');
    expect(s.board.cellAt(5)).toBe('O');
    expect(s.stage).toBe('finished');
    expect(s.statusMessage).toBe(MESSAGES.lost);
  });

  test('filling the last cell without a line is a draw', async () => {
    const ctx = setup();
    const s = playing(ctx, 'XOXXOOOX_', 'X', 'hard');
    await ctx.choose('9');
    expect(s.stage).toBe('finished');
    expect(s.statusMessage).toBe(MESSAGES.draw);
  });

  test('a finished game only answers restart', async () => {
    const ctx = setup();
    const s = playing(ctx, 'XOXOXOOXO', 'X', 'easy');
    s.stage = 'finished';
    await ctx.choose('5');
    expect(ctx.notices).toEqual([{ chatId: 'c1', text: NOTICES.finished, queryId: 'q1' }]);
    expect(ctx.renders).toEqual([]);
    expect(ctx.session()).toBe(s);
  });

  test('input outside its stage changes nothing', async () => {
    const ctx = setup();
    await ctx.choose('5');
    expect(ctx.session().stage).toBe('choosing_difficulty');
    await ctx.choose('dificil');
    await ctx.choose('Z');
    expect(ctx.session().stage).toBe('choosing_symbol');
    await ctx.choose('X');
    await ctx.choose('facil');
    expect(ctx.session().board.isEmpty()).toBe(true);
    expect(ctx.notices.map((n) => n.text)).toEqual([NOTICES.unsupported, NOTICES.unsupported, NOTICES.unsupported]);
  });

  test('restart replaces the game from any stage and keeps the handle', async () => {
    const ctx = setup();
    const old = playing(ctx, 'X___O____', 'X', 'hard');
    old.presentationHandle = { chatId: 'c1', messageId: 'm1' };

    await ctx.choose('restart');
    const fresh = ctx.session();
    expect(fresh).not.toBe(old);
    expect(fresh.stage).toBe('choosing_difficulty');
    expect(fresh.board.isEmpty()).toBe(true);
    expect(fresh.presentationHandle).toEqual({ chatId: 'c1', messageId: 'm1' });
    expect(ctx.renders.at(-1)).toEqual({ text: PROMPTS.difficulty, menu: 'difficulty' });

    await ctx.choose('recomecar');
    expect(ctx.session()).not.toBe(fresh);
    expect(ctx.registry.size).toBe(1);
  });

  test('a failed render does not undo the move', async () => {
    const ctx = setup();
    ctx.presenter.render = async () => {
      throw new Error('socket gone');
    };
    await expect(ctx.choose('dificil')).resolves.toBeUndefined();
    expect(ctx.session().stage).toBe('choosing_symbol');
    expect(console.warn).toHaveBeenCalledWith('[presenter] render failed', 'socket gone');
  });
});
