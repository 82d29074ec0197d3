import { Cell, Difficulty, PlayerMark } from '../types/game';
import { env } from '../config/env';
import { Board, dumpBoard, emptyIndices, otherMark, outcomeOf } from './board';

/** Candidate move index → score, for one ply. Iterates in ascending index order. */
export type SearchResult = Map<number, number>;

export type RandomSource = () => number;

// Search horizon per difficulty. Easy never searches.
export const DIFFICULTY_DEPTH: Record<Exclude<Difficulty, 'easy'>, number> = {
  medium: 2,
  hard: 9,
};

const WIN_SCORE = 10;

/**
 * Scores every legal move of `player`. A move that wins scores `10 - depthLevel`
 * for X and the negation for O; an undecided move below `maxDepth` takes the
 * opponent's best reply score. Draws and moves at the horizon are left out.
 */
export function evaluate(board: Board, player: PlayerMark, depthLevel = 0, maxDepth = 9): SearchResult {
  return search(board.snapshot(), player, depthLevel, maxDepth);
}

// `cells` is a scratch copy: each move is undone before the next one is tried.
function search(cells: Cell[], player: PlayerMark, level: number, maxDepth: number): SearchResult {
  const result: SearchResult = new Map();
  for (const index of emptyIndices(cells)) {
    cells[index] = player;
    const outcome = outcomeOf(cells);
    if (outcome === 'x_wins' || outcome === 'o_wins') {
      const score = WIN_SCORE - level;
      result.set(index, outcome === 'x_wins' ? score : -score);
    } else if (outcome === 'ongoing' && level < maxDepth) {
      const opponent = otherMark(player);
      const nested = search(cells, opponent, level + 1, maxDepth);
      result.set(index, bestScore(nested, opponent) ?? 0);
    }
    cells[index] = null;
  }
  return result;
}

/** Max for X, min for O; undefined when nothing was scored. */
export function bestScore(result: SearchResult, player: PlayerMark): number | undefined {
  if (result.size === 0) return undefined;
  const scores = Array.from(result.values());
  return player === 'X' ? Math.max(...scores) : Math.min(...scores);
}

export function bestOf(result: SearchResult, player: PlayerMark): number[] {
  const best = bestScore(result, player);
  if (best === undefined) return [];
  const moves: number[] = [];
  for (const [index, score] of result) {
    if (score === best) moves.push(index);
  }
  return moves.sort((a, b) => a - b);
}

export function bestMoves(player: PlayerMark, board: Board, maxDepth: number): number[] {
  const result = evaluate(board, player, 0, maxDepth);
  const moves = bestOf(result, player);
  if (env.nodeEnv === 'development') {
    console.debug(`[search] player=${player} depth=${maxDepth} best=${JSON.stringify(moves)}${dumpBoard(board.snapshot())}`);
  }
  return moves;
}

export function pickRandom<T>(items: readonly T[], random: RandomSource = Math.random): T {
  if (items.length === 0) throw new Error('Cannot pick from an empty list');
  const i = Math.min(items.length - 1, Math.floor(random() * items.length));
  return items[i];
}

/**
 * Chooses the computer's move. The opening move and every Easy move are random;
 * Medium and Hard pick among the best moves at their horizon, falling back to a
 * random legal move when the search scored nothing.
 */
export function chooseComputerMove(
  board: Board,
  mark: PlayerMark,
  difficulty: Difficulty,
  random: RandomSource = Math.random
): number {
  const legal = board.legalMoves();
  if (legal.length === 0) throw new Error('No legal moves left');
  if (board.isEmpty() || difficulty === 'easy') {
    return pickRandom(legal, random);
  }
  const candidates = bestMoves(mark, board, DIFFICULTY_DEPTH[difficulty]);
  return pickRandom(candidates.length > 0 ? candidates : legal, random);
}
