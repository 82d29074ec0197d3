import { Keyboard, MenuShape } from '../types/game';
import { Board } from '../services/board';

const DIFFICULTY_MENU: Keyboard = [
  [{ text: 'Easy', data: 'facil' }],
  [{ text: 'Medium', data: 'medio' }],
  [{ text: 'Hard', data: 'dificil' }],
];

const SYMBOL_MENU: Keyboard = [
  [{ text: 'X', data: 'X' }],
  [{ text: 'O', data: 'O' }],
];

// Cell buttons carry the 1-indexed position.
function boardKeyboard(board: Board): Keyboard {
  const rows: Keyboard = [];
  for (let row = 0; row < 3; row++) {
    rows.push(
      [0, 1, 2].map((col) => {
        const index = row * 3 + col;
        return { text: board.cellAt(index) ?? ' ', data: String(index + 1) };
      })
    );
  }
  rows.push([{ text: 'Restart', data: 'restart' }]);
  return rows;
}

export function buildKeyboard(menu: MenuShape, board: Board): Keyboard {
  switch (menu) {
    case 'difficulty':
      return DIFFICULTY_MENU;
    case 'symbol':
      return SYMBOL_MENU;
    case 'board':
      return boardKeyboard(board);
  }
}
