import type { CellValue } from './Grid.ts';

import {
  GRID_SIZE,
  Grid
} from './Grid.ts';
import {
  isDigitChar,
  toDigitOrNull
} from './typeGuards.ts';

const EMPTY_CHAR = '.';
const SEPARATOR_MARKER = '---';

/**
 * Reads a grid from its text form. Lines containing `---` are separators and
 * take no row. In a data line `.` is empty, a digit fills a cell (`0` leaves it
 * empty) and every other character is ignored. Anything missing stays empty;
 * malformed text never throws.
 */
export function parseGrid(text: string): Grid {
  const values: CellValue[] = Array.from({ length: GRID_SIZE * GRID_SIZE }, () => null);
  const lines = text.split('\n');
  if (lines.at(-1) === '') {
    lines.pop();
  }

  let rowIndex = 0;
  for (const line of lines) {
    if (rowIndex >= GRID_SIZE) {
      break;
    }
    if (line.includes(SEPARATOR_MARKER)) {
      continue;
    }
    let columnIndex = 0;
    for (const ch of line) {
      if (columnIndex >= GRID_SIZE) {
        break;
      }
      if (ch === EMPTY_CHAR) {
        columnIndex++;
      } else if (isDigitChar(ch)) {
        values[rowIndex * GRID_SIZE + columnIndex] = toDigitOrNull(ch);
        columnIndex++;
      }
    }
    rowIndex++;
  }
  return new Grid(values);
}
