import type { Digit } from './typeGuards.ts';

import {
  DIGITS,
  ensureDefined
} from './typeGuards.ts';

export type CellValue = Digit | null;

export interface CellPosition {
  readonly columnIndex: number;
  readonly rowIndex: number;
}

export interface GridConflict {
  readonly digit: Digit;
  readonly house: HouseType;
  readonly index: number;
}

export type HouseType = 'box' | 'column' | 'row';

export const BOX_SIZE = 3;
export const GRID_SIZE = 9;

const CELL_COUNT = GRID_SIZE * GRID_SIZE;
const EMPTY_CHAR = '.';
const COLUMN_SEPARATOR = '|';
const ROW_SEPARATOR = '-----------';
const HOUSE_TYPES: readonly HouseType[] = ['row', 'column', 'box'];

/**
 * 9x9 Sudoku board. Cells hold a digit or `null` when empty.
 *
 * The grid is mutable: the solver places and clears digits in place.
 */
export class Grid {
  public get isComplete(): boolean {
    return this.cells.every((value) => value !== null);
  }

  private readonly cells: CellValue[];

  public constructor(values?: Iterable<CellValue>) {
    this.cells = values === undefined ? Array.from({ length: CELL_COUNT }, () => null) : [...values];
    if (this.cells.length !== CELL_COUNT) {
      throw new RangeError(`Grid needs ${String(CELL_COUNT)} cells, got ${String(this.cells.length)}`);
    }
  }

  public static empty(): Grid {
    return new Grid();
  }

  public clearValue(rowIndex: number, columnIndex: number): void {
    this.cells[toCellIndex(rowIndex, columnIndex)] = null;
  }

  public clone(): Grid {
    return new Grid(this.cells);
  }

  public equals(other: Grid): boolean {
    return this.cells.every((value, index) => value === other.cells[index]);
  }

  /**
   * Lists each digit that appears more than once in a row, column or box.
   */
  public findConflicts(): GridConflict[] {
    const conflicts: GridConflict[] = [];
    for (const house of HOUSE_TYPES) {
      for (let index = 0; index < GRID_SIZE; index++) {
        const counts = new Map<Digit, number>();
        for (const { columnIndex, rowIndex } of getHousePositions(house, index)) {
          const value = this.getValue(rowIndex, columnIndex);
          if (value !== null) {
            counts.set(value, (counts.get(value) ?? 0) + 1);
          }
        }
        for (const digit of DIGITS) {
          if ((counts.get(digit) ?? 0) > 1) {
            conflicts.push({ digit, house, index });
          }
        }
      }
    }
    return conflicts;
  }

  public findFirstEmpty(): CellPosition | null {
    const index = this.cells.indexOf(null);
    if (index < 0) {
      return null;
    }
    return {
      columnIndex: index % GRID_SIZE,
      rowIndex: Math.floor(index / GRID_SIZE)
    };
  }

  public getRow(rowIndex: number): CellValue[] {
    const start = toCellIndex(rowIndex, 0);
    return this.cells.slice(start, start + GRID_SIZE);
  }

  public getValue(rowIndex: number, columnIndex: number): CellValue {
    return ensureDefined(this.cells[toCellIndex(rowIndex, columnIndex)]);
  }

  /**
   * True when no other cell sharing a row, column or box with the given cell
   * holds `digit`. The cell's own value is not considered.
   */
  public isPlacementSafe(rowIndex: number, columnIndex: number, digit: Digit): boolean {
    toCellIndex(rowIndex, columnIndex);
    for (let i = 0; i < GRID_SIZE; i++) {
      if (i !== columnIndex && this.getValue(rowIndex, i) === digit) {
        return false;
      }
      if (i !== rowIndex && this.getValue(i, columnIndex) === digit) {
        return false;
      }
    }
    const boxRow = rowIndex - rowIndex % BOX_SIZE;
    const boxColumn = columnIndex - columnIndex % BOX_SIZE;
    for (let r = boxRow; r < boxRow + BOX_SIZE; r++) {
      for (let c = boxColumn; c < boxColumn + BOX_SIZE; c++) {
        if ((r !== rowIndex || c !== columnIndex) && this.getValue(r, c) === digit) {
          return false;
        }
      }
    }
    return true;
  }

  public setValue(rowIndex: number, columnIndex: number, digit: Digit): void {
    this.cells[toCellIndex(rowIndex, columnIndex)] = digit;
  }

  public toText(): string {
    const lines: string[] = [];
    for (let r = 0; r < GRID_SIZE; r++) {
      let line = '';
      for (let c = 0; c < GRID_SIZE; c++) {
        line += String(this.getValue(r, c) ?? EMPTY_CHAR);
        if ((c + 1) % BOX_SIZE === 0 && c + 1 !== GRID_SIZE) {
          line += COLUMN_SEPARATOR;
        }
      }
      lines.push(line);
      if ((r + 1) % BOX_SIZE === 0 && r + 1 !== GRID_SIZE) {
        lines.push(ROW_SEPARATOR);
      }
    }
    return lines.map((line) => `${line}\n`).join('');
  }
}

function getHousePositions(house: HouseType, index: number): CellPosition[] {
  const positions: CellPosition[] = [];
  for (let i = 0; i < GRID_SIZE; i++) {
    switch (house) {
      case 'box':
        positions.push({
          columnIndex: (index % BOX_SIZE) * BOX_SIZE + i % BOX_SIZE,
          rowIndex: Math.floor(index / BOX_SIZE) * BOX_SIZE + Math.floor(i / BOX_SIZE)
        });
        break;
      case 'column':
        positions.push({ columnIndex: index, rowIndex: i });
        break;
      case 'row':
        positions.push({ columnIndex: i, rowIndex: index });
        break;
      default:
        throw new Error(`Unknown house: ${String(house)}`);
    }
  }
  return positions;
}

function toCellIndex(rowIndex: number, columnIndex: number): number {
  if (!isGridIndex(rowIndex) || !isGridIndex(columnIndex)) {
    throw new RangeError(`Cell out of range: row ${String(rowIndex)}, column ${String(columnIndex)}`);
  }
  return rowIndex * GRID_SIZE + columnIndex;
}

function isGridIndex(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value < GRID_SIZE;
}
