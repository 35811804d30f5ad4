import {
  describe,
  expect,
  it
} from 'vitest';

import { Grid } from '../src/Grid.ts';
import { parseGrid } from '../src/parsers.ts';
import { readFixture } from './gridTestHelper.ts';

const EMPTY_ROW = [null, null, null, null, null, null, null, null, null];

describe('parseGrid', () => {
  it('reads dots as empty and digits as values, skipping box bars', () => {
    expect(parseGrid('53.|.7.|...').getRow(0)).toEqual([5, 3, null, null, 7, null, null, null, null]);
  });

  it('skips separator lines without using a row', () => {
    const grid = parseGrid('----------\n53.|.7.|...\n');
    expect(grid.getRow(0)).toEqual([5, 3, null, null, 7, null, null, null, null]);
    expect(grid.getRow(1)).toEqual(EMPTY_ROW);
  });

  it('treats 0 as an empty cell that still takes a column', () => {
    expect(parseGrid('102').getRow(0)).toEqual([1, null, 2, null, null, null, null, null, null]);
  });

  it('ignores characters that are neither digits nor dots', () => {
    expect(parseGrid('1 2 x3\r').getRow(0)).toEqual([1, 2, 3, null, null, null, null, null, null]);
  });

  it('stops a row after nine cells', () => {
    const grid = parseGrid('123456789999\n4');
    expect(grid.getRow(0)).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9]);
    expect(grid.getRow(1)).toEqual([4, null, null, null, null, null, null, null, null]);
  });

  it('uses a row for a blank line', () => {
    const grid = parseGrid('\n5');
    expect(grid.getRow(0)).toEqual(EMPTY_ROW);
    expect(grid.getRow(1)).toEqual([5, null, null, null, null, null, null, null, null]);
  });

  it('handles CRLF line endings', () => {
    const grid = parseGrid('12.\r\n34\r\n');
    expect(grid.getRow(0)).toEqual([1, 2, null, null, null, null, null, null, null]);
    expect(grid.getRow(1)).toEqual([3, 4, null, null, null, null, null, null, null]);
  });

  it('ignores data lines after the ninth row', () => {
    const text = `${'.........\n'.repeat(9)}123456789\n`;
    expect(parseGrid(text).equals(Grid.empty())).toBe(true);
  });

  it('returns an empty grid for text without cells', () => {
    expect(parseGrid('').equals(Grid.empty())).toBe(true);
    expect(parseGrid('hello world').equals(Grid.empty())).toBe(true);
  });

  it('reads a full puzzle file', () => {
    const grid = parseGrid(readFixture('forced.txt'));
    expect(grid.getRow(0)).toEqual([null, 2, 3, 4, 5, 6, 7, 8, 9]);
    expect(grid.getRow(4)).toEqual(EMPTY_ROW);
    expect(grid.getRow(8)).toEqual([9, 1, 2, 3, 4, 5, 6, 7, null]);
  });

  it('reads back what toText writes', () => {
    const grid = Grid.empty();
    grid.setValue(0, 0, 1);
    grid.setValue(3, 4, 8);
    grid.setValue(8, 8, 9);
    expect(parseGrid(grid.toText()).equals(grid)).toBe(true);
  });
});
