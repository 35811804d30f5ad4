import type { Grid } from './Grid.ts';

import { DIGITS } from './typeGuards.ts';

/** Milliseconds from a monotonic source. */
export type Clock = () => number;

export type SolveOutcome = 'solved' | 'timedOut' | 'unsolvable';

export interface SolveOptions {
  readonly clock?: Clock;
  readonly timeLimitMs: number;
}

interface SearchContext {
  readonly clock: Clock;
  readonly grid: Grid;
  readonly startedAt: number;
  readonly timeLimitMs: number;
  timedOut: boolean;
}

export const DEFAULT_TIME_LIMIT_MS = 5000;

function defaultClock(): number {
  return performance.now();
}

/**
 * Fills the grid in place by depth-first search: the first empty cell in
 * row-major order gets digits 1..9 in ascending order, and placements are
 * undone when the search below them fails.
 *
 * - `solved`: the grid is complete.
 * - `unsolvable`: every placement was undone, the grid is as it was.
 * - `timedOut`: placements in flight when the deadline was seen are left in
 *   the grid.
 *
 * The clock is read once per recursive call, so a deadline overrun is bounded
 * by one cell's worth of safety checks.
 */
export function solve(grid: Grid, options: SolveOptions): SolveOutcome {
  const { timeLimitMs } = options;
  if (!Number.isFinite(timeLimitMs) || timeLimitMs < 0) {
    throw new RangeError(`timeLimitMs must be a non-negative finite number: ${String(timeLimitMs)}`);
  }
  const clock = options.clock ?? defaultClock;
  const context: SearchContext = {
    clock,
    grid,
    startedAt: clock(),
    timedOut: false,
    timeLimitMs
  };

  if (backtrack(context)) {
    return 'solved';
  }
  return context.timedOut ? 'timedOut' : 'unsolvable';
}

function backtrack(context: SearchContext): boolean {
  if (context.clock() - context.startedAt > context.timeLimitMs) {
    context.timedOut = true;
    return false;
  }

  const { grid } = context;
  const position = grid.findFirstEmpty();
  if (position === null) {
    return true;
  }

  const { columnIndex, rowIndex } = position;
  for (const digit of DIGITS) {
    if (!grid.isPlacementSafe(rowIndex, columnIndex, digit)) {
      continue;
    }
    grid.setValue(rowIndex, columnIndex, digit);
    if (backtrack(context)) {
      return true;
    }
    if (context.timedOut) {
      return false;
    }
    grid.clearValue(rowIndex, columnIndex);
  }
  return false;
}
