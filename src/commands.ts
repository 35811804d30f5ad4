import type {
  SolveOptions,
  SolveOutcome
} from './BacktrackingSolver.ts';

import { solve } from './BacktrackingSolver.ts';
import { Grid } from './Grid.ts';
import { parseGrid } from './parsers.ts';

export interface SolveReport {
  readonly message: string;
  readonly outcome: SolveOutcome;
  readonly text: string;
}

const OUTCOME_MESSAGES: Record<SolveOutcome, string> = {
  solved: 'Solved.',
  timedOut: 'Solver timed out! Puzzle may not be solvable.',
  unsolvable: 'No solution found!'
};

export function createBlankPuzzleText(): string {
  return Grid.empty().toText();
}

/**
 * Parses puzzle text, solves it and renders the grid as it stands afterwards,
 * whatever the outcome.
 */
export function solvePuzzleText(text: string, options: SolveOptions): SolveReport {
  const grid = parseGrid(text);
  const outcome = solve(grid, options);
  return {
    message: OUTCOME_MESSAGES[outcome],
    outcome,
    text: grid.toText()
  };
}
