export {
  type Clock,
  DEFAULT_TIME_LIMIT_MS,
  solve,
  type SolveOptions,
  type SolveOutcome
} from './BacktrackingSolver.ts';
export {
  createBlankPuzzleText,
  type SolveReport,
  solvePuzzleText
} from './commands.ts';
export {
  DEFAULT_SOLVER_CONFIG,
  parseSolverConfig,
  resolveEditor,
  type SolverConfig,
  toTimeLimitMs
} from './config.ts';
export {
  BOX_SIZE,
  type CellPosition,
  type CellValue,
  Grid,
  type GridConflict,
  GRID_SIZE,
  type HouseType
} from './Grid.ts';
export { parseGrid } from './parsers.ts';
export {
  type Digit,
  DIGITS
} from './typeGuards.ts';
