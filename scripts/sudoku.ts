/**
 * Command-line front end for the Sudoku solver.
 *
 * Usage:
 *     npm run sudoku -- export puzzle.txt
 *     npm run sudoku -- solve puzzle.txt [--out solved.txt]
 *
 * `export` writes a blank puzzle and opens it in an editor so the givens can be
 * typed in. `solve` reads a puzzle, solves it and prints the result.
 *
 * Settings are read from sudoku.yaml in the working directory when present.
 */

/* eslint-disable no-console -- CLI script output. */

import type { SolverConfig } from '../src/index.ts';

import { spawnSync } from 'node:child_process';
import {
  existsSync,
  readFileSync,
  writeFileSync
} from 'node:fs';
import { join } from 'node:path';

import {
  createBlankPuzzleText,
  DEFAULT_SOLVER_CONFIG,
  parseSolverConfig,
  resolveEditor,
  solvePuzzleText,
  toTimeLimitMs
} from '../src/index.ts';

const FIRST_CLI_ARG_INDEX = 2;
const OUT_ARG_COUNT = 2;
const CONFIG_FILE = join(process.cwd(), 'sudoku.yaml');
const USAGE = 'Usage: npm run sudoku -- export <file.txt> | solve <file.txt> [--out <file.txt>]';

function exportPuzzle(config: SolverConfig, filePath: string): void {
  writeFileSync(filePath, createBlankPuzzleText(), 'utf-8');
  console.log('File saved. Opening editor...');

  const editor = resolveEditor(config, process.env, process.platform);
  const result = spawnSync(`${editor} "${filePath}"`, { shell: true, stdio: 'inherit' });
  if (result.error) {
    throw result.error;
  }
}

function loadConfig(): SolverConfig {
  if (!existsSync(CONFIG_FILE)) {
    return DEFAULT_SOLVER_CONFIG;
  }
  return parseSolverConfig(readFileSync(CONFIG_FILE, 'utf-8'));
}

function main(): void {
  const [command, filePath, ...rest] = process.argv.slice(FIRST_CLI_ARG_INDEX);
  if (command === undefined || filePath === undefined) {
    fail(USAGE);
  }

  const config = loadConfig();
  switch (command) {
    case 'export':
      exportPuzzle(config, filePath);
      break;
    case 'solve':
      solvePuzzleFile(config, filePath, parseOutPath(rest));
      break;
    default:
      fail(USAGE);
  }
}

function fail(message: string): never {
  console.error(message);
  process.exit(1);
}

function parseOutPath(args: readonly string[]): string | undefined {
  if (args.length === 0) {
    return undefined;
  }
  const [flag, outPath] = args;
  if (flag !== '--out' || outPath === undefined || args.length > OUT_ARG_COUNT) {
    fail(USAGE);
  }
  return outPath;
}

function solvePuzzleFile(config: SolverConfig, filePath: string, outPath: string | undefined): void {
  if (!existsSync(filePath)) {
    fail(`Error: ${filePath} not found`);
  }

  const report = solvePuzzleText(readFileSync(filePath, 'utf-8'), { timeLimitMs: toTimeLimitMs(config) });
  if (outPath !== undefined) {
    writeFileSync(outPath, report.text, 'utf-8');
  }
  if (report.outcome !== 'solved') {
    fail(report.message);
  }
  process.stdout.write(report.text);
}

main();

/* eslint-enable no-console -- End CLI script output. */
