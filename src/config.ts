import yaml from 'js-yaml';

import { DEFAULT_TIME_LIMIT_MS } from './BacktrackingSolver.ts';

export interface SolverConfig {
  readonly editor?: string;
  readonly timeLimitSeconds: number;
}

interface YamlConfig {
  editor?: unknown;
  timeLimitSeconds?: unknown;
}

const MS_PER_SECOND = 1000;
const KNOWN_KEYS = new Set(['editor', 'timeLimitSeconds']);

export const DEFAULT_SOLVER_CONFIG: SolverConfig = {
  timeLimitSeconds: DEFAULT_TIME_LIMIT_MS / MS_PER_SECOND
};

export function parseSolverConfig(text: string): SolverConfig {
  const raw = yaml.load(text);
  if (raw === undefined || raw === null) {
    return DEFAULT_SOLVER_CONFIG;
  }
  if (typeof raw !== 'object' || Array.isArray(raw)) {
    throw new Error('Config must be a mapping');
  }

  for (const key of Object.keys(raw)) {
    if (!KNOWN_KEYS.has(key)) {
      throw new Error(`Unknown config key: ${key}`);
    }
  }

  const spec = raw as YamlConfig;
  let timeLimitSeconds = DEFAULT_SOLVER_CONFIG.timeLimitSeconds;
  if (spec.timeLimitSeconds !== undefined) {
    if (typeof spec.timeLimitSeconds !== 'number' || !Number.isFinite(spec.timeLimitSeconds) || spec.timeLimitSeconds < 0) {
      throw new Error('timeLimitSeconds must be a non-negative number');
    }
    timeLimitSeconds = spec.timeLimitSeconds;
  }

  if (spec.editor === undefined) {
    return { timeLimitSeconds };
  }
  if (typeof spec.editor !== 'string' || !spec.editor.trim()) {
    throw new Error('editor must be a non-empty string');
  }
  return { editor: spec.editor.trim(), timeLimitSeconds };
}

/**
 * Picks the command used to edit an exported puzzle: the configured editor,
 * then `$VISUAL`, then `$EDITOR`, then the platform default.
 */
export function resolveEditor(config: SolverConfig, env: NodeJS.ProcessEnv, platform: NodeJS.Platform): string {
  return config.editor ?? env['VISUAL'] ?? env['EDITOR'] ?? (platform === 'win32' ? 'notepad' : 'nano');
}

export function toTimeLimitMs(config: SolverConfig): number {
  return config.timeLimitSeconds * MS_PER_SECOND;
}
