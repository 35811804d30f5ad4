import {
  describe,
  expect,
  it
} from 'vitest';

import {
  DEFAULT_SOLVER_CONFIG,
  parseSolverConfig,
  resolveEditor,
  toTimeLimitMs
} from '../src/config.ts';

describe('parseSolverConfig', () => {
  it('returns the defaults for an empty document', () => {
    expect(parseSolverConfig('')).toEqual({ timeLimitSeconds: 5 });
    expect(parseSolverConfig('# nothing here\n')).toBe(DEFAULT_SOLVER_CONFIG);
  });

  it('reads the time limit and editor', () => {
    expect(parseSolverConfig('timeLimitSeconds: 2.5\neditor: " vim "\n')).toEqual({
      editor: 'vim',
      timeLimitSeconds: 2.5
    });
  });

  it('keeps the default time limit when only the editor is set', () => {
    expect(parseSolverConfig('editor: code --wait')).toEqual({ editor: 'code --wait', timeLimitSeconds: 5 });
  });

  it('accepts a zero time limit', () => {
    expect(parseSolverConfig('timeLimitSeconds: 0')).toEqual({ timeLimitSeconds: 0 });
  });

  it('throws for a document that is not a mapping', () => {
    expect(() => parseSolverConfig('- 1\n- 2\n')).toThrow('Config must be a mapping');
    expect(() => parseSolverConfig('42')).toThrow('Config must be a mapping');
  });

  it('throws for unknown keys', () => {
    expect(() => parseSolverConfig('timeout: 3')).toThrow('Unknown config key: timeout');
  });

  it('throws for a negative or non-numeric time limit', () => {
    expect(() => parseSolverConfig('timeLimitSeconds: -1')).toThrow('timeLimitSeconds must be a non-negative number');
    expect(() => parseSolverConfig('timeLimitSeconds: "5"')).toThrow('timeLimitSeconds must be a non-negative number');
  });

  it('throws for a blank editor', () => {
    expect(() => parseSolverConfig('editor: "  "')).toThrow('editor must be a non-empty string');
    expect(() => parseSolverConfig('editor: 3')).toThrow('editor must be a non-empty string');
  });
});

describe('resolveEditor', () => {
  it('prefers the configured editor', () => {
    expect(resolveEditor({ editor: 'micro', timeLimitSeconds: 5 }, { EDITOR: 'vi', VISUAL: 'emacs' }, 'linux')).toBe('micro');
  });

  it('falls back to VISUAL, then EDITOR', () => {
    expect(resolveEditor(DEFAULT_SOLVER_CONFIG, { EDITOR: 'vi', VISUAL: 'emacs' }, 'linux')).toBe('emacs');
    expect(resolveEditor(DEFAULT_SOLVER_CONFIG, { EDITOR: 'vi' }, 'linux')).toBe('vi');
  });

  it('uses the platform default last', () => {
    expect(resolveEditor(DEFAULT_SOLVER_CONFIG, {}, 'linux')).toBe('nano');
    expect(resolveEditor(DEFAULT_SOLVER_CONFIG, {}, 'win32')).toBe('notepad');
  });
});

describe('toTimeLimitMs', () => {
  it('converts seconds to milliseconds', () => {
    expect(toTimeLimitMs({ timeLimitSeconds: 2.5 })).toBe(2500);
    expect(toTimeLimitMs(DEFAULT_SOLVER_CONFIG)).toBe(5000);
  });
});
