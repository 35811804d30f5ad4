export type Digit = 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9;

export const DIGITS: readonly Digit[] = [1, 2, 3, 4, 5, 6, 7, 8, 9];

const CHAR_CODE_ZERO = 48;
const MAX_DIGIT = 9;

export function assertDefined<T>(value: T | undefined, errorOrMessage?: Error | string): asserts value is T {
  if (value !== undefined) {
    return;
  }
  errorOrMessage ??= 'Value is undefined';
  throw typeof errorOrMessage === 'string' ? new Error(errorOrMessage) : errorOrMessage;
}

export function ensureDefined<T>(value: T | undefined, errorOrMessage?: Error | string): T {
  assertDefined(value, errorOrMessage);
  return value;
}

/**
 * Narrows a number to a placeable digit. Zero is not a digit here: it is how
 * an empty cell is written in the text format.
 */
export function isDigit(value: number): value is Digit {
  return Number.isInteger(value) && value >= 1 && value <= MAX_DIGIT;
}

export function isDigitChar(ch: string): boolean {
  return ch.length === 1 && ch >= '0' && ch <= '9';
}

export function toDigitOrNull(ch: string): Digit | null {
  const value = ch.charCodeAt(0) - CHAR_CODE_ZERO;
  return isDigit(value) ? value : null;
}
